// ──────────────────────────────────────────
// Script: Migrate — apply pending migrations (run under tsx so the
// TypeScript knexfile and migrations load without a register hook)
// ──────────────────────────────────────────

import knex from 'knex';
import config from '../src/db/knexfile';
import logger, { errorMessage } from '../src/lib/logger';

async function migrate() {
  const db = knex(config);

  try {
    const [batch, applied] = await db.migrate.latest();
    if (applied.length === 0) {
      logger.info('[Migrate] Already up to date');
    } else {
      logger.info(`[Migrate] Batch ${batch} applied: ${applied.join(', ')}`);
    }
  } finally {
    await db.destroy();
  }
}

migrate().catch((err) => {
  logger.error(`[Migrate] Error: ${errorMessage(err)}`);
  process.exit(1);
});
