// ──────────────────────────────────────────
// Script: Reset — drop the records table and re-run migrations
// ──────────────────────────────────────────

import dotenv from 'dotenv';
dotenv.config();

import { loadConfig } from '../src/config';
import { createDb } from '../src/db/connection';
import { migrations } from '../src/db/knexfile';
import logger, { errorMessage } from '../src/lib/logger';

async function reset() {
  const config = loadConfig();
  const db = createDb(config.db);

  try {
    logger.info(`[Reset] Dropping ${config.db.table}...`);
    await db.schema.dropTableIfExists(config.db.table);
    await db.schema.dropTableIfExists('knex_migrations');
    await db.schema.dropTableIfExists('knex_migrations_lock');

    logger.info('[Reset] Running migrations...');
    await db.migrate.latest(migrations);
    logger.info('[Reset] Done — table recreated');
  } finally {
    await db.destroy();
  }
}

reset().catch((err) => {
  logger.error(`[Reset] Error: ${errorMessage(err)}`);
  process.exit(1);
});
