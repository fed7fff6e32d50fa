// ──────────────────────────────────────────
// Script: Seed — migrate, then load a small demo data set
// (includes a few invalid rows for POST /api/cleanup to remove)
// ──────────────────────────────────────────

import dotenv from 'dotenv';
dotenv.config();

import { loadConfig } from '../src/config';
import { createDb } from '../src/db/connection';
import { migrations } from '../src/db/knexfile';
import logger, { errorMessage } from '../src/lib/logger';
import { TransformerRow } from '../src/shared/types';

const DEMO_ROWS: TransformerRow[] = [
  { serial: 'TR-1001', contract: 'CT-2019-004', customer: 'Northfield Water Board', power: '630.00' },
  { serial: 'TR-1002', contract: 'CT-2019-004', customer: 'Northfield Water Board', power: '630.00' },
  { serial: 'TR-1003', contract: 'CT-2021-017', customer: 'Northfield Water Board', power: '1250.00' },
  { serial: 'TR-2001', contract: 'CT-2020-009', customer: 'Eastgate Steelworks', power: '2500.00' },
  { serial: 'TR-2002', contract: 'CT-2020-009', customer: 'Eastgate Steelworks', power: null },
  { serial: 'TR-2003', contract: 'CT-2022-031', customer: 'Eastgate Steelworks', power: '400.00' },
  { serial: 'TR-3001', contract: 'CT-2018-002', customer: 'Harbor Rail Depot', power: '160.00' },
  { serial: 'TR-3002', contract: 'CT-2023-044', customer: 'Harbor Rail Depot', power: '250.00' },
  // Invalid: missing key fields
  { serial: '', contract: 'CT-2023-050', customer: 'Harbor Rail Depot', power: '100.00' },
  { serial: 'TR-9001', contract: null, customer: 'Eastgate Steelworks', power: '315.00' },
  { serial: 'TR-9002', contract: 'CT-2024-001', customer: '', power: '50.00' },
];

async function seed() {
  const config = loadConfig();
  const db = createDb(config.db);
  const table = config.db.table;

  try {
    logger.info('[Seed] Running migrations...');
    await db.migrate.latest(migrations);

    logger.info(`[Seed] Clearing ${table}...`);
    await db(table).del();

    await db(table).insert(DEMO_ROWS);
    logger.info(`[Seed] Inserted ${DEMO_ROWS.length} rows into ${table}`);
  } finally {
    await db.destroy();
  }
}

seed().catch((err) => {
  logger.error(`[Seed] Error: ${errorMessage(err)}`);
  process.exit(1);
});
