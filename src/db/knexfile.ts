// ──────────────────────────────────────────
// Knex configuration — shared by the migrate, seed and reset scripts
// ──────────────────────────────────────────

import dotenv from 'dotenv';
import path from 'path';
import { Knex } from 'knex';
import { loadConfig } from '../config';

dotenv.config({ path: path.resolve(__dirname, '../../.env') });

export const migrations: Knex.MigratorConfig = {
  directory: path.resolve(__dirname, 'migrations'),
  extension: 'ts',
};

const { db } = loadConfig();

const config: Knex.Config = {
  client: 'pg',
  connection: db.url,
  pool: { min: db.poolMin, max: db.poolMax },
  acquireConnectionTimeout: db.acquireTimeoutMs,
  migrations,
};

export default config;
