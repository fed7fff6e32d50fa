// ──────────────────────────────────────────
// Database connection — Knex instance
// ──────────────────────────────────────────

import knex, { Knex } from 'knex';
import { AppConfig } from '../config';

export function createDb(config: AppConfig['db']): Knex {
  return knex({
    client: 'pg',
    connection: config.url,
    pool: { min: config.poolMin, max: config.poolMax },
    // Checkout waits for a free connection up to this bound, then rejects
    acquireConnectionTimeout: config.acquireTimeoutMs,
  });
}
