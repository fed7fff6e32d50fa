// ──────────────────────────────────────────
// Migration: create the transformer records table
// ──────────────────────────────────────────
// Key columns stay nullable: rows arrive from external loaders and
// invalid ones are removed by POST /api/cleanup, not rejected on insert.

import { Knex } from 'knex';
import { loadConfig } from '../../config';

const { table } = loadConfig().db;

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable(table, (t) => {
    t.increments('id');
    t.string('serial', 100);
    t.string('contract', 100);
    t.string('customer', 255);
    t.decimal('power', 12, 2);

    t.index(['customer', 'serial']);
    t.index(['customer', 'contract']);
    t.index(['contract']);
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists(table);
}
