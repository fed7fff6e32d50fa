// ──────────────────────────────────────────
// Customers: transformer record repository
// ──────────────────────────────────────────

import { Knex } from 'knex';
import { RecordSource } from '../../shared/contracts';
import { TransformerRecord, TransformerRow } from '../../shared/types';
import logger, { errorMessage } from '../../lib/logger';

const COLUMNS = ['serial', 'contract', 'customer', 'power'] as const;
const KEY_COLUMNS = ['customer', 'contract', 'serial'] as const;

/** Restricts a query to rows whose key columns are all non-null and non-empty. */
export function whereValid(query: Knex.QueryBuilder): Knex.QueryBuilder {
  for (const column of KEY_COLUMNS) {
    query.whereNotNull(column).where(column, '<>', '');
  }
  return query;
}

/** Restricts a query to rows with at least one null or empty key column. */
export function whereInvalid(query: Knex.QueryBuilder): Knex.QueryBuilder {
  return query.where((w) => {
    for (const column of KEY_COLUMNS) {
      w.orWhereNull(column).orWhere(column, '');
    }
  });
}

export function toRecord(row: TransformerRow): TransformerRecord {
  return {
    serial: row.serial ?? '',
    contract: row.contract ?? '',
    customer: row.customer ?? '',
    // Passed through as stored; clamping belongs to the aggregator
    power: row.power === null ? null : Number(row.power),
  };
}

export class TransformerRecordRepo implements RecordSource {
  constructor(private db: Knex, private table: string) {}

  async findAllValid(): Promise<TransformerRecord[]> {
    return this.guarded<TransformerRecord[]>('fetching records', [], async () => {
      const rows: TransformerRow[] = await this.allValidQuery();
      return rows.map(toRecord);
    });
  }

  async findValidByCustomer(customerName: string): Promise<TransformerRecord[]> {
    return this.guarded<TransformerRecord[]>('fetching contracts by customer', [], async () => {
      const rows: TransformerRow[] = await this.byCustomerQuery(customerName);
      return rows.map(toRecord);
    });
  }

  async findDistinctCustomers(): Promise<string[]> {
    return this.guarded<string[]>('fetching unique customers', [], async () => {
      const rows: Array<{ customer: string }> = await this.distinctCustomersQuery();
      return rows.map((r) => r.customer);
    });
  }

  async findDistinctContractIds(): Promise<string[]> {
    return this.guarded<string[]>('fetching unique contract ids', [], async () => {
      const rows: Array<{ contract: string }> = await this.distinctContractsQuery();
      return rows.map((r) => r.contract);
    });
  }

  async countValid(): Promise<number> {
    return this.guarded('counting records', 0, async () => {
      const [row] = await whereValid(this.db(this.table)).count('* as count');
      return Number(row?.count ?? 0);
    });
  }

  async deleteInvalid(): Promise<number> {
    return this.guarded('cleaning up invalid records', 0, () =>
      this.inTransaction((trx) => this.purgeInvalid(trx))
    );
  }

  async inTransaction<T>(fn: (trx: Knex) => Promise<T>): Promise<T> {
    return this.db.transaction((trx) => fn(trx));
  }

  /** Count-then-delete on one connection; callers run it inside a transaction. */
  async purgeInvalid(conn: Knex): Promise<number> {
    const toDelete = await this.countInvalid(conn);

    if (toDelete > 0) {
      await this.removeInvalid(conn);
      logger.info(`Cleaned up ${toDelete} invalid records`, { table: this.table });
    }
    return toDelete;
  }

  async countInvalid(conn: Knex): Promise<number> {
    const [row] = await whereInvalid(conn(this.table)).count('* as count');
    return Number(row?.count ?? 0);
  }

  async removeInvalid(conn: Knex): Promise<number> {
    const deleted: number = await whereInvalid(conn(this.table)).del();
    return deleted;
  }

  async ping(): Promise<boolean> {
    return this.guarded('checking database connection', false, async () => {
      await this.db.raw('select 1');
      return true;
    });
  }

  // ── Query builders (exposed for SQL shape tests) ──

  allValidQuery(): Knex.QueryBuilder {
    return whereValid(this.db(this.table))
      .select(...COLUMNS)
      .orderBy([{ column: 'customer' }, { column: 'serial' }]);
  }

  byCustomerQuery(customerName: string): Knex.QueryBuilder {
    return whereValid(this.db(this.table).where('customer', customerName))
      .select(...COLUMNS)
      .orderBy([{ column: 'contract' }, { column: 'serial' }]);
  }

  distinctCustomersQuery(): Knex.QueryBuilder {
    return whereValid(this.db(this.table)).distinct('customer').orderBy('customer');
  }

  /** Only the contract column is filtered here, as the legacy endpoint expects. */
  distinctContractsQuery(): Knex.QueryBuilder {
    return this.db(this.table)
      .whereNotNull('contract')
      .where('contract', '<>', '')
      .distinct('contract')
      .orderBy('contract');
  }

  private async guarded<T>(action: string, fallback: T, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      logger.error(`Error ${action}: ${errorMessage(err)}`, { table: this.table });
      return fallback;
    }
  }
}
