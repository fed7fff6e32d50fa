import { RecordSource } from '../../src/shared/contracts';
import { TransformerRecord, TransformerRow } from '../../src/shared/types';
import { compareKeys } from '../../src/domains/customers/aggregator';
import { toRecord } from '../../src/domains/customers/transformer-record.repo';

function isBlank(value: string | null): boolean {
  return value === null || value === '';
}

function isValid(row: TransformerRow): boolean {
  return !isBlank(row.customer) && !isBlank(row.contract) && !isBlank(row.serial);
}

function byKeys(...keys: Array<'customer' | 'contract' | 'serial'>) {
  return (a: TransformerRecord, b: TransformerRecord): number => {
    for (const key of keys) {
      const diff = compareKeys(a[key], b[key]);
      if (diff !== 0) return diff;
    }
    return 0;
  };
}

function distinctSorted(values: string[]): string[] {
  return Array.from(new Set(values)).sort(compareKeys);
}

/** Array-backed stand-in for TransformerRecordRepo with the same filtering rules. */
export class InMemoryRecords implements RecordSource {
  reachable = true;

  constructor(public rows: TransformerRow[] = []) {}

  private valid(): TransformerRecord[] {
    if (!this.reachable) return [];
    return this.rows.filter(isValid).map(toRecord);
  }

  async findAllValid(): Promise<TransformerRecord[]> {
    return this.valid().sort(byKeys('customer', 'serial'));
  }

  async findValidByCustomer(customerName: string): Promise<TransformerRecord[]> {
    return this.valid()
      .filter((r) => r.customer === customerName)
      .sort(byKeys('contract', 'serial'));
  }

  async findDistinctCustomers(): Promise<string[]> {
    return distinctSorted(this.valid().map((r) => r.customer));
  }

  async findDistinctContractIds(): Promise<string[]> {
    if (!this.reachable) return [];
    const ids: string[] = [];
    for (const row of this.rows) {
      if (row.contract !== null && row.contract !== '') ids.push(row.contract);
    }
    return distinctSorted(ids);
  }

  async countValid(): Promise<number> {
    return this.valid().length;
  }

  async deleteInvalid(): Promise<number> {
    if (!this.reachable) return 0;
    const before = this.rows.length;
    this.rows = this.rows.filter(isValid);
    return before - this.rows.length;
  }

  async ping(): Promise<boolean> {
    return this.reachable;
  }
}

export function row(
  serial: string | null,
  contract: string | null,
  customer: string | null,
  power: string | number | null
): TransformerRow {
  return { serial, contract, customer, power };
}
