// ──────────────────────────────────────────
// Customers: flat rows → customer / contract / transformer tree
// ──────────────────────────────────────────

import { ContractSummary, CustomerSummary, TransformerEntry, TransformerRecord } from '../../shared/types';

export type AggregatorInput = Pick<TransformerRecord, 'serial' | 'contract' | 'customer'> & {
  power?: number | string | null;
};

interface CustomerAccumulator {
  customerName: string;
  contracts: Map<string, ContractSummary>;
  totalTransformers: number;
  totalPower: number;
}

/** Absent, non-numeric and negative values count as zero. */
export function coercePower(value: number | string | null | undefined): number {
  if (value === null || value === undefined) return 0;
  const n = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(n) && n > 0 ? n : 0;
}

/** Plain code-unit ordering, so 'Zeta' sorts before 'acme'. */
export function compareKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Groups rows by customer, then by contract, keeping running totals on both
 * levels. Input order is irrelevant to the result except for the order of
 * transformers inside a contract, which follows the input. Rows are not
 * validated: whatever key value is present (including '') becomes a group.
 */
export function aggregateCustomers(records: Iterable<AggregatorInput>): CustomerSummary[] {
  const customers = new Map<string, CustomerAccumulator>();

  for (const record of records) {
    const power = coercePower(record.power);

    let customer = customers.get(record.customer);
    if (!customer) {
      customer = {
        customerName: record.customer,
        contracts: new Map(),
        totalTransformers: 0,
        totalPower: 0,
      };
      customers.set(record.customer, customer);
    }

    let contract = customer.contracts.get(record.contract);
    if (!contract) {
      contract = {
        contractId: record.contract,
        transformers: [],
        transformerCount: 0,
        totalPower: 0,
      };
      customer.contracts.set(record.contract, contract);
    }

    // Each row is one transformer, repeated serials included
    const entry: TransformerEntry = { serial: record.serial, power };
    contract.transformers.push(entry);
    contract.transformerCount += 1;
    contract.totalPower += power;

    customer.totalTransformers += 1;
    customer.totalPower += power;
  }

  return Array.from(customers.values())
    .map(
      (customer): CustomerSummary => ({
        customerName: customer.customerName,
        contracts: Array.from(customer.contracts.values()).sort((a, b) =>
          compareKeys(a.contractId, b.contractId)
        ),
        uniqueContractCount: customer.contracts.size,
        totalTransformers: customer.totalTransformers,
        totalPower: customer.totalPower,
      })
    )
    .sort((a, b) => compareKeys(a.customerName, b.customerName));
}
