// ──────────────────────────────────────────
// Customers: read-side query service
// ──────────────────────────────────────────

import { RecordSource } from '../../shared/contracts';
import { CustomerSummary, TransformerRecord } from '../../shared/types';
import { aggregateCustomers } from './aggregator';

export class CustomerQueryService {
  constructor(private records: RecordSource) {}

  async listAll(): Promise<TransformerRecord[]> {
    return this.records.findAllValid();
  }

  async listUniqueCustomerNames(): Promise<string[]> {
    return this.records.findDistinctCustomers();
  }

  async listContractsForCustomer(customerName: string): Promise<TransformerRecord[]> {
    return this.records.findValidByCustomer(customerName);
  }

  async listDistinctContractIds(): Promise<string[]> {
    return this.records.findDistinctContractIds();
  }

  async getCustomersWithContracts(): Promise<CustomerSummary[]> {
    const rows = await this.records.findAllValid();
    return aggregateCustomers(rows);
  }

  /** Customers holding at least one valid contract — not a row count. */
  async countDistinctCustomersWithContracts(): Promise<number> {
    const customers = await this.getCustomersWithContracts();
    return customers.length;
  }

  async countValidRecords(): Promise<number> {
    return this.records.countValid();
  }
}
