// ──────────────────────────────────────────
// Domain contracts — typed interfaces between layers
// ──────────────────────────────────────────

import { TransformerRecord } from './types';

/**
 * Row source contract — exposed to the query and maintenance services.
 * Implementations log storage failures and answer with an empty result
 * instead of throwing.
 */
export interface RecordSource {
  /** Valid rows ordered by (customer, serial). */
  findAllValid(): Promise<TransformerRecord[]>;
  /** Valid rows for one customer ordered by (contract, serial). */
  findValidByCustomer(customerName: string): Promise<TransformerRecord[]>;
  findDistinctCustomers(): Promise<string[]>;
  findDistinctContractIds(): Promise<string[]>;
  countValid(): Promise<number>;
  /** Count-then-delete of rows with a null or empty key field, in one transaction. */
  deleteInvalid(): Promise<number>;
  ping(): Promise<boolean>;
}
