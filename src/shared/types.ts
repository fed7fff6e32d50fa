// ──────────────────────────────────────────
// Shared type definitions for the transformer registry
// ──────────────────────────────────────────

/** One persisted row: a single transformer unit billed under a contract. */
export interface TransformerRecord {
  serial: string;
  contract: string;
  customer: string;
  power: number | null;
}

/** Row as the driver hands it back — pg returns DECIMAL columns as strings. */
export interface TransformerRow {
  serial: string | null;
  contract: string | null;
  customer: string | null;
  power: string | number | null;
}

export interface TransformerEntry {
  serial: string;
  power: number;
}

export interface ContractSummary {
  contractId: string;
  transformers: TransformerEntry[];
  transformerCount: number;
  totalPower: number;
}

export interface CustomerSummary {
  customerName: string;
  contracts: ContractSummary[];
  uniqueContractCount: number;
  totalTransformers: number;
  totalPower: number;
}

export type HealthStatus = 'healthy' | 'unhealthy' | 'shutting_down';
export type DatabaseStatus = 'connected' | 'disconnected';

export interface HealthReport {
  success: boolean;
  status: HealthStatus;
  database: DatabaseStatus;
  error?: string;
}
