// ──────────────────────────────────────────
// Customers domain — barrel export
// ──────────────────────────────────────────

export { aggregateCustomers, coercePower } from './aggregator';
export { CustomerQueryService } from './customer-query.service';
export { TransformerRecordRepo } from './transformer-record.repo';
export { createCustomerRoutes } from './routes';
