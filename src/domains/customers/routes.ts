// ──────────────────────────────────────────
// Customers: API routes
// ──────────────────────────────────────────

import { Router, Request, Response } from 'express';
import { CustomerQueryService } from './customer-query.service';
import { Runtime } from '../../runtime';
import { shutdownGuard } from '../../platform/shutdown';
import logger, { errorMessage } from '../../lib/logger';

function logFailure(route: string, err: unknown): void {
  logger.error(`Error in ${route}: ${errorMessage(err)}`, {
    stack: err instanceof Error ? err.stack : undefined,
  });
}

export function createCustomerRoutes(service: CustomerQueryService, runtime: Runtime): Router {
  const router = Router();

  // GET / — customers with their contracts grouped and totalled
  router.get('/', shutdownGuard(runtime, { customers: [] }), async (_req: Request, res: Response) => {
    try {
      const customers = await service.getCustomersWithContracts();
      res.json({ success: true, customers, count: customers.length });
    } catch (err) {
      logFailure('GET /api/customers', err);
      res.status(500).json({ success: false, error: 'Failed to fetch customers', customers: [] });
    }
  });

  // GET /contracts — legacy: every valid row, but `count` is the number of
  // distinct contract ids rather than the number of rows returned
  router.get('/contracts', shutdownGuard(runtime, { contracts: [] }), async (_req: Request, res: Response) => {
    try {
      const [contracts, contractIds] = await Promise.all([
        service.listAll(),
        service.listDistinctContractIds(),
      ]);
      res.json({ success: true, contracts, count: contractIds.length });
    } catch (err) {
      logFailure('GET /api/customers/contracts', err);
      res.status(500).json({ success: false, error: 'Failed to fetch contracts', contracts: [] });
    }
  });

  // GET /unique — distinct customer names
  router.get('/unique', shutdownGuard(runtime, { customers: [] }), async (_req: Request, res: Response) => {
    try {
      const customers = await service.listUniqueCustomerNames();
      res.json({ success: true, customers, count: customers.length });
    } catch (err) {
      logFailure('GET /api/customers/unique', err);
      res.status(500).json({ success: false, error: 'Failed to fetch unique customers', customers: [] });
    }
  });

  // GET /count — customers holding at least one valid contract
  router.get('/count', shutdownGuard(runtime), async (_req: Request, res: Response) => {
    try {
      const count = await service.countDistinctCustomersWithContracts();
      res.json({ success: true, count });
    } catch (err) {
      logFailure('GET /api/customers/count', err);
      res.status(500).json({ success: false, error: 'Failed to get customer count' });
    }
  });

  // GET /:name/contracts — rows for one customer, exact match
  router.get('/:name/contracts', shutdownGuard(runtime, { contracts: [] }), async (req: Request, res: Response) => {
    const customer = req.params.name;
    try {
      const contracts = await service.listContractsForCustomer(customer);
      res.json({ success: true, customer, contracts, count: contracts.length });
    } catch (err) {
      logFailure(`GET /api/customers/${customer}/contracts`, err);
      res.status(500).json({ success: false, error: 'Failed to fetch customer contracts', contracts: [] });
    }
  });

  return router;
}
