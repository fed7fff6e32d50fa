// ──────────────────────────────────────────
// Platform: health check route
// ──────────────────────────────────────────

import { Router, Request, Response } from 'express';
import { RecordSource } from '../shared/contracts';
import { HealthReport } from '../shared/types';
import { Runtime } from '../runtime';
import logger, { errorMessage } from '../lib/logger';

export function createHealthRoutes(runtime: Runtime, records: RecordSource): Router {
  const router = Router();

  // GET /health — storage reachability probe
  router.get('/health', async (_req: Request, res: Response) => {
    if (runtime.isShuttingDown) {
      const report: HealthReport = { success: false, status: 'shutting_down', database: 'disconnected' };
      res.status(503).json(report);
      return;
    }

    try {
      const connected = await records.ping();
      const report: HealthReport = connected
        ? { success: true, status: 'healthy', database: 'connected' }
        : { success: false, status: 'unhealthy', database: 'disconnected' };
      res.status(connected ? 200 : 500).json(report);
    } catch (err) {
      logger.error(`Health check failed: ${errorMessage(err)}`);
      const report: HealthReport = {
        success: false,
        status: 'unhealthy',
        database: 'disconnected',
        error: errorMessage(err),
      };
      res.status(500).json(report);
    }
  });

  return router;
}
