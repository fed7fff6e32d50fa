// ──────────────────────────────────────────
// Maintenance: API routes
// ──────────────────────────────────────────

import { Router, Request, Response } from 'express';
import { CleanupService } from './cleanup.service';
import { Runtime } from '../../runtime';
import { shutdownGuard } from '../../platform/shutdown';
import logger, { errorMessage } from '../../lib/logger';

export function createMaintenanceRoutes(cleanupService: CleanupService, runtime: Runtime): Router {
  const router = Router();

  // POST /cleanup — delete rows with a null or empty key field
  router.post('/cleanup', shutdownGuard(runtime), async (_req: Request, res: Response) => {
    try {
      const deletedCount = await cleanupService.cleanupInvalidRecords();
      res.json({
        success: true,
        message: `Successfully cleaned up ${deletedCount} empty records`,
        deleted_count: deletedCount,
      });
    } catch (err) {
      logger.error(`Error in POST /api/cleanup: ${errorMessage(err)}`);
      res.status(500).json({ success: false, error: 'Failed to clean up database' });
    }
  });

  return router;
}
