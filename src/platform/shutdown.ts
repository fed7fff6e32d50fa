// ──────────────────────────────────────────
// Platform: shutdown guard middleware
// ──────────────────────────────────────────

import { Request, Response, NextFunction } from 'express';
import { Runtime } from '../runtime';
import { serviceUnavailable } from '../lib/errors';

/**
 * Rejects the request with 503 once shutdown has begun. `emptyBody` is merged
 * into the failure envelope so list endpoints still return their empty list.
 */
export function shutdownGuard(runtime: Runtime, emptyBody: Record<string, unknown> = {}) {
  return (_req: Request, _res: Response, next: NextFunction): void => {
    if (runtime.isShuttingDown) {
      next(serviceUnavailable('Server is shutting down', emptyBody));
      return;
    }
    next();
  };
}
