// ──────────────────────────────────────────
// Platform: 404 + error envelope middleware
// ──────────────────────────────────────────

import { Request, Response, NextFunction } from 'express';
import { isAppError, notFound } from '../lib/errors';
import logger, { errorMessage } from '../lib/logger';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Client errors raised by express itself (malformed JSON body and the like). */
function clientStatus(err: unknown): number | null {
  if (isRecord(err) && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    return err.status;
  }
  return null;
}

export function notFoundHandler(_req: Request, _res: Response, next: NextFunction): void {
  next(notFound());
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (isAppError(err)) {
    if (err.status >= 500 && err.status !== 503) {
      logger.error(`${req.method} ${req.originalUrl} failed: ${err.message}`, { code: err.code });
    }
    const extra = isRecord(err.details) ? err.details : {};
    res.status(err.status).json({ ...extra, success: false, error: err.message });
    return;
  }

  const status = clientStatus(err);
  if (status !== null) {
    res.status(status).json({ success: false, error: errorMessage(err) });
    return;
  }

  logger.error(`Unhandled error on ${req.method} ${req.originalUrl}`, {
    error: err instanceof Error ? err.stack : String(err),
  });
  res.status(500).json({ success: false, error: 'Internal server error' });
}
