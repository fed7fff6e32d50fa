// ──────────────────────────────────────────
// Platform: request logging middleware
// ──────────────────────────────────────────

import { Request, Response, NextFunction } from 'express';
import logger from '../lib/logger';

const SLOW_THRESHOLD_MS = 500;

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();

  res.on('finish', () => {
    const durationMs = Date.now() - start;
    const meta = {
      method: req.method,
      path: req.originalUrl,
      statusCode: res.statusCode,
      durationMs,
    };

    if (durationMs >= SLOW_THRESHOLD_MS) {
      logger.warn('Slow request', meta);
    } else {
      logger.http(`${req.method} ${req.originalUrl} ${res.statusCode} in ${durationMs}ms`);
    }
  });

  next();
}
