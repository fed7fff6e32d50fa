// ──────────────────────────────────────────
// Express application — wiring only, no listen()
// ──────────────────────────────────────────

import express, { Express } from 'express';
import cors from 'cors';
import path from 'path';
import { RecordSource } from './shared/contracts';
import { Runtime } from './runtime';

import { CustomerQueryService, createCustomerRoutes } from './domains/customers';
import { CleanupService, createMaintenanceRoutes } from './domains/maintenance';

import { createHealthRoutes } from './platform/health';
import { requestLogger } from './platform/request-logger';
import { errorHandler, notFoundHandler } from './platform/error-handler';

export interface AppDeps {
  runtime: Runtime;
  records: RecordSource;
  publicDir?: string;
}

export function createApp({ runtime, records, publicDir }: AppDeps): Express {
  const customerService = new CustomerQueryService(records);
  const cleanupService = new CleanupService(records);

  const app = express();
  app.disable('x-powered-by');
  app.use(cors());
  app.use(express.json());
  app.use(requestLogger);

  // Static page
  if (publicDir) {
    app.get('/', (_req, res) => {
      res.sendFile(path.join(publicDir, 'index.html'));
    });
    app.use(express.static(publicDir, { index: false }));
  }

  // Mount routes
  app.use('/api/customers', createCustomerRoutes(customerService, runtime));
  app.use('/api', createMaintenanceRoutes(cleanupService, runtime));
  app.use('/api', createHealthRoutes(runtime, records));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
