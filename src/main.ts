// ──────────────────────────────────────────
// Entry point — bootstrap + HTTP server
// ──────────────────────────────────────────
// 1. Load and validate configuration
// 2. Open the database pool and probe it
// 3. Build the Express app with injected dependencies
// 4. Listen; on SIGINT/SIGTERM refuse new work, close server, destroy pool

import dotenv from 'dotenv';
dotenv.config();

import { loadConfig } from './config';
import { createDb } from './db/connection';
import { Runtime } from './runtime';
import { TransformerRecordRepo } from './domains/customers';
import { createApp } from './app';
import logger, { configureLogger, errorMessage } from './lib/logger';

async function main() {
  const config = loadConfig();
  configureLogger(config.log);
  logger.info('[App] Starting transformer registry...');

  const runtime = new Runtime(() => createDb(config.db));
  const records = new TransformerRecordRepo(runtime.open(), config.db.table);

  if (await records.ping()) {
    logger.info('[App] Database connection successful');
  } else {
    logger.warn('[App] Database connection failed on startup; database features may not work');
  }

  const app = createApp({ runtime, records, publicDir: config.publicDir });
  const server = app.listen(config.port, config.host, () => {
    logger.info(`[App] Listening on http://${config.host}:${config.port}`);
  });

  let closing = false;
  const shutdown = async (signal: NodeJS.Signals) => {
    if (closing) return;
    closing = true;
    logger.info(`[App] Received ${signal}, shutting down...`);
    runtime.beginShutdown();

    await new Promise<void>((resolve) => server.close(() => resolve()));
    try {
      await runtime.close();
      process.exit(0);
    } catch (err) {
      logger.error(`[App] Error during cleanup: ${errorMessage(err)}`);
      process.exit(1);
    }
  };
  process.on('SIGINT', (signal) => void shutdown(signal));
  process.on('SIGTERM', (signal) => void shutdown(signal));
}

main().catch((err) => {
  logger.error(`[App] Fatal error: ${errorMessage(err)}`, {
    stack: err instanceof Error ? err.stack : undefined,
  });
  process.exit(1);
});
