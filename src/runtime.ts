// ──────────────────────────────────────────
// Runtime: database lifecycle + shutdown flag
// ──────────────────────────────────────────

import { Knex } from 'knex';
import logger from './lib/logger';

export class Runtime {
  private db: Knex | null = null;
  private shuttingDown = false;

  constructor(private dbFactory: () => Knex) {}

  /** Creates the pool on first call; later calls return the same handle. */
  open(): Knex {
    if (!this.db) {
      this.db = this.dbFactory();
      logger.info('[Runtime] Database pool opened');
    }
    return this.db;
  }

  get isShuttingDown(): boolean {
    return this.shuttingDown;
  }

  /** From here on every route answers 503 without touching storage. */
  beginShutdown(): void {
    if (!this.shuttingDown) {
      this.shuttingDown = true;
      logger.info('[Runtime] Shutdown requested, refusing new work');
    }
  }

  async close(): Promise<void> {
    this.beginShutdown();
    if (this.db) {
      const db = this.db;
      this.db = null;
      await db.destroy();
      logger.info('[Runtime] Database pool closed');
    }
  }
}
