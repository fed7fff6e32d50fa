// ──────────────────────────────────────────
// Maintenance: invalid record cleanup
// ──────────────────────────────────────────

import { RecordSource } from '../../shared/contracts';
import logger from '../../lib/logger';

export class CleanupService {
  constructor(private records: RecordSource) {}

  /**
   * Removes every row with a null or empty customer, contract or serial and
   * returns how many were removed. A repeat run with no writes in between
   * returns 0.
   */
  async cleanupInvalidRecords(): Promise<number> {
    const deleted = await this.records.deleteInvalid();
    logger.info(`[Cleanup] Removed ${deleted} invalid records`);
    return deleted;
  }
}
