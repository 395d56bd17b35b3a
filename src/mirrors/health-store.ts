/**
 * Postwatch — Endpoint health persistence
 */

import path from 'path';
import type { EndpointPool } from './endpoint-pool';
import { readJsonFile, writeJsonFile } from '../lib/state-file';
import { logger } from '../lib/logger';
import { toErrorMessage } from '../lib/errors';

export const ENDPOINT_HEALTH_FILE = 'endpoint-health.json';

export class EndpointHealthStore {
  readonly filePath: string;

  constructor(archiveDir: string) {
    this.filePath = path.join(archiveDir, ENDPOINT_HEALTH_FILE);
  }

  /**
   * Restore pool health from disk. A missing or unreadable file leaves the
   * pool at its configured defaults.
   */
  async load(pool: EndpointPool): Promise<number> {
    try {
      const raw = await readJsonFile(this.filePath);
      if (raw === null) return 0;

      const restored = pool.restore(raw);
      logger.info('Endpoint health restored', { restored, file: this.filePath });
      return restored;
    } catch (error) {
      logger.warn('Could not read endpoint health', { file: this.filePath, error: toErrorMessage(error) });
      return 0;
    }
  }

  async save(pool: EndpointPool): Promise<void> {
    await writeJsonFile(this.filePath, pool.snapshot());
  }
}
