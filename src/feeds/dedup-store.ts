/**
 * Postwatch — Seen-item persistence
 */

import path from 'path';
import type { DedupCache } from './dedup';
import { readJsonFile, writeJsonFile } from '../lib/state-file';
import { logger } from '../lib/logger';
import { toErrorMessage } from '../lib/errors';

export const SEEN_ITEMS_FILE = 'seen-items.json';

export class DedupStore {
  readonly filePath: string;

  constructor(archiveDir: string) {
    this.filePath = path.join(archiveDir, SEEN_ITEMS_FILE);
  }

  async load(cache: DedupCache): Promise<boolean> {
    try {
      const raw = await readJsonFile(this.filePath);
      if (raw === null) return false;

      const restored = cache.restore(raw);
      if (restored) {
        logger.info('Seen items restored', { ids: cache.size(), file: this.filePath });
      } else {
        logger.warn('Ignoring invalid seen-items file', { file: this.filePath });
      }
      return restored;
    } catch (error) {
      logger.warn('Could not read seen items', { file: this.filePath, error: toErrorMessage(error) });
      return false;
    }
  }

  async save(cache: DedupCache): Promise<void> {
    await writeJsonFile(this.filePath, cache.snapshot());
  }
}
