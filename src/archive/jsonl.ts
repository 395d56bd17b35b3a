/**
 * Postwatch — JSONL archive
 *
 * One file per event kind under the archive directory, one JSON object per
 * line. Appends run through a single promise chain so lines never interleave.
 */

import { appendFile, mkdir } from 'fs/promises';
import path from 'path';
import type { ArchiveEvent } from '../types';
import type { ArchiveSink } from './types';
import { logger } from '../lib/logger';
import { toErrorMessage } from '../lib/errors';

export class JsonlArchiveSink implements ArchiveSink {
  private chain: Promise<void> = Promise.resolve();
  private dirReady = false;
  private readonly dir: string;

  constructor(dir: string) {
    this.dir = dir;
  }

  filePath(kind: ArchiveEvent['kind']): string {
    return path.join(this.dir, `${kind}.jsonl`);
  }

  record(event: ArchiveEvent): void {
    const line = `${JSON.stringify(event)}\n`;
    this.chain = this.chain.then(() => this.append(event.kind, line));
  }

  flush(): Promise<void> {
    return this.chain;
  }

  private async append(kind: ArchiveEvent['kind'], line: string): Promise<void> {
    try {
      if (!this.dirReady) {
        await mkdir(this.dir, { recursive: true });
        this.dirReady = true;
      }
      await appendFile(this.filePath(kind), line, 'utf8');
    } catch (error) {
      logger.error('Archive write failed', { kind, dir: this.dir, error: toErrorMessage(error) });
    }
  }
}
