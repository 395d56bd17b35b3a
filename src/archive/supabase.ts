/**
 * Postwatch — Supabase archive
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { ArchiveEvent } from '../types';
import type { ArchiveSink } from './types';
import type { ArchiveEventRow } from '../db/client';
import { handleSupabaseError } from '../db/client';
import { logger } from '../lib/logger';
import { toErrorMessage } from '../lib/errors';

export const ARCHIVE_TABLE = 'archive_events';

export type InsertRows = (rows: ArchiveEventRow[]) => PromiseLike<{ error: unknown }>;

export function toRow(event: ArchiveEvent): ArchiveEventRow {
  return {
    kind: event.kind,
    item_id: event.itemId,
    account_handle: event.accountHandle,
    payload: event.payload,
    recorded_at: event.recordedAt,
  };
}

export function supabaseInserter(client: SupabaseClient): InsertRows {
  return rows => client.from(ARCHIVE_TABLE).insert(rows);
}

export class SupabaseArchiveSink implements ArchiveSink {
  private readonly pending = new Set<Promise<void>>();
  private readonly insertRows: InsertRows;

  constructor(insertRows: InsertRows) {
    this.insertRows = insertRows;
  }

  record(event: ArchiveEvent): void {
    const write = this.write(event).finally(() => {
      this.pending.delete(write);
    });
    this.pending.add(write);
  }

  async flush(): Promise<void> {
    await Promise.all(Array.from(this.pending));
  }

  private async write(event: ArchiveEvent): Promise<void> {
    try {
      const { error } = await this.insertRows([toRow(event)]);
      if (error) throw handleSupabaseError(error);
    } catch (error) {
      logger.error('Archive insert failed', { kind: event.kind, itemId: event.itemId, error: toErrorMessage(error) });
    }
  }
}
