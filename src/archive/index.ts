/**
 * Postwatch — Archive sinks
 */

import type { ArchiveConfig } from '../lib/config';
import type { ArchiveSink } from './types';
import { JsonlArchiveSink } from './jsonl';
import { SupabaseArchiveSink, supabaseInserter } from './supabase';
import { getAdminClient } from '../db/client';

export type { ArchiveSink } from './types';
export { JsonlArchiveSink } from './jsonl';
export { SupabaseArchiveSink, supabaseInserter, toRow, ARCHIVE_TABLE } from './supabase';

export const noopArchiveSink: ArchiveSink = {
  record: () => undefined,
  flush: async () => undefined,
};

export function createArchiveSink(config: ArchiveConfig): ArchiveSink {
  switch (config.kind) {
    case 'supabase':
      return new SupabaseArchiveSink(supabaseInserter(getAdminClient(config.url, config.serviceRoleKey)));
    case 'jsonl':
      return new JsonlArchiveSink(config.dir);
    case 'none':
      return noopArchiveSink;
  }
}
