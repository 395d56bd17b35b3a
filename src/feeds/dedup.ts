/**
 * Postwatch — Seen-item cache
 *
 * Per-account, bounded, insertion-ordered set of post ids. Overflow evicts
 * the oldest id, so an id evicted and later re-fetched is delivered again.
 */

import { z } from 'zod';
import type { Item } from '../types';

export const DedupSnapshotSchema = z.object({
  version: z.literal(1),
  accounts: z.record(z.array(z.string())),
});
export type DedupSnapshot = z.infer<typeof DedupSnapshotSchema>;

export class DedupCache {
  // Set iteration order is insertion order; the first entry is the oldest.
  private readonly records = new Map<string, Set<string>>();
  private readonly maxSize: number;

  constructor(maxSize: number) {
    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new RangeError(`maxSize must be a positive integer, got ${maxSize}`);
    }
    this.maxSize = maxSize;
  }

  /**
   * Items whose ids have not been seen for this account, in input order.
   * Input is newest first; returned ids are recorded oldest first so the
   * newest ids are the last to be evicted.
   */
  filterNew(accountHandle: string, items: readonly Item[]): Item[] {
    const record = this.recordFor(accountHandle);
    const batch = new Set<string>();
    const fresh: Item[] = [];

    for (const item of items) {
      if (record.has(item.id) || batch.has(item.id)) continue;
      batch.add(item.id);
      fresh.push(item);
    }

    for (const item of [...fresh].reverse()) {
      this.insert(record, item.id);
    }

    return fresh;
  }

  has(accountHandle: string, id: string): boolean {
    return this.records.get(key(accountHandle))?.has(id) ?? false;
  }

  size(accountHandle?: string): number {
    if (accountHandle !== undefined) {
      return this.records.get(key(accountHandle))?.size ?? 0;
    }
    let total = 0;
    for (const record of this.records.values()) total += record.size;
    return total;
  }

  snapshot(): DedupSnapshot {
    const accounts: Record<string, string[]> = {};
    for (const [account, record] of this.records) {
      accounts[account] = Array.from(record);
    }
    return { version: 1, accounts };
  }

  /**
   * Replace the cache contents. Oldest ids are dropped when a persisted
   * record exceeds the current capacity.
   */
  restore(raw: unknown): boolean {
    const parsed = DedupSnapshotSchema.safeParse(raw);
    if (!parsed.success) return false;

    this.records.clear();
    for (const [account, ids] of Object.entries(parsed.data.accounts)) {
      const record = this.recordFor(account);
      for (const id of ids) this.insert(record, id);
    }
    return true;
  }

  private recordFor(accountHandle: string): Set<string> {
    const k = key(accountHandle);
    let record = this.records.get(k);
    if (!record) {
      record = new Set();
      this.records.set(k, record);
    }
    return record;
  }

  private insert(record: Set<string>, id: string): void {
    record.add(id);
    while (record.size > this.maxSize) {
      const oldest = record.values().next();
      if (oldest.done) break;
      record.delete(oldest.value);
    }
  }
}

function key(accountHandle: string): string {
  return accountHandle.toLowerCase();
}
