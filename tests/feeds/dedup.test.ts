/**
 * Tests for the seen-item cache
 */

import { describe, it, expect } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { DedupCache } from '../../src/feeds/dedup';
import { DedupStore, SEEN_ITEMS_FILE } from '../../src/feeds/dedup-store';
import { createMockItem } from '../helpers/fixtures';

const items = (...ids: string[]) => ids.map(id => createMockItem({ id }));

describe('DedupCache', () => {
  // ============================================================
  // FILTERING
  // ============================================================

  describe('filterNew', () => {
    it('should return unseen items and exclude them on the next call', () => {
      const cache = new DedupCache(10);

      expect(cache.filterNew('alice', items('123')).map(i => i.id)).toEqual(['123']);
      expect(cache.filterNew('alice', items('123'))).toEqual([]);
    });

    it('should keep input order and drop duplicates within a batch', () => {
      const cache = new DedupCache(10);

      const fresh = cache.filterNew('alice', items('3', '2', '3', '1'));

      expect(fresh.map(i => i.id)).toEqual(['3', '2', '1']);
      expect(cache.size('alice')).toBe(3);
    });

    it('should track accounts independently and ignore handle case', () => {
      const cache = new DedupCache(10);
      cache.filterNew('Alice', items('123'));

      expect(cache.has('alice', '123')).toBe(true);
      expect(cache.filterNew('bob', items('123'))).toHaveLength(1);
      expect(cache.size()).toBe(2);
    });

    it('should record a newest-first batch oldest first', () => {
      const cache = new DedupCache(10);

      cache.filterNew('alice', items('3', '2', '1'));

      expect(cache.snapshot().accounts).toEqual({ alice: ['1', '2', '3'] });
    });

    it('should evict the oldest id when the capacity is exceeded', () => {
      const cache = new DedupCache(3);
      cache.filterNew('alice', items('3', '2', '1'));

      cache.filterNew('alice', items('4'));

      expect(cache.has('alice', '1')).toBe(false);
      expect(cache.has('alice', '4')).toBe(true);
      expect(cache.size('alice')).toBe(3);
      // Evicted ids count as new again
      expect(cache.filterNew('alice', items('1')).map(i => i.id)).toEqual(['1']);
      expect(cache.has('alice', '2')).toBe(false);
    });

    it('should not re-emit a post still on the page as the window slides', () => {
      const cache = new DedupCache(4);

      expect(cache.filterNew('alice', items('3', '2', '1')).map(i => i.id)).toEqual(['3', '2', '1']);
      expect(cache.filterNew('alice', items('4', '3', '2')).map(i => i.id)).toEqual(['4']);
      expect(cache.filterNew('alice', items('5', '4', '3')).map(i => i.id)).toEqual(['5']);
      expect(cache.snapshot().accounts).toEqual({ alice: ['2', '3', '4', '5'] });
    });

    it('should judge a whole batch against the record before evicting', () => {
      const cache = new DedupCache(2);
      cache.filterNew('alice', items('2', '1'));

      const fresh = cache.filterNew('alice', items('4', '3', '2'));

      expect(fresh.map(i => i.id)).toEqual(['4', '3']);
      expect(cache.snapshot().accounts).toEqual({ alice: ['3', '4'] });
    });
  });

  it('should reject a non-positive capacity', () => {
    expect(() => new DedupCache(0)).toThrow(RangeError);
    expect(() => new DedupCache(1.5)).toThrow('maxSize must be a positive integer, got 1.5');
  });

  // ============================================================
  // SNAPSHOT / RESTORE
  // ============================================================

  describe('snapshot / restore', () => {
    it('should carry seen ids into a fresh cache', () => {
      const cache = new DedupCache(10);
      cache.filterNew('alice', items('1', '2'));

      const restored = new DedupCache(10);
      expect(restored.restore(JSON.parse(JSON.stringify(cache.snapshot())))).toBe(true);

      expect(restored.snapshot()).toEqual({ version: 1, accounts: { alice: ['2', '1'] } });
      expect(restored.filterNew('alice', items('2', '3')).map(i => i.id)).toEqual(['3']);
    });

    it('should keep only the newest ids when restoring into a smaller cache', () => {
      const restored = new DedupCache(2);
      restored.restore({ version: 1, accounts: { alice: ['1', '2', '3'] } });

      expect(restored.snapshot().accounts).toEqual({ alice: ['2', '3'] });
    });

    it('should reject malformed snapshots and keep current contents', () => {
      const cache = new DedupCache(10);
      cache.filterNew('alice', items('1'));

      expect(cache.restore({ version: 1, accounts: { alice: [1] } })).toBe(false);
      expect(cache.has('alice', '1')).toBe(true);
    });
  });
});

describe('DedupStore', () => {
  it('should save and load seen ids through a JSON file', async () => {
    const dir = await mkdtemp(path.join(tmpdir(), 'postwatch-dedup-'));
    try {
      const store = new DedupStore(dir);
      const cache = new DedupCache(10);
      cache.filterNew('alice', items('1'));

      await store.save(cache);
      const written = JSON.parse(await readFile(path.join(dir, SEEN_ITEMS_FILE), 'utf8'));
      expect(written).toEqual({ version: 1, accounts: { alice: ['1'] } });

      const fresh = new DedupCache(10);
      expect(await store.load(fresh)).toBe(true);
      expect(fresh.has('alice', '1')).toBe(true);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it('should report false when no file exists yet', async () => {
    const dir = await mkdtemp(path.join(tmpdir(), 'postwatch-dedup-'));
    try {
      expect(await new DedupStore(dir).load(new DedupCache(10))).toBe(false);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
