/**
 * Tests for archive sinks
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import {
  JsonlArchiveSink,
  SupabaseArchiveSink,
  createArchiveSink,
  noopArchiveSink,
  toRow,
} from '../../src/archive';
import type { InsertRows } from '../../src/archive/supabase';
import { handleSupabaseError } from '../../src/db/client';
import type { ArchiveEvent } from '../../src/types';

const createMockEvent = (overrides: Partial<ArchiveEvent> = {}): ArchiveEvent => ({
  kind: 'item_seen',
  itemId: '123',
  accountHandle: 'alice',
  recordedAt: '2026-01-15T12:00:00.000Z',
  payload: { url: 'https://x.com/alice/status/123' },
  ...overrides,
});

// ============================================================
// JSONL
// ============================================================

describe('JsonlArchiveSink', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'postwatch-archive-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should append one line per event to a file per kind', async () => {
    const archiveDir = path.join(dir, 'nested');
    const sink = new JsonlArchiveSink(archiveDir);
    const seen = createMockEvent();
    const seenAgain = createMockEvent({ itemId: '124' });
    const delivery = createMockEvent({ kind: 'delivery', payload: { channel: 'console' } });

    sink.record(seen);
    sink.record(delivery);
    sink.record(seenAgain);
    await sink.flush();

    const seenLines = (await readFile(sink.filePath('item_seen'), 'utf8')).trimEnd().split('\n');
    expect(seenLines.map(line => JSON.parse(line))).toEqual([seen, seenAgain]);
    expect(await readFile(path.join(archiveDir, 'delivery.jsonl'), 'utf8')).toBe(`${JSON.stringify(delivery)}\n`);
  });
});

// ============================================================
// SUPABASE
// ============================================================

describe('SupabaseArchiveSink', () => {
  it('should insert one row per event', async () => {
    const insertRows = vi.fn<InsertRows>(async () => ({ error: null }));
    const sink = new SupabaseArchiveSink(insertRows);
    const event = createMockEvent();

    sink.record(event);
    await sink.flush();

    expect(insertRows).toHaveBeenCalledWith([
      {
        kind: 'item_seen',
        item_id: '123',
        account_handle: 'alice',
        payload: { url: 'https://x.com/alice/status/123' },
        recorded_at: '2026-01-15T12:00:00.000Z',
      },
    ]);
    expect(insertRows.mock.calls[0]?.[0]).toEqual([toRow(event)]);
  });

  it('should keep going when an insert fails', async () => {
    const insertRows = vi
      .fn<InsertRows>()
      .mockResolvedValueOnce({ error: { message: 'permission denied', code: '42501' } })
      .mockResolvedValueOnce({ error: null });
    const sink = new SupabaseArchiveSink(insertRows);

    sink.record(createMockEvent());
    sink.record(createMockEvent({ itemId: '124' }));

    await expect(sink.flush()).resolves.toBeUndefined();
    expect(insertRows).toHaveBeenCalledTimes(2);
  });
});

describe('handleSupabaseError', () => {
  it('should include the error code', () => {
    expect(handleSupabaseError({ message: 'permission denied', code: '42501' }).message).toBe(
      'Supabase error: permission denied (code: 42501)'
    );
    expect(handleSupabaseError('nope').message).toBe('Unknown Supabase error');
  });
});

describe('createArchiveSink', () => {
  it('should pick the sink for the configured backend', () => {
    expect(createArchiveSink({ kind: 'none' })).toBe(noopArchiveSink);
    expect(createArchiveSink({ kind: 'jsonl', dir: 'archives' })).toBeInstanceOf(JsonlArchiveSink);
  });
});
