/**
 * Tests for the delivery queue
 */

import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { DeliveryQueue, type DeliveryQueueOptions } from '../../src/delivery/queue';
import type { DeliveryChannel } from '../../src/delivery/channels';
import type { ArchiveSink } from '../../src/archive';
import type { DeliveryOutcome } from '../../src/types';
import { DeliveryError } from '../../src/lib/errors';
import { ManualClock, settle } from '../helpers/manual-clock';
import { createMockPayload } from '../helpers/fixtures';

type SendMock = Mock<DeliveryChannel['send']>;

const createMockChannel = (
  name: string,
  send: SendMock = vi.fn<DeliveryChannel['send']>()
): DeliveryChannel & { send: SendMock } => ({
  name,
  kind: 'console',
  send,
});

const httpFailure = (channel: string) => new DeliveryError({ channel, status: 500, message: 'HTTP 500' });

describe('DeliveryQueue', () => {
  let clock: ManualClock;
  let archive: ArchiveSink & { record: Mock<ArchiveSink['record']> };
  let primary: ReturnType<typeof createMockChannel>;
  let secondary: ReturnType<typeof createMockChannel>;
  let ids: number;

  const createQueue = (overrides: Partial<DeliveryQueueOptions> = {}) =>
    new DeliveryQueue({
      channels: [primary, secondary],
      maxAttempts: 3,
      baseDelayMs: 1000,
      maxDelayMs: 10_000,
      drainIntervalMs: 1000,
      sendTimeoutMs: 1000,
      clock,
      archive,
      createId: () => `t${++ids}`,
      ...overrides,
    });

  beforeEach(() => {
    clock = new ManualClock();
    archive = { record: vi.fn<ArchiveSink['record']>(), flush: async () => undefined };
    primary = createMockChannel('primary');
    secondary = createMockChannel('secondary');
    ids = 0;
  });

  // ============================================================
  // ENQUEUE
  // ============================================================

  describe('enqueue', () => {
    it('should create one task per channel', () => {
      const queue = createQueue();

      expect(queue.enqueue(createMockPayload())).toEqual(['t1', 't2']);
      expect(queue.pending().map(task => [task.channel, task.state, task.attempt])).toEqual([
        ['primary', 'pending', 0],
        ['secondary', 'pending', 0],
      ]);
    });

    it('should ignore a pair that is already active', () => {
      const queue = createQueue();
      queue.enqueue(createMockPayload());

      expect(queue.enqueue(createMockPayload())).toEqual([]);
      expect(queue.stats().pending).toBe(2);
    });

    it('should skip unknown channel names', () => {
      const queue = createQueue();

      expect(queue.enqueue(createMockPayload(), ['missing', 'secondary'])).toEqual(['t1']);
    });
  });

  // ============================================================
  // DRAIN
  // ============================================================

  describe('drain', () => {
    it('should deliver due tasks and record a delivery event', async () => {
      primary.send.mockResolvedValue(undefined);
      secondary.send.mockResolvedValue(undefined);
      const queue = createQueue();
      queue.enqueue(createMockPayload());

      const result = await queue.drain();

      expect(result).toEqual({ dispatched: 2, delivered: 2, retried: 0, failed: 0 });
      expect(queue.stats()).toEqual({ pending: 0, inFlight: 0, delivered: 2, failed: 0 });
      expect(archive.record).toHaveBeenCalledWith({
        kind: 'delivery',
        itemId: '123',
        accountHandle: 'alice',
        recordedAt: new Date(clock.now()).toISOString(),
        payload: { taskId: 't1', channel: 'primary', attempts: 1 },
      });
    });

    it('should not dispatch a task again while its send is still in flight', async () => {
      let release: () => void = () => undefined;
      const inFlight = new Promise<void>(resolve => {
        release = resolve;
      });
      primary.send.mockReturnValue(inFlight);
      secondary.send.mockReturnValue(inFlight);
      const queue = createQueue();
      queue.enqueue(createMockPayload());

      const first = queue.drain();
      const second = queue.drain();
      expect(queue.stats()).toEqual({ pending: 0, inFlight: 2, delivered: 0, failed: 0 });

      release();

      expect(await second).toEqual({ dispatched: 0, delivered: 0, retried: 0, failed: 0 });
      expect(await first).toEqual({ dispatched: 2, delivered: 2, retried: 0, failed: 0 });
      expect(primary.send).toHaveBeenCalledTimes(1);
      expect(secondary.send).toHaveBeenCalledTimes(1);
    });

    it('should retry with backoff and dead-letter after the last attempt', async () => {
      primary.send.mockRejectedValue(httpFailure('primary'));
      secondary.send.mockResolvedValue(undefined);
      const queue = createQueue();
      const payload = createMockPayload();
      queue.enqueue(payload);

      expect(await queue.drain()).toEqual({ dispatched: 2, delivered: 1, retried: 1, failed: 0 });
      expect(queue.pending()[0]?.nextAttemptAt).toBe(clock.now() + 1000);

      clock.advance(999);
      expect((await queue.drain()).dispatched).toBe(0);

      clock.advance(1);
      expect(await queue.drain()).toEqual({ dispatched: 1, delivered: 0, retried: 1, failed: 0 });
      expect(queue.pending()[0]?.nextAttemptAt).toBe(clock.now() + 2000);

      clock.advance(2000);
      expect(await queue.drain()).toEqual({ dispatched: 1, delivered: 0, retried: 0, failed: 1 });

      expect(queue.stats()).toEqual({ pending: 0, inFlight: 0, delivered: 1, failed: 1 });
      expect(archive.record).toHaveBeenCalledWith({
        kind: 'dead_letter',
        itemId: '123',
        accountHandle: 'alice',
        recordedAt: new Date(clock.now()).toISOString(),
        payload: {
          taskId: 't1',
          channel: 'primary',
          attempts: 3,
          error: 'HTTP 500',
          title: payload.title,
          body: payload.body,
        },
      });

      // A failed task is never retried
      clock.advance(60_000);
      expect((await queue.drain()).dispatched).toBe(0);
      expect(primary.send).toHaveBeenCalledTimes(3);
      expect(secondary.send).toHaveBeenCalledTimes(1);
    });

    it('should count a send that exceeds the timeout as a failure', async () => {
      const hanging = createMockChannel(
        'hanging',
        vi.fn<DeliveryChannel['send']>(() => new Promise<void>(() => undefined))
      );
      const queue = createQueue({ channels: [hanging], sendTimeoutMs: 20 });
      queue.enqueue(createMockPayload());

      expect((await queue.drain()).retried).toBe(1);
      expect(queue.pending()[0]?.lastError).toBe('Send to hanging timed out after 20ms');
    });

    it('should allow the same item again once the previous task settled', async () => {
      primary.send.mockResolvedValue(undefined);
      const queue = createQueue({ channels: [primary] });
      queue.enqueue(createMockPayload());
      await queue.drain();

      expect(queue.enqueue(createMockPayload())).toEqual(['t2']);
    });
  });

  // ============================================================
  // LISTENERS, FLUSH & BACKGROUND LOOP
  // ============================================================

  it('should notify settled listeners until unsubscribed', async () => {
    primary.send.mockRejectedValue(httpFailure('primary'));
    secondary.send.mockResolvedValue(undefined);
    const queue = createQueue({ maxAttempts: 1 });
    const outcomes: DeliveryOutcome[] = [];
    const unsubscribe = queue.onSettled(outcome => outcomes.push(outcome));

    queue.enqueue(createMockPayload());
    await queue.drain();

    const byChannel = [...outcomes].sort((a, b) => a.channel.localeCompare(b.channel));
    expect(byChannel.map(o => [o.channel, o.state, o.attempts, o.error])).toEqual([
      ['primary', 'failed', 1, 'HTTP 500'],
      ['secondary', 'delivered', 1, undefined],
    ]);

    unsubscribe();
    queue.enqueue(createMockPayload({ itemId: '124' }));
    await queue.drain();
    expect(outcomes).toHaveLength(2);
  });

  it('should flush everything due and leave scheduled retries pending', async () => {
    primary.send.mockRejectedValue(httpFailure('primary'));
    secondary.send.mockResolvedValue(undefined);
    const queue = createQueue();
    queue.enqueue(createMockPayload());

    await queue.flush();

    expect(queue.stats()).toEqual({ pending: 1, inFlight: 0, delivered: 1, failed: 0 });
  });

  it('should drain on the clock once started and stop cleanly', async () => {
    primary.send.mockResolvedValue(undefined);
    secondary.send.mockResolvedValue(undefined);
    const queue = createQueue();
    queue.start();
    queue.enqueue(createMockPayload());

    clock.advance(1000);
    await settle();

    expect(queue.stats().delivered).toBe(2);
    expect(clock.pendingTimers()).toBe(1);

    await queue.stop();
    expect(clock.pendingTimers()).toBe(0);
  });
});
