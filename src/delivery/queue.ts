/**
 * Postwatch — Delivery queue
 *
 * One PushTask per (item, channel). Each drain pass dispatches the tasks
 * that are due; failures are retried with capped exponential backoff until
 * the attempt budget is spent, after which the task is dead-lettered.
 *
 * A task is moved to `in_flight` synchronously before its send starts, so a
 * drain pass that overlaps another never dispatches it twice.
 */

import { nanoid } from 'nanoid';
import type {
  DeliveryOutcome,
  DeliveryQueueStats,
  NotificationPayload,
  PushTask,
} from '../types';
import type { DeliveryChannel } from './channels';
import type { ArchiveSink } from '../archive';
import { noopArchiveSink } from '../archive';
import { exponentialBackoff } from '../lib/backoff';
import { withTimeout } from '../lib/timeout';
import { systemClock, type Clock, type Timer } from '../lib/clock';
import { logger } from '../lib/logger';
import { toErrorMessage } from '../lib/errors';

// ============================================================
// TYPES
// ============================================================

export interface DeliveryQueueOptions {
  channels: readonly DeliveryChannel[];
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  drainIntervalMs: number;
  sendTimeoutMs: number;
  clock?: Clock;
  archive?: ArchiveSink;
  createId?: () => string;
}

export interface DrainResult {
  dispatched: number;
  delivered: number;
  retried: number;
  failed: number;
}

export type SettledListener = (outcome: DeliveryOutcome) => void;

type SendResult = 'delivered' | 'retried' | 'failed';

function taskKey(itemId: string, channel: string): string {
  return `${itemId}\u0000${channel}`;
}

// ============================================================
// QUEUE
// ============================================================

export class DeliveryQueue {
  private readonly channels = new Map<string, DeliveryChannel>();
  private readonly tasks = new Map<string, PushTask>();
  private readonly activeKeys = new Map<string, string>();
  private readonly listeners = new Set<SettledListener>();
  private readonly inFlight = new Set<Promise<SendResult>>();

  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly drainIntervalMs: number;
  private readonly sendTimeoutMs: number;
  private readonly clock: Clock;
  private readonly archive: ArchiveSink;
  private readonly createId: () => string;
  private readonly logger = logger.child({ module: 'delivery-queue' });

  private deliveredCount = 0;
  private failedCount = 0;
  private timer: Timer | null = null;
  private running = false;
  private currentDrain: Promise<DrainResult> | null = null;

  constructor(options: DeliveryQueueOptions) {
    for (const channel of options.channels) {
      this.channels.set(channel.name, channel);
    }
    this.maxAttempts = Math.max(1, options.maxAttempts);
    this.baseDelayMs = options.baseDelayMs;
    this.maxDelayMs = options.maxDelayMs;
    this.drainIntervalMs = options.drainIntervalMs;
    this.sendTimeoutMs = options.sendTimeoutMs;
    this.clock = options.clock ?? systemClock;
    this.archive = options.archive ?? noopArchiveSink;
    this.createId = options.createId ?? (() => nanoid());
  }

  channelNames(): string[] {
    return Array.from(this.channels.keys());
  }

  /**
   * Create one pending task per channel. Pairs already active are skipped.
   * Returns the ids of the tasks created.
   */
  enqueue(payload: NotificationPayload, channelNames: readonly string[] = this.channelNames()): string[] {
    const now = this.clock.now();
    const created: string[] = [];

    for (const channel of channelNames) {
      if (!this.channels.has(channel)) {
        this.logger.warn('Unknown channel, task not created', { channel, itemId: payload.itemId });
        continue;
      }

      const key = taskKey(payload.itemId, channel);
      if (this.activeKeys.has(key)) {
        this.logger.debug('Task already active', { channel, itemId: payload.itemId });
        continue;
      }

      const task: PushTask = {
        id: this.createId(),
        payload,
        channel,
        attempt: 0,
        nextAttemptAt: now,
        state: 'pending',
        createdAt: now,
      };
      this.tasks.set(task.id, task);
      this.activeKeys.set(key, task.id);
      created.push(task.id);
    }

    return created;
  }

  /**
   * One pass: dispatch every pending task that is due and wait for the
   * sends started by this pass.
   */
  async drain(): Promise<DrainResult> {
    const now = this.clock.now();
    const due: PushTask[] = [];

    for (const task of this.tasks.values()) {
      if (task.state === 'pending' && task.nextAttemptAt <= now) {
        task.state = 'in_flight';
        due.push(task);
      }
    }

    const sends = due.map(task => this.track(this.dispatch(task)));
    const results = await Promise.all(sends);

    return {
      dispatched: due.length,
      delivered: results.filter(r => r === 'delivered').length,
      retried: results.filter(r => r === 'retried').length,
      failed: results.filter(r => r === 'failed').length,
    };
  }

  /**
   * Drain until nothing is due. With `waitForRetries`, also sleeps until
   * scheduled retries come due, returning once the queue is empty.
   */
  async flush(options: { waitForRetries?: boolean } = {}): Promise<void> {
    for (;;) {
      const result = await this.drain();
      if (result.dispatched > 0) continue;

      const next = this.nextDueAt();
      if (next === null || !options.waitForRetries) return;
      await this.sleep(Math.max(0, next - this.clock.now()));
    }
  }

  /**
   * Background drain every `drainIntervalMs`.
   */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.logger.info('Delivery queue started', {
      channels: this.channelNames(),
      drainIntervalMs: this.drainIntervalMs,
    });
    this.scheduleTick();
  }

  /**
   * Stop the background drain and wait for in-flight sends.
   */
  async stop(): Promise<void> {
    this.running = false;
    this.timer?.cancel();
    this.timer = null;

    if (this.currentDrain) {
      await this.currentDrain;
    }
    await Promise.all(Array.from(this.inFlight));
    this.logger.info('Delivery queue stopped', { ...this.stats() });
  }

  onSettled(listener: SettledListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  stats(): DeliveryQueueStats {
    let pending = 0;
    let inFlight = 0;
    for (const task of this.tasks.values()) {
      if (task.state === 'pending') pending++;
      else if (task.state === 'in_flight') inFlight++;
    }
    return { pending, inFlight, delivered: this.deliveredCount, failed: this.failedCount };
  }

  /**
   * Copies of the active (pending or in-flight) tasks.
   */
  pending(): PushTask[] {
    return Array.from(this.tasks.values(), task => ({ ...task }));
  }

  // ============================================================
  // INTERNALS
  // ============================================================

  private scheduleTick(): void {
    if (!this.running) return;
    this.timer = this.clock.schedule(() => {
      this.timer = null;
      this.currentDrain = this.drain();
      void this.currentDrain
        .catch(error => {
          this.logger.error('Drain pass failed', { error: toErrorMessage(error) });
        })
        .finally(() => {
          this.currentDrain = null;
          this.scheduleTick();
        });
    }, this.drainIntervalMs);
  }

  private track(send: Promise<SendResult>): Promise<SendResult> {
    this.inFlight.add(send);
    return send.finally(() => {
      this.inFlight.delete(send);
    });
  }

  private async dispatch(task: PushTask): Promise<SendResult> {
    const channel = this.channels.get(task.channel);

    try {
      if (!channel) {
        throw new Error(`Channel ${task.channel} is not registered`);
      }
      await withTimeout(`Send to ${task.channel}`, this.sendTimeoutMs, signal =>
        channel.send(task.payload, signal)
      );
    } catch (error) {
      return this.handleFailure(task, toErrorMessage(error));
    }

    task.attempt += 1;
    task.state = 'delivered';
    this.deliveredCount++;
    this.settle(task);

    this.logger.info('Notification delivered', {
      channel: task.channel,
      itemId: task.payload.itemId,
      attempts: task.attempt,
    });
    return 'delivered';
  }

  private handleFailure(task: PushTask, message: string): SendResult {
    task.attempt += 1;
    task.lastError = message;

    if (task.attempt < this.maxAttempts) {
      const delayMs = exponentialBackoff(task.attempt - 1, {
        baseMs: this.baseDelayMs,
        maxMs: this.maxDelayMs,
      });
      task.nextAttemptAt = this.clock.now() + delayMs;
      task.state = 'pending';

      this.logger.warn('Send failed, retry scheduled', {
        channel: task.channel,
        itemId: task.payload.itemId,
        attempt: task.attempt,
        retryInMs: delayMs,
        error: message,
      });
      return 'retried';
    }

    task.state = 'failed';
    this.failedCount++;
    this.settle(task);

    this.logger.error('Delivery failed permanently', {
      channel: task.channel,
      itemId: task.payload.itemId,
      attempts: task.attempt,
      error: message,
    });
    this.archive.record({
      kind: 'dead_letter',
      itemId: task.payload.itemId,
      accountHandle: task.payload.accountHandle,
      recordedAt: new Date(this.clock.now()).toISOString(),
      payload: {
        taskId: task.id,
        channel: task.channel,
        attempts: task.attempt,
        error: message,
        title: task.payload.title,
        body: task.payload.body,
      },
    });
    return 'failed';
  }

  private settle(task: PushTask): void {
    this.tasks.delete(task.id);
    this.activeKeys.delete(taskKey(task.payload.itemId, task.channel));

    if (task.state !== 'delivered' && task.state !== 'failed') return;

    const outcome: DeliveryOutcome = {
      taskId: task.id,
      itemId: task.payload.itemId,
      channel: task.channel,
      state: task.state,
      attempts: task.attempt,
      error: task.lastError,
      settledAt: new Date(this.clock.now()).toISOString(),
    };

    if (task.state === 'delivered') {
      this.archive.record({
        kind: 'delivery',
        itemId: outcome.itemId,
        accountHandle: task.payload.accountHandle,
        recordedAt: outcome.settledAt,
        payload: { taskId: task.id, channel: task.channel, attempts: task.attempt },
      });
    }

    for (const listener of this.listeners) {
      try {
        listener(outcome);
      } catch (error) {
        this.logger.error('Settled listener threw', { error: toErrorMessage(error) });
      }
    }
  }

  private nextDueAt(): number | null {
    let next: number | null = null;
    for (const task of this.tasks.values()) {
      if (task.state === 'pending' && (next === null || task.nextAttemptAt < next)) {
        next = task.nextAttemptAt;
      }
    }
    return next;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => {
      this.clock.schedule(() => resolve(), ms);
    });
  }
}
