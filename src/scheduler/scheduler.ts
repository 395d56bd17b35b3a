/**
 * Postwatch — Scheduler
 *
 * Drives check cycles: per account fetch → dedup → enrich → enqueue, with a
 * bounded number of accounts in flight. Cycles run on a fixed-rate schedule
 * anchored at start time; a tick that lands while a cycle is still running
 * is skipped.
 */

import pLimit from 'p-limit';
import type { Item, NotificationPayload, TrackedAccount } from '../types';
import type { FetchResult } from '../feeds/fetcher';
import type { DedupCache } from '../feeds/dedup';
import type { NearDuplicate } from '../feeds/similarity';
import type { AnalysisService } from '../analysis/analyzer';
import type { ArchiveSink } from '../archive';
import { enrichItem } from '../analysis/analyzer';
import { isWithinRecencyWindow } from '../feeds/recency';
import { buildNotification } from '../delivery/message';
import { noopArchiveSink } from '../archive';
import { FetchError, NoHealthyEndpointError, toErrorMessage } from '../lib/errors';
import { systemClock, type Clock, type Timer } from '../lib/clock';
import { logger } from '../lib/logger';

// ============================================================
// TYPES
// ============================================================

export type SchedulerState = 'idle' | 'checking';
export type AccountStage = 'fetching' | 'deduping' | 'enriching' | 'enqueuing';

export type AccountStatus = 'ok' | 'no_healthy_endpoint' | 'fetch_failed' | 'error';

export interface AccountOutcome {
  account: string;
  status: AccountStatus;
  endpoint?: string;
  fetched: number;
  new: number;
  forwarded: number;
  /** New posts skipped because they repeat a recently forwarded post */
  nearDuplicates: number;
  tasks: number;
  error?: string;
}

export interface CycleReport {
  cycle: number;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  accounts: AccountOutcome[];
  totals: {
    fetched: number;
    new: number;
    forwarded: number;
    tasks: number;
    failedAccounts: number;
  };
}

export interface SchedulerStatus {
  state: SchedulerState;
  running: boolean;
  cycles: number;
  skippedTicks: number;
  nextRunAt: string | null;
  activeAccounts: Record<string, AccountStage>;
  lastReport: CycleReport | null;
}

export interface SchedulerOptions {
  accounts: readonly TrackedAccount[];
  fetcher: { fetchWithFailover(account: TrackedAccount): Promise<FetchResult> };
  dedup: DedupCache;
  similarity?: { check(item: Item): NearDuplicate | null };
  analysis: AnalysisService;
  queue: { enqueue(payload: NotificationPayload): string[] };
  intervalMs: number;
  accountConcurrency: number;
  recentWindowMs: number;
  imageBaseUrl: string;
  archive?: ArchiveSink;
  clock?: Clock;
  /** Runs after every cycle (state persistence); errors are logged */
  afterCycle?: (report: CycleReport) => Promise<void>;
}

// ============================================================
// SCHEDULER
// ============================================================

export class Scheduler {
  private readonly options: SchedulerOptions;
  private readonly clock: Clock;
  private readonly archive: ArchiveSink;
  private readonly logger = logger.child({ module: 'scheduler' });

  private state: SchedulerState = 'idle';
  private readonly stages = new Map<string, AccountStage>();
  private cycleCount = 0;
  private skippedTicks = 0;
  private lastReport: CycleReport | null = null;
  private currentCycle: Promise<CycleReport> | null = null;

  private running = false;
  private anchor = 0;
  private timer: Timer | null = null;
  private nextRunAt: number | null = null;

  constructor(options: SchedulerOptions) {
    this.options = options;
    this.clock = options.clock ?? systemClock;
    this.archive = options.archive ?? noopArchiveSink;
  }

  /**
   * Check every account once.
   */
  async runCycle(): Promise<CycleReport> {
    if (this.currentCycle) {
      return this.currentCycle;
    }

    this.currentCycle = this.executeCycle();
    try {
      return await this.currentCycle;
    } finally {
      this.currentCycle = null;
    }
  }

  /**
   * Run a cycle now and then at start + k * interval.
   */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.anchor = this.clock.now();

    this.logger.info('Scheduler started', {
      accounts: this.options.accounts.length,
      intervalMs: this.options.intervalMs,
      concurrency: this.options.accountConcurrency,
    });
    this.tick();
  }

  /**
   * Cancel the schedule and wait for the running cycle.
   */
  async stop(): Promise<void> {
    this.running = false;
    this.timer?.cancel();
    this.timer = null;
    this.nextRunAt = null;

    if (this.currentCycle) {
      await this.currentCycle.catch(() => undefined);
    }
    this.logger.info('Scheduler stopped', { cycles: this.cycleCount });
  }

  status(): SchedulerStatus {
    return {
      state: this.state,
      running: this.running,
      cycles: this.cycleCount,
      skippedTicks: this.skippedTicks,
      nextRunAt: this.nextRunAt === null ? null : new Date(this.nextRunAt).toISOString(),
      activeAccounts: Object.fromEntries(this.stages),
      lastReport: this.lastReport,
    };
  }

  // ============================================================
  // SCHEDULING
  // ============================================================

  private tick(): void {
    if (!this.running) return;
    this.scheduleNext();

    if (this.currentCycle) {
      this.skippedTicks++;
      this.logger.warn('Previous cycle still running, skipping tick', { skippedTicks: this.skippedTicks });
      return;
    }

    this.runCycle().catch(error => {
      this.logger.error('Cycle failed', { error: toErrorMessage(error) });
    });
  }

  private scheduleNext(): void {
    const interval = this.options.intervalMs;
    const now = this.clock.now();
    // Next aligned slot strictly after now; late timers never cause bursts
    const k = Math.floor((now - this.anchor) / interval) + 1;
    const next = this.anchor + k * interval;

    this.nextRunAt = next;
    this.timer = this.clock.schedule(() => {
      this.timer = null;
      this.tick();
    }, next - now);
  }

  // ============================================================
  // CYCLE
  // ============================================================

  private async executeCycle(): Promise<CycleReport> {
    const startedAt = this.clock.now();
    const cycle = ++this.cycleCount;
    this.state = 'checking';
    this.logger.info('Cycle started', { cycle, accounts: this.options.accounts.length });

    const limit = pLimit(Math.max(1, this.options.accountConcurrency));
    let accounts: AccountOutcome[];
    try {
      accounts = await Promise.all(
        this.options.accounts.map(account => limit(() => this.checkAccount(account)))
      );
    } finally {
      this.state = 'idle';
      this.stages.clear();
    }

    const finishedAt = this.clock.now();
    const report: CycleReport = {
      cycle,
      startedAt: new Date(startedAt).toISOString(),
      finishedAt: new Date(finishedAt).toISOString(),
      durationMs: finishedAt - startedAt,
      accounts,
      totals: {
        fetched: sum(accounts, a => a.fetched),
        new: sum(accounts, a => a.new),
        forwarded: sum(accounts, a => a.forwarded),
        tasks: sum(accounts, a => a.tasks),
        failedAccounts: accounts.filter(a => a.status !== 'ok').length,
      },
    };
    this.lastReport = report;

    this.logger.info('Cycle completed', { cycle, durationMs: report.durationMs, ...report.totals });

    if (this.options.afterCycle) {
      try {
        await this.options.afterCycle(report);
      } catch (error) {
        this.logger.error('After-cycle hook failed', { cycle, error: toErrorMessage(error) });
      }
    }

    return report;
  }

  private async checkAccount(account: TrackedAccount): Promise<AccountOutcome> {
    const outcome: AccountOutcome = {
      account: account.handle,
      status: 'ok',
      fetched: 0,
      new: 0,
      forwarded: 0,
      nearDuplicates: 0,
      tasks: 0,
    };
    const log = this.logger.child({ account: account.handle });

    try {
      this.stages.set(account.handle, 'fetching');
      const result = await this.options.fetcher.fetchWithFailover(account);
      outcome.endpoint = result.endpoint;
      outcome.fetched = result.items.length;

      this.stages.set(account.handle, 'deduping');
      const fresh = this.options.dedup.filterNew(account.handle, result.items);
      outcome.new = fresh.length;
      for (const item of fresh) {
        this.recordItem('item_seen', item, { url: item.url, postedAt: item.postedAt?.toISOString() ?? null });
      }

      const now = this.clock.now();
      const recent = fresh.filter(item => isWithinRecencyWindow(item, now, this.options.recentWindowMs));
      if (recent.length < fresh.length) {
        log.info('Skipping posts outside the recency window', { skipped: fresh.length - recent.length });
      }

      // Mirrors list newest first; notify in posting order
      for (const item of [...recent].reverse()) {
        const duplicate = this.options.similarity?.check(item) ?? null;
        if (duplicate) {
          outcome.nearDuplicates++;
          log.warn('Skipping near-duplicate post', {
            id: item.id,
            duplicateOf: duplicate.id,
            duplicateAccount: duplicate.accountHandle,
            similarity: Number(duplicate.similarity.toFixed(3)),
          });
          continue;
        }

        this.stages.set(account.handle, 'enriching');
        const enriched = await enrichItem(this.options.analysis, item);
        this.recordItem('item_enriched', item, {
          analysis: enriched.analysis,
          analysisUnavailable: enriched.analysisUnavailable ?? null,
        });

        this.stages.set(account.handle, 'enqueuing');
        const payload = buildNotification(enriched, {
          imageBaseUrl: this.options.imageBaseUrl,
          alias: account.alias,
        });
        outcome.tasks += this.options.queue.enqueue(payload).length;
        outcome.forwarded++;
      }

      log.info('Account checked', {
        fetched: outcome.fetched,
        new: outcome.new,
        forwarded: outcome.forwarded,
        nearDuplicates: outcome.nearDuplicates,
      });
    } catch (error) {
      outcome.error = toErrorMessage(error);
      if (error instanceof NoHealthyEndpointError) {
        outcome.status = 'no_healthy_endpoint';
        log.warn('No healthy endpoint, account skipped this cycle', {
          retryAt: error.retryAt?.toISOString() ?? null,
        });
      } else if (error instanceof FetchError) {
        outcome.status = 'fetch_failed';
        log.warn('Fetch failed after retry, deferred to next cycle', { endpoint: error.endpoint, error: outcome.error });
      } else {
        outcome.status = 'error';
        log.error('Account check failed', { error: outcome.error });
      }
    } finally {
      this.stages.delete(account.handle);
    }

    return outcome;
  }

  private recordItem(kind: 'item_seen' | 'item_enriched', item: Item, payload: Record<string, unknown>): void {
    this.archive.record({
      kind,
      itemId: item.id,
      accountHandle: item.accountHandle,
      recordedAt: new Date(this.clock.now()).toISOString(),
      payload,
    });
  }
}

function sum<T>(values: readonly T[], pick: (value: T) => number): number {
  return values.reduce((total, value) => total + pick(value), 0);
}
