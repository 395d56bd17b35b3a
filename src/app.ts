/**
 * Postwatch — Service wiring
 *
 * Builds the pipeline components from a validated configuration. Both entry
 * scripts share this so the long-running monitor and the one-shot check
 * behave identically.
 */

import type { PostwatchConfig, ChannelConfig } from './lib/config';
import { EndpointPool } from './mirrors/endpoint-pool';
import { EndpointHealthStore } from './mirrors/health-store';
import { refreshInstances } from './mirrors/instance-list';
import { Fetcher } from './feeds/fetcher';
import { HttpRenderer, type Renderer } from './feeds/renderer';
import { DedupCache } from './feeds/dedup';
import { DedupStore } from './feeds/dedup-store';
import { SimilarityFilter } from './feeds/similarity';
import { createAnalysisService, type AnalysisService } from './analysis/analyzer';
import { createChannels } from './delivery/channels';
import { DeliveryQueue } from './delivery/queue';
import { createArchiveSink, type ArchiveSink } from './archive';
import { Scheduler } from './scheduler/scheduler';
import { systemClock, type Clock } from './lib/clock';
import { logger } from './lib/logger';

/** Endpoint stats untouched for a week are reset */
export const ENDPOINT_STATS_RETENTION_MS = 7 * 86_400_000;

export interface PostwatchOverrides {
  clock?: Clock;
  renderer?: Renderer;
  analysis?: AnalysisService;
  archive?: ArchiveSink;
  /** Replace configured channels, e.g. console only for dry runs */
  channels?: ChannelConfig[];
  /** When false, cycles leave endpoint health and seen ids on disk untouched */
  persistState?: boolean;
}

export interface Postwatch {
  config: PostwatchConfig;
  pool: EndpointPool;
  healthStore: EndpointHealthStore;
  fetcher: Fetcher;
  dedup: DedupCache;
  dedupStore: DedupStore;
  queue: DeliveryQueue;
  scheduler: Scheduler;
  archive: ArchiveSink;
  /** Restore persisted health and seen ids, then refresh the instance list */
  prepare(): Promise<void>;
  /** Write endpoint health and seen ids */
  persist(): Promise<void>;
}

export function createPostwatch(config: PostwatchConfig, overrides: PostwatchOverrides = {}): Postwatch {
  const clock = overrides.clock ?? systemClock;
  const archive = overrides.archive ?? createArchiveSink(config.archive);

  const pool = new EndpointPool(config.mirrors.endpoints, {
    failureThreshold: config.mirrors.failureThreshold,
    baseDisableMs: config.mirrors.baseDisableMs,
    maxDisableMs: config.mirrors.maxDisableMs,
    clock,
  });
  const healthStore = new EndpointHealthStore(config.storage.archiveDir);

  const fetcher = new Fetcher({
    pool,
    renderer: overrides.renderer ?? new HttpRenderer({ baseUrl: config.fetch.renderServiceUrl }),
    timeoutMs: config.fetch.timeoutMs,
    maxItemsPerCheck: config.fetch.maxItemsPerCheck,
    clock,
  });

  const dedup = new DedupCache(config.dedup.maxCacheSize);
  const dedupStore = new DedupStore(config.storage.archiveDir);
  const similarity =
    config.dedup.similarityWindowMs > 0
      ? new SimilarityFilter({
          threshold: config.dedup.similarityThreshold,
          windowMs: config.dedup.similarityWindowMs,
          clock,
        })
      : undefined;

  const channels = createChannels(overrides.channels ?? config.delivery.channels);
  const queue = new DeliveryQueue({
    channels,
    maxAttempts: config.delivery.maxAttempts,
    baseDelayMs: config.delivery.baseDelayMs,
    maxDelayMs: config.delivery.maxDelayMs,
    drainIntervalMs: config.delivery.drainIntervalMs,
    sendTimeoutMs: config.delivery.sendTimeoutMs,
    clock,
    archive,
  });

  const persist = async (): Promise<void> => {
    pool.pruneStale(ENDPOINT_STATS_RETENTION_MS);
    await Promise.all([healthStore.save(pool), dedupStore.save(dedup)]);
  };

  const scheduler = new Scheduler({
    accounts: config.accounts,
    fetcher,
    dedup,
    similarity,
    analysis: overrides.analysis ?? createAnalysisService(config.analysis),
    queue,
    intervalMs: config.scheduler.intervalMs,
    accountConcurrency: config.scheduler.accountConcurrency,
    recentWindowMs: config.dedup.recentWindowMs,
    imageBaseUrl: config.server.imageBaseUrl,
    archive,
    clock,
    afterCycle: overrides.persistState === false ? undefined : persist,
  });

  const prepare = async (): Promise<void> => {
    await Promise.all([healthStore.load(pool), dedupStore.load(dedup)]);
    if (config.mirrors.instanceListUrl) {
      await refreshInstances(pool, { url: config.mirrors.instanceListUrl, timeoutMs: config.fetch.timeoutMs });
    }
    logger.info('Postwatch ready', {
      accounts: config.accounts.map(a => a.handle),
      endpoints: pool.size,
      channels: queue.channelNames(),
    });
  };

  return { config, pool, healthStore, fetcher, dedup, dedupStore, queue, scheduler, archive, prepare, persist };
}
