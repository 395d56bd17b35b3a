/**
 * Postwatch — Fetcher
 *
 * Retrieves the latest posts of one account through the mirror pool.
 * Every outcome is reported back to the pool so endpoint health tracks
 * what the fetcher actually sees.
 */

import type { Endpoint, Item, TrackedAccount } from '../types';
import type { EndpointPool } from '../mirrors/endpoint-pool';
import type { Renderer } from './renderer';
import { parseTimeline } from './parser';
import { FetchError, toErrorMessage } from '../lib/errors';
import { withTimeout } from '../lib/timeout';
import { systemClock, type Clock } from '../lib/clock';
import { logger } from '../lib/logger';

export interface FetcherOptions {
  pool: EndpointPool;
  renderer: Renderer;
  timeoutMs: number;
  maxItemsPerCheck: number;
  clock?: Clock;
}

export interface FetchResult {
  items: Item[];
  endpoint: string;
  attempts: number;
}

export class Fetcher {
  private readonly pool: EndpointPool;
  private readonly renderer: Renderer;
  private readonly timeoutMs: number;
  private readonly maxItems: number;
  private readonly clock: Clock;
  private readonly logger = logger.child({ module: 'fetcher' });

  constructor(options: FetcherOptions) {
    this.pool = options.pool;
    this.renderer = options.renderer;
    this.timeoutMs = options.timeoutMs;
    this.maxItems = options.maxItemsPerCheck;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Latest posts of the account, newest first.
   * Throws NoHealthyEndpointError when the pool is exhausted, FetchError otherwise.
   */
  async fetchLatest(account: TrackedAccount): Promise<Item[]> {
    const endpoint = this.pool.select();
    return this.fetchFrom(endpoint, account);
  }

  /**
   * fetchLatest with one retry on a different endpoint after a FetchError.
   * NoHealthyEndpointError is never retried, and neither is a failure when
   * the failed endpoint is the only one the pool will hand out.
   */
  async fetchWithFailover(account: TrackedAccount): Promise<FetchResult> {
    const first = this.pool.select();
    try {
      const items = await this.fetchFrom(first, account);
      return { items, endpoint: first.address, attempts: 1 };
    } catch (error) {
      if (!(error instanceof FetchError)) throw error;

      const second = this.pool.select();
      if (second.address === first.address) throw error;

      this.logger.info('Retrying on another endpoint', {
        account: account.handle,
        failed: first.address,
        next: second.address,
      });
      const items = await this.fetchFrom(second, account);
      return { items, endpoint: second.address, attempts: 2 };
    }
  }

  private async fetchFrom(endpoint: Endpoint, account: TrackedAccount): Promise<Item[]> {
    const url = `${endpoint.address}/${account.handle}`;
    const startTime = this.clock.now();

    let items: Item[];
    try {
      const page = await withTimeout(`Render of ${url}`, this.timeoutMs, signal =>
        this.renderer.render(url, signal)
      );

      items = parseTimeline(page.html, {
        handle: account.handle,
        limit: this.maxItems,
        baseUrl: endpoint.address,
        now: new Date(this.clock.now()),
        screenshots: page.screenshots,
      });
    } catch (error) {
      this.pool.reportFailure(endpoint);
      this.logger.warn('Fetch failed', { endpoint: endpoint.address, account: account.handle, error: toErrorMessage(error) });
      throw new FetchError({
        endpoint: endpoint.address,
        accountHandle: account.handle,
        message: `Fetch of ${url} failed: ${toErrorMessage(error)}`,
        cause: error,
      });
    }

    if (items.length === 0) {
      this.pool.reportFailure(endpoint);
      this.logger.warn('Empty timeline', { endpoint: endpoint.address, account: account.handle });
      throw new FetchError({
        endpoint: endpoint.address,
        accountHandle: account.handle,
        message: `Fetch of ${url} returned an empty timeline`,
      });
    }

    this.pool.reportSuccess(endpoint);
    this.logger.debug('Fetch completed', {
      endpoint: endpoint.address,
      account: account.handle,
      items: items.length,
      durationMs: this.clock.now() - startTime,
    });
    return items;
  }
}
