/**
 * Postwatch — Mirror Endpoint Pool
 *
 * Health-aware round-robin over mirror front-ends. An endpoint that fails
 * `failureThreshold` times in a row is disabled for an exponentially growing
 * window; a single success re-arms it.
 *
 * All mutations are synchronous, so concurrent account checks on the event
 * loop see a consistent pool without locking.
 */

import type { Endpoint, EndpointPoolSnapshot, EndpointPoolStats } from '../types';
import { EndpointPoolSnapshotSchema } from '../types';
import { NoHealthyEndpointError } from '../lib/errors';
import { exponentialBackoff } from '../lib/backoff';
import { systemClock, type Clock } from '../lib/clock';
import { logger } from '../lib/logger';
import { normalizeEndpointAddress } from '../lib/config';

export interface EndpointPoolOptions {
  failureThreshold: number;
  baseDisableMs: number;
  maxDisableMs: number;
  clock?: Clock;
}

const poolLogger = logger.child({ module: 'endpoint-pool' });

function createEndpoint(address: string): Endpoint {
  return {
    address,
    consecutiveFailures: 0,
    lastCheckedAt: null,
    disabledUntil: null,
    successCount: 0,
    failureCount: 0,
    lastSuccessAt: null,
    lastFailureAt: null,
  };
}

function toDate(value: string | null): Date | null {
  return value === null ? null : new Date(value);
}

function toIso(value: Date | null): string | null {
  return value === null ? null : value.toISOString();
}

export class EndpointPool {
  private readonly endpoints: Endpoint[] = [];
  private readonly byAddress = new Map<string, Endpoint>();
  private cursor = 0;

  private readonly failureThreshold: number;
  private readonly baseDisableMs: number;
  private readonly maxDisableMs: number;
  private readonly clock: Clock;

  constructor(addresses: readonly string[], options: EndpointPoolOptions) {
    this.failureThreshold = Math.max(1, options.failureThreshold);
    this.baseDisableMs = options.baseDisableMs;
    this.maxDisableMs = Math.max(options.baseDisableMs, options.maxDisableMs);
    this.clock = options.clock ?? systemClock;

    for (const address of addresses) {
      this.add(address);
    }
  }

  /**
   * Register an endpoint. Returns false when it was already known.
   */
  add(address: string): boolean {
    const normalized = normalizeEndpointAddress(address);
    if (!normalized || this.byAddress.has(normalized)) return false;

    const endpoint = createEndpoint(normalized);
    this.endpoints.push(endpoint);
    this.byAddress.set(normalized, endpoint);
    return true;
  }

  get size(): number {
    return this.endpoints.length;
  }

  isEnabled(endpoint: Endpoint, now: number = this.clock.now()): boolean {
    return endpoint.disabledUntil === null || endpoint.disabledUntil.getTime() <= now;
  }

  /**
   * Next enabled endpoint in rotation order.
   */
  select(): Endpoint {
    const now = this.clock.now();
    const count = this.endpoints.length;

    for (let offset = 0; offset < count; offset++) {
      const index = (this.cursor + offset) % count;
      const endpoint = this.endpoints[index];
      if (endpoint && this.isEnabled(endpoint, now)) {
        this.cursor = (index + 1) % count;
        return endpoint;
      }
    }

    throw new NoHealthyEndpointError(this.earliestReenable());
  }

  reportSuccess(endpoint: Endpoint): void {
    const tracked = this.resolve(endpoint);
    const now = new Date(this.clock.now());

    if (tracked.disabledUntil !== null) {
      poolLogger.info('Endpoint re-enabled', { endpoint: tracked.address });
    }

    tracked.consecutiveFailures = 0;
    tracked.disabledUntil = null;
    tracked.lastCheckedAt = now;
    tracked.lastSuccessAt = now;
    tracked.successCount += 1;
  }

  reportFailure(endpoint: Endpoint): void {
    const tracked = this.resolve(endpoint);
    const now = this.clock.now();

    tracked.consecutiveFailures += 1;
    tracked.failureCount += 1;
    tracked.lastCheckedAt = new Date(now);
    tracked.lastFailureAt = new Date(now);

    if (tracked.consecutiveFailures < this.failureThreshold) return;

    const disableMs = exponentialBackoff(tracked.consecutiveFailures - this.failureThreshold, {
      baseMs: this.baseDisableMs,
      maxMs: this.maxDisableMs,
    });
    tracked.disabledUntil = new Date(now + disableMs);

    poolLogger.warn('Endpoint disabled', {
      endpoint: tracked.address,
      consecutiveFailures: tracked.consecutiveFailures,
      disabledForMs: disableMs,
    });
  }

  /**
   * Reset counters of endpoints that have not been checked within maxAgeMs.
   * Endpoints are never removed.
   */
  pruneStale(maxAgeMs: number): number {
    const cutoff = this.clock.now() - maxAgeMs;
    let pruned = 0;

    for (const endpoint of this.endpoints) {
      if (endpoint.lastCheckedAt === null || endpoint.lastCheckedAt.getTime() >= cutoff) continue;

      endpoint.consecutiveFailures = 0;
      endpoint.disabledUntil = null;
      endpoint.successCount = 0;
      endpoint.failureCount = 0;
      pruned++;
    }

    if (pruned > 0) {
      poolLogger.info('Stale endpoint stats reset', { pruned });
    }
    return pruned;
  }

  stats(): EndpointPoolStats {
    const now = this.clock.now();
    const enabled = this.endpoints.filter(e => this.isEnabled(e, now)).length;
    return {
      total: this.endpoints.length,
      enabled,
      disabled: this.endpoints.length - enabled,
    };
  }

  list(): Endpoint[] {
    return this.endpoints.map(endpoint => ({ ...endpoint }));
  }

  snapshot(): EndpointPoolSnapshot {
    return {
      version: 1,
      endpoints: this.endpoints.map(endpoint => ({
        address: endpoint.address,
        consecutiveFailures: endpoint.consecutiveFailures,
        lastCheckedAt: toIso(endpoint.lastCheckedAt),
        disabledUntil: toIso(endpoint.disabledUntil),
        successCount: endpoint.successCount,
        failureCount: endpoint.failureCount,
        lastSuccessAt: toIso(endpoint.lastSuccessAt),
        lastFailureAt: toIso(endpoint.lastFailureAt),
      })),
    };
  }

  /**
   * Apply persisted health to known endpoints. Unknown addresses in the
   * snapshot are ignored so that configuration stays authoritative.
   */
  restore(raw: unknown): number {
    const parsed = EndpointPoolSnapshotSchema.safeParse(raw);
    if (!parsed.success) {
      poolLogger.warn('Ignoring invalid endpoint snapshot', { issues: parsed.error.issues.length });
      return 0;
    }

    let restored = 0;
    for (const saved of parsed.data.endpoints) {
      const endpoint = this.byAddress.get(normalizeEndpointAddress(saved.address));
      if (!endpoint) continue;

      endpoint.consecutiveFailures = saved.consecutiveFailures;
      endpoint.lastCheckedAt = toDate(saved.lastCheckedAt);
      endpoint.disabledUntil = toDate(saved.disabledUntil);
      endpoint.successCount = saved.successCount;
      endpoint.failureCount = saved.failureCount;
      endpoint.lastSuccessAt = toDate(saved.lastSuccessAt);
      endpoint.lastFailureAt = toDate(saved.lastFailureAt);
      restored++;
    }
    return restored;
  }

  private earliestReenable(): Date | null {
    let earliest: Date | null = null;
    for (const endpoint of this.endpoints) {
      if (endpoint.disabledUntil && (!earliest || endpoint.disabledUntil < earliest)) {
        earliest = endpoint.disabledUntil;
      }
    }
    return earliest;
  }

  private resolve(endpoint: Endpoint): Endpoint {
    const tracked = this.byAddress.get(endpoint.address);
    if (!tracked) {
      throw new Error(`Unknown endpoint: ${endpoint.address}`);
    }
    return tracked;
  }
}
