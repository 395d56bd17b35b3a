/**
 * Postwatch — Mirror instance list refresh
 *
 * Pulls the community-maintained markdown table of public instances and adds
 * the ones marked online to the pool.
 */

import type { EndpointPool } from './endpoint-pool';
import { normalizeEndpointAddress } from '../lib/config';
import { withTimeout } from '../lib/timeout';
import { logger } from '../lib/logger';
import { toErrorMessage } from '../lib/errors';

// | [name](https://host) | ... | :white_check_mark: | ✅ |
const ONLINE_ROW = /\[[^\]]*\]\((https?:\/\/[^)\s]+)\)[^\n]*\|\s*:white_check_mark:\s*\|\s*✅/g;

export function parseInstanceList(markdown: string): string[] {
  const found = new Set<string>();

  for (const match of markdown.matchAll(ONLINE_ROW)) {
    const url = match[1];
    if (url) found.add(normalizeEndpointAddress(url));
  }

  return Array.from(found);
}

export interface RefreshInstancesOptions {
  url: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

/**
 * Fetch the instance list and register new endpoints.
 * Returns the number added; on any failure the pool is left as it was.
 */
export async function refreshInstances(
  pool: EndpointPool,
  options: RefreshInstancesOptions
): Promise<number> {
  const fetchImpl = options.fetchImpl ?? fetch;

  try {
    const markdown = await withTimeout('Instance list fetch', options.timeoutMs, async signal => {
      const response = await fetchImpl(options.url, { signal });
      if (!response.ok) {
        throw new Error(`HTTP ${response.status}`);
      }
      return response.text();
    });

    const instances = parseInstanceList(markdown);
    const added = instances.filter(address => pool.add(address)).length;

    logger.info('Instance list refreshed', { listed: instances.length, added, total: pool.size });
    return added;
  } catch (error) {
    logger.warn('Instance list refresh failed', { url: options.url, error: toErrorMessage(error) });
    return 0;
  }
}
