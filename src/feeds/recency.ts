/**
 * Postwatch — Recency window
 */

import type { Item } from '../types';

export const DEFAULT_RECENT_WINDOW_MS = 72 * 3_600_000;

/**
 * True when the post is recent enough to forward. Posts whose time could
 * not be parsed are forwarded.
 */
export function isWithinRecencyWindow(
  item: Pick<Item, 'postedAt'>,
  now: number,
  windowMs: number = DEFAULT_RECENT_WINDOW_MS
): boolean {
  if (item.postedAt === null) return true;
  return item.postedAt.getTime() > now - windowMs;
}
