/**
 * Postwatch — Near-duplicate detection
 *
 * Catches the same text posted again under a new id (reposts, deleted and
 * re-sent posts, two tracked accounts sharing an announcement). Posts are
 * compared by the Jaccard index of their whitespace-separated word sets
 * against everything forwarded within a sliding window.
 */

import type { Item } from '../types';
import { systemClock, type Clock } from '../lib/clock';

export const DEFAULT_SIMILARITY_THRESHOLD = 0.85;
export const DEFAULT_SIMILARITY_WINDOW_MS = 30 * 60_000;

export interface SimilarityFilterOptions {
  /** Similarity strictly above this counts as a duplicate; 1 disables matching */
  threshold?: number;
  windowMs?: number;
  clock?: Clock;
}

export interface NearDuplicate {
  id: string;
  accountHandle: string;
  similarity: number;
}

interface RecentPost {
  id: string;
  accountHandle: string;
  words: Set<string>;
  seenAt: number;
}

function wordSet(text: string): Set<string> {
  return new Set(text.split(/\s+/).filter(word => word.length > 0));
}

/**
 * |A ∩ B| / |A ∪ B| over word sets. Empty text never matches anything.
 */
export function jaccardSimilarity(a: string, b: string): number {
  return jaccard(wordSet(a), wordSet(b));
}

function jaccard(a: Set<string>, b: Set<string>): number {
  if (a.size === 0 || b.size === 0) return 0;

  let shared = 0;
  for (const word of a) {
    if (b.has(word)) shared++;
  }
  return shared / (a.size + b.size - shared);
}

export class SimilarityFilter {
  private readonly threshold: number;
  private readonly windowMs: number;
  private readonly clock: Clock;
  private recent: RecentPost[] = [];

  constructor(options: SimilarityFilterOptions = {}) {
    this.threshold = options.threshold ?? DEFAULT_SIMILARITY_THRESHOLD;
    this.windowMs = options.windowMs ?? DEFAULT_SIMILARITY_WINDOW_MS;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * The recent post this item repeats, or null. Items that are not
   * duplicates are remembered for later comparisons.
   */
  check(item: Item): NearDuplicate | null {
    const now = this.clock.now();
    this.recent = this.recent.filter(post => now - post.seenAt < this.windowMs);

    const words = wordSet(item.content);
    for (const post of this.recent) {
      if (post.id === item.id) continue;
      const similarity = jaccard(words, post.words);
      if (similarity > this.threshold) {
        return { id: post.id, accountHandle: post.accountHandle, similarity };
      }
    }

    if (this.windowMs > 0) {
      this.recent.push({ id: item.id, accountHandle: item.accountHandle, words, seenAt: now });
    }
    return null;
  }

  get size(): number {
    return this.recent.length;
  }
}
