import { describe, it, expect } from 'vitest';
import { isWithinRecencyWindow, DEFAULT_RECENT_WINDOW_MS } from '../../src/feeds/recency';

const NOW = Date.UTC(2026, 0, 15, 12, 0, 0);

describe('isWithinRecencyWindow', () => {
  it('should forward posts inside the window', () => {
    expect(isWithinRecencyWindow({ postedAt: new Date(NOW - 3_600_000) }, NOW)).toBe(true);
  });

  it('should skip posts exactly at or beyond the window edge', () => {
    expect(isWithinRecencyWindow({ postedAt: new Date(NOW - DEFAULT_RECENT_WINDOW_MS) }, NOW)).toBe(false);
    expect(isWithinRecencyWindow({ postedAt: new Date(NOW - 10 * 86_400_000) }, NOW)).toBe(false);
  });

  it('should forward posts without a parsed time', () => {
    expect(isWithinRecencyWindow({ postedAt: null }, NOW)).toBe(true);
  });

  it('should honour a custom window', () => {
    expect(isWithinRecencyWindow({ postedAt: new Date(NOW - 7_200_000) }, NOW, 3_600_000)).toBe(false);
  });
});
