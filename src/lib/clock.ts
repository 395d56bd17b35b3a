/**
 * Postwatch — Clock
 *
 * Time source and timer scheduling behind one seam so that backoff,
 * cooldown and schedule logic can be driven by a manual clock in tests.
 */

export interface Timer {
  cancel(): void;
}

export interface Clock {
  now(): number;
  schedule(callback: () => void, delayMs: number): Timer;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  schedule: (callback, delayMs) => {
    const handle = setTimeout(callback, Math.max(0, delayMs));
    return { cancel: () => clearTimeout(handle) };
  },
};
