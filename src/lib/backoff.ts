/**
 * Postwatch — Exponential backoff
 */

export interface BackoffPolicy {
  baseMs: number;
  maxMs: number;
  /** Multiplier per step (default 2) */
  factor?: number;
}

/**
 * Delay for the given step: baseMs * factor^step, capped at maxMs.
 * Step 0 yields baseMs.
 */
export function exponentialBackoff(step: number, policy: BackoffPolicy): number {
  const factor = policy.factor ?? 2;
  const safeStep = Math.max(0, Math.floor(step));
  const raw = policy.baseMs * Math.pow(factor, safeStep);

  if (!Number.isFinite(raw)) return policy.maxMs;
  return Math.min(policy.maxMs, raw);
}
