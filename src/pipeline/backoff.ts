export interface BackoffPolicy {
  baseMs: number;
  factor: number;
  maxMs: number;
}

/**
 * Delay before retry number `attempt` (1-based): exponential, capped,
 * with equal jitter so the result lies in [delay/2, delay).
 */
export function computeBackoff(
  attempt: number,
  policy: BackoffPolicy,
  random: () => number = Math.random
): number {
  const exponent = Math.max(0, attempt - 1);
  const delay = Math.min(policy.maxMs, policy.baseMs * Math.pow(policy.factor, exponent));
  const half = delay / 2;
  return Math.floor(half + half * random());
}
