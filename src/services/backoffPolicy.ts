export interface BackoffPolicy {
  baseIntervalMs: number;
  maxIntervalMs: number;
  multiplier: number;
}

/**
 * Delay before the next poll after `attempt` attempts (1-based):
 * base * multiplier^(attempt-1), capped at maxIntervalMs.
 */
export function backoffDelay(attempt: number, policy: BackoffPolicy): number {
  const n = Math.max(1, Math.floor(attempt));
  const raw = policy.baseIntervalMs * Math.pow(policy.multiplier, n - 1);
  return Math.min(raw, policy.maxIntervalMs);
}
