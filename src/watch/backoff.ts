/**
 * @fileoverview Poll interval schedule
 *
 * delay(attempt) = min(maxMs, initialMs * 2^attempt), attempt counted from 0.
 */

export interface BackoffPolicy {
  initialMs: number;
  maxMs: number;
}

export const DEFAULT_BACKOFF: BackoffPolicy = {
  initialMs: 2_000,
  maxMs: 30_000,
};

export function backoffDelay(attempt: number, policy: BackoffPolicy = DEFAULT_BACKOFF): number {
  const step = Math.max(0, Math.floor(attempt));
  // 2^31 already exceeds any sane ceiling; keep the exponent finite.
  const delay = policy.initialMs * Math.pow(2, Math.min(step, 31));
  return Math.min(policy.maxMs, delay);
}

export function backoffSchedule(attempts: number, policy: BackoffPolicy = DEFAULT_BACKOFF): number[] {
  return Array.from({ length: Math.max(0, attempts) }, (_, attempt) => backoffDelay(attempt, policy));
}
