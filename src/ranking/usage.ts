/**
 * @fileoverview Recency-weighted usage scores
 *
 * Each usage event contributes `2^(-age / halfLife)`: an event opened just now
 * is worth 1, one a half-life ago is worth 0.5. A target's score is the sum
 * over its events, so frequency and recency both raise it. The half-life is a
 * tunable (`ranking.halfLifeDays`), defaulting to one week.
 */

import type { TargetKind, UsageEvent, UsageTarget } from '../types.js';

export const DEFAULT_HALF_LIFE_DAYS = 7;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/** Usage score per target, keyed by {@link usageKey}. */
export type UsageIndex = ReadonlyMap<string, number>;

export function usageKey(kind: TargetKind, key: string): string {
  return `${kind}:${key}`;
}

export function targetUsageKey(target: UsageTarget): string {
  return usageKey(target.kind, target.key);
}

/**
 * Weight of one event. Events stamped in the future (clock skew) count as
 * fresh rather than exceeding 1.
 */
export function decayWeight(occurredAt: Date, now: Date, halfLifeDays = DEFAULT_HALF_LIFE_DAYS): number {
  const ageMs = Math.max(0, now.getTime() - occurredAt.getTime());
  return Math.pow(2, -ageMs / (halfLifeDays * MS_PER_DAY));
}

/**
 * Fold the usage log into one score per target. Called once per session;
 * ranking then reads scores by key on every keystroke.
 */
export function buildUsageIndex(
  events: readonly UsageEvent[],
  now: Date,
  halfLifeDays = DEFAULT_HALF_LIFE_DAYS,
): UsageIndex {
  const index = new Map<string, number>();
  for (const event of events) {
    const key = targetUsageKey(event.target);
    index.set(key, (index.get(key) ?? 0) + decayWeight(event.occurredAt, now, halfLifeDays));
  }
  return index;
}
