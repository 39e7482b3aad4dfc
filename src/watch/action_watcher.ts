/**
 * @fileoverview CI run watcher
 *
 * locating -> polling(runId, nextInterval) -> completed(conclusion)
 *                                          -> failed(reason)
 *
 * The watcher is an async generator: it yields a `state` event on every
 * transition, a `progress` event after every successful poll and a `failure`
 * event after every failed request. Fatal outcomes never throw; they end the
 * stream with one `failed` state.
 *
 * No wait extends past the deadline. Cancellation and the deadline are
 * checked after every sleep, so no request starts once either has passed,
 * and an in-flight request always finishes before the watcher stops.
 */

import { NotFoundError, RateLimitedError, isRetryableError } from '../core/errors.js';
import { logDebug } from '../telemetry/logger.js';
import { sleep as defaultSleep, type Sleeper } from '../utils/async.js';
import { getErrorMessage } from '../utils/errors.js';
import { backoffDelay, DEFAULT_BACKOFF, type BackoffPolicy } from './backoff.js';

export type RunStatus = 'queued' | 'in_progress' | 'completed';

export type RunConclusion =
  | 'success'
  | 'failure'
  | 'cancelled'
  | 'timed_out'
  | 'skipped'
  | 'neutral'
  | 'action_required'
  | 'stale';

export interface RunRef {
  id: number;
  name: string;
  branch: string;
  url: string;
}

export interface RunSnapshot extends RunRef {
  status: RunStatus;
  conclusion: RunConclusion | null;
}

export interface WatchTarget {
  /** `owner/name` */
  repo: string;
  branch: string;
}

export interface RunStatusProvider {
  /** Latest run for the branch, or null when it has none. */
  locateRun(target: WatchTarget): Promise<RunRef | null>;
  pollRun(repo: string, runId: number): Promise<RunSnapshot>;
}

export type FailureReason = 'not_found' | 'timeout' | 'network_error' | 'cancelled' | 'provider_error';

export type WatchState =
  | { status: 'locating' }
  | { status: 'polling'; runId: number; nextIntervalMs: number }
  | { status: 'completed'; conclusion: RunConclusion; run: RunSnapshot }
  | { status: 'failed'; reason: FailureReason; message: string };

export interface WatchProgress {
  run: RunSnapshot;
  polls: number;
  elapsedMs: number;
}

export type WatchEvent =
  | { type: 'state'; state: WatchState }
  | { type: 'progress'; progress: WatchProgress }
  /** `retryInMs` is null when the failure ends the watch. */
  | { type: 'failure'; error: string; consecutiveFailures: number; retryInMs: number | null };

export interface WatchOptions {
  backoff?: BackoffPolicy;
  timeoutMs?: number;
  failureThreshold?: number;
  signal?: AbortSignal;
  sleep?: Sleeper;
  now?: () => number;
}

export const DEFAULT_WATCH_TIMEOUT_MS = 30 * 60 * 1000;
export const DEFAULT_FAILURE_THRESHOLD = 3;

type Attempt<T> =
  | { ok: true; value: T }
  | { ok: false; kind: 'rate_limited'; error: RateLimitedError }
  | { ok: false; kind: 'transient'; error: unknown }
  | { ok: false; kind: 'fatal'; reason: FailureReason; message: string };

async function attempt<T>(call: () => Promise<T>): Promise<Attempt<T>> {
  try {
    return { ok: true, value: await call() };
  } catch (error) {
    if (error instanceof RateLimitedError) return { ok: false, kind: 'rate_limited', error };
    if (error instanceof NotFoundError) return { ok: false, kind: 'fatal', reason: 'not_found', message: error.message };
    if (isRetryableError(error)) return { ok: false, kind: 'transient', error };
    return { ok: false, kind: 'fatal', reason: 'provider_error', message: getErrorMessage(error) };
  }
}

type FailureOutcome =
  | { kind: 'retry'; message: string; delayMs: number }
  | { kind: 'stop'; message: string; state: WatchState };

function failed(reason: FailureReason, message: string): WatchState {
  return { status: 'failed', reason, message };
}

export async function* watchAction(
  provider: RunStatusProvider,
  target: WatchTarget,
  options: WatchOptions = {},
): AsyncGenerator<WatchEvent, WatchState> {
  const policy = options.backoff ?? DEFAULT_BACKOFF;
  const timeoutMs = options.timeoutMs ?? DEFAULT_WATCH_TIMEOUT_MS;
  const threshold = options.failureThreshold ?? DEFAULT_FAILURE_THRESHOLD;
  const signal = options.signal;
  const sleep = options.sleep ?? defaultSleep;
  const now = options.now ?? Date.now;
  const startedAt = now();

  let consecutiveFailures = 0;
  // Advances on every scheduled wait; rate limits advance it too, which widens the interval.
  let step = 0;
  let polls = 0;

  const elapsed = (): number => now() - startedAt;
  const cancelled = (): WatchState => failed('cancelled', 'watch cancelled');
  const timedOut = (): WatchState =>
    failed('timeout', `run did not complete within ${Math.round(timeoutMs / 1000)}s`);

  const remaining = (): number => Math.max(0, timeoutMs - elapsed());

  const onFailure = (result: Exclude<Attempt<unknown>, { ok: true }>): FailureOutcome => {
    switch (result.kind) {
      case 'fatal':
        consecutiveFailures++;
        return { kind: 'stop', message: result.message, state: failed(result.reason, result.message) };
      case 'rate_limited': {
        // Widens the interval; does not count towards the failure threshold.
        const delayMs = Math.max(result.error.retryAfterMs ?? 0, backoffDelay(step, policy));
        step++;
        return { kind: 'retry', message: result.error.message, delayMs };
      }
      case 'transient': {
        consecutiveFailures++;
        const message = getErrorMessage(result.error);
        if (consecutiveFailures >= threshold) {
          return { kind: 'stop', message, state: failed('network_error', `${consecutiveFailures} consecutive failures: ${message}`) };
        }
        return { kind: 'retry', message, delayMs: backoffDelay(consecutiveFailures - 1, policy) };
      }
    }
  };

  // Sleep, then return the terminal state if the watch was cancelled or ran out of time.
  const pause = async (delayMs: number): Promise<WatchState | null> => {
    await sleep(delayMs, signal);
    if (signal?.aborted) return cancelled();
    if (elapsed() >= timeoutMs) return timedOut();
    return null;
  };

  const finish = function* (state: WatchState): Generator<WatchEvent, WatchState> {
    yield { type: 'state', state };
    return state;
  };

  // Reports a failed request. Returns the capped wait before the retry, or the terminal state.
  const report = function* (outcome: FailureOutcome): Generator<WatchEvent, WatchState | number> {
    const retryInMs = outcome.kind === 'retry' && elapsed() < timeoutMs ? Math.min(outcome.delayMs, remaining()) : null;
    yield { type: 'failure', error: outcome.message, consecutiveFailures, retryInMs };
    if (outcome.kind === 'stop') return outcome.state;
    return retryInMs ?? timedOut();
  };

  yield { type: 'state', state: { status: 'locating' } };

  let run: RunRef | null = null;
  while (!run) {
    if (signal?.aborted) return yield* finish(cancelled());
    const located = await attempt(() => provider.locateRun(target));
    if (located.ok) {
      consecutiveFailures = 0;
      if (!located.value) {
        return yield* finish(failed('not_found', `no workflow runs for ${target.repo} on ${target.branch}`));
      }
      run = located.value;
      break;
    }
    const next = yield* report(onFailure(located));
    if (typeof next !== 'number') return yield* finish(next);
    const stop = await pause(next);
    if (stop) return yield* finish(stop);
  }

  logDebug('Located workflow run', { repo: target.repo, branch: target.branch, runId: run.id });
  const runId = run.id;

  for (;;) {
    if (signal?.aborted) return yield* finish(cancelled());

    const polled = await attempt(() => provider.pollRun(target.repo, runId));
    let delayMs: number;
    if (polled.ok) {
      consecutiveFailures = 0;
      polls++;
      const snapshot = polled.value;
      yield { type: 'progress', progress: { run: snapshot, polls, elapsedMs: elapsed() } };
      if (snapshot.status === 'completed') {
        // A completed run without a conclusion is reported as neutral.
        const conclusion = snapshot.conclusion ?? 'neutral';
        return yield* finish({ status: 'completed', conclusion, run: snapshot });
      }
      if (elapsed() >= timeoutMs) return yield* finish(timedOut());
      delayMs = Math.min(backoffDelay(step, policy), remaining());
      step++;
    } else {
      const next = yield* report(onFailure(polled));
      if (typeof next !== 'number') return yield* finish(next);
      delayMs = next;
    }

    yield { type: 'state', state: { status: 'polling', runId, nextIntervalMs: delayMs } };
    const stop = await pause(delayMs);
    if (stop) return yield* finish(stop);
  }
}
