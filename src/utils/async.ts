/**
 * @fileoverview Async Utilities
 */

export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Wait `ms` milliseconds. Resolves early, without throwing, when `signal`
 * aborts; callers check `signal.aborted` afterwards.
 */
export const sleep: Sleeper = (ms, signal) =>
  new Promise<void>((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(done, Math.max(0, ms));
    function done(): void {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });
