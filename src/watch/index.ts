export { backoffDelay, backoffSchedule, DEFAULT_BACKOFF, type BackoffPolicy } from './backoff.js';
export {
  watchAction,
  DEFAULT_FAILURE_THRESHOLD,
  DEFAULT_WATCH_TIMEOUT_MS,
  type FailureReason,
  type RunConclusion,
  type RunRef,
  type RunSnapshot,
  type RunStatus,
  type RunStatusProvider,
  type WatchEvent,
  type WatchOptions,
  type WatchProgress,
  type WatchState,
  type WatchTarget,
} from './action_watcher.js';
