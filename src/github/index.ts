export {
  GitHubClient,
  mapRequestError,
  splitFullName,
  toRemoteRepository,
  toRunConclusion,
  toRunRef,
  toRunSnapshot,
  toRunStatus,
  USER_AGENT,
  type ApiRepository,
  type ApiWorkflowRun,
  type FetchPhase,
  type FetchProgress,
  type GitHubClientOptions,
} from './client.js';
export {
  parseRemoteUrl,
  hostOf,
  resolveCurrentRepository,
  resolveWatchTarget,
  DEFAULT_GIT_HOST,
  type RemoteRepositoryRef,
} from './remote.js';
