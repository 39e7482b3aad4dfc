/**
 * @fileoverview GitHub REST access
 *
 * One Octokit-backed class serves both remote roles: the snapshot provider
 * used by refresh and the run-status provider used by the action watcher.
 * Request failures are mapped onto the domain error set; the mapping
 * functions are exported on their own so they can be exercised without a
 * network.
 */

import { Octokit } from '@octokit/rest';
import {
  ConfigurationError,
  NetworkError,
  NotFoundError,
  ProviderError,
  RateLimitedError,
  SyncError,
  type GhjumpError,
} from '../core/errors.js';
import { logDebug } from '../telemetry/logger.js';
import type { Organization, RemoteRepository, RemoteSnapshot } from '../types.js';
import { getErrorMessage } from '../utils/errors.js';
import type { RunConclusion, RunRef, RunSnapshot, RunStatus, RunStatusProvider, WatchTarget } from '../watch/action_watcher.js';

export const USER_AGENT = 'ghjump';
const PAGE_SIZE = 100;

export interface GitHubClientOptions {
  token: string | null;
  apiUrl?: string;
  octokit?: Octokit;
}

export type FetchPhase = 'organizations' | 'repositories';

export interface FetchProgress {
  phase: FetchPhase;
  fetched: number;
}

// ============================================================================
// RESPONSE SHAPES
// ============================================================================

/** Fields read from a repository item; Octokit's item type is assignable to it. */
export interface ApiRepository {
  id: number;
  name: string;
  full_name: string;
  private: boolean;
  description: string | null;
  language?: string | null;
  default_branch?: string;
  owner: { id: number; login: string };
}

export interface ApiWorkflowRun {
  id: number;
  name?: string | null;
  display_title?: string;
  head_branch: string | null;
  html_url: string;
  status: string | null;
  conclusion: string | null;
}

export function toRemoteRepository(repo: ApiRepository): RemoteRepository {
  return {
    id: repo.id,
    ownerId: repo.owner.id,
    ownerLogin: repo.owner.login,
    name: repo.name,
    fullName: repo.full_name,
    private: repo.private,
    description: repo.description,
    language: repo.language ?? null,
    defaultBranch: repo.default_branch ?? null,
  };
}

const QUEUED_STATUSES = new Set(['queued', 'waiting', 'requested', 'pending']);

const CONCLUSIONS: ReadonlySet<string> = new Set<RunConclusion>([
  'success',
  'failure',
  'cancelled',
  'timed_out',
  'skipped',
  'neutral',
  'action_required',
  'stale',
]);

function isRunConclusion(value: string): value is RunConclusion {
  return CONCLUSIONS.has(value);
}

export function toRunStatus(status: string | null): RunStatus {
  if (status === 'completed') return 'completed';
  if (status === null || QUEUED_STATUSES.has(status)) return 'queued';
  return 'in_progress';
}

export function toRunConclusion(conclusion: string | null): RunConclusion | null {
  if (conclusion === null) return null;
  return isRunConclusion(conclusion) ? conclusion : 'neutral';
}

export function toRunRef(run: ApiWorkflowRun, fallbackBranch: string): RunRef {
  return {
    id: run.id,
    name: run.name || run.display_title || `run ${run.id}`,
    branch: run.head_branch ?? fallbackBranch,
    url: run.html_url,
  };
}

export function toRunSnapshot(run: ApiWorkflowRun, fallbackBranch = ''): RunSnapshot {
  return {
    ...toRunRef(run, fallbackBranch),
    status: toRunStatus(run.status),
    conclusion: toRunConclusion(run.conclusion),
  };
}

// ============================================================================
// ERROR MAPPING
// ============================================================================

function readStatus(error: unknown): number | null {
  if (typeof error !== 'object' || error === null || !('status' in error)) return null;
  return typeof error.status === 'number' ? error.status : null;
}

function readHeader(error: unknown, name: string): string | null {
  if (typeof error !== 'object' || error === null || !('response' in error)) return null;
  const response = error.response;
  if (typeof response !== 'object' || response === null || !('headers' in response)) return null;
  const headers = response.headers;
  if (typeof headers !== 'object' || headers === null || !(name in headers)) return null;
  const value: unknown = Reflect.get(headers, name);
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return null;
}

function retryAfterMs(error: unknown, now: number): number | undefined {
  const retryAfter = readHeader(error, 'retry-after');
  if (retryAfter !== null && Number.isFinite(Number(retryAfter))) {
    return Number(retryAfter) * 1000;
  }
  const reset = readHeader(error, 'x-ratelimit-reset');
  if (reset !== null && Number.isFinite(Number(reset))) {
    return Math.max(0, Number(reset) * 1000 - now);
  }
  return undefined;
}

/**
 * Map a thrown request failure to a domain error.
 *
 *   429, or 403 with an exhausted quota   RateLimitedError
 *   404                                   NotFoundError
 *   5xx or no HTTP status (transport)     NetworkError
 *   anything else                         ProviderError
 */
export function mapRequestError(error: unknown, resource: string, now = Date.now()): GhjumpError {
  const status = readStatus(error);
  const message = getErrorMessage(error);

  if (status === 429 || (status === 403 && (readHeader(error, 'x-ratelimit-remaining') === '0' || readHeader(error, 'retry-after') !== null))) {
    return new RateLimitedError(`GitHub rate limit reached: ${message}`, retryAfterMs(error, now));
  }
  if (status === 404) {
    return new NotFoundError(resource, `${resource} not found`);
  }
  if (status === null || status >= 500) {
    return new NetworkError(`GitHub request failed: ${message}`, error instanceof Error ? error : undefined);
  }
  return new ProviderError(`GitHub request failed (${status}): ${message}`, status);
}

export function splitFullName(fullName: string): { owner: string; repo: string } {
  const slash = fullName.indexOf('/');
  if (slash <= 0 || slash === fullName.length - 1 || fullName.indexOf('/', slash + 1) !== -1) {
    throw new ProviderError(`not an owner/name repository: ${fullName}`);
  }
  return { owner: fullName.slice(0, slash), repo: fullName.slice(slash + 1) };
}

// ============================================================================
// CLIENT
// ============================================================================

export class GitHubClient implements RunStatusProvider {
  private readonly octokit: Octokit;
  private readonly token: string | null;

  constructor(options: GitHubClientOptions) {
    this.token = options.token;
    this.octokit =
      options.octokit ??
      new Octokit({
        auth: options.token ?? undefined,
        baseUrl: options.apiUrl,
        userAgent: USER_AGENT,
      });
  }

  /**
   * Fetch every organization and repository the token can see. The
   * authenticated user is listed as an organization so personal
   * repositories have an owner entry. Any failure aborts the whole fetch.
   */
  async fetchSnapshot(onProgress?: (progress: FetchProgress) => void): Promise<RemoteSnapshot> {
    if (!this.token) {
      throw new ConfigurationError('GITHUB_TOKEN', 'a token is required to refresh the cache');
    }
    const fetchedAt = new Date();
    try {
      const { data: user } = await this.octokit.rest.users.getAuthenticated();
      const organizations: Organization[] = [{ id: user.id, login: user.login }];
      onProgress?.({ phase: 'organizations', fetched: organizations.length });

      for await (const { data: page } of this.octokit.paginate.iterator(
        this.octokit.rest.orgs.listForAuthenticatedUser,
        { per_page: PAGE_SIZE },
      )) {
        for (const org of page) {
          organizations.push({ id: org.id, login: org.login });
        }
        onProgress?.({ phase: 'organizations', fetched: organizations.length });
      }

      const repositories: RemoteRepository[] = [];
      for await (const { data: page } of this.octokit.paginate.iterator(
        this.octokit.rest.repos.listForAuthenticatedUser,
        { per_page: PAGE_SIZE, affiliation: 'owner,collaborator,organization_member' },
      )) {
        for (const repo of page) {
          repositories.push(toRemoteRepository(repo));
        }
        onProgress?.({ phase: 'repositories', fetched: repositories.length });
      }

      logDebug('Fetched snapshot', { organizations: organizations.length, repositories: repositories.length });
      return { organizations, repositories, fetchedAt, complete: true };
    } catch (error) {
      const mapped = mapRequestError(error, 'snapshot');
      throw new SyncError(`snapshot is incomplete: ${mapped.message}`, [], mapped);
    }
  }

  async locateRun(target: WatchTarget): Promise<RunRef | null> {
    const { owner, repo } = splitFullName(target.repo);
    try {
      const { data } = await this.octokit.rest.actions.listWorkflowRunsForRepo({
        owner,
        repo,
        branch: target.branch,
        per_page: 1,
      });
      const latest = data.workflow_runs[0];
      return latest ? toRunRef(latest, target.branch) : null;
    } catch (error) {
      throw mapRequestError(error, `repository ${target.repo}`);
    }
  }

  async pollRun(repoFullName: string, runId: number): Promise<RunSnapshot> {
    const { owner, repo } = splitFullName(repoFullName);
    try {
      const { data } = await this.octokit.rest.actions.getWorkflowRun({ owner, repo, run_id: runId });
      return toRunSnapshot(data);
    } catch (error) {
      throw mapRequestError(error, `workflow run ${runId}`);
    }
  }
}
