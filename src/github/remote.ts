/**
 * @fileoverview Current-repository detection
 *
 * Accepted origin forms:
 *   git@github.com:owner/repo(.git)
 *   ssh://git@github.com/owner/repo(.git)
 *   https://github.com/owner/repo(.git)   (http and credentials allowed)
 */

import { GitContextError } from '../core/errors.js';
import type { CacheReader } from '../storage/types.js';
import { logDebug } from '../telemetry/logger.js';
import { getCurrentBranch, getRemoteUrl, isGitRepo } from '../utils/git.js';
import type { WatchTarget } from '../watch/action_watcher.js';

export const DEFAULT_GIT_HOST = 'github.com';

export interface RemoteRepositoryRef {
  owner: string;
  name: string;
  fullName: string;
}

const SCP_PATTERN = /^[\w.-]+@([\w.-]+):(.+)$/;
const URL_PATTERN = /^(?:https?|ssh|git):\/\/(?:[^@/]+@)?([\w.-]+)(?::\d+)?\/(.+)$/;

export function parseRemoteUrl(url: string, host = DEFAULT_GIT_HOST): RemoteRepositoryRef | null {
  const trimmed = url.trim();
  const match = SCP_PATTERN.exec(trimmed) ?? URL_PATTERN.exec(trimmed);
  if (!match) return null;
  const [, matchedHost = '', rawPath = ''] = match;
  if (matchedHost.toLowerCase() !== host.toLowerCase()) return null;

  const segments = rawPath.replace(/\/+$/, '').replace(/\.git$/, '').split('/');
  if (segments.length !== 2) return null;
  const [owner = '', name = ''] = segments;
  if (!owner || !name) return null;
  return { owner, name, fullName: `${owner}/${name}` };
}

/** Host part of the configured web URL, used to recognise matching remotes. */
export function hostOf(webUrl: string): string {
  try {
    return new URL(webUrl).hostname;
  } catch {
    return DEFAULT_GIT_HOST;
  }
}

export async function resolveCurrentRepository(cwd: string, host = DEFAULT_GIT_HOST): Promise<RemoteRepositoryRef> {
  if (!(await isGitRepo(cwd))) {
    throw new GitContextError('not_a_repository', `${cwd} is not inside a git repository`);
  }
  const url = await getRemoteUrl(cwd, 'origin');
  if (!url) {
    throw new GitContextError('no_origin', 'the repository has no "origin" remote');
  }
  const parsed = parseRemoteUrl(url, host);
  if (!parsed) {
    throw new GitContextError('not_github', `origin is not a ${host} repository: ${url}`);
  }
  return parsed;
}

/**
 * Repository and branch to watch. A detached HEAD falls back to the
 * repository's cached default branch.
 */
export async function resolveWatchTarget(
  cwd: string,
  cache: Pick<CacheReader, 'getRepository'> | null,
  host = DEFAULT_GIT_HOST,
): Promise<WatchTarget> {
  const repository = await resolveCurrentRepository(cwd, host);
  const branch = await getCurrentBranch(cwd);
  if (branch) return { repo: repository.fullName, branch };

  const fallback = cache?.getRepository(repository.fullName)?.defaultBranch ?? null;
  if (!fallback) {
    throw new GitContextError(
      'detached_head',
      `HEAD is detached and no default branch is cached for ${repository.fullName}; run "ghj data refresh" or pass --branch`,
    );
  }
  logDebug('Detached HEAD; watching default branch', { repo: repository.fullName, branch: fallback });
  return { repo: repository.fullName, branch: fallback };
}
