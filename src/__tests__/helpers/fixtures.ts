/**
 * @fileoverview Test fixtures shared across suites
 */

import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { StorageError } from '../../core/errors.js';
import type { CacheReader, UsageRecorder } from '../../storage/types.js';
import type {
  CandidateSet,
  Organization,
  RemoteRepository,
  RemoteSnapshot,
  Repository,
  UsageEvent,
  UsageTarget,
  ViewKind,
} from '../../types.js';

export const FETCHED_AT = new Date('2024-03-01T12:00:00.000Z');

export function org(id: number, login: string): Organization {
  return { id, login };
}

export function remoteRepo(id: number, fullName: string, overrides: Partial<RemoteRepository> = {}): RemoteRepository {
  const [ownerLogin = '', name = ''] = fullName.split('/');
  return {
    id,
    ownerId: 1,
    ownerLogin,
    name,
    fullName,
    private: false,
    description: null,
    language: null,
    defaultBranch: 'main',
    ...overrides,
  };
}

export function cachedRepo(id: number, fullName: string, overrides: Partial<Repository> = {}): Repository {
  const remote = remoteRepo(id, fullName);
  return {
    id: remote.id,
    ownerId: remote.ownerId,
    ownerLogin: remote.ownerLogin,
    name: remote.name,
    fullName: remote.fullName,
    private: false,
    description: null,
    language: null,
    defaultBranch: 'main',
    syncedAt: FETCHED_AT,
    ...overrides,
  };
}

export function snapshot(
  organizations: Organization[],
  repositories: RemoteRepository[],
  fetchedAt: Date = FETCHED_AT,
): RemoteSnapshot {
  return { organizations, repositories, fetchedAt, complete: true };
}

export interface TempDir {
  dir: string;
  cleanup(): void;
}

export function tempDir(prefix: string): TempDir {
  const dir = mkdtempSync(join(tmpdir(), `ghjump-${prefix}-`));
  return {
    dir,
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}

/**
 * In-memory cache for session and query tests. `failReads` makes every
 * read throw the way an unreadable store does.
 */
export class MemoryCache implements CacheReader, UsageRecorder {
  readonly events: UsageEvent[] = [];
  failReads = false;
  failWrites = false;

  constructor(
    private readonly candidates: CandidateSet,
    private readonly clock: () => Date = () => new Date(FETCHED_AT),
  ) {}

  queryCandidates(): CandidateSet {
    if (this.failReads) throw new StorageError('read', 'database disk image is malformed');
    return this.candidates;
  }

  listUsageEvents(): UsageEvent[] {
    if (this.failReads) throw new StorageError('read', 'database disk image is malformed');
    return [...this.events];
  }

  getRepository(fullName: string): Repository | null {
    return this.candidates.repositories.find((repo) => repo.fullName === fullName) ?? null;
  }

  recordUsage(target: UsageTarget, view: ViewKind): UsageEvent {
    if (this.failWrites) throw new StorageError('write', 'attempt to write a readonly database');
    const event: UsageEvent = { id: this.events.length + 1, target: { ...target }, view, occurredAt: this.clock() };
    this.events.push(event);
    return event;
  }

  /** Append a usage event at an explicit time. */
  seedUsage(target: UsageTarget, occurredAt: Date, view: ViewKind = 'overview'): void {
    this.events.push({ id: this.events.length + 1, target: { ...target }, view, occurredAt });
  }
}
