/**
 * @fileoverview Cache storage contracts
 *
 * The cache is always handed around as an explicit handle. Components that
 * only rank or display take a {@link CacheReader}; the search session also
 * needs {@link UsageRecorder}; only the CLI data commands see the full store.
 */

import type {
  CandidateSet,
  Organization,
  RemoteSnapshot,
  Repository,
  UsageEvent,
  UsageTarget,
  ViewKind,
} from '../types.js';

export interface CacheReader {
  /** All organizations and repositories, ordered by login / full name. */
  queryCandidates(): CandidateSet;
  /** The raw usage log, oldest first, orphans included. */
  listUsageEvents(): UsageEvent[];
  getRepository(fullName: string): Repository | null;
}

export interface UsageRecorder {
  recordUsage(target: UsageTarget, view: ViewKind): UsageEvent;
}

export interface EntityChangeCounts {
  inserted: number;
  updated: number;
  removed: number;
}

export interface RefreshSummary {
  organizations: EntityChangeCounts;
  repositories: EntityChangeCounts;
  refreshedAt: Date;
}

export interface CacheStatus {
  organizations: number;
  repositories: number;
  usageEvents: number;
  lastRefreshAt: Date | null;
  sizeBytes: number;
}

export interface CacheExport {
  version: number;
  exportedAt: Date;
  lastRefreshAt: Date | null;
  organizations: Organization[];
  repositories: Repository[];
  usageEvents: UsageEvent[];
}

/** Produces a snapshot while the refresh lock is held. */
export type SnapshotLoader = () => Promise<RemoteSnapshot>;

export interface CacheStore extends CacheReader, UsageRecorder {
  /** Filesystem path of the store file. */
  readonly location: string;
  refresh(source: RemoteSnapshot | SnapshotLoader): Promise<RefreshSummary>;
  clear(): void;
  status(): CacheStatus;
  export(): CacheExport;
  close(): Promise<void>;
}
