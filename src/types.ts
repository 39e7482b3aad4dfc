/**
 * @fileoverview Domain types shared by the cache, ranking, session and watcher.
 */

// ============================================================================
// CACHED ENTITIES
// ============================================================================

export interface Organization {
  id: number;
  login: string;
}

export interface Repository {
  id: number;
  ownerId: number;
  ownerLogin: string;
  /** Short name, e.g. `blog` */
  name: string;
  /** `owner/name`; unique within the cache */
  fullName: string;
  private: boolean;
  description: string | null;
  language: string | null;
  defaultBranch: string | null;
  /** When the snapshot this row came from was fetched */
  syncedAt: Date;
}

export type TargetKind = 'organization' | 'repository';

/**
 * Identity of something a usage event can point at.
 * `key` is the login for organizations and the full name for repositories.
 */
export interface UsageTarget {
  kind: TargetKind;
  id: number;
  key: string;
}

export interface UsageEvent {
  id: number;
  target: UsageTarget;
  view: ViewKind;
  occurredAt: Date;
}

// ============================================================================
// VIEWS
// ============================================================================

export const VIEW_KINDS = ['overview', 'issues', 'pulls', 'actions', 'milestones', 'settings'] as const;

export type ViewKind = (typeof VIEW_KINDS)[number];

export function isViewKind(value: string): value is ViewKind {
  return VIEW_KINDS.some((kind) => kind === value);
}

// ============================================================================
// SNAPSHOTS
// ============================================================================

export interface RemoteRepository {
  id: number;
  ownerId: number;
  ownerLogin: string;
  name: string;
  fullName: string;
  private: boolean;
  description?: string | null;
  language?: string | null;
  defaultBranch?: string | null;
}

/**
 * Everything the remote reports as accessible. `complete` is false when the
 * fetch could not page through every result.
 */
export interface RemoteSnapshot {
  organizations: Organization[];
  repositories: RemoteRepository[];
  fetchedAt: Date;
  complete: boolean;
}

export interface CandidateSet {
  organizations: Organization[];
  repositories: Repository[];
}
