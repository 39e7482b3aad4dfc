/**
 * @fileoverview SQLite cache store
 *
 * Uses better-sqlite3 for synchronous reads and usage appends, so a keystroke
 * never waits on I/O. Refreshes are serialized with an in-process flag plus a
 * proper-lockfile lock next to the database, which also keeps a second
 * ghjump process from refreshing the same file.
 */

import Database from 'better-sqlite3';
import * as fs from 'node:fs';
import * as path from 'node:path';
import lockfile from 'proper-lockfile';
import { LockedError, StorageError, SyncError } from '../core/errors.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import { getErrorMessage, toError } from '../utils/errors.js';
import type {
  CandidateSet,
  Organization,
  RemoteSnapshot,
  Repository,
  TargetKind,
  UsageEvent,
  UsageTarget,
  ViewKind,
} from '../types.js';
import { isViewKind } from '../types.js';
import { validateSnapshot, type ValidatedSnapshot } from './snapshot.js';
import type {
  CacheExport,
  CacheStatus,
  CacheStore,
  EntityChangeCounts,
  RefreshSummary,
  SnapshotLoader,
} from './types.js';

const SCHEMA_VERSION = 1;
const EXPORT_VERSION = 1;

/** A refresh lock older than this is considered abandoned by a crashed process. */
const LOCK_STALE_TIMEOUT_MS = 60_000;
const LOCK_UPDATE_INTERVAL_MS = 10_000;

const METADATA_LAST_REFRESH = 'last_refresh_at';
const METADATA_ORGANIZATION_COUNT = 'organization_count';
const METADATA_REPOSITORY_COUNT = 'repository_count';

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS metadata (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL
  );
  CREATE TABLE IF NOT EXISTS organizations (
    login TEXT PRIMARY KEY,
    id INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_organizations_id ON organizations(id);
  CREATE TABLE IF NOT EXISTS repositories (
    full_name TEXT PRIMARY KEY,
    id INTEGER NOT NULL,
    owner_id INTEGER NOT NULL,
    owner_login TEXT NOT NULL,
    name TEXT NOT NULL,
    private INTEGER NOT NULL DEFAULT 0,
    description TEXT,
    language TEXT,
    default_branch TEXT,
    synced_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_repositories_id ON repositories(id);
  CREATE INDEX IF NOT EXISTS idx_repositories_owner ON repositories(owner_login);
  CREATE TABLE IF NOT EXISTS usage_events (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    target_kind TEXT NOT NULL CHECK (target_kind IN ('organization', 'repository')),
    target_id INTEGER NOT NULL,
    target_key TEXT NOT NULL,
    view TEXT NOT NULL,
    occurred_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_usage_events_target ON usage_events(target_kind, target_key);
`;

interface OrganizationRow {
  login: string;
  id: number;
}

interface RepositoryRow {
  full_name: string;
  id: number;
  owner_id: number;
  owner_login: string;
  name: string;
  private: number;
  description: string | null;
  language: string | null;
  default_branch: string | null;
  synced_at: string;
}

interface UsageEventRow {
  id: number;
  target_kind: string;
  target_id: number;
  target_key: string;
  view: string;
  occurred_at: string;
}

interface CountRow {
  count: number;
}

interface MetadataRow {
  value: string;
}

export interface SqliteCacheOptions {
  /** Clock used for usage timestamps and refresh metadata. */
  now?: () => Date;
}

export class SqliteCacheStore implements CacheStore {
  readonly location: string;
  private readonly lockPath: string;
  private readonly now: () => Date;
  private db: Database.Database | null = null;
  private refreshing = false;

  constructor(dbPath: string, options: SqliteCacheOptions = {}) {
    this.location = dbPath;
    this.lockPath = `${dbPath}.lock`;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Open (creating if needed) the database and bring its schema up to date.
   * A file that is not a SQLite database, or fails the integrity check, is
   * reported as corrupt and left in place for the user to clear.
   */
  open(): this {
    if (this.db) return this;
    let db: Database.Database | null = null;
    try {
      fs.mkdirSync(path.dirname(this.location), { recursive: true });
      db = new Database(this.location);
      db.pragma('journal_mode = WAL');
      db.pragma('synchronous = NORMAL');
      db.pragma('busy_timeout = 5000');
      const check = db.pragma('quick_check', { simple: true });
      if (check !== 'ok') {
        throw new Error(`integrity check reported: ${String(check)}`);
      }
      migrate(db);
      this.db = db;
      logDebug('Opened cache', { path: this.location });
      return this;
    } catch (error) {
      db?.close();
      if (error instanceof StorageError) throw error;
      throw new StorageError('open', `${this.location} is unavailable or corrupt (${getErrorMessage(error)})`, toError(error));
    }
  }

  async close(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  private ensureDb(): Database.Database {
    if (!this.db) {
      throw new StorageError('read', 'cache is not open. Call open() first.');
    }
    return this.db;
  }

  // --------------------------------------------------------------------------
  // Reads
  // --------------------------------------------------------------------------

  queryCandidates(): CandidateSet {
    return this.read(() => ({
      organizations: this.loadOrganizations(),
      repositories: this.loadRepositories(),
    }));
  }

  listUsageEvents(): UsageEvent[] {
    return this.read(() => {
      const rows = this.ensureDb()
        .prepare<[], UsageEventRow>(
          'SELECT id, target_kind, target_id, target_key, view, occurred_at FROM usage_events ORDER BY id',
        )
        .all();
      return rows.map(rowToUsageEvent);
    });
  }

  getRepository(fullName: string): Repository | null {
    return this.read(() => {
      const row = this.ensureDb()
        .prepare<[string], RepositoryRow>('SELECT * FROM repositories WHERE full_name = ?')
        .get(fullName);
      return row ? rowToRepository(row) : null;
    });
  }

  status(): CacheStatus {
    return this.read(() => {
      const db = this.ensureDb();
      const count = (table: 'organizations' | 'repositories' | 'usage_events'): number =>
        db.prepare<[], CountRow>(`SELECT COUNT(*) AS count FROM ${table}`).get()?.count ?? 0;
      return {
        organizations: count('organizations'),
        repositories: count('repositories'),
        usageEvents: count('usage_events'),
        lastRefreshAt: this.readLastRefresh(),
        sizeBytes: storeSizeBytes(this.location),
      };
    });
  }

  export(): CacheExport {
    return this.read(() => ({
      version: EXPORT_VERSION,
      exportedAt: this.now(),
      lastRefreshAt: this.readLastRefresh(),
      organizations: this.loadOrganizations(),
      repositories: this.loadRepositories(),
      usageEvents: this.listUsageEvents(),
    }));
  }

  // --------------------------------------------------------------------------
  // Writes
  // --------------------------------------------------------------------------

  recordUsage(target: UsageTarget, view: ViewKind): UsageEvent {
    const occurredAt = this.now();
    try {
      const result = this.ensureDb()
        .prepare(
          'INSERT INTO usage_events (target_kind, target_id, target_key, view, occurred_at) VALUES (?, ?, ?, ?, ?)',
        )
        .run(target.kind, target.id, target.key, view, occurredAt.toISOString());
      return { id: Number(result.lastInsertRowid), target: { ...target }, view, occurredAt };
    } catch (error) {
      throw asStorageError('write', error);
    }
  }

  clear(): void {
    this.assertNotRefreshing();
    const db = this.ensureDb();
    try {
      db.transaction(() => {
        db.exec(`
          DELETE FROM usage_events;
          DELETE FROM repositories;
          DELETE FROM organizations;
          DELETE FROM metadata;
          DELETE FROM sqlite_sequence WHERE name = 'usage_events';
        `);
      })();
    } catch (error) {
      throw asStorageError('clear', error);
    }
  }

  /**
   * Replace the cached organizations and repositories with a snapshot.
   *
   * When given a loader, the refresh lock is held while it runs so that the
   * fetch and the write form one exclusive section. The lock is released on
   * every exit path; proper-lockfile also drops it if the process is killed.
   */
  async refresh(source: RemoteSnapshot | SnapshotLoader): Promise<RefreshSummary> {
    this.ensureDb();
    const release = await this.acquireRefreshLock();
    try {
      const snapshot = typeof source === 'function' ? await source() : source;
      const validated = validateSnapshot(snapshot);
      return this.applySnapshot(validated);
    } finally {
      await release();
    }
  }

  private applySnapshot(snapshot: ValidatedSnapshot): RefreshSummary {
    const db = this.ensureDb();
    const refreshedAt = this.now();
    const syncedAt = snapshot.fetchedAt.toISOString();

    const apply = db.transaction((): RefreshSummary => {
      const knownLogins = new Set(
        db.prepare<[], { login: string }>('SELECT login FROM organizations').all().map((row) => row.login),
      );
      const knownRepos = new Set(
        db.prepare<[], { full_name: string }>('SELECT full_name FROM repositories').all().map((row) => row.full_name),
      );

      const logins = snapshot.organizations.map((org) => org.login);
      const removedOrgs = db
        .prepare('DELETE FROM organizations WHERE login NOT IN (SELECT value FROM json_each(?))')
        .run(JSON.stringify(logins)).changes;
      const upsertOrg = db.prepare(
        `INSERT INTO organizations (login, id) VALUES (?, ?)
         ON CONFLICT(login) DO UPDATE SET id = excluded.id`,
      );
      for (const org of snapshot.organizations) {
        upsertOrg.run(org.login, org.id);
      }

      const fullNames = snapshot.repositories.map((repo) => repo.fullName);
      const removedRepos = db
        .prepare('DELETE FROM repositories WHERE full_name NOT IN (SELECT value FROM json_each(?))')
        .run(JSON.stringify(fullNames)).changes;
      const upsertRepo = db.prepare(
        `INSERT INTO repositories
           (full_name, id, owner_id, owner_login, name, private, description, language, default_branch, synced_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(full_name) DO UPDATE SET
           id = excluded.id,
           owner_id = excluded.owner_id,
           owner_login = excluded.owner_login,
           name = excluded.name,
           private = excluded.private,
           description = excluded.description,
           language = excluded.language,
           default_branch = excluded.default_branch,
           synced_at = excluded.synced_at`,
      );
      for (const repo of snapshot.repositories) {
        upsertRepo.run(
          repo.fullName,
          repo.id,
          repo.ownerId,
          repo.ownerLogin,
          repo.name,
          repo.private ? 1 : 0,
          repo.description ?? null,
          repo.language ?? null,
          repo.defaultBranch ?? null,
          syncedAt,
        );
      }

      const setMetadata = db.prepare(
        'INSERT INTO metadata (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value',
      );
      setMetadata.run(METADATA_LAST_REFRESH, refreshedAt.toISOString());
      setMetadata.run(METADATA_ORGANIZATION_COUNT, String(snapshot.organizations.length));
      setMetadata.run(METADATA_REPOSITORY_COUNT, String(snapshot.repositories.length));

      return {
        organizations: changeCounts(logins, knownLogins, removedOrgs),
        repositories: changeCounts(fullNames, knownRepos, removedRepos),
        refreshedAt,
      };
    });

    try {
      return apply();
    } catch (error) {
      throw asStorageError('write', error);
    }
  }

  // --------------------------------------------------------------------------
  // Locking
  // --------------------------------------------------------------------------

  private async acquireRefreshLock(): Promise<() => Promise<void>> {
    if (this.refreshing) {
      throw new LockedError(this.lockPath);
    }
    this.refreshing = true;

    let releaseFile: () => Promise<void>;
    try {
      releaseFile = await lockfile.lock(this.location, {
        lockfilePath: this.lockPath,
        realpath: false,
        stale: LOCK_STALE_TIMEOUT_MS,
        update: LOCK_UPDATE_INTERVAL_MS,
        retries: 0,
        onCompromised: (err) => {
          logWarning('Refresh lock compromised', { path: this.lockPath, error: err.message });
        },
      });
    } catch (error) {
      this.refreshing = false;
      if (isLockHeldError(error)) {
        throw new LockedError(this.lockPath, 'another ghjump process is refreshing this cache');
      }
      throw asStorageError('open', error);
    }

    return async () => {
      this.refreshing = false;
      await releaseFile().catch((lockError: unknown) => {
        logWarning('Failed to release refresh lock', { path: this.lockPath, error: getErrorMessage(lockError) });
      });
    };
  }

  private assertNotRefreshing(): void {
    if (this.refreshing) {
      throw new LockedError(this.lockPath);
    }
    let held = false;
    try {
      held = lockfile.checkSync(this.location, {
        lockfilePath: this.lockPath,
        realpath: false,
        stale: LOCK_STALE_TIMEOUT_MS,
      });
    } catch (error) {
      logDebug('Refresh lock check failed', { path: this.lockPath, error: getErrorMessage(error) });
    }
    if (held) {
      throw new LockedError(this.lockPath, 'another ghjump process is refreshing this cache');
    }
  }

  // --------------------------------------------------------------------------
  // Helpers
  // --------------------------------------------------------------------------

  private read<T>(fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      throw asStorageError('read', error);
    }
  }

  private loadOrganizations(): Organization[] {
    return this.ensureDb()
      .prepare<[], OrganizationRow>('SELECT login, id FROM organizations ORDER BY login')
      .all()
      .map((row) => ({ id: row.id, login: row.login }));
  }

  private loadRepositories(): Repository[] {
    return this.ensureDb()
      .prepare<[], RepositoryRow>('SELECT * FROM repositories ORDER BY full_name')
      .all()
      .map(rowToRepository);
  }

  private readLastRefresh(): Date | null {
    const row = this.ensureDb()
      .prepare<[string], MetadataRow>('SELECT value FROM metadata WHERE key = ?')
      .get(METADATA_LAST_REFRESH);
    return row ? parseTimestamp(row.value, METADATA_LAST_REFRESH) : null;
  }
}

/**
 * Open the cache at `dbPath`, creating it if missing.
 */
export function openCacheStore(dbPath: string, options?: SqliteCacheOptions): SqliteCacheStore {
  return new SqliteCacheStore(dbPath, options).open();
}

// ============================================================================
// SCHEMA
// ============================================================================

function migrate(db: Database.Database): void {
  const version = db.pragma('user_version', { simple: true });
  if (typeof version !== 'number') {
    throw new StorageError('migrate', 'could not read schema version');
  }
  if (version > SCHEMA_VERSION) {
    throw new StorageError('migrate', `cache schema v${version} is newer than supported v${SCHEMA_VERSION}`);
  }
  if (version === SCHEMA_VERSION) return;
  db.transaction(() => {
    db.exec(SCHEMA_SQL);
    db.pragma(`user_version = ${SCHEMA_VERSION}`);
  })();
}

// ============================================================================
// ROW MAPPING
// ============================================================================

function rowToRepository(row: RepositoryRow): Repository {
  return {
    id: row.id,
    ownerId: row.owner_id,
    ownerLogin: row.owner_login,
    name: row.name,
    fullName: row.full_name,
    private: row.private !== 0,
    description: row.description,
    language: row.language,
    defaultBranch: row.default_branch,
    syncedAt: parseTimestamp(row.synced_at, `repositories.${row.full_name}.synced_at`),
  };
}

function rowToUsageEvent(row: UsageEventRow): UsageEvent {
  const kind = parseTargetKind(row.target_kind);
  if (!isViewKind(row.view)) {
    throw new StorageError('read', `usage event ${row.id} has unknown view "${row.view}"`);
  }
  return {
    id: row.id,
    target: { kind, id: row.target_id, key: row.target_key },
    view: row.view,
    occurredAt: parseTimestamp(row.occurred_at, `usage_events.${row.id}.occurred_at`),
  };
}

function parseTargetKind(value: string): TargetKind {
  if (value === 'organization' || value === 'repository') return value;
  throw new StorageError('read', `unknown target kind "${value}"`);
}

function parseTimestamp(value: string, field: string): Date {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new StorageError('read', `${field} holds an invalid timestamp "${value}"`);
  }
  return date;
}

function changeCounts(keys: string[], known: Set<string>, removed: number): EntityChangeCounts {
  let inserted = 0;
  for (const key of keys) {
    if (!known.has(key)) inserted += 1;
  }
  return { inserted, updated: keys.length - inserted, removed };
}

function storeSizeBytes(dbPath: string): number {
  let total = 0;
  for (const file of [dbPath, `${dbPath}-wal`]) {
    try {
      total += fs.statSync(file).size;
    } catch {
      // WAL file only exists while a connection has pending frames
    }
  }
  return total;
}

function isLockHeldError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ELOCKED';
}

function asStorageError(operation: 'read' | 'write' | 'clear' | 'open', error: unknown): Error {
  if (error instanceof StorageError || error instanceof LockedError || error instanceof SyncError) {
    return error;
  }
  return new StorageError(operation, getErrorMessage(error), toError(error));
}
