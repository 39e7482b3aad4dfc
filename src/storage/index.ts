/**
 * @fileoverview Storage module exports
 */

export type {
  CacheReader,
  CacheStore,
  CacheStatus,
  CacheExport,
  EntityChangeCounts,
  RefreshSummary,
  SnapshotLoader,
  UsageRecorder,
} from './types.js';

export { SqliteCacheStore, openCacheStore, type SqliteCacheOptions } from './sqlite_cache.js';
export { validateSnapshot, type ValidatedSnapshot } from './snapshot.js';
export { resolveCachePath, CACHE_FILENAME } from './cache_path.js';
