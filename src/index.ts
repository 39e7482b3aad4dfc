/**
 * @fileoverview ghjump - jump to GitHub repositories from the terminal
 *
 * The library surface behind the `ghj` CLI:
 *
 * ```typescript
 * import { openCacheStore, rankCandidates, toCandidates, buildUsageIndex } from 'ghjump';
 *
 * const cache = openCacheStore('/tmp/ghjump/cache.sqlite');
 * const usage = buildUsageIndex(cache.listUsageEvents(), new Date());
 * const ranked = rankCandidates('blog', toCandidates(cache.queryCandidates()), usage);
 * await cache.close();
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// DOMAIN
// ============================================================================

export * from './types.js';
export * from './core/errors.js';

// ============================================================================
// COMPONENTS
// ============================================================================

export * from './storage/index.js';
export * from './ranking/index.js';
export * from './session/index.js';
export * from './watch/index.js';
export * from './navigation/index.js';
export * from './github/index.js';

export {
  loadConfig,
  parseConfigFile,
  resolveHomeDir,
  CONFIG_FILENAME,
  DEFAULT_API_URL,
  DEFAULT_RANKING,
  DEFAULT_WATCH,
  type GhjumpConfig,
  type LoadConfigOptions,
  type RankingConfig,
  type WatchConfig,
} from './config/index.js';

// ============================================================================
// VERSION CONSTANTS
// ============================================================================

/** Kept in step with package.json. */
export const GHJUMP_VERSION = '0.3.0';
