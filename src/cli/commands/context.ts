/**
 * @fileoverview Shared command plumbing: configuration, cache handle, output
 */

import type { GhjumpConfig } from '../../config/index.js';
import { openCacheStore } from '../../storage/sqlite_cache.js';
import { resolveCachePath } from '../../storage/cache_path.js';
import type { CacheStore } from '../../storage/types.js';
import type { UrlOpener } from '../../navigation/browser.js';

export interface CommandContext {
  config: GhjumpConfig;
  cwd: string;
  json: boolean;
  /** Arguments after the command name. */
  args: string[];
  openUrl: UrlOpener;
  write: (line: string) => void;
}

export function cachePathFor(config: GhjumpConfig): string {
  return resolveCachePath(config.homeDir);
}

/**
 * Open the cache for the duration of `fn` and close it on every exit path.
 */
export async function withCache<T>(config: GhjumpConfig, fn: (cache: CacheStore) => Promise<T> | T): Promise<T> {
  const cache = openCacheStore(cachePathFor(config));
  try {
    return await fn(cache);
  } finally {
    await cache.close();
  }
}
