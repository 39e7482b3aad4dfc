/**
 * @fileoverview Cache file location
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

export const CACHE_FILENAME = 'cache.sqlite';

/**
 * Resolve the store file inside the ghjump home directory, creating the
 * directory so the path can be opened immediately.
 */
export function resolveCachePath(homeDir: string): string {
  fs.mkdirSync(homeDir, { recursive: true });
  return path.join(homeDir, CACHE_FILENAME);
}
