import { mkdirSync } from 'node:fs';
import { defineConfig } from 'vitest/config';

// Storage tests create databases under the temp directory; make sure it exists.
const resolvedTmpDir =
  process.env.TMPDIR && process.env.TMPDIR.trim().length > 0 ? process.env.TMPDIR : '/tmp';
process.env.TMPDIR = resolvedTmpDir;
process.env.TMP = resolvedTmpDir;
process.env.TEMP = resolvedTmpDir;
mkdirSync(resolvedTmpDir, { recursive: true });

/**
 * Vitest configuration for ghjump
 *
 * Every test runs in-process: SQLite files live in temp directories and
 * GitHub is replaced by fakes behind the provider interfaces.
 */
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts', 'test/**/*.test.ts'],
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 30000,
    hookTimeout: 10000,
    // better-sqlite3 is a native addon; forks keep each file in its own process.
    pool: 'forks',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/', 'dist/', '**/*.test.ts', 'vitest.config.ts', 'vitest.setup.ts'],
    },
  },
});
