/**
 * Shared test setup
 *
 * Logging is silenced unless GHJUMP_TEST_LOG_LEVEL asks for it, and the
 * environment variables that steer configuration are cleared so a
 * developer's own settings cannot leak into a test.
 */

import { afterAll, beforeAll } from 'vitest';
import { parseLogLevel, setLogLevel } from './src/telemetry/logger.js';

const ENV_KEYS = ['GITHUB_TOKEN', 'GHJUMP_HOME', 'GHJUMP_WEB_URL', 'GHJUMP_API_URL', 'XDG_CONFIG_HOME'];
const saved = new Map<string, string | undefined>();

beforeAll(() => {
  setLogLevel(parseLogLevel(process.env.GHJUMP_TEST_LOG_LEVEL) ?? 'silent');
  for (const key of ENV_KEYS) {
    saved.set(key, process.env[key]);
    delete process.env[key];
  }
});

afterAll(() => {
  for (const [key, value] of saved) {
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
});
