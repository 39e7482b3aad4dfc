import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { ConfigurationError } from '../../core/errors.js';
import { DEFAULT_RANKING, DEFAULT_WATCH, loadConfig, parseConfigFile, resolveHomeDir } from '../index.js';
import { tempDir, type TempDir } from '../../__tests__/helpers/fixtures.js';

describe('resolveHomeDir', () => {
  it('prefers GHJUMP_HOME, then XDG_CONFIG_HOME', () => {
    expect(resolveHomeDir({ GHJUMP_HOME: '/opt/ghj', XDG_CONFIG_HOME: '/xdg' })).toBe('/opt/ghj');
    expect(resolveHomeDir({ XDG_CONFIG_HOME: '/xdg' })).toBe('/xdg/ghjump');
    expect(resolveHomeDir({})).toMatch(/[/\\]\.config[/\\]ghjump$/);
  });
});

describe('parseConfigFile', () => {
  it('treats an empty document as no settings', () => {
    expect(parseConfigFile('')).toEqual({});
  });

  it('names the offending key', () => {
    const error = (() => {
      try {
        parseConfigFile('ranking:\n  nearTieBand: 0\n');
      } catch (e) {
        return e;
      }
      return null;
    })();

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error instanceof ConfigurationError ? error.configKey : null).toBe('ranking.nearTieBand');
  });

  it('rejects unknown keys and malformed YAML', () => {
    expect(() => parseConfigFile('colour: blue\n')).toThrow(ConfigurationError);
    expect(() => parseConfigFile('ranking: [1, 2\n')).toThrow(/invalid YAML/);
  });
});

describe('loadConfig', () => {
  let temp: TempDir;

  beforeEach(() => {
    temp = tempDir('config');
  });

  afterEach(() => {
    temp.cleanup();
  });

  it('uses defaults when there is no file', () => {
    const config = loadConfig({ env: { GHJUMP_HOME: temp.dir } });

    expect(config).toEqual({
      homeDir: temp.dir,
      webUrl: 'https://github.com',
      apiUrl: 'https://api.github.com',
      token: null,
      ranking: DEFAULT_RANKING,
      watch: DEFAULT_WATCH,
      source: null,
    });
  });

  it('layers the file over defaults and the environment over the file', () => {
    const file = join(temp.dir, 'config.yaml');
    writeFileSync(
      file,
      ['webUrl: https://git.example.test', 'apiUrl: https://git.example.test/api/v3', 'ranking:', '  halfLifeDays: 3', ''].join('\n'),
    );

    const config = loadConfig({
      env: { GHJUMP_HOME: temp.dir, GHJUMP_API_URL: 'https://api.example.test', GITHUB_TOKEN: ' test-secret \n' },
    });

    expect(config.webUrl).toBe('https://git.example.test');
    expect(config.apiUrl).toBe('https://api.example.test');
    expect(config.token).toBe('test-secret');
    expect(config.ranking).toEqual({ ...DEFAULT_RANKING, halfLifeDays: 3 });
    expect(config.source).toBe(file);
  });

  it('rejects an invalid URL from the environment', () => {
    expect(() => loadConfig({ env: { GHJUMP_HOME: temp.dir, GHJUMP_WEB_URL: 'github' } })).toThrow(
      'Configuration error for GHJUMP_WEB_URL: not a valid URL: github',
    );
  });

  it('rejects a watch ceiling below the initial interval', () => {
    writeFileSync(join(temp.dir, 'config.yaml'), 'watch:\n  initialIntervalMs: 5000\n  maxIntervalMs: 1000\n');

    expect(() => loadConfig({ env: { GHJUMP_HOME: temp.dir } })).toThrow(/watch\.maxIntervalMs/);
  });
});
