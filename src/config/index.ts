/**
 * @fileoverview Runtime configuration
 *
 * Layers, lowest precedence first:
 *   1. built-in defaults
 *   2. `$GHJUMP_HOME/config.yaml`, when present
 *   3. environment variables
 *
 * The home directory itself comes from `GHJUMP_HOME`, then
 * `$XDG_CONFIG_HOME/ghjump`, then `~/.config/ghjump`.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import yaml from 'yaml';
import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';
import { DEFAULT_WEB_URL } from '../navigation/views.js';
import { DEFAULT_HALF_LIFE_DAYS } from '../ranking/usage.js';
import { DEFAULT_NEAR_TIE_BAND } from '../ranking/ranker.js';

export const CONFIG_FILENAME = 'config.yaml';
export const DEFAULT_API_URL = 'https://api.github.com';

export interface RankingConfig {
  halfLifeDays: number;
  nearTieBand: number;
  visibleRows: number;
}

export interface WatchConfig {
  initialIntervalMs: number;
  maxIntervalMs: number;
  timeoutMs: number;
  failureThreshold: number;
}

export interface GhjumpConfig {
  homeDir: string;
  webUrl: string;
  apiUrl: string;
  token: string | null;
  ranking: RankingConfig;
  watch: WatchConfig;
  /** Config file that was read, if any. */
  source: string | null;
}

export const DEFAULT_RANKING: RankingConfig = {
  halfLifeDays: DEFAULT_HALF_LIFE_DAYS,
  nearTieBand: DEFAULT_NEAR_TIE_BAND,
  visibleRows: 10,
};

export const DEFAULT_WATCH: WatchConfig = {
  initialIntervalMs: 2_000,
  maxIntervalMs: 30_000,
  timeoutMs: 30 * 60 * 1000,
  failureThreshold: 3,
};

const FileConfigSchema = z
  .object({
    webUrl: z.string().url().optional(),
    apiUrl: z.string().url().optional(),
    ranking: z
      .object({
        halfLifeDays: z.number().positive().optional(),
        nearTieBand: z.number().positive().optional(),
        visibleRows: z.number().int().min(1).optional(),
      })
      .strict()
      .optional(),
    watch: z
      .object({
        initialIntervalMs: z.number().int().positive().optional(),
        maxIntervalMs: z.number().int().positive().optional(),
        timeoutMs: z.number().int().positive().optional(),
        failureThreshold: z.number().int().min(1).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof FileConfigSchema>;

export type Env = Readonly<Record<string, string | undefined>>;

export interface LoadConfigOptions {
  env?: Env;
  /** Overrides the home directory resolution. */
  homeDir?: string;
}

export function resolveHomeDir(env: Env): string {
  const explicit = env.GHJUMP_HOME?.trim();
  if (explicit) return path.resolve(explicit);
  const xdg = env.XDG_CONFIG_HOME?.trim();
  if (xdg) return path.join(path.resolve(xdg), 'ghjump');
  return path.join(os.homedir(), '.config', 'ghjump');
}

/**
 * Parse and validate the YAML body of a config file. An empty document is
 * an empty config.
 */
export function parseConfigFile(raw: string, source = CONFIG_FILENAME): FileConfig {
  let document: unknown;
  try {
    document = yaml.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(source, `invalid YAML: ${message}`);
  }
  if (document === null || document === undefined) return {};

  const result = FileConfigSchema.safeParse(document);
  if (!result.success) {
    const issue = result.error.issues[0];
    const key = issue && issue.path.length > 0 ? issue.path.join('.') : source;
    throw new ConfigurationError(key, issue?.message ?? 'invalid configuration');
  }
  return result.data;
}

function readConfigFile(filePath: string): FileConfig | null {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return null;
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(filePath, `unreadable: ${message}`);
  }
  return parseConfigFile(raw, filePath);
}

function urlFromEnv(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  if (!value) return undefined;
  const result = z.string().url().safeParse(value);
  if (!result.success) {
    throw new ConfigurationError(key, `not a valid URL: ${value}`);
  }
  return value;
}

export function loadConfig(options: LoadConfigOptions = {}): GhjumpConfig {
  const env = options.env ?? process.env;
  const homeDir = options.homeDir ?? resolveHomeDir(env);
  const source = path.join(homeDir, CONFIG_FILENAME);
  const file = readConfigFile(source);

  const ranking: RankingConfig = { ...DEFAULT_RANKING, ...file?.ranking };
  const watch: WatchConfig = { ...DEFAULT_WATCH, ...file?.watch };
  if (watch.maxIntervalMs < watch.initialIntervalMs) {
    throw new ConfigurationError('watch.maxIntervalMs', 'must not be smaller than watch.initialIntervalMs');
  }

  return {
    homeDir,
    webUrl: urlFromEnv(env, 'GHJUMP_WEB_URL') ?? file?.webUrl ?? DEFAULT_WEB_URL,
    apiUrl: urlFromEnv(env, 'GHJUMP_API_URL') ?? file?.apiUrl ?? DEFAULT_API_URL,
    token: env.GITHUB_TOKEN?.trim() || null,
    ranking,
    watch,
    source: file ? source : null,
  };
}
