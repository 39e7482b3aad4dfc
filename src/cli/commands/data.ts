/**
 * @fileoverview `ghj data` - cache maintenance
 */

import { parseArgs } from 'node:util';
import { GitHubClient, type FetchProgress } from '../../github/client.js';
import type { CacheStatus, CacheStore, RefreshSummary } from '../../storage/types.js';
import { logInfo } from '../../telemetry/logger.js';
import { createError } from '../errors.js';
import { createProgressBar, formatBytes, formatDuration, formatKeyValue, formatTimestamp } from '../progress.js';
import { cachePathFor, withCache, type CommandContext } from './context.js';

export const DATA_SUBCOMMANDS = ['refresh', 'clear', 'status', 'export', 'reveal'] as const;
export type DataSubcommand = (typeof DATA_SUBCOMMANDS)[number];

function isDataSubcommand(value: string | undefined): value is DataSubcommand {
  return DATA_SUBCOMMANDS.some((name) => name === value);
}

export interface StatusLine {
  organizations: number;
  repositories: number;
  usageEvents: number;
  lastRefreshAt: string | null;
  sizeBytes: number;
}

export function toStatusLine(status: CacheStatus): StatusLine {
  return {
    organizations: status.organizations,
    repositories: status.repositories,
    usageEvents: status.usageEvents,
    lastRefreshAt: status.lastRefreshAt ? status.lastRefreshAt.toISOString() : null,
    sizeBytes: status.sizeBytes,
  };
}

export function formatStatus(status: CacheStatus, location: string): string[] {
  return [
    'Cache Status',
    '============',
    ...formatKeyValue([
      { key: 'Organizations', value: status.organizations },
      { key: 'Repositories', value: status.repositories },
      { key: 'Usage events', value: status.usageEvents },
      { key: 'Last refresh', value: formatTimestamp(status.lastRefreshAt) },
      { key: 'Size', value: formatBytes(status.sizeBytes) },
      { key: 'Location', value: location },
    ]),
  ];
}

export function formatRefreshSummary(summary: RefreshSummary, elapsedMs: number): string {
  const { organizations: orgs, repositories: repos } = summary;
  return (
    `Refreshed in ${formatDuration(elapsedMs)}: ` +
    `organizations +${orgs.inserted} ~${orgs.updated} -${orgs.removed}, ` +
    `repositories +${repos.inserted} ~${repos.updated} -${repos.removed}`
  );
}

async function refresh(context: CommandContext, cache: CacheStore, quiet: boolean): Promise<void> {
  const client = new GitHubClient({ token: context.config.token, apiUrl: context.config.apiUrl });
  const showProgress = !quiet && !context.json && process.stderr.isTTY === true;
  const bar = showProgress ? createProgressBar({ total: 1 }) : null;
  const onProgress = (progress: FetchProgress): void => {
    if (!bar) return;
    bar.setTotal(Math.max(1, progress.fetched));
    bar.update(progress.fetched, { task: progress.phase });
  };

  const startedAt = Date.now();
  let summary: RefreshSummary;
  try {
    // The loader runs inside the refresh lock, so the fetch is covered too.
    summary = await cache.refresh(() => client.fetchSnapshot(onProgress));
  } finally {
    bar?.stop();
  }
  const elapsedMs = Date.now() - startedAt;
  logInfo('Cache refreshed', { location: cache.location, elapsedMs });

  if (context.json) {
    context.write(JSON.stringify(summary));
  } else if (!quiet) {
    context.write(formatRefreshSummary(summary, elapsedMs));
  }
}

export async function dataCommand(context: CommandContext): Promise<void> {
  const { values, positionals } = parseArgs({
    args: context.args,
    options: {
      quiet: { type: 'boolean', short: 'q', default: false },
    },
    allowPositionals: true,
    strict: true,
  });
  const subcommand = positionals[0];
  if (!isDataSubcommand(subcommand)) {
    throw createError(
      'INVALID_ARGUMENT',
      subcommand ? `Unknown data subcommand: ${subcommand}` : 'Missing data subcommand',
      { available: DATA_SUBCOMMANDS },
    );
  }
  const quiet = values.quiet;

  if (subcommand === 'reveal') {
    context.write(cachePathFor(context.config));
    return;
  }

  await withCache(context.config, async (cache) => {
    switch (subcommand) {
      case 'refresh':
        await refresh(context, cache, quiet);
        return;
      case 'clear':
        cache.clear();
        if (!quiet && !context.json) context.write('Cache cleared.');
        return;
      case 'status': {
        const status = cache.status();
        if (quiet || context.json) {
          context.write(JSON.stringify(toStatusLine(status)));
        } else {
          for (const line of formatStatus(status, cache.location)) context.write(line);
        }
        return;
      }
      case 'export':
        context.write(JSON.stringify(cache.export(), null, 2));
        return;
    }
  });
}
