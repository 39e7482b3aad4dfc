/**
 * @fileoverview `ghj query` - non-interactive ranking for launchers and scripts
 */

import { parseArgs } from 'node:util';
import { buildUsageIndex, rankCandidates, toCandidates } from '../../ranking/index.js';
import type { CacheReader } from '../../storage/types.js';
import type { RankingConfig } from '../../config/index.js';
import { createError } from '../errors.js';
import { withCache, type CommandContext } from './context.js';

export const DEFAULT_QUERY_COUNT = 10;

/**
 * Top `count` full names for `query`, ranked exactly as the interactive
 * search ranks them.
 */
export function topMatches(
  cache: CacheReader,
  query: string,
  count: number,
  ranking: Pick<RankingConfig, 'halfLifeDays' | 'nearTieBand'>,
  now: Date = new Date(),
): string[] {
  const candidates = toCandidates(cache.queryCandidates());
  const usage = buildUsageIndex(cache.listUsageEvents(), now, ranking.halfLifeDays);
  return rankCandidates(query, candidates, usage, { nearTieBand: ranking.nearTieBand })
    .slice(0, count)
    .map((entry) => entry.candidate.fullName);
}

function parseCount(raw: string | undefined): number {
  if (raw === undefined) return DEFAULT_QUERY_COUNT;
  const count = Number(raw);
  if (!Number.isInteger(count) || count < 1) {
    throw createError('INVALID_ARGUMENT', `--count must be a positive integer, got "${raw}"`);
  }
  return count;
}

export async function queryCommand(context: CommandContext): Promise<void> {
  const { values, positionals } = parseArgs({
    args: context.args,
    options: {
      count: { type: 'string', short: 'n' },
    },
    allowPositionals: true,
    strict: true,
  });
  const count = parseCount(values.count);
  const query = positionals.join(' ');

  const results = await withCache(context.config, (cache) => topMatches(cache, query, count, context.config.ranking));

  if (context.json) {
    context.write(JSON.stringify({ items: results }));
    return;
  }
  for (const fullName of results) {
    context.write(fullName);
  }
}
