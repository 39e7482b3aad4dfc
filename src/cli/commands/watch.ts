/**
 * @fileoverview `ghj watch action` - follow the latest CI run for the current branch
 */

import kleur from 'kleur';
import { parseArgs } from 'node:util';
import { GitHubClient } from '../../github/client.js';
import { StorageError } from '../../core/errors.js';
import { hostOf, resolveCurrentRepository, resolveWatchTarget } from '../../github/remote.js';
import { logDebug, logWarning } from '../../telemetry/logger.js';
import { getErrorMessage } from '../../utils/errors.js';
import { watchAction, type RunConclusion, type RunSnapshot, type WatchEvent, type WatchState, type WatchTarget } from '../../watch/action_watcher.js';
import { createError } from '../errors.js';
import { formatDuration } from '../progress.js';
import { withCache, type CommandContext } from './context.js';

function paintConclusion(conclusion: RunConclusion): string {
  switch (conclusion) {
    case 'success':
      return kleur.green(conclusion);
    case 'failure':
    case 'timed_out':
      return kleur.red(conclusion);
    default:
      return kleur.yellow(conclusion);
  }
}

/** `name | branch | status` */
export function formatRunLine(run: RunSnapshot): string {
  const status = run.status === 'completed' && run.conclusion ? paintConclusion(run.conclusion) : kleur.cyan(run.status);
  return `${run.name} | ${run.branch} | ${status}`;
}

export function formatWatchEvent(event: WatchEvent): string | null {
  switch (event.type) {
    case 'progress':
      return `${formatRunLine(event.progress.run)} ${kleur.dim(`(${formatDuration(event.progress.elapsedMs)})`)}`;
    case 'failure':
      return event.retryInMs === null
        ? kleur.red(`request failed: ${event.error}`)
        : kleur.yellow(`retrying in ${formatDuration(event.retryInMs)}: ${event.error}`);
    case 'state':
      switch (event.state.status) {
        case 'locating':
          return kleur.dim('Locating latest run...');
        case 'failed':
          return kleur.red(`Watch failed (${event.state.reason}): ${event.state.message}`);
        default:
          return null;
      }
  }
}

function parseTimeout(raw: string | undefined, fallbackMs: number): number {
  if (raw === undefined) return fallbackMs;
  const seconds = Number(raw);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw createError('INVALID_ARGUMENT', `--timeout must be a positive number of seconds, got "${raw}"`);
  }
  return seconds * 1000;
}

async function resolveTarget(context: CommandContext, branch: string | undefined): Promise<WatchTarget> {
  const host = hostOf(context.config.webUrl);
  if (branch) {
    const repository = await resolveCurrentRepository(context.cwd, host);
    return { repo: repository.fullName, branch };
  }
  try {
    return await withCache(context.config, (cache) => resolveWatchTarget(context.cwd, cache, host));
  } catch (error) {
    if (!(error instanceof StorageError)) throw error;
    logWarning('Cache unavailable; resolving the branch from git only', { error: error.message });
    return resolveWatchTarget(context.cwd, null, host);
  }
}

export async function watchCommand(context: CommandContext): Promise<WatchState> {
  const { values, positionals } = parseArgs({
    args: context.args,
    options: {
      branch: { type: 'string', short: 'b' },
      'no-open': { type: 'boolean', default: false },
      timeout: { type: 'string' },
    },
    allowPositionals: true,
    strict: true,
  });
  const subject = positionals[0] ?? 'action';
  if (subject !== 'action') {
    throw createError('INVALID_ARGUMENT', `Unknown watch target: ${subject}`, { available: ['action'] });
  }

  const { config } = context;
  const timeoutMs = parseTimeout(values.timeout, config.watch.timeoutMs);
  const target = await resolveTarget(context, values.branch);
  logDebug('Watching workflow runs', { repo: target.repo, branch: target.branch });

  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  process.once('SIGINT', onInterrupt);

  const client = new GitHubClient({ token: config.token, apiUrl: config.apiUrl });
  let final: WatchState = { status: 'locating' };
  try {
    for await (const event of watchAction(client, target, {
      backoff: { initialMs: config.watch.initialIntervalMs, maxMs: config.watch.maxIntervalMs },
      timeoutMs,
      failureThreshold: config.watch.failureThreshold,
      signal: controller.signal,
    })) {
      if (event.type === 'state') final = event.state;
      if (context.json) {
        context.write(JSON.stringify(event));
        continue;
      }
      const line = formatWatchEvent(event);
      if (line) context.write(line);
    }
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }

  if (final.status === 'completed') {
    if (!values['no-open']) {
      try {
        await context.openUrl(final.run.url);
      } catch (error) {
        logWarning('Could not open the run page', { url: final.run.url, error: getErrorMessage(error) });
      }
    }
    if (!context.json) context.write(`Run page: ${final.run.url}`);
    if (final.conclusion !== 'success') process.exitCode = 1;
  } else if (final.status === 'failed' && final.reason !== 'cancelled') {
    throw createError('WATCH_FAILED', final.message, { reason: final.reason, repo: target.repo, branch: target.branch });
  }
  return final;
}
