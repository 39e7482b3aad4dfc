/**
 * @fileoverview CLI error handling with helpful suggestions
 */

import {
  ConfigurationError,
  GitContextError,
  LockedError,
  NetworkError,
  NotFoundError,
  ProviderError,
  RateLimitedError,
  StorageError,
  SyncError,
  isGhjumpError,
} from '../core/errors.js';
import { getErrorMessage } from '../utils/errors.js';

export class CliError extends Error {
  constructor(
    message: string,
    public readonly code: CliErrorCode,
    public readonly suggestion?: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CliError';
  }
}

export type CliErrorCode =
  | 'INVALID_ARGUMENT'
  | 'CONFIGURATION_ERROR'
  | 'STORAGE_ERROR'
  | 'SYNC_FAILED'
  | 'LOCKED'
  | 'NOT_FOUND'
  | 'RATE_LIMITED'
  | 'NETWORK_ERROR'
  | 'PROVIDER_ERROR'
  | 'GIT_CONTEXT'
  | 'WATCH_FAILED'
  | 'UNEXPECTED';

export const ERROR_SUGGESTIONS: Record<CliErrorCode, string> = {
  INVALID_ARGUMENT: 'Run `ghj help <command>` for usage information.',
  CONFIGURATION_ERROR: 'Check config.yaml in the directory printed by `ghj data reveal`, and the GHJUMP_* variables.',
  STORAGE_ERROR: 'Run `ghj data clear` and then `ghj data refresh` to rebuild the cache.',
  SYNC_FAILED: 'Nothing was changed. Retry `ghj data refresh`; check GITHUB_TOKEN if it keeps failing.',
  LOCKED: 'Another refresh is running. Wait for it to finish and try again.',
  NOT_FOUND: 'Check the repository name, and that GITHUB_TOKEN can see it.',
  RATE_LIMITED: 'GitHub rate limit reached. Wait a few minutes and try again.',
  NETWORK_ERROR: 'Check your network connection and try again.',
  PROVIDER_ERROR: 'Check that GITHUB_TOKEN is valid and has the repo and read:org scopes.',
  GIT_CONTEXT: 'Run this inside a clone whose origin points at GitHub.',
  WATCH_FAILED: 'Open the Actions tab with `ghj actions` to inspect the run.',
  UNEXPECTED: 'Re-run with --verbose for details.',
};

export const EXIT_CODES: Record<CliErrorCode, number> = {
  INVALID_ARGUMENT: 2,
  CONFIGURATION_ERROR: 3,
  STORAGE_ERROR: 4,
  SYNC_FAILED: 5,
  LOCKED: 6,
  NOT_FOUND: 7,
  RATE_LIMITED: 8,
  NETWORK_ERROR: 9,
  PROVIDER_ERROR: 10,
  GIT_CONTEXT: 11,
  WATCH_FAILED: 12,
  UNEXPECTED: 1,
};

export function createError(
  code: CliErrorCode,
  message: string,
  details?: Record<string, unknown>,
): CliError {
  return new CliError(message, code, ERROR_SUGGESTIONS[code], details);
}

function isArgumentParseError(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    error.code.startsWith('ERR_PARSE_ARGS')
  );
}

function codeFor(error: unknown): CliErrorCode {
  if (isArgumentParseError(error)) return 'INVALID_ARGUMENT';
  if (error instanceof ConfigurationError) return 'CONFIGURATION_ERROR';
  if (error instanceof StorageError) return 'STORAGE_ERROR';
  if (error instanceof SyncError) return 'SYNC_FAILED';
  if (error instanceof LockedError) return 'LOCKED';
  if (error instanceof NotFoundError) return 'NOT_FOUND';
  if (error instanceof RateLimitedError) return 'RATE_LIMITED';
  if (error instanceof NetworkError) return 'NETWORK_ERROR';
  if (error instanceof ProviderError) return 'PROVIDER_ERROR';
  if (error instanceof GitContextError) return 'GIT_CONTEXT';
  return 'UNEXPECTED';
}

/** Wrap any thrown value as a CliError, keeping domain details. */
export function toCliError(error: unknown): CliError {
  if (error instanceof CliError) return error;
  const code = codeFor(error);
  const details = isGhjumpError(error) ? error.toJSON().details : undefined;
  return createError(code, getErrorMessage(error), details);
}

export function exitCodeFor(error: unknown): number {
  return EXIT_CODES[toCliError(error).code];
}

export function formatError(error: unknown): string {
  const cliError = toCliError(error);
  const lines = [`Error [${cliError.code}]: ${cliError.message}`];
  if (error instanceof SyncError && error.issues.length > 0) {
    for (const issue of error.issues.slice(0, 10)) {
      lines.push(`  - ${issue}`);
    }
    if (error.issues.length > 10) {
      lines.push(`  ... and ${error.issues.length - 10} more`);
    }
  }
  if (cliError.suggestion) {
    lines.push('', `Suggestion: ${cliError.suggestion}`);
  }
  return lines.join('\n');
}

export interface ErrorEnvelope {
  error: {
    code: CliErrorCode;
    message: string;
    suggestion: string | null;
    details: Record<string, unknown> | null;
  };
}

export function errorEnvelope(error: unknown): ErrorEnvelope {
  const cliError = toCliError(error);
  return {
    error: {
      code: cliError.code,
      message: cliError.message,
      suggestion: cliError.suggestion ?? null,
      details: cliError.details ?? null,
    },
  };
}
