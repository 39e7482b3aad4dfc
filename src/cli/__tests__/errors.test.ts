/**
 * @fileoverview Tests for CLI error mapping
 */

import { describe, it, expect } from 'vitest';
import { ConfigurationError, LockedError, NotFoundError, StorageError, SyncError } from '../../core/errors.js';
import { createError, errorEnvelope, exitCodeFor, formatError, toCliError } from '../errors.js';

describe('toCliError', () => {
  it('maps domain errors to CLI codes', () => {
    expect(toCliError(new ConfigurationError('GITHUB_TOKEN', 'missing')).code).toBe('CONFIGURATION_ERROR');
    expect(toCliError(new StorageError('open', 'corrupt')).code).toBe('STORAGE_ERROR');
    expect(toCliError(new LockedError('/tmp/cache.sqlite.lock')).code).toBe('LOCKED');
    expect(toCliError(new NotFoundError('repository acme/api', 'repository acme/api not found')).code).toBe('NOT_FOUND');
    expect(toCliError(new Error('boom')).code).toBe('UNEXPECTED');
  });

  it('treats argument parser failures as invalid arguments', () => {
    const parseError = Object.assign(new TypeError("Unknown option '--frob'"), { code: 'ERR_PARSE_ARGS_UNKNOWN_OPTION' });

    expect(toCliError(parseError).code).toBe('INVALID_ARGUMENT');
    expect(exitCodeFor(parseError)).toBe(2);
  });

  it('passes CLI errors through unchanged', () => {
    const error = createError('WATCH_FAILED', 'run did not complete');

    expect(toCliError(error)).toBe(error);
    expect(exitCodeFor(error)).toBe(12);
  });
});

describe('formatError', () => {
  it('prints the code, message and suggestion', () => {
    expect(formatError(new LockedError('/tmp/cache.sqlite.lock'))).toBe(
      [
        'Error [LOCKED]: Cache is locked: another refresh is in progress',
        '',
        'Suggestion: Another refresh is running. Wait for it to finish and try again.',
      ].join('\n'),
    );
  });

  it('lists at most ten refresh issues', () => {
    const issues = Array.from({ length: 12 }, (_, i) => `issue ${i + 1}`);
    const lines = formatError(new SyncError('snapshot is inconsistent', issues)).split('\n');

    expect(lines[0]).toBe('Error [SYNC_FAILED]: Refresh aborted: snapshot is inconsistent');
    expect(lines.slice(1, 12)).toEqual([...issues.slice(0, 10).map((issue) => `  - ${issue}`), '  ... and 2 more']);
  });
});

describe('errorEnvelope', () => {
  it('carries domain details', () => {
    expect(errorEnvelope(new LockedError('/tmp/cache.sqlite.lock'))).toEqual({
      error: {
        code: 'LOCKED',
        message: 'Cache is locked: another refresh is in progress',
        suggestion: 'Another refresh is running. Wait for it to finish and try again.',
        details: { lockPath: '/tmp/cache.sqlite.lock' },
      },
    });
  });
});
