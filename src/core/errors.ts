/**
 * @fileoverview ghjump error hierarchy
 *
 * Every failure the core can surface is a typed error carrying a stable code
 * and a retryability hint, so the CLI can map it to a message and exit code.
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  retryable: boolean;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class GhjumpError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;
  readonly timestamp = Date.now();

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// STORAGE ERRORS
// ============================================================================

export type StorageOperation = 'open' | 'read' | 'write' | 'clear' | 'migrate';

/** The local store is unavailable or corrupt. Recovery is an explicit clear. */
export class StorageError extends GhjumpError {
  readonly code = 'STORAGE_ERROR';
  readonly retryable = false;

  constructor(
    readonly operation: StorageOperation,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Storage ${operation} failed: ${message}`);
    this.name = 'StorageError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        operation: this.operation,
        cause: this.cause?.message,
      },
    };
  }
}

/** A refresh snapshot was incomplete or inconsistent; the cache was left untouched. */
export class SyncError extends GhjumpError {
  readonly code = 'SYNC_ERROR';
  readonly retryable = true;

  constructor(
    message: string,
    readonly issues: string[] = [],
    readonly cause?: Error,
  ) {
    super(`Refresh aborted: ${message}`);
    this.name = 'SyncError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        issues: this.issues,
        cause: this.cause?.message,
      },
    };
  }
}

/** Another refresh holds the store's exclusive section. */
export class LockedError extends GhjumpError {
  readonly code = 'LOCKED';
  readonly retryable = true;

  constructor(readonly lockPath: string, message = 'another refresh is in progress') {
    super(`Cache is locked: ${message}`);
    this.name = 'LockedError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { lockPath: this.lockPath },
    };
  }
}

// ============================================================================
// PROVIDER ERRORS
// ============================================================================

export class NotFoundError extends GhjumpError {
  readonly code = 'NOT_FOUND';
  readonly retryable = false;

  constructor(readonly resource: string, message: string) {
    super(message);
    this.name = 'NotFoundError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { resource: this.resource },
    };
  }
}

/** The remote asked us to slow down. Callers widen their interval instead of failing. */
export class RateLimitedError extends GhjumpError {
  readonly code = 'RATE_LIMITED';
  readonly retryable = true;

  constructor(message: string, readonly retryAfterMs?: number) {
    super(message);
    this.name = 'RateLimitedError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { retryAfterMs: this.retryAfterMs },
    };
  }
}

/** A transient transport failure (connection reset, 5xx, DNS). */
export class NetworkError extends GhjumpError {
  readonly code = 'NETWORK_ERROR';
  readonly retryable = true;

  constructor(message: string, readonly cause?: Error) {
    super(message);
    this.name = 'NetworkError';
  }
}

/** A non-transient remote failure such as bad credentials or a malformed response. */
export class ProviderError extends GhjumpError {
  readonly code = 'PROVIDER_ERROR';
  readonly retryable = false;

  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = 'ProviderError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { status: this.status },
    };
  }
}

// ============================================================================
// ENVIRONMENT ERRORS
// ============================================================================

export class ConfigurationError extends GhjumpError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly retryable = false;

  constructor(
    readonly configKey: string,
    message: string,
  ) {
    super(`Configuration error for ${configKey}: ${message}`);
    this.name = 'ConfigurationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { configKey: this.configKey },
    };
  }
}

export type GitContextReason = 'not_a_repository' | 'no_origin' | 'not_github' | 'detached_head';

export class GitContextError extends GhjumpError {
  readonly code = 'GIT_CONTEXT_ERROR';
  readonly retryable = false;

  constructor(readonly reason: GitContextReason, message: string) {
    super(message);
    this.name = 'GitContextError';
  }
}

// ============================================================================
// ERROR TYPE GUARDS
// ============================================================================

export function isGhjumpError(error: unknown): error is GhjumpError {
  return error instanceof GhjumpError;
}

export function isRetryableError(error: unknown): boolean {
  if (error instanceof GhjumpError) {
    return error.retryable;
  }
  return false;
}
