type LogContext = Record<string, unknown>;

type LoggerFn = (message: string, context?: LogContext) => void;

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

const LEVEL_RANK: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

export function parseLogLevel(value: string | undefined): LogLevel | null {
  if (!value) return null;
  const normalized = value.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : null;
}

let threshold: LogLevel = parseLogLevel(process.env.GHJUMP_LOG_LEVEL) ?? 'warn';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

const emit = (level: Exclude<LogLevel, 'silent'>, message: string, context?: LogContext): void => {
  if (LEVEL_RANK[level] > LEVEL_RANK[threshold]) return;
  // stdout is reserved for command output (`--json`, `data export`); logs go to stderr.
  const logger = level === 'warn' ? console.warn : console.error;
  if (context && Object.keys(context).length > 0) {
    logger(`[ghjump] ${message}`, context);
    return;
  }
  logger(`[ghjump] ${message}`);
};

export const logInfo: LoggerFn = (message, context) => emit('info', message, context);
export const logWarning: LoggerFn = (message, context) => emit('warn', message, context);
export const logError: LoggerFn = (message, context) => emit('error', message, context);
export const logDebug: LoggerFn = (message, context) => emit('debug', message, context);
