/**
 * @fileoverview Progress indicators and formatting for CLI output
 *
 * Indicators write to stderr; stdout carries command results only.
 */

import cliProgress from 'cli-progress';

export interface ProgressBarHandle {
  update(current: number, payload?: Record<string, unknown>): void;
  setTotal(total: number): void;
  stop(): void;
}

export interface ProgressBarOptions {
  total: number;
  format?: string;
}

/**
 * Bar for a paginated fetch. The total is unknown until the last page, so
 * callers grow it as pages arrive.
 */
export function createProgressBar(options: ProgressBarOptions): ProgressBarHandle {
  const format = options.format || '{bar} {value} fetched | {task}';

  const bar = new cliProgress.SingleBar(
    {
      format,
      barCompleteChar: '=',
      barIncompleteChar: '-',
      hideCursor: true,
      clearOnComplete: true,
      stream: process.stderr,
    },
    cliProgress.Presets.shades_classic,
  );

  bar.start(options.total, 0, { task: 'Starting...' });

  return {
    update(current: number, payload?: Record<string, unknown>): void {
      bar.update(current, payload);
    },

    setTotal(newTotal: number): void {
      bar.setTotal(newTotal);
    },

    stop(): void {
      bar.stop();
    },
  };
}

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60_000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60_000);
  const seconds = Math.round((ms % 60_000) / 1000);
  return `${minutes}m ${seconds}s`;
}

export function formatTimestamp(date: Date | null): string {
  if (!date) return 'Never';
  return date.toLocaleString();
}

/**
 * Format a file size in bytes to human-readable format
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  if (bytes < 1024 * 1024 * 1024) return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
  return `${(bytes / (1024 * 1024 * 1024)).toFixed(2)} GB`;
}

export function formatKeyValue(items: Array<{ key: string; value: string | number | boolean | null }>): string[] {
  const maxKeyLength = Math.max(0, ...items.map((item) => item.key.length));
  return items.map((item) => {
    const value = item.value === null ? 'N/A' : String(item.value);
    return `  ${item.key.padEnd(maxKeyLength)}: ${value}`;
  });
}
