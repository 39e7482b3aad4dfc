import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { getLogLevel, logDebug, logError, logInfo, logWarning, parseLogLevel, setLogLevel, type LogLevel } from '../logger.js';

let previous: LogLevel;

beforeEach(() => {
  previous = getLogLevel();
  setLogLevel('debug');
});

afterEach(() => {
  setLogLevel(previous);
  vi.restoreAllMocks();
});

describe('telemetry logger', () => {
  const cases = [
    { fn: logInfo, level: 'info' as const, method: 'error' as const },
    { fn: logWarning, level: 'warn' as const, method: 'warn' as const },
    { fn: logError, level: 'error' as const, method: 'error' as const },
    { fn: logDebug, level: 'debug' as const, method: 'error' as const },
  ];

  for (const { fn, level, method } of cases) {
    it(`logs a prefixed message only for ${level} when context is empty`, () => {
      const spy = vi.spyOn(console, method).mockImplementation(() => {});

      fn('hello', {});

      expect(spy).toHaveBeenCalledWith('[ghjump] hello');
    });

    it(`logs message and context for ${level} when context has keys`, () => {
      const spy = vi.spyOn(console, method).mockImplementation(() => {});
      const context = { repo: 'acme/api' };

      fn('hello', context);

      expect(spy).toHaveBeenCalledWith('[ghjump] hello', context);
    });
  }

  it('drops messages below the threshold', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    setLogLevel('warn');

    logInfo('quiet');
    logDebug('quieter');
    logError('loud');

    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy).toHaveBeenCalledWith('[ghjump] loud');
  });

  it('parses level names loosely', () => {
    expect(parseLogLevel(' DEBUG ')).toBe('debug');
    expect(parseLogLevel('verbose')).toBeNull();
    expect(parseLogLevel(undefined)).toBeNull();
  });
});
