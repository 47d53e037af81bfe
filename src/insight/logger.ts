/**
 * Leveled console logger.
 *
 * Every component takes a `Logger` in its constructor. Output goes through a
 * sink (console by default) so harnesses can capture lines instead.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export type Logger = {
  debug: (message: string, details?: Record<string, unknown>) => void;
  info: (message: string, details?: Record<string, unknown>) => void;
  warn: (message: string, details?: Record<string, unknown>) => void;
  error: (message: string, details?: Record<string, unknown>) => void;
  child: (scope: string) => Logger;
};

export type LogRecord = {
  level: LogLevel;
  scope: string;
  message: string;
  details?: Record<string, unknown>;
};

export type LogSink = (record: LogRecord) => void;

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const LEVEL_ICON: Record<LogLevel, string> = { debug: '·', info: '✅', warn: '⚠️', error: '❌' };

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

export const consoleSink: LogSink = ({ level, scope, message, details }) => {
  const line = `${LEVEL_ICON[level]} [${scope}] ${message}`;
  const args: unknown[] = details ? [line, details] : [line];
  switch (level) {
    case 'debug': console.debug(...args); break;
    case 'info': console.log(...args); break;
    case 'warn': console.warn(...args); break;
    case 'error': console.error(...args); break;
  }
};

export function createLogger(scope: string, options: { level?: LogLevel; sink?: LogSink } = {}): Logger {
  const minRank = LEVEL_RANK[options.level ?? 'info'];
  const sink = options.sink ?? consoleSink;

  const emit = (level: LogLevel, message: string, details?: Record<string, unknown>): void => {
    if (LEVEL_RANK[level] < minRank) return;
    sink(details ? { level, scope, message, details } : { level, scope, message });
  };

  return {
    debug: (message, details) => emit('debug', message, details),
    info: (message, details) => emit('info', message, details),
    warn: (message, details) => emit('warn', message, details),
    error: (message, details) => emit('error', message, details),
    child: (childScope) => createLogger(`${scope}:${childScope}`, options),
  };
}

/** Collects records in memory; used by the test harnesses. */
export function createMemoryLogger(scope = 'test'): { logger: Logger; records: LogRecord[] } {
  const records: LogRecord[] = [];
  const logger = createLogger(scope, { level: 'debug', sink: (record) => { records.push(record); } });
  return { logger, records };
}

export const silentLogger: Logger = createLogger('silent', { level: 'error', sink: () => {} });
