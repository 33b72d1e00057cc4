// Structured logging for units of work and the services built on them

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogData = Record<string, unknown>;

/**
 * Structured logger: a message plus optional key/value data per entry.
 */
export type Logger = Record<LogLevel, (message: string, data?: LogData) => void>;

export type LogEntry = {
  level: LogLevel;
  message: string;
  data?: LogData;
  timestamp: string;
};

type LogSink = (entry: LogEntry) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Build a Logger that turns each call into a LogEntry for `sink`.
 * Entries below `minLevel` never reach the sink.
 */
function createSinkLogger(sink: LogSink, minLevel: LogLevel = 'debug'): Logger {
  const at = (level: LogLevel) => (message: string, data?: LogData) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
    sink({ level, message, data, timestamp: new Date().toISOString() });
  };

  return { debug: at('debug'), info: at('info'), warn: at('warn'), error: at('error') };
}

/**
 * Console logger writing one line per entry, tagged with `component`:
 *
 *   2024-05-01T12:00:00.000Z WARN  [unit-of-work] Unit of work commit failed {"scope":3}
 */
export function createConsoleLogger(component: string): Logger {
  return createSinkLogger(({ level, message, data, timestamp }) => {
    const line = `${timestamp} ${level.toUpperCase().padEnd(5)} [${component}] ${message}`;
    const output = data === undefined ? line : `${line} ${JSON.stringify(data)}`;
    if (level === 'error') console.error(output);
    else if (level === 'warn') console.warn(output);
    else console.log(output);
  });
}

export const consoleLogger: Logger = createConsoleLogger('unit-of-work');

export const silentLogger: Logger = createSinkLogger(() => {});

/**
 * Drop entries below `minLevel` before they reach `logger`.
 */
export function createLevelFilteredLogger(logger: Logger, minLevel: LogLevel): Logger {
  return createSinkLogger(({ level, message, data }) => logger[level](message, data), minLevel);
}

/**
 * Logger that keeps every entry in `entries`, for assertions in tests.
 */
export function createCapturingLogger(): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return { ...createSinkLogger((entry) => entries.push(entry)), entries };
}
