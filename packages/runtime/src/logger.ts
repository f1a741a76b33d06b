// Structured logging
//
// Every logger is a LogSink behind the four level methods. Log lines go to
// stderr so they never mix with the reports printed on stdout.

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'] as const;

export type Logger = Record<LogLevel, (message: string, data?: Record<string, unknown>) => void>;

export type LogEntry = {
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
};

export type LogSink = (entry: LogEntry) => void;

/**
 * Build a Logger that hands every entry to `sink`.
 * `data` is left off the entry when the caller gave none.
 */
export function createLogger(sink: LogSink): Logger {
  const at = (level: LogLevel) => (message: string, data?: Record<string, unknown>) =>
    sink(data === undefined ? { level, message } : { level, message, data });

  return {
    debug: at('debug'),
    info: at('info'),
    warn: at('warn'),
    error: at('error'),
  };
}

/**
 * `[WARN] message {"key":"value"}`
 */
export function formatLogEntry({ level, message, data }: LogEntry): string {
  const line = `[${level.toUpperCase()}] ${message}`;
  return data === undefined ? line : `${line} ${JSON.stringify(data)}`;
}

export function createConsoleLogger(
  write: (line: string) => void = (line) => console.error(line)
): Logger {
  return createLogger((entry) => write(formatLogEntry(entry)));
}

export const consoleLogger: Logger = createConsoleLogger();

export const silentLogger: Logger = createLogger(() => undefined);

/**
 * Wrap a logger so entries below `minLevel` are dropped.
 */
export function createLevelLogger(minLevel: LogLevel, target: Logger = consoleLogger): Logger {
  const threshold = LOG_LEVELS.indexOf(minLevel);

  return createLogger(({ level, message, data }) => {
    if (LOG_LEVELS.indexOf(level) >= threshold) {
      target[level](message, data);
    }
  });
}

/**
 * Logger that keeps its entries, for tests.
 */
export function createCapturingLogger(): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return { ...createLogger((entry) => entries.push(entry)), entries };
}
