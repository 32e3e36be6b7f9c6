// Logger seam shared by the registry, whitelist admin and sweeper

type LogData = Record<string, unknown>;
type Level = 'debug' | 'info' | 'warn' | 'error';

export type Logger = Record<Level, (message: string, data?: LogData) => void>;

const write =
  (level: Level, sink: (...args: unknown[]) => void) =>
  (message: string, data?: LogData) => {
    if (data === undefined) {
      sink(`${level.toUpperCase()} ${message}`);
    } else {
      sink(`${level.toUpperCase()} ${message}`, data);
    }
  };

export const consoleLogger: Logger = {
  debug: write('debug', console.debug),
  info: write('info', console.info),
  warn: write('warn', console.warn),
  error: write('error', console.error),
};

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export type LogEntry = { level: Level; message: string; data?: LogData };

/** Records every call in `entries`; used by tests to assert on what was logged. */
export function createCapturingLogger(): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const record = (level: Level) => (message: string, data?: LogData) => {
    entries.push(data === undefined ? { level, message } : { level, message, data });
  };
  return {
    entries,
    debug: record('debug'),
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
