/**
 * Minimal leveled logger. Writes one JSON object per line to stderr so the
 * CLI's stdout stays machine-readable.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string, fields?: Record<string, unknown>): void;
  info(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(message: string, fields?: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

type Sink = (line: string) => void;

export function createLogger(
  level: LogLevel = 'info',
  sink: Sink = line => console.error(line)
): Logger {
  const threshold = LEVEL_ORDER[level];

  const write = (msgLevel: Exclude<LogLevel, 'silent'>, message: string, fields?: Record<string, unknown>) => {
    if (LEVEL_ORDER[msgLevel] < threshold) return;
    sink(JSON.stringify({ time: new Date().toISOString(), level: msgLevel, msg: message, ...fields }));
  };

  return {
    debug: (message, fields) => write('debug', message, fields),
    info: (message, fields) => write('info', message, fields),
    warn: (message, fields) => write('warn', message, fields),
    error: (message, fields) => write('error', message, fields),
  };
}

export const silentLogger: Logger = createLogger('silent');

/** Flattens an unknown thrown value for a log line. */
export function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return { error: error.message, type: error.name };
  }
  return { error: String(error), type: 'UnknownError' };
}
