export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(msg: string, ...details: unknown[]): void;
  info(msg: string, ...details: unknown[]): void;
  warn(msg: string, ...details: unknown[]): void;
  error(msg: string, ...details: unknown[]): void;
}

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVELS;
}

export function createLogger(level: LogLevel = 'info'): Logger {
  const enabled = (l: LogLevel) => LEVELS[l] >= LEVELS[level];
  return {
    debug: (msg, ...details) => enabled('debug') && console.log('[DEBUG]', msg, ...details),
    info: (msg, ...details) => enabled('info') && console.log('[INFO]', msg, ...details),
    warn: (msg, ...details) => enabled('warn') && console.warn('[WARN]', msg, ...details),
    error: (msg, ...details) => enabled('error') && console.error('[ERROR]', msg, ...details)
  };
}

// For tests and embedding callers that want no output
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {}
};
