/**
 * Logger - minimal leveled logging passed through options
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LEVEL_ORDER: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

/**
 * Logger interface for core components
 */
export interface Logger {
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}

/**
 * Create a logger writing to stderr, dropping messages below `level`
 */
export function createConsoleLogger(level: LogLevel = 'warn'): Logger {
  const enabled = (l: LogLevel): boolean => LEVEL_ORDER[l] <= LEVEL_ORDER[level];
  return {
    error: (message) => { if (enabled('error')) {console.error(`[error] ${message}`);} },
    warn: (message) => { if (enabled('warn')) {console.error(`[warn] ${message}`);} },
    info: (message) => { if (enabled('info')) {console.error(`[info] ${message}`);} },
    debug: (message) => { if (enabled('debug')) {console.error(`[debug] ${message}`);} },
  };
}

/** Logger that discards everything */
export const silentLogger: Logger = {
  error: () => {},
  warn: () => {},
  info: () => {},
  debug: () => {},
};
