// ============================================================================
// FILE: src/logger.ts
// PURPOSE: Tagged console logging with a level threshold
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let threshold: LogLevel = 'info';

/**
 * setLogLevel - Change the global threshold (from LOG_LEVEL at startup)
 */
export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

/**
 * createLogger - Logger whose lines are prefixed with `[Tag]`
 *
 * warn/error go to stderr so piped CLI output (e.g. `search --json`) stays clean.
 */
export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  return {
    debug: (message, ...args) => {
      if (enabled('debug')) console.debug(prefix, message, ...args);
    },
    info: (message, ...args) => {
      if (enabled('info')) console.log(prefix, message, ...args);
    },
    warn: (message, ...args) => {
      if (enabled('warn')) console.warn(prefix, message, ...args);
    },
    error: (message, ...args) => {
      if (enabled('error')) console.error(prefix, message, ...args);
    },
  };
}
