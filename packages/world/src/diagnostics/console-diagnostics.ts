import { LOG_LEVELS, type Diagnostics, type LogLevel } from '@tilecrawl/protocol';

/**
 * Anything with console-style methods (the global console, a `new Console(stderr)`, a test spy)
 */
export interface LogTarget {
  debug(...data: unknown[]): void;
  info(...data: unknown[]): void;
  warn(...data: unknown[]): void;
  error(...data: unknown[]): void;
}

export interface ConsoleDiagnosticsOptions {
  tag: string;
  level?: LogLevel | 'silent';
  target?: LogTarget;
}

/**
 * Diagnostics sink writing `[Tag] message` lines to a console
 */
export function createConsoleDiagnostics(options: ConsoleDiagnosticsOptions): Diagnostics {
  const target = options.target ?? console;
  const prefix = `[${options.tag}]`;
  const level = options.level ?? 'info';
  const threshold = level === 'silent' ? LOG_LEVELS.length : LOG_LEVELS.indexOf(level);
  const enabled = (candidate: LogLevel): boolean => LOG_LEVELS.indexOf(candidate) >= threshold;

  return {
    debug: (message, ...args) => {
      if (enabled('debug')) target.debug(`${prefix} ${message}`, ...args);
    },
    info: (message, ...args) => {
      if (enabled('info')) target.info(`${prefix} ${message}`, ...args);
    },
    warn: (message, ...args) => {
      if (enabled('warn')) target.warn(`${prefix} ${message}`, ...args);
    },
    error: (message, ...args) => {
      if (enabled('error')) target.error(`${prefix} ${message}`, ...args);
    },
  };
}
