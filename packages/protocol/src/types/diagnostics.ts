export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Diagnostics sink injected into every core component.
 * Arguments follow console formatting (%s, %d, ...).
 */
export interface Diagnostics {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export const SILENT_DIAGNOSTICS: Diagnostics = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
