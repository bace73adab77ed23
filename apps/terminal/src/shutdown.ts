/**
 * The part of the Sentry client used on the way out
 */
export interface ErrorReporter {
  captureException(error: unknown): string;
  close(timeout?: number): PromiseLike<boolean>;
}

export interface ShutdownOptions {
  timeout?: number;
  exit?: (code: number) => void;
  log?: (message: string, error: unknown) => void;
}

export const REPORT_FLUSH_TIMEOUT = 2000;

/**
 * Send queued error reports, then exit. Resolves once exit has been called.
 */
export async function flushAndExit(
  reporter: ErrorReporter,
  code: number,
  options: ShutdownOptions = {}
): Promise<void> {
  const exit = options.exit ?? ((exitCode: number) => process.exit(exitCode));
  const log = options.log ?? ((message: string, error: unknown) => console.error(message, error));

  try {
    await reporter.close(options.timeout ?? REPORT_FLUSH_TIMEOUT);
  } catch (error) {
    log('Failed to flush error reports:', error);
  }
  exit(code);
}

/**
 * Report an error that ended the program and exit with status 1
 */
export function reportFatal(
  reporter: ErrorReporter,
  error: unknown,
  options: ShutdownOptions = {}
): Promise<void> {
  const log = options.log ?? ((message: string, detail: unknown) => console.error(message, detail));
  log('Fatal error:', error instanceof Error ? error.message : error);
  reporter.captureException(error);
  return flushAndExit(reporter, 1, { ...options, log });
}
