import { describe, it, expect, vi } from 'vitest';
import { flushAndExit, reportFatal, type ErrorReporter } from './shutdown.js';

function reporter(close: () => Promise<boolean> = () => Promise.resolve(true)) {
  const order: string[] = [];
  const client: ErrorReporter = {
    captureException: vi.fn(() => {
      order.push('capture');
      return 'event-1';
    }),
    close: vi.fn((timeout?: number) => {
      order.push(`close ${timeout}`);
      return close();
    }),
  };
  return { client, order };
}

describe('flushAndExit', () => {
  it('waits for the reports to go out before exiting', async () => {
    const { client, order } = reporter();
    const exit = vi.fn((code: number) => {
      order.push(`exit ${code}`);
    });

    await flushAndExit(client, 0, { exit });

    expect(order).toEqual(['close 2000', 'exit 0']);
  });

  it('still exits when flushing fails', async () => {
    const failure = new Error('offline');
    const { client } = reporter(() => Promise.reject(failure));
    const exit = vi.fn();
    const log = vi.fn();

    await flushAndExit(client, 1, { exit, log, timeout: 10 });

    expect(client.close).toHaveBeenCalledWith(10);
    expect(log).toHaveBeenCalledWith('Failed to flush error reports:', failure);
    expect(exit).toHaveBeenCalledWith(1);
  });
});

describe('reportFatal', () => {
  it('captures the error and flushes it before exiting with 1', async () => {
    const { client, order } = reporter();
    const error = new Error('bad config');
    const log = vi.fn();
    const exit = vi.fn((code: number) => {
      order.push(`exit ${code}`);
    });

    await reportFatal(client, error, { exit, log });

    expect(client.captureException).toHaveBeenCalledWith(error);
    expect(log).toHaveBeenCalledWith('Fatal error:', 'bad config');
    expect(order).toEqual(['capture', 'close 2000', 'exit 1']);
  });
});
