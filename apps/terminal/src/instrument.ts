import 'dotenv/config';
import * as Sentry from '@sentry/node';
import { reportFatal } from './shutdown.js';

// Error reporting is opt-in: without a DSN the capture calls are no-ops
const dsn = process.env.SENTRY_DSN;
if (dsn) {
  Sentry.init({
    dsn,
    environment: process.env.NODE_ENV || 'development',
    tracesSampleRate: 0,
    beforeSend(event) {
      const mem = process.memoryUsage();
      event.contexts = {
        ...event.contexts,
        memory: {
          heap_used_mb: Math.round(mem.heapUsed / 1024 / 1024),
          rss_mb: Math.round(mem.rss / 1024 / 1024),
        },
      };
      return event;
    },
  });
}

// Capture unhandled rejections
process.on('unhandledRejection', (reason) => {
  Sentry.captureException(reason);
});

// Capture uncaught exceptions; the process cannot carry on after one
process.on('uncaughtException', (error) => {
  void reportFatal(Sentry, error);
});

export { Sentry };
