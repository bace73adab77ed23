// Sentry must be imported first
import { Sentry } from './instrument.js';

import { Console } from 'console';
import { createConsoleDiagnostics } from '@tilecrawl/world';
import { loadConfig } from './config.js';
import { GameHost, type StopReason } from './game/game-host.js';
import { flushAndExit, reportFatal } from './shutdown.js';

function main(): void {
  const config = loadConfig();

  // stdout belongs to the game screen
  const logger = new Console(process.stderr);
  const diagnostics = createConsoleDiagnostics({ tag: 'Game', level: config.logLevel, target: logger });
  diagnostics.info(
    'Starting %dx%d level with %d NPCs (seed %s)',
    config.level.cols,
    config.level.rows,
    config.level.npcCount,
    config.level.seed.toString()
  );

  const host = new GameHost({
    config,
    input: process.stdin,
    output: process.stdout,
    diagnostics,
    reportError: (error) => Sentry.captureException(error),
  });

  host.on('stop', (reason: StopReason) => {
    void flushAndExit(Sentry, reason === 'fatal' ? 1 : 0, {
      log: (message, error) => logger.error(message, error),
    });
  });

  const shutdown = () => host.stop('signal');
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  host.start();
}

try {
  main();
} catch (error) {
  void reportFatal(Sentry, error);
}
