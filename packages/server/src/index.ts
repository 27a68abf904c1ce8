import { type LogLevel, logger, setLogLevel } from '@hand-squeeze/shared';
import { loadTrackerConfig } from './config/trackerConfig.js';
import { createTracker } from './main.js';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

async function start(): Promise<number> {
  const config = loadTrackerConfig();
  const envLevel = process.env['LOG_LEVEL'];
  setLogLevel(envLevel && isLogLevel(envLevel) ? envLevel : config.logging.level);

  logger.info('Starting hand squeeze tracker...', {
    source: config.source.kind,
    osc: `${config.transport.host}:${config.transport.port}`,
  });

  const tracker = createTracker(config, {
    keyInput: process.stdin.isTTY ? process.stdin : undefined,
  });

  // Graceful shutdown
  process.on('SIGTERM', () => {
    logger.info('SIGTERM received, shutting down...');
    tracker.stop();
  });

  process.on('SIGINT', () => {
    logger.info('SIGINT received, shutting down...');
    tracker.stop();
  });

  const reason = await tracker.run();
  return reason === 'open_failed' ? 1 : 0;
}

start()
  .then((code) => {
    process.exitCode = code;
    // stdin may still hold the event loop open after raw mode is left
    process.exit();
  })
  .catch((error: unknown) => {
    logger.error('Tracker failed', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  });
