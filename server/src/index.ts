#!/usr/bin/env node
import 'dotenv/config';
import { configWarnings, loadConfig } from './config/MonitorConfig';
import { createMonitor } from './bootstrap';
import { ConfigError, errorMessage, getExitCode } from './utils/errors';
import logger from './utils/logger';

const SHUTDOWN_GRACE_MS = 10000;

async function start(): Promise<void> {
  const config = loadConfig();
  for (const warning of configWarnings(config)) {
    logger.warn(warning);
  }

  const monitor = createMonitor(config);

  const controller = new AbortController();

  // Graceful shutdown: finish the current step, write the final entry, exit 0
  const shutdown = (signal: NodeJS.Signals): void => {
    if (controller.signal.aborted) return;
    logger.info({ signal }, 'shutting down');
    controller.abort();

    // Force exit if the final log write stalls; unref() so this timer doesn't keep the process alive
    const forceExitTimer = setTimeout(() => {
      logger.warn('forcing exit after timeout');
      process.exit(0);
    }, SHUTDOWN_GRACE_MS);
    forceExitTimer.unref();
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);

  await monitor.run(controller.signal);
}

start()
  .then(() => process.exit(0))
  .catch((error: unknown) => {
    if (error instanceof ConfigError) {
      logger.fatal({ field: error.field }, error.message);
    } else {
      logger.fatal({ err: error }, 'monitor stopped');
      process.stderr.write(`downornot: ${errorMessage(error)}\n`);
    }
    process.exit(getExitCode(error));
  });
