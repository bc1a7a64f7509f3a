/**
 * Process entry point
 *
 * Loads configuration (exiting on error), starts the liveness server, and
 * starts the scheduling loop once the server is listening. SIGINT/SIGTERM
 * abort the loop and close the server.
 */

import { AppConfig } from './types/config';
import { ConfigurationError, loadConfig } from './services/config';
import { createReportServices } from './services/service-factory';
import { createApp, startServer } from './server';
import { createLogger, describeError } from './utils/logger';

function loadConfigOrExit(): AppConfig {
  try {
    return loadConfig(process.env);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      createLogger('Boot').error(error.message);
      process.exit(1);
    }
    throw error;
  }
}

function main(): void {
  const config = loadConfigOrExit();
  const logger = createLogger('CryptoReport', config.logLevel);
  const { scheduler } = createReportServices(config, logger);
  const shutdown = new AbortController();
  let loop: Promise<void> | undefined;

  const server = startServer(createApp(logger.child('Server')), {
    port: config.server.port,
    logger: logger.child('Server'),
    onListening: () => {
      if (loop) return;
      loop = scheduler.run(shutdown.signal).catch((error: unknown) => {
        logger.error(`Scheduler terminated: ${describeError(error)}`);
      });
    }
  });

  const stop = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, shutting down`);
    shutdown.abort();
    server.close();
    void (loop ?? Promise.resolve()).then(() => process.exit(0));
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);
}

main();
