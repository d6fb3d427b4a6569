/**
 * Entry point for the HTTP API server.
 */

import { loadConfig } from './config';
import { describeError } from './domain/errors';
import { logger, setLogLevel } from './logger';
import { createApp, createAppContext } from './server';

async function main(): Promise<void> {
  const config = await loadConfig();
  setLogLevel(config.logLevel);
  const app = createApp(createAppContext(config));
  app.listen(config.server.port, () => {
    logger.info('API listening', { port: config.server.port });
  });
}

main().catch((err: unknown) => {
  logger.error('Server failed to start', { error: describeError(err) });
  process.exitCode = 1;
});
