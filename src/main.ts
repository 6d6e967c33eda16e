/**
 * Service entry point: read the environment, build the store client and
 * start listening.
 */

import { ConfigError, loadConfig, validateConfig } from './config';
import { createApp, createAppContext, createStoreFromConfig } from './server';
import { logger, setLogLevel } from './logger';

function main(): void {
  const config = loadConfig(process.env);
  setLogLevel(config.logLevel);

  const validation = validateConfig(config);
  for (const warning of validation.warnings) {
    logger.warn(warning);
  }
  if (!validation.valid) {
    logger.error('Invalid configuration', { errors: validation.errors });
    process.exit(1);
  }

  const context = createAppContext(createStoreFromConfig(config), config.store);
  const app = createApp(context);
  app.listen(config.port, () => {
    logger.info('Metadata service listening', { port: config.port, store: config.store });
  });
}

try {
  main();
} catch (err) {
  logger.error('Startup failed', {
    error: err instanceof Error ? err.message : String(err),
    kind: err instanceof ConfigError ? 'config' : 'startup',
  });
  process.exit(1);
}
