import 'dotenv/config';

import { createApp, createSessions } from './app.js';
import { ConfigError, loadConfig } from './config.js';
import { logger } from './logger.js';

function start() {
  const config = loadConfig();
  logger.level = config.logLevel;

  const app = createApp(createSessions(config, logger), logger);
  app.listen(config.port, () => logger.info({ port: config.port }, '[Server] listening'));
}

try {
  start();
} catch (err) {
  if (err instanceof ConfigError) {
    logger.fatal(err.message);
    process.exit(1);
  }
  throw err;
}
