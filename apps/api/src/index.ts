import { serve } from '@hono/node-server';
import { createLogger } from '@userprofile/observability';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { FixedIdentityResolver } from './lib/identity-provider.js';
import { createServices } from './services/index.js';

const config = loadConfig();
const logger = createLogger({ level: config.logLevel });
const { profileService } = createServices();

const app = createApp({
  profileService,
  identityResolver: new FixedIdentityResolver(config.profileUserId),
  logger,
});

logger.info({ port: config.port, host: config.host }, 'Starting server');

const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
  logger.info({ port: info.port, address: info.address }, 'Server running');
});

function shutdown(signal: NodeJS.Signals) {
  logger.info({ signal }, 'Shutting down');
  server.close((error) => {
    if (error) {
      logger.error({ err: error }, 'Server close failed');
      process.exitCode = 1;
    }
  });
}

process.once('SIGINT', shutdown);
process.once('SIGTERM', shutdown);
