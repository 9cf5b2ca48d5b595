import { serve } from '@hono/node-server';
import { createAuthServer } from './app.js';
import { createMemoryStorage } from './storage/memory/index.js';
import { getConfig } from './config/index.js';
import { initializeLogger } from './logging/index.js';

// Load configuration
const config = getConfig();
const logger = initializeLogger({ level: config.logging.level });

const storage = createMemoryStorage();
logger.info('Using in-memory storage. Data will be lost on restart.');

const { app, maintenance } = createAuthServer({
  storage,
  jwtSecret: config.secrets.jwtSecret,
  accessTokenTtlMs: config.tokens.accessTokenTtlMs,
  refreshTokenTtlMs: config.tokens.refreshTokenTtlMs,
  corsOrigins: config.server.corsOrigins,
  enableLogging: config.server.nodeEnv !== 'test',
  production: config.server.nodeEnv === 'production',
});

maintenance.start(config.tokens.sweepIntervalMs);

// Start server
const server = serve(
  {
    fetch: app.fetch,
    port: config.server.port,
    hostname: config.server.host,
  },
  (info) => {
    logger.info({ address: info.address, port: info.port }, 'Auth server listening');
  }
);

function shutdown(signal: string): void {
  logger.info({ signal }, 'Shutting down');
  maintenance.stop();
  server.close();
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
