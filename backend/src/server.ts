import type { Server } from 'http';
import { loadConfig } from './config';
import { createApp } from './app';
import { logger, logError } from './utils/logger';
import { errorMessage } from './utils/errors';

const SHUTDOWN_GRACE_MS = 10_000;

function startServer(): Server {
  const config = loadConfig();
  const app = createApp(config);
  const server = app.listen(config.port, () => {
    logger.info('SIPADU AI Tools backend started', {
      port: config.port,
      env: config.env,
      sipaduApiBase: config.sipadu.apiBase,
      devMode: config.sipadu.devMode,
      qaConfigured: Boolean(config.qa.serviceUrl)
    });
    logger.info(`Health check: http://localhost:${config.port}/api/health`);
  });

  const shutdown = (signal: string) => {
    logger.info('Shutting down', { signal });
    server.close((error) => {
      if (error) {
        logError(undefined, error, { phase: 'shutdown' });
        process.exit(1);
      }
      process.exit(0);
    });
    setTimeout(() => {
      logger.warn('Forcing shutdown after grace period');
      process.exit(1);
    }, SHUTDOWN_GRACE_MS).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  return server;
}

try {
  startServer();
} catch (error) {
  logger.error('Failed to start server', { error: errorMessage(error) });
  process.exit(1);
}
