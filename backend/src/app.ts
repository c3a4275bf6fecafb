import express from 'express';
import type { AppConfig } from './config';
import {
  errorHandler,
  notFoundHandler,
  requestLogger,
  createApiLimiter,
  createSessionLimiter,
  helmetConfig,
  corsConfig,
  requestSizeValidator
} from './middleware';
import { createConfigRouter, createSessionRouter, createChatRouter, createHealthRouter } from './routes';
import { SipaduAuthService } from './services/SipaduAuthService';
import { QaServiceClient } from './services/QaServiceClient';

export interface AppDependencies {
  auth: SipaduAuthService;
  qa: QaServiceClient;
}

export const createDependencies = (config: AppConfig): AppDependencies => ({
  auth: new SipaduAuthService({
    validateEndpoint: config.sipadu.validateEndpoint,
    timeoutMs: config.sipadu.validateTimeoutMs,
    devMode: config.sipadu.devMode
  }),
  qa: new QaServiceClient({
    serviceUrl: config.qa.serviceUrl,
    timeoutMs: config.qa.timeoutMs
  })
});

/**
 * Build the Express app. Tests pass their own dependencies with fake fetches.
 */
export const createApp = (config: AppConfig, deps: AppDependencies = createDependencies(config)) => {
  const app = express();

  app.set('trust proxy', 1);
  app.disable('x-powered-by');

  app.use(requestLogger);
  app.use(helmetConfig);
  app.use(corsConfig(config.cors.origins));
  app.use(requestSizeValidator());
  app.use(express.json({ limit: '64kb' }));

  app.use(createConfigRouter(config));

  app.use('/api', createApiLimiter(config.rateLimit));
  app.use(
    '/api/health',
    createHealthRouter({
      version: config.app.version,
      sipaduApiBase: config.sipadu.apiBase,
      qaConfigured: deps.qa.isConfigured(),
      devMode: config.sipadu.devMode
    })
  );
  app.use('/api/session', createSessionLimiter(config.rateLimit), createSessionRouter(deps.auth));
  app.use('/api/chat', createChatRouter(deps.qa));

  if (config.staticDir) {
    app.use(express.static(config.staticDir));
  }

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};

export default createApp;
