import express, { type Application, type Request, type Response } from 'express';
import { isProduction, type AppConfig } from './lib/config';
import type { Logger } from './lib/logger';
import { createErrorHandler, notFoundHandler } from './lib/errors';
import {
  createApiRateLimiter,
  createCorsMiddleware,
  createRequestLoggingMiddleware,
  requestIdMiddleware,
  securityMiddleware,
} from './lib/middleware';
import type { Services } from './services';
import { createHealthRouter } from './routes/health';
import { createGitHubRouter } from './routes/github';
import { createAnalyticsRouter } from './routes/analytics';
import { createStatsRouter } from './routes/stats';
import { createCacheRouter } from './routes/cache';
import { createGatewayRouter } from './routes/gateway';

// API info handler
const apiInfo = (config: AppConfig) => (_req: Request, res: Response): void => {
  res.json({
    name: 'Repo Pulse API',
    description: 'GitHub repository activity analytics with AI narratives',
    version: process.env.npm_package_version || '1.0.0',
    environment: config.env,
    health: '/health',
    timestamp: new Date().toISOString(),
  });
};

export function createApp(services: Services, config: AppConfig, logger: Logger): Application {
  const app = express();
  const httpLogger = logger.child({ component: 'http' });

  app.set('trust proxy', 1);

  app.use(requestIdMiddleware);
  app.use(securityMiddleware);
  app.use(createCorsMiddleware(config));
  app.use(express.json({ limit: '10mb' }));
  app.use(express.urlencoded({ extended: true, limit: '10mb' }));
  app.use(createRequestLoggingMiddleware(httpLogger));

  app.get('/', apiInfo(config));

  // Service-level endpoints
  app.use(createHealthRouter(services));
  app.use(createGitHubRouter(services));
  app.use(createAnalyticsRouter(services));
  app.use(createStatsRouter(services));
  app.use(createCacheRouter(services));

  // Gateway endpoints for the bot and the web client
  app.use('/api', createApiRateLimiter(config, httpLogger), createGatewayRouter(services, logger));

  app.use(notFoundHandler);
  app.use(createErrorHandler(httpLogger, { exposeDetails: !isProduction(config) }));

  return app;
}
