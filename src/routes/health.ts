import { Router, type Request, type Response } from 'express';
import { HTTP_STATUS } from '../lib/errors';
import type { Services } from '../services';

export interface HealthStatus {
  status: 'healthy' | 'degraded';
  service: string;
  timestamp: string;
  github_token_configured: boolean;
  completion_configured: boolean;
  database: 'connected' | 'unavailable';
}

export const buildHealthStatus = (services: Pick<Services, 'github' | 'completion' | 'stats'>): HealthStatus => {
  const databaseUp = services.stats.ping();

  return {
    status: databaseUp ? 'healthy' : 'degraded',
    service: 'repo-pulse',
    timestamp: new Date().toISOString(),
    github_token_configured: services.github.isAuthenticated(),
    completion_configured: services.completion.isConfigured(),
    database: databaseUp ? 'connected' : 'unavailable',
  };
};

/**
 * GET /health
 * Liveness plus configuration flags; 503 while the database is unreachable
 */
export const createHealthRouter = (services: Services): Router => {
  const router = Router();

  router.get('/health', (_req: Request, res: Response) => {
    const health = buildHealthStatus(services);
    res
      .status(health.status === 'healthy' ? HTTP_STATUS.OK : HTTP_STATUS.SERVICE_UNAVAILABLE)
      .json(health);
  });

  return router;
};
