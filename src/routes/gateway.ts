import { Router, type Request, type Response } from 'express';
import { asyncHandler } from '../lib/errors';
import type { Logger } from '../lib/logger';
import {
  analysisRequestSchema,
  historyQuerySchema,
  parseInput,
  repoHistoryQuerySchema,
  repoParamsSchema,
} from '../lib/validation';
import type { Services } from '../services';
import { buildHealthStatus } from './health';

/**
 * Endpoints the bot and the web client talk to
 */
export const createGatewayRouter = (services: Services, logger: Logger): Router => {
  const router = Router();
  const log = logger.child({ component: 'gateway' });

  /**
   * GET /api/repo/:owner/:repo
   */
  router.get('/repo/:owner/:repo', asyncHandler(async (req: Request, res: Response) => {
    const { owner, repo } = parseInput(repoParamsSchema, req.params, 'params');
    log.info({ owner, repo }, 'Getting repo info');
    const repoInfo = await services.activity.getRepository(owner, repo);
    res.json({ success: true, repo_info: repoInfo });
  }));

  /**
   * POST /api/analyze
   * Full analysis: snapshot, narrative and a persisted history record
   */
  router.post('/analyze', asyncHandler(async (req: Request, res: Response) => {
    const request = parseInput(analysisRequestSchema, req.body);
    log.info({ owner: request.owner, repo: request.repo_name }, 'Starting full analysis');
    res.json(await services.analysis.analyze(request));
  }));

  router.get('/history', (req: Request, res: Response) => {
    const { limit, offset } = parseInput(historyQuerySchema, req.query, 'query');
    res.json(services.stats.historyPage(limit, offset));
  });

  router.get('/history/:owner/:repo', (req: Request, res: Response) => {
    const { owner, repo } = parseInput(repoParamsSchema, req.params, 'params');
    const { limit } = parseInput(repoHistoryQuerySchema, req.query, 'query');
    res.json(services.stats.repoHistory(owner, repo, limit));
  });

  /**
   * GET /api/services/status
   */
  router.get('/services/status', (_req: Request, res: Response) => {
    const health = buildHealthStatus(services);
    const rateLimit = services.github.getRateLimitInfo();

    res.json({
      timestamp: health.timestamp,
      services: {
        github: {
          status: 'online',
          authenticated: health.github_token_configured,
          ...(rateLimit && {
            rate_limit: {
              limit: rateLimit.limit,
              remaining: rateLimit.remaining,
              reset: rateLimit.reset.toISOString(),
            },
          }),
        },
        analytics: {
          status: health.completion_configured ? 'online' : 'degraded',
          model: services.completion.model,
        },
        database: {
          status: health.database === 'connected' ? 'online' : 'offline',
        },
      },
    });
  });

  return router;
};
