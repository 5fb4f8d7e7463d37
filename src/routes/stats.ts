import { Router, type Request, type Response } from 'express';
import {
  historyQuerySchema,
  parseInput,
  repoHistoryQuerySchema,
  repoParamsSchema,
  statsSaveSchema,
} from '../lib/validation';
import type { Services } from '../services';

export const createStatsRouter = (services: Services): Router => {
  const router = Router();

  /**
   * POST /stats/save
   */
  router.post('/stats/save', (req: Request, res: Response) => {
    const body = parseInput(statsSaveSchema, req.body);
    const recordId = services.stats.save(body);

    res.json({
      success: true,
      record_id: recordId,
      message: 'Statistics saved successfully',
    });
  });

  /**
   * GET /stats/history?limit&offset
   */
  router.get('/stats/history', (req: Request, res: Response) => {
    const { limit, offset } = parseInput(historyQuerySchema, req.query, 'query');
    res.json(services.stats.historyPage(limit, offset));
  });

  /**
   * GET /stats/repo/:owner/:repo?limit
   */
  router.get('/stats/repo/:owner/:repo', (req: Request, res: Response) => {
    const { owner, repo } = parseInput(repoParamsSchema, req.params, 'params');
    const { limit } = parseInput(repoHistoryQuerySchema, req.query, 'query');
    res.json(services.stats.repoHistory(owner, repo, limit));
  });

  return router;
};
