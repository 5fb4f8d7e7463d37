import { Router, type Request, type Response } from 'express';
import { asyncHandler } from '../lib/errors';
import { analysisRequestSchema, parseInput, repoParamsSchema } from '../lib/validation';
import type { Services } from '../services';

/**
 * Raw GitHub activity endpoints, without narrative or persistence
 */
export const createGitHubRouter = (services: Services): Router => {
  const router = Router();

  /**
   * GET /repo/:owner/:repo
   */
  router.get('/repo/:owner/:repo', asyncHandler(async (req: Request, res: Response) => {
    const { owner, repo } = parseInput(repoParamsSchema, req.params, 'params');
    const repoInfo = await services.activity.getRepository(owner, repo);
    res.json({ success: true, repo_info: repoInfo });
  }));

  /**
   * POST /analyze
   * Activity snapshot for a window
   */
  router.post('/analyze', asyncHandler(async (req: Request, res: Response) => {
    const body = parseInput(analysisRequestSchema, req.body);
    const snapshot = await services.activity.fetch(body.owner, body.repo_name, body.start_date, body.end_date);
    res.json({ success: true, ...snapshot });
  }));

  return router;
};
