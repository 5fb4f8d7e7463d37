import { Router, type Request, type Response } from 'express';
import { asyncHandler } from '../lib/errors';
import { analyticsRequestSchema, parseInput } from '../lib/validation';
import { ActivitySnapshotSchema } from '../types/activity';
import { isSuccessfulGeneration } from '../types/analysis';
import type { Services } from '../services';

/**
 * POST /analytics/analyze
 * Narrative for a caller-supplied snapshot. Always answers 200; `success`
 * is false when the fallback was used.
 */
export const createAnalyticsRouter = (services: Services): Router => {
  const router = Router();

  router.post('/analytics/analyze', asyncHandler(async (req: Request, res: Response) => {
    const body = parseInput(analyticsRequestSchema, req.body);

    // Missing or mistyped fields fall back one by one
    const snapshot = ActivitySnapshotSchema.parse(body.activity_data);

    const result = await services.aiSummary.generate(body.owner, body.repo_name, snapshot);

    res.json({
      success: isSuccessfulGeneration(result),
      analysis: result.analysis,
      recommendations: result.recommendations,
      insights: result.insights,
      summary: result.summary,
      ...(result.error !== undefined && { error: result.error }),
    });
  }));

  return router;
};
