import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { cacheSetSchema, parseInput } from '../lib/validation';
import type { Services } from '../services';

const cacheKeyParamsSchema = z.object({ key: z.string().min(1) });

export const createCacheRouter = (services: Services): Router => {
  const router = Router();

  router.post('/cache/set', (req: Request, res: Response) => {
    const body = parseInput(cacheSetSchema, req.body);
    const expiresAt = services.cache.set(body.cache_key, body.data, body.ttl_seconds);
    res.json({ success: true, cache_key: body.cache_key, expires_at: expiresAt });
  });

  router.get('/cache/get/:key', (req: Request, res: Response) => {
    const { key } = parseInput(cacheKeyParamsSchema, req.params, 'params');
    res.json(services.cache.get(key));
  });

  router.delete('/cache/clear', (_req: Request, res: Response) => {
    res.json({ success: true, deleted_records: services.cache.clear() });
  });

  return router;
};
