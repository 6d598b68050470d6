/**
 * cacheController.ts
 * Response cache statistics and invalidation
 */

import type { Request, Response } from 'express';
import { z } from 'zod';

import type { AppContext } from '../context.js';
import { InvalidRequestError } from '../errors.js';
import { sendError } from '../middleware/errorHandler.js';

const invalidateBodySchema = z.object({
  /** Key prefix; cache keys start with the request path */
  prefix: z.string(),
});

export function createCacheController(context: AppContext) {
  const { cache } = context;

  return {
    /**
     * GET /api/cache/stats
     */
    getStats(_req: Request, res: Response): void {
      res.json(cache.stats());
    },

    /**
     * POST /api/cache/invalidate
     */
    invalidate(req: Request, res: Response): void {
      const body = invalidateBodySchema.safeParse(req.body ?? {});
      if (!body.success) {
        sendError(res, InvalidRequestError.fromZod(body.error));
        return;
      }
      const removed = cache.invalidate(body.data.prefix);
      res.json({ success: true, removed });
    },
  };
}
