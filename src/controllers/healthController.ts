/**
 * healthController.ts
 * Liveness and component summary
 */

import type { Request, Response } from 'express';

import type { AppContext } from '../context.js';

export function createHealthController(context: AppContext) {
  const { registry, cache, failover, jobs, clock } = context;

  return {
    /**
     * GET /api/health
     */
    getHealth(_req: Request, res: Response): void {
      const cacheStats = cache.stats();
      res.json({
        status: 'ok',
        uptime: process.uptime(),
        timestamp: new Date(clock.now()).toISOString(),
        tasks: registry.stats(),
        activeJobs: jobs.activeJobs(),
        cache: { size: cacheStats.size, maxSize: cacheStats.maxSize },
        failover: failover.healthReport().metrics,
      });
    },
  };
}
