/**
 * rateLimiter.ts
 * Tiered sliding-window rate limiting middleware
 */

import type { NextFunction, Request, Response } from 'express';

import { RateLimitExceededError } from '../errors.js';
import type { TieredRateLimiter } from '../rate-limiter.js';
import { type Clock, systemClock, toEpochSeconds } from '../utils/clock.js';
import { logger } from '../utils/logger.js';
import { type PathRules, isExcludedPath } from '../utils/path-rules.js';

import { extractApiKey } from './identity.js';

export interface RateLimitMiddlewareConfig
  extends Pick<PathRules, 'excludePaths' | 'excludePrefixes'> {
  enabled: boolean;
}

export function clientIp(req: Request): string {
  return req.ip ?? req.socket.remoteAddress ?? 'unknown';
}

/**
 * Create rate limiter middleware. Admitted requests get X-RateLimit-* headers;
 * rejected ones a 429 with Retry-After.
 */
export function createRateLimiter(
  limiter: TieredRateLimiter,
  config: RateLimitMiddlewareConfig,
  clock: Clock = systemClock
): (req: Request, res: Response, next: NextFunction) => void {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!config.enabled || isExcludedPath(req.path, config)) {
      next();
      return;
    }

    const ip = clientIp(req);
    const result = limiter.check(ip, extractApiKey(req));

    if (result.limited) {
      logger.warn(`Rate limit exceeded for ${ip}`, {
        path: req.path,
        method: req.method,
        tier: result.tier,
        waitSeconds: result.waitSeconds,
      });

      const error = new RateLimitExceededError(result.waitSeconds, result.tier);
      res.setHeader('Retry-After', String(result.waitSeconds));
      res.status(error.statusCode).json(error.toJSON());
      return;
    }

    res.setHeader('X-RateLimit-Limit', String(result.limit));
    res.setHeader('X-RateLimit-Remaining', String(result.remaining));
    res.setHeader('X-RateLimit-Reset', String(toEpochSeconds(clock.now()) + result.windowSeconds));
    next();
  };
}
