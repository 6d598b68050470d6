/**
 * responseCache.ts
 * Serves eligible GET responses from the response cache and stores fresh 2xx ones
 */

import type { NextFunction, Request, Response } from 'express';

import type { ResponseCache } from '../response-cache.js';
import { type CacheKeyOptions, buildCacheKey, queryStringOf } from '../utils/cache-key.js';
import { type Clock, systemClock } from '../utils/clock.js';
import { getErrorMessage } from '../utils/error-helpers.js';
import { logger } from '../utils/logger.js';
import { type PathRules, isIncludedPath } from '../utils/path-rules.js';

import { extractApiKey } from './identity.js';

export interface ResponseCacheMiddlewareConfig extends PathRules, CacheKeyOptions {
  enabled: boolean;
}

/** Headers that describe one particular response and are never replayed */
const PER_RESPONSE_HEADERS = new Set([
  'age',
  'content-length',
  'date',
  'set-cookie',
  'x-cache',
  'x-ratelimit-limit',
  'x-ratelimit-remaining',
  'x-ratelimit-reset',
]);

function headerValue(value: number | string | string[] | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  return Array.isArray(value) ? value.join(', ') : String(value);
}

function snapshotHeaders(res: Response): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(res.getHeaders())) {
    const text = headerValue(value);
    if (text !== undefined && !PER_RESPONSE_HEADERS.has(name.toLowerCase())) {
      headers[name] = text;
    }
  }
  return headers;
}

/**
 * TTL from Cache-Control max-age, then Expires; undefined means the cache default
 */
export function ttlFromHeaders(
  cacheControl: string,
  expires: string | undefined,
  now: number
): number | undefined {
  for (const directive of cacheControl.split(',')) {
    const match = /^max-age=(\d+)$/i.exec(directive.trim());
    if (match) {
      return parseInt(match[1], 10);
    }
  }

  if (expires) {
    const expiresAt = Date.parse(expires);
    if (!isNaN(expiresAt)) {
      return Math.max(0, Math.floor((expiresAt - now) / 1000));
    }
  }

  return undefined;
}

function toPayload(body: unknown): Buffer | undefined {
  if (typeof body === 'string') {
    return Buffer.from(body, 'utf-8');
  }
  if (Buffer.isBuffer(body)) {
    return Buffer.from(body);
  }
  return undefined;
}

export function createResponseCache(
  cache: ResponseCache,
  config: ResponseCacheMiddlewareConfig,
  clock: Clock = systemClock
): (req: Request, res: Response, next: NextFunction) => void {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!config.enabled || req.method !== 'GET' || !isIncludedPath(req.path, config)) {
      next();
      return;
    }

    const key = buildCacheKey(
      {
        method: req.method,
        path: req.path,
        query: queryStringOf(req.originalUrl),
        apiKey: extractApiKey(req),
      },
      config
    );

    const entry = cache.get(key);
    if (entry) {
      res.set(entry.headers);
      res.setHeader('X-Cache', 'HIT');
      res.setHeader('Age', String(cache.getAge(entry)));
      res.status(entry.statusCode).send(entry.payload);
      return;
    }

    const originalSend = res.send.bind(res);
    let handled = false;

    res.send = (body?: unknown): Response => {
      // res.json re-enters send with the serialized string; handle only that pass
      const payload = handled ? undefined : toPayload(body);
      if (payload) {
        handled = true;
        res.setHeader('X-Cache', 'MISS');
        store(payload);
      }
      return originalSend(body);
    };

    function store(payload: Buffer): void {
      if (res.statusCode < 200 || res.statusCode >= 300) {
        return;
      }
      const cacheControl = headerValue(res.getHeader('Cache-Control')) ?? '';
      if (/no-cache|no-store/i.test(cacheControl)) {
        return;
      }
      try {
        const ttl = ttlFromHeaders(
          cacheControl,
          headerValue(res.getHeader('Expires')),
          clock.now()
        );
        cache.set(key, payload, snapshotHeaders(res), res.statusCode, ttl);
      } catch (error) {
        logger.warn('Response not cached', { path: req.path, error: getErrorMessage(error) });
      }
    }

    next();
  };
}
