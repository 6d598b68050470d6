/**
 * cache-key.ts
 * Request fingerprints for the response cache
 */

import { createHash } from 'crypto';

export interface CacheKeyOptions {
  cacheQueryParams: boolean;
  cacheByApiKey: boolean;
}

export interface CacheKeyInput {
  method: string;
  path: string;
  /** Raw query string without the leading '?' */
  query?: string;
  apiKey?: string;
}

/**
 * `<path>:<md5>` where the digest covers method, path and, per options, the
 * query string and the caller's key. The path prefix keeps keys invalidatable
 * by route.
 */
export function buildCacheKey(input: CacheKeyInput, options: CacheKeyOptions): string {
  const parts = [input.method.toUpperCase(), input.path];
  if (options.cacheQueryParams && input.query) {
    parts.push(input.query);
  }
  if (options.cacheByApiKey) {
    parts.push(input.apiKey ?? 'anonymous');
  }
  const digest = createHash('md5').update(parts.join(':')).digest('hex');
  return `${input.path}:${digest}`;
}

export function queryStringOf(originalUrl: string): string | undefined {
  const index = originalUrl.indexOf('?');
  if (index === -1 || index === originalUrl.length - 1) {
    return undefined;
  }
  return originalUrl.substring(index + 1);
}
