/**
 * response-cache.ts
 * TTL- and capacity-bounded cache of response payloads keyed by request fingerprint
 */

import { type Clock, systemClock } from './utils/clock.js';
import { logger } from './utils/logger.js';

export interface CacheEntry {
  payload: Buffer;
  headers: Record<string, string>;
  statusCode: number;
  createdAt: number;
  ttlSeconds: number;
  expiresAt: number;
}

export interface ResponseCacheConfig {
  maxSize: number;
  defaultTtlSeconds: number;
}

export const DEFAULT_RESPONSE_CACHE_CONFIG: ResponseCacheConfig = {
  maxSize: 1000,
  defaultTtlSeconds: 300,
};

export interface ResponseCacheStats {
  size: number;
  maxSize: number;
  defaultTtlSeconds: number;
  hits: number;
  misses: number;
  evictions: number;
  expirations: number;
}

export class ResponseCache {
  private entries = new Map<string, CacheEntry>();
  private config: ResponseCacheConfig;
  private clock: Clock;
  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private expirations = 0;

  constructor(config: Partial<ResponseCacheConfig> = {}, clock: Clock = systemClock) {
    this.config = { ...DEFAULT_RESPONSE_CACHE_CONFIG, ...config };
    this.clock = clock;
  }

  get(key: string): CacheEntry | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }

    if (this.isExpired(entry, this.clock.now())) {
      this.entries.delete(key);
      this.expirations++;
      this.misses++;
      return undefined;
    }

    this.hits++;
    return { ...entry, headers: { ...entry.headers } };
  }

  set(
    key: string,
    payload: Buffer,
    headers: Record<string, string>,
    statusCode: number,
    ttlSeconds?: number
  ): void {
    this.purgeExpired();

    if (this.entries.size >= this.config.maxSize && !this.entries.has(key)) {
      this.evictOldest();
    }

    const createdAt = this.clock.now();
    const ttl = ttlSeconds ?? this.config.defaultTtlSeconds;
    // Re-inserting moves the key to the end of the map's iteration order
    this.entries.delete(key);
    this.entries.set(key, {
      payload,
      headers: { ...headers },
      statusCode,
      createdAt,
      ttlSeconds: ttl,
      expiresAt: createdAt + ttl * 1000,
    });
  }

  invalidate(keyPrefix: string): number {
    let removed = 0;
    for (const key of Array.from(this.entries.keys())) {
      if (key.startsWith(keyPrefix)) {
        this.entries.delete(key);
        removed++;
      }
    }
    if (removed > 0) {
      logger.info(`Invalidated ${removed} cache entries`, { keyPrefix });
    }
    return removed;
  }

  /**
   * Whole seconds since the entry was stored
   */
  getAge(entry: CacheEntry): number {
    return Math.max(0, Math.floor((this.clock.now() - entry.createdAt) / 1000));
  }

  clear(): void {
    this.entries.clear();
  }

  stats(): ResponseCacheStats {
    return {
      size: this.entries.size,
      maxSize: this.config.maxSize,
      defaultTtlSeconds: this.config.defaultTtlSeconds,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      expirations: this.expirations,
    };
  }

  private isExpired(entry: CacheEntry, now: number): boolean {
    return now > entry.expiresAt;
  }

  private purgeExpired(): void {
    const now = this.clock.now();
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry, now)) {
        this.entries.delete(key);
        this.expirations++;
      }
    }
  }

  private evictOldest(): void {
    let oldestKey: string | undefined;
    let oldestCreatedAt = Infinity;
    for (const [key, entry] of this.entries) {
      if (entry.createdAt < oldestCreatedAt) {
        oldestKey = key;
        oldestCreatedAt = entry.createdAt;
      }
    }
    if (oldestKey !== undefined) {
      this.entries.delete(oldestKey);
      this.evictions++;
      logger.debug('Evicted oldest cache entry', { key: oldestKey });
    }
  }
}
