/**
 * rate-limiter.ts
 * Sliding-window request counter keyed by an arbitrary identifier
 */

import { type Clock, systemClock } from './utils/clock.js';

export interface RateLimitDecision {
  limited: boolean;
  remaining: number;
  /** Seconds until a slot frees up; 0 when admitted */
  waitSeconds: number;
}

export interface SlidingWindowConfig {
  maxRequests: number;
  windowSeconds: number;
}

interface WindowSample {
  timestamp: number;
  count: number;
}

export class SlidingWindowRateLimiter {
  readonly maxRequests: number;
  readonly windowSeconds: number;
  private windows = new Map<string, WindowSample[]>();
  private clock: Clock;

  constructor(config: SlidingWindowConfig, clock: Clock = systemClock) {
    this.maxRequests = config.maxRequests;
    this.windowSeconds = config.windowSeconds;
    this.clock = clock;
  }

  /**
   * Checks the identifier's window and, when admitted, records this request in it.
   */
  isLimited(identifier: string): RateLimitDecision {
    const now = this.clock.now();
    const windowMs = this.windowSeconds * 1000;
    const cutoff = now - windowMs;

    const samples = (this.windows.get(identifier) ?? []).filter(s => s.timestamp > cutoff);
    this.windows.set(identifier, samples);

    const total = samples.reduce((sum, s) => sum + s.count, 0);

    if (total >= this.maxRequests) {
      const oldest = samples[0];
      if (!oldest) {
        return { limited: true, remaining: 0, waitSeconds: Math.max(1, this.windowSeconds) };
      }
      // The oldest sample leaves the window once windowSeconds have elapsed
      const waitSeconds = Math.ceil(this.windowSeconds - (now - oldest.timestamp) / 1000);
      return { limited: true, remaining: 0, waitSeconds: Math.max(1, waitSeconds) };
    }

    samples.push({ timestamp: now, count: 1 });
    return { limited: false, remaining: this.maxRequests - total - 1, waitSeconds: 0 };
  }

  /**
   * Drop identifiers whose windows no longer hold any sample.
   */
  prune(): number {
    const cutoff = this.clock.now() - this.windowSeconds * 1000;
    let removed = 0;
    for (const [identifier, samples] of this.windows) {
      if (!samples.some(s => s.timestamp > cutoff)) {
        this.windows.delete(identifier);
        removed++;
      }
    }
    return removed;
  }

  reset(identifier?: string): void {
    if (identifier === undefined) {
      this.windows.clear();
    } else {
      this.windows.delete(identifier);
    }
  }

  trackedIdentifiers(): number {
    return this.windows.size;
  }
}

export type RateLimitTier = 'global' | 'ip' | 'api_key';

export interface TieredRateLimitConfig {
  global: SlidingWindowConfig;
  ip: SlidingWindowConfig;
  apiKey: SlidingWindowConfig;
}

export interface TieredRateLimitResult extends RateLimitDecision {
  /** Tier that rejected the request, or the tier whose budget is reported back */
  tier: RateLimitTier;
  limit: number;
  windowSeconds: number;
}

/**
 * Global, per-IP and per-API-key windows evaluated in sequence. A request is
 * admitted only if no tier rejects it; evaluation stops at the first rejection.
 */
export class TieredRateLimiter {
  readonly global: SlidingWindowRateLimiter;
  readonly ip: SlidingWindowRateLimiter;
  readonly apiKey: SlidingWindowRateLimiter;

  constructor(config: TieredRateLimitConfig, clock: Clock = systemClock) {
    this.global = new SlidingWindowRateLimiter(config.global, clock);
    this.ip = new SlidingWindowRateLimiter(config.ip, clock);
    this.apiKey = new SlidingWindowRateLimiter(config.apiKey, clock);
  }

  check(clientIp: string, apiKey?: string): TieredRateLimitResult {
    const globalDecision = this.global.isLimited('global');
    if (globalDecision.limited) {
      return this.result('global', this.global, globalDecision);
    }

    const ipDecision = this.ip.isLimited(clientIp);
    if (ipDecision.limited || !apiKey) {
      return this.result('ip', this.ip, ipDecision);
    }

    return this.result('api_key', this.apiKey, this.apiKey.isLimited(apiKey));
  }

  prune(): number {
    return this.global.prune() + this.ip.prune() + this.apiKey.prune();
  }

  private result(
    tier: RateLimitTier,
    limiter: SlidingWindowRateLimiter,
    decision: RateLimitDecision
  ): TieredRateLimitResult {
    return {
      ...decision,
      tier,
      limit: limiter.maxRequests,
      windowSeconds: limiter.windowSeconds,
    };
  }
}
