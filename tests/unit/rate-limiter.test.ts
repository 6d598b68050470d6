/**
 * rate-limiter.test.ts
 * Tests for the sliding-window and tiered rate limiters
 */

import { describe, it, expect, beforeEach } from 'vitest';

import { SlidingWindowRateLimiter, TieredRateLimiter } from '../../src/rate-limiter.js';
import { ManualClock } from '../utils/manual-clock.js';

describe('SlidingWindowRateLimiter', () => {
  let clock: ManualClock;
  let limiter: SlidingWindowRateLimiter;

  beforeEach(() => {
    clock = new ManualClock();
    limiter = new SlidingWindowRateLimiter({ maxRequests: 3, windowSeconds: 60 }, clock);
  });

  it('should count down the remaining budget', () => {
    expect(limiter.isLimited('client').remaining).toBe(2);
    expect(limiter.isLimited('client').remaining).toBe(1);
    expect(limiter.isLimited('client').remaining).toBe(0);
  });

  it('should reject once the window is full and admit again after it slides', () => {
    for (let i = 0; i < 3; i++) {
      expect(limiter.isLimited('client').limited).toBe(false);
    }

    clock.advanceSeconds(10);
    const rejected = limiter.isLimited('client');
    expect(rejected).toEqual({ limited: true, remaining: 0, waitSeconds: 50 });

    clock.advanceSeconds(50);
    expect(limiter.isLimited('client')).toEqual({ limited: false, remaining: 2, waitSeconds: 0 });
  });

  it('should keep the wait within 1..window seconds', () => {
    for (let i = 0; i < 3; i++) {
      limiter.isLimited('client');
    }

    expect(limiter.isLimited('client').waitSeconds).toBe(60);

    clock.advance(59_500);
    expect(limiter.isLimited('client').waitSeconds).toBe(1);
  });

  it('should not record rejected requests', () => {
    for (let i = 0; i < 3; i++) {
      limiter.isLimited('client');
    }
    for (let i = 0; i < 5; i++) {
      limiter.isLimited('client');
    }

    clock.advanceSeconds(60);
    expect(limiter.isLimited('client').remaining).toBe(2);
  });

  it('should track identifiers independently', () => {
    for (let i = 0; i < 3; i++) {
      limiter.isLimited('first');
    }
    expect(limiter.isLimited('first').limited).toBe(true);
    expect(limiter.isLimited('second').limited).toBe(false);
  });

  it('should prune identifiers with empty windows', () => {
    limiter.isLimited('old');
    clock.advanceSeconds(30);
    limiter.isLimited('recent');
    clock.advanceSeconds(31);

    expect(limiter.prune()).toBe(1);
    expect(limiter.trackedIdentifiers()).toBe(1);
  });

  it('should reset one identifier or all of them', () => {
    limiter.isLimited('a');
    limiter.isLimited('b');

    limiter.reset('a');
    expect(limiter.trackedIdentifiers()).toBe(1);

    limiter.reset();
    expect(limiter.trackedIdentifiers()).toBe(0);
  });
});

describe('TieredRateLimiter', () => {
  let clock: ManualClock;

  beforeEach(() => {
    clock = new ManualClock();
  });

  it('should report the ip tier when no api key is given', () => {
    const limiter = new TieredRateLimiter(
      {
        global: { maxRequests: 100, windowSeconds: 60 },
        ip: { maxRequests: 5, windowSeconds: 30 },
        apiKey: { maxRequests: 10, windowSeconds: 60 },
      },
      clock
    );

    expect(limiter.check('10.0.0.1')).toEqual({
      limited: false,
      remaining: 4,
      waitSeconds: 0,
      tier: 'ip',
      limit: 5,
      windowSeconds: 30,
    });
  });

  it('should report the api key tier when a key is given', () => {
    const limiter = new TieredRateLimiter(
      {
        global: { maxRequests: 100, windowSeconds: 60 },
        ip: { maxRequests: 5, windowSeconds: 60 },
        apiKey: { maxRequests: 10, windowSeconds: 60 },
      },
      clock
    );

    const result = limiter.check('10.0.0.1', 'test-key');
    expect(result.tier).toBe('api_key');
    expect(result.remaining).toBe(9);
    expect(result.limit).toBe(10);
  });

  it('should stop at the global tier when it is exhausted', () => {
    const limiter = new TieredRateLimiter(
      {
        global: { maxRequests: 2, windowSeconds: 60 },
        ip: { maxRequests: 5, windowSeconds: 60 },
        apiKey: { maxRequests: 10, windowSeconds: 60 },
      },
      clock
    );

    limiter.check('10.0.0.1');
    limiter.check('10.0.0.2');
    const result = limiter.check('10.0.0.3', 'test-key');

    expect(result.limited).toBe(true);
    expect(result.tier).toBe('global');
    expect(limiter.ip.trackedIdentifiers()).toBe(2);
    expect(limiter.apiKey.trackedIdentifiers()).toBe(0);
  });

  it('should reject on the ip tier without touching the api key tier', () => {
    const limiter = new TieredRateLimiter(
      {
        global: { maxRequests: 100, windowSeconds: 60 },
        ip: { maxRequests: 1, windowSeconds: 60 },
        apiKey: { maxRequests: 10, windowSeconds: 60 },
      },
      clock
    );

    limiter.check('10.0.0.1', 'test-key');
    const result = limiter.check('10.0.0.1', 'test-key');

    expect(result.limited).toBe(true);
    expect(result.tier).toBe('ip');
    expect(limiter.check('10.0.0.2', 'test-key').remaining).toBe(8);
  });

  it('should reject on the api key tier shared across addresses', () => {
    const limiter = new TieredRateLimiter(
      {
        global: { maxRequests: 100, windowSeconds: 60 },
        ip: { maxRequests: 10, windowSeconds: 60 },
        apiKey: { maxRequests: 2, windowSeconds: 60 },
      },
      clock
    );

    limiter.check('10.0.0.1', 'test-key');
    limiter.check('10.0.0.2', 'test-key');
    const result = limiter.check('10.0.0.3', 'test-key');

    expect(result).toEqual({
      limited: true,
      remaining: 0,
      waitSeconds: 60,
      tier: 'api_key',
      limit: 2,
      windowSeconds: 60,
    });
  });
});
