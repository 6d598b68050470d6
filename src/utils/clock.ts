/**
 * clock.ts
 * Injectable time source shared by the registry, cache, limiter and failover tables
 */

export interface Clock {
  /** Current time in epoch milliseconds */
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

export function toEpochSeconds(ms: number): number {
  return Math.floor(ms / 1000);
}

export function toIsoOrNull(ms: number | null): string | null {
  return ms === null ? null : new Date(ms).toISOString();
}
