/**
 * context.ts
 * One instance of every shared structure, built at process start and passed to
 * routes and background jobs
 */

import type { DispatchConfig } from './config/schema.js';
import { MODEL_TYPES } from './constants/index.js';
import { FailoverManager } from './failover-manager.js';
import { JobRunner } from './job-runner.js';
import { HttpModelBackend, type ModelBackend } from './model-backend.js';
import { TieredRateLimiter } from './rate-limiter.js';
import { ResponseCache } from './response-cache.js';
import { TaskRegistry } from './task-registry.js';
import { type Clock, systemClock } from './utils/clock.js';
import { logger } from './utils/logger.js';

export interface AppContext {
  config: DispatchConfig;
  clock: Clock;
  registry: TaskRegistry;
  cache: ResponseCache;
  rateLimiter: TieredRateLimiter;
  failover: FailoverManager;
  backend: ModelBackend;
  jobs: JobRunner;
}

export interface AppContextOverrides {
  clock?: Clock;
  backend?: ModelBackend;
  random?: () => number;
}

export function createAppContext(
  config: DispatchConfig,
  overrides: AppContextOverrides = {}
): AppContext {
  const clock = overrides.clock ?? systemClock;

  const registry = new TaskRegistry(
    {
      retentionSeconds: config.tasks.retentionSeconds,
      maxTasks: config.tasks.maxTasks,
      monotonicProgress: config.tasks.monotonicProgress,
    },
    clock
  );

  const cache = new ResponseCache(
    { maxSize: config.cache.maxSize, defaultTtlSeconds: config.cache.ttlSeconds },
    clock
  );

  const rateLimiter = new TieredRateLimiter(
    { global: config.rateLimit.global, ip: config.rateLimit.ip, apiKey: config.rateLimit.apiKey },
    clock
  );

  const failover = new FailoverManager(
    {
      historySize: config.failover.historySize,
      defaultCooldownSeconds: config.failover.cooldownSeconds,
      selectionStrategy: config.failover.selectionStrategy,
    },
    clock,
    overrides.random
  );
  for (const modelType of MODEL_TYPES) {
    const models = config.failover.models[modelType];
    failover.registerConfig(modelType, models.alternatives, models.cooldownSeconds);
  }

  const backend =
    overrides.backend ??
    new HttpModelBackend({
      url: config.modelBackend.url,
      timeoutMs: config.modelBackend.timeoutMs,
      apiKey: config.modelBackend.apiKey,
    });

  const jobs = new JobRunner({ registry, failover, backend });

  logger.debug('Application context created', {
    modelTypes: MODEL_TYPES,
    cacheMaxSize: config.cache.maxSize,
  });

  return { config, clock, registry, cache, rateLimiter, failover, backend, jobs };
}

/**
 * Periodic housekeeping: task retention and idle rate-limit windows.
 * Returns a function that stops both timers.
 */
export function startMaintenance(context: AppContext): () => void {
  context.registry.startSweep(context.config.tasks.sweepIntervalMs);

  const limiterTimer = setInterval(() => {
    const removed = context.rateLimiter.prune();
    if (removed > 0) {
      logger.debug(`Pruned ${removed} idle rate limit windows`);
    }
  }, context.config.rateLimit.pruneIntervalMs);
  limiterTimer.unref();

  return () => {
    context.registry.stop();
    clearInterval(limiterTimer);
  };
}
