/**
 * envMapper.ts
 * Maps DISPATCH_* environment variables onto configuration paths
 */

import { logger } from '../utils/logger.js';

export type EnvValueKind = 'string' | 'number' | 'boolean' | 'list';

export interface EnvMapping {
  path: string;
  kind: EnvValueKind;
}

const str = (path: string): EnvMapping => ({ path, kind: 'string' });
const num = (path: string): EnvMapping => ({ path, kind: 'number' });
const bool = (path: string): EnvMapping => ({ path, kind: 'boolean' });
const list = (path: string): EnvMapping => ({ path, kind: 'list' });

/**
 * Environment variable to config path mapping
 * Format: ENV_VAR_NAME: 'nested.config.path'
 */
export const ENV_CONFIG_MAPPING: Record<string, EnvMapping> = {
  // Server settings
  DISPATCH_PORT: num('port'),
  DISPATCH_HOST: str('host'),
  DISPATCH_LOG_LEVEL: str('logLevel'),
  DISPATCH_TRUST_PROXY: bool('trustProxy'),

  // Security settings
  DISPATCH_ENABLE_AUTH: bool('security.enableAuth'),
  DISPATCH_API_KEYS: list('security.apiKeys'),
  DISPATCH_ADMIN_API_KEYS: list('security.adminApiKeys'),
  DISPATCH_CORS_ORIGINS: list('security.corsOrigins'),
  DISPATCH_USER_ID_HEADER: str('security.userIdHeader'),

  // Rate limit settings
  DISPATCH_RATE_LIMIT_ENABLED: bool('rateLimit.enabled'),
  DISPATCH_RATE_LIMIT_GLOBAL_MAX: num('rateLimit.global.maxRequests'),
  DISPATCH_RATE_LIMIT_GLOBAL_WINDOW: num('rateLimit.global.windowSeconds'),
  DISPATCH_RATE_LIMIT_IP_MAX: num('rateLimit.ip.maxRequests'),
  DISPATCH_RATE_LIMIT_IP_WINDOW: num('rateLimit.ip.windowSeconds'),
  DISPATCH_RATE_LIMIT_API_KEY_MAX: num('rateLimit.apiKey.maxRequests'),
  DISPATCH_RATE_LIMIT_API_KEY_WINDOW: num('rateLimit.apiKey.windowSeconds'),

  // Cache settings
  DISPATCH_CACHE_ENABLED: bool('cache.enabled'),
  DISPATCH_CACHE_TTL: num('cache.ttlSeconds'),
  DISPATCH_CACHE_MAX_SIZE: num('cache.maxSize'),
  DISPATCH_CACHE_QUERY_PARAMS: bool('cache.cacheQueryParams'),
  DISPATCH_CACHE_BY_API_KEY: bool('cache.cacheByApiKey'),

  // Failover settings
  DISPATCH_FAILOVER_COOLDOWN: num('failover.cooldownSeconds'),
  DISPATCH_FAILOVER_HISTORY_SIZE: num('failover.historySize'),
  DISPATCH_FAILOVER_STRATEGY: str('failover.selectionStrategy'),

  // Task settings
  DISPATCH_TASK_RETENTION: num('tasks.retentionSeconds'),
  DISPATCH_TASK_MAX: num('tasks.maxTasks'),
  DISPATCH_TASK_MONOTONIC_PROGRESS: bool('tasks.monotonicProgress'),
  DISPATCH_TASK_SWEEP_INTERVAL: num('tasks.sweepIntervalMs'),

  // Model backend settings
  DISPATCH_MODEL_BACKEND_URL: str('modelBackend.url'),
  DISPATCH_MODEL_BACKEND_TIMEOUT: num('modelBackend.timeoutMs'),
  DISPATCH_MODEL_BACKEND_API_KEY: str('modelBackend.apiKey'),
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse environment variable value to the mapping's type.
 * Returns undefined when the value does not fit.
 */
export function parseEnvValue(
  value: string,
  kind: EnvValueKind
): string | number | boolean | string[] | undefined {
  switch (kind) {
    case 'number': {
      const trimmed = value.trim();
      if (trimmed === '') {
        return undefined;
      }
      const parsed = Number(trimmed);
      return Number.isFinite(parsed) ? parsed : undefined;
    }
    case 'boolean': {
      const lowered = value.trim().toLowerCase();
      if (lowered === 'true' || lowered === '1') {
        return true;
      }
      if (lowered === 'false' || lowered === '0') {
        return false;
      }
      return undefined;
    }
    case 'list':
      return value
        .split(',')
        .map(item => item.trim())
        .filter(Boolean);
    default:
      return value;
  }
}

/**
 * Set a nested value in an object by path
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const keys = path.split('.');
  const last = keys.pop();
  if (last === undefined) {
    return;
  }

  let current = obj;
  for (const key of keys) {
    const next = current[key];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[key] = created;
      current = created;
    }
  }

  current[last] = value;
}

/**
 * Apply environment variable overrides to a copy of config
 */
export function applyEnvOverrides(
  config: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env
): Record<string, unknown> {
  const result = structuredClone(config);
  let appliedCount = 0;

  for (const [envVar, mapping] of Object.entries(ENV_CONFIG_MAPPING)) {
    const raw = env[envVar];
    if (raw === undefined) {
      continue;
    }
    const parsedValue = parseEnvValue(raw, mapping.kind);
    if (parsedValue === undefined) {
      logger.warn(`Ignoring ${envVar}: expected a ${mapping.kind}`, { value: raw });
      continue;
    }
    setNestedValue(result, mapping.path, parsedValue);
    appliedCount++;
    logger.debug(`Applied config override from env: ${envVar} -> ${mapping.path}`);
  }

  if (appliedCount > 0) {
    logger.info(`Applied ${appliedCount} configuration overrides from environment variables`);
  }

  return result;
}
