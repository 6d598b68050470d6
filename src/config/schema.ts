/**
 * schema.ts
 * Centralized Zod configuration schema with validation
 */

import { z } from 'zod';

import type { ModelType } from '../constants/models.js';

const slidingWindowSchema = z.object({
  maxRequests: z.number().int().min(1),
  windowSeconds: z.number().int().min(1).max(86400),
});

/**
 * Security configuration schema
 */
const securityConfigSchema = z.object({
  enableAuth: z.boolean().default(false),
  apiKeys: z.array(z.string().min(1)).default([]),
  adminApiKeys: z.array(z.string().min(1)).default([]),
  corsOrigins: z.array(z.string()).default(['*']),
  /** User each api key acts as */
  apiKeyUsers: z.record(z.string().min(1)).default({}),
  /** Header naming the end user; admin keys may set it when auth is enabled */
  userIdHeader: z.string().default('x-user-id'),
});

/**
 * Rate limiting: one window per tier, evaluated global -> ip -> api key
 */
const rateLimitConfigSchema = z.object({
  enabled: z.boolean().default(true),
  global: slidingWindowSchema.default({ maxRequests: 1000, windowSeconds: 60 }),
  ip: slidingWindowSchema.default({ maxRequests: 100, windowSeconds: 60 }),
  apiKey: slidingWindowSchema.default({ maxRequests: 200, windowSeconds: 60 }),
  excludePaths: z.array(z.string()).default(['/api/health']),
  excludePrefixes: z.array(z.string()).default(['/static/', '/docs/']),
  pruneIntervalMs: z.number().int().min(1000).default(300000), // 5 minutes
});

/**
 * Response cache configuration schema
 */
const cacheConfigSchema = z.object({
  enabled: z.boolean().default(true),
  ttlSeconds: z.number().int().min(1).default(300),
  maxSize: z.number().int().min(1).default(1000),
  includePaths: z.array(z.string()).default(['/api/health']),
  includePrefixes: z.array(z.string()).default(['/api/inference/']),
  excludePaths: z.array(z.string()).default([]),
  excludePrefixes: z.array(z.string()).default(['/api/tasks', '/auth/']),
  cacheQueryParams: z.boolean().default(true),
  cacheByApiKey: z.boolean().default(true),
});

const modelFailoverSchema = z.object({
  defaultModel: z.string().min(1),
  cooldownSeconds: z.number().int().min(1).optional(),
  alternatives: z.record(z.array(z.string().min(1))).default({}),
});

const DEFAULT_MODEL_FAILOVER = {
  text: {
    defaultModel: 'llama-3-8b-instruct',
    alternatives: {
      'deepseek-coder-33b-instruct': ['deepseek-coder-6.7b-instruct', 'codellama-7b-instruct'],
      'llama-3-70b-instruct': ['llama-3-8b-instruct', 'mistral-7b-instruct'],
      'llama-3-8b-instruct': ['mistral-7b-instruct', 'deepseek-coder-6.7b-instruct'],
      'mistral-7b-instruct': ['llama-3-8b-instruct', 'deepseek-coder-6.7b-instruct'],
    },
  },
  transcription: {
    defaultModel: 'whisper-large-v3',
    alternatives: {
      'whisper-large-v3': ['whisper-medium', 'whisper-small'],
      'whisper-medium': ['whisper-small', 'whisper-base'],
      'whisper-small': ['whisper-base', 'whisper-tiny'],
    },
  },
  video: {
    defaultModel: 'videollama-7b',
    alternatives: {
      'internvideo-14b': ['internvideo-7b', 'videollama-7b'],
      'videollama-7b': ['internvideo-7b', 'videollama-3b'],
    },
  },
} satisfies Record<ModelType, z.input<typeof modelFailoverSchema>>;

/**
 * Failover configuration schema
 */
const failoverConfigSchema = z.object({
  cooldownSeconds: z.number().int().min(1).default(300),
  historySize: z.number().int().min(1).default(100),
  selectionStrategy: z.enum(['random', 'fewest-errors']).default('random'),
  models: z
    .object({
      text: modelFailoverSchema.default(DEFAULT_MODEL_FAILOVER.text),
      transcription: modelFailoverSchema.default(DEFAULT_MODEL_FAILOVER.transcription),
      video: modelFailoverSchema.default(DEFAULT_MODEL_FAILOVER.video),
    })
    .default({}),
});

/**
 * Task registry configuration schema
 */
const tasksConfigSchema = z.object({
  retentionSeconds: z.number().int().min(0).default(86400), // 24 hours
  maxTasks: z.number().int().min(1).default(10000),
  monotonicProgress: z.boolean().default(true),
  sweepIntervalMs: z.number().int().min(1000).default(60000),
});

/**
 * Model backend configuration schema
 */
const modelBackendConfigSchema = z.object({
  url: z.string().url().default('http://localhost:8000'),
  timeoutMs: z.number().int().min(1000).default(120000), // 2 minutes
  apiKey: z.string().optional(),
});

/**
 * Main configuration schema
 */
export const dispatchConfigSchema = z.object({
  port: z.number().int().min(1).max(65535).default(5100),
  host: z.string().default('0.0.0.0'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  trustProxy: z.boolean().default(false),

  security: securityConfigSchema.default({}),
  rateLimit: rateLimitConfigSchema.default({}),
  cache: cacheConfigSchema.default({}),
  failover: failoverConfigSchema.default({}),
  tasks: tasksConfigSchema.default({}),
  modelBackend: modelBackendConfigSchema.default({}),
});

export type DispatchConfig = z.infer<typeof dispatchConfigSchema>;

export interface ConfigIssue {
  path: string;
  message: string;
}

export function collectIssues(error: z.ZodError): ConfigIssue[] {
  return error.issues.map((issue: z.ZodIssue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}
