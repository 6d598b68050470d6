/**
 * config.ts
 * Layered configuration: schema defaults, optional JSON/YAML file, programmatic
 * overrides, then DISPATCH_* environment variables
 */

import { promises as fs } from 'fs';
import path from 'path';

import { logger } from '../utils/logger.js';

import { applyEnvOverrides } from './envMapper.js';
import { type ConfigIssue, type DispatchConfig, collectIssues, dispatchConfigSchema } from './schema.js';

export class ConfigValidationError extends Error {
  errors: ConfigIssue[];

  constructor(errors: ConfigIssue[], source?: string) {
    super(
      `Configuration validation failed${source ? ` (${source})` : ''}: ${errors
        .map(e => `${e.path}: ${e.message}`)
        .join(', ')}`
    );
    this.errors = errors;
    this.name = 'ConfigValidationError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge where arrays and scalars from `source` replace those in `target`
 */
function mergeLayers(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };
  for (const [key, value] of Object.entries(source)) {
    const existing = result[key];
    if (isRecord(value) && isRecord(existing)) {
      result[key] = mergeLayers(existing, value);
    } else if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

export class ConfigManager {
  private config: DispatchConfig;
  private configPath?: string;
  private fileLayer: Record<string, unknown> = {};
  private overrides: Record<string, unknown>;
  private env: NodeJS.ProcessEnv;

  constructor(overrides: Record<string, unknown> = {}, env: NodeJS.ProcessEnv = process.env) {
    this.overrides = overrides;
    this.env = env;
    this.config = this.resolve();
  }

  /**
   * Load configuration from file (JSON or YAML)
   */
  async loadFromFile(filePath: string): Promise<void> {
    const resolvedPath = path.resolve(filePath);
    const ext = path.extname(resolvedPath).toLowerCase();

    let content: string;
    try {
      content = await fs.readFile(resolvedPath, 'utf-8');
    } catch (error) {
      logger.error(`Failed to load configuration from ${filePath}:`, { error });
      throw error;
    }

    let parsed: unknown;
    if (ext === '.json') {
      parsed = JSON.parse(content);
    } else if (ext === '.yaml' || ext === '.yml') {
      // Dynamic import to avoid loading yaml if not used
      const yaml = await import('js-yaml');
      parsed = yaml.load(content);
    } else {
      throw new Error(`Unsupported config file format: ${ext}. Use .json, .yaml, or .yml`);
    }

    if (parsed === undefined || parsed === null) {
      parsed = {};
    }
    if (!isRecord(parsed)) {
      throw new ConfigValidationError(
        [{ path: '', message: 'Configuration file must contain an object' }],
        resolvedPath
      );
    }

    const previous = this.fileLayer;
    this.fileLayer = parsed;
    try {
      this.config = this.resolve(resolvedPath);
    } catch (error) {
      this.fileLayer = previous;
      throw error;
    }
    this.configPath = resolvedPath;

    logger.info(`Configuration loaded from ${resolvedPath}`);
  }

  /**
   * Get current configuration
   */
  getConfig(): DispatchConfig {
    return structuredClone(this.config);
  }

  getConfigPath(): string | undefined {
    return this.configPath;
  }

  toJSON(): DispatchConfig {
    return this.getConfig();
  }

  private resolve(source?: string): DispatchConfig {
    const layered = mergeLayers(this.fileLayer, this.overrides);
    // Env overrides apply to the fully-defaulted object
    const withDefaults = this.parse(layered, source);
    return this.parse(applyEnvOverrides(withDefaults, this.env), 'environment');
  }

  private parse(raw: unknown, source?: string): DispatchConfig {
    const result = dispatchConfigSchema.safeParse(raw);
    if (!result.success) {
      throw new ConfigValidationError(collectIssues(result.error), source);
    }
    return result.data;
  }
}
