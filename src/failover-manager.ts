/**
 * failover-manager.ts
 * Model health tracking and alternate selection with cooldown-based recovery
 */

import { type Clock, systemClock } from './utils/clock.js';
import { logger } from './utils/logger.js';

export type SelectionStrategy = 'random' | 'fewest-errors';

export interface FailoverManagerConfig {
  historySize: number;
  /** Default cooldown base for model types registered without one */
  defaultCooldownSeconds: number;
  /** 'fewest-errors' is deterministic; 'random' spreads load uniformly */
  selectionStrategy: SelectionStrategy;
}

export const DEFAULT_FAILOVER_CONFIG: FailoverManagerConfig = {
  historySize: 100,
  defaultCooldownSeconds: 300,
  selectionStrategy: 'random',
};

/** Cooldown multiplier cap: repeated failures stretch the cooldown up to 5x the base */
const MAX_COOLDOWN_MULTIPLIER = 5;

export interface ModelStatusSnapshot {
  modelId: string;
  available: boolean;
  failureCount: number;
  lastFailureAt: number | null;
  recoveryCount: number;
  cumulativeErrors: number;
}

export class ModelStatus {
  readonly modelId: string;
  private available = true;
  private failureCount = 0;
  private lastFailureAt: number | null = null;
  private recoveryCount = 0;
  private cumulativeErrors = 0;

  constructor(modelId: string) {
    this.modelId = modelId;
  }

  isAvailable(): boolean {
    return this.available;
  }

  getCumulativeErrors(): number {
    return this.cumulativeErrors;
  }

  markFailure(now: number): void {
    this.available = false;
    this.failureCount++;
    this.cumulativeErrors++;
    this.lastFailureAt = now;
  }

  /**
   * @returns true when this call brought the model back from unavailable
   */
  markSuccess(): boolean {
    const recovered = !this.available;
    if (recovered) {
      this.recoveryCount++;
    }
    this.available = true;
    this.failureCount = 0;
    return recovered;
  }

  /**
   * Eligible for an attempt: either available, or the progressive cooldown has
   * elapsed since the last failure. Does not flip the model back to available.
   */
  shouldRetry(cooldownSeconds: number, now: number): boolean {
    if (this.available) {
      return true;
    }
    const cooldownMs =
      cooldownSeconds * 1000 * Math.min(MAX_COOLDOWN_MULTIPLIER, this.failureCount);
    return now - (this.lastFailureAt ?? 0) > cooldownMs;
  }

  snapshot(): ModelStatusSnapshot {
    return {
      modelId: this.modelId,
      available: this.available,
      failureCount: this.failureCount,
      lastFailureAt: this.lastFailureAt,
      recoveryCount: this.recoveryCount,
      cumulativeErrors: this.cumulativeErrors,
    };
  }
}

export interface ModelTypeConfig {
  modelType: string;
  alternatives: Record<string, string[]>;
  cooldownSeconds: number;
}

export interface FailoverEvent {
  timestamp: number;
  originalModel: string;
  alternativeModel: string;
  success: boolean;
  error?: string;
}

export interface FailoverMetrics {
  totalFailovers: number;
  successfulFailovers: number;
  failedFailovers: number;
  modelsRecovered: number;
}

export interface ModelHealthReport {
  metrics: FailoverMetrics;
  models: Record<string, ModelStatusSnapshot>;
}

export class FailoverManager {
  private configs = new Map<string, ModelTypeConfig>();
  private statuses = new Map<string, ModelStatus>();
  private history: FailoverEvent[] = [];
  private metrics: FailoverMetrics = {
    totalFailovers: 0,
    successfulFailovers: 0,
    failedFailovers: 0,
    modelsRecovered: 0,
  };
  private config: FailoverManagerConfig;
  private clock: Clock;
  private random: () => number;

  constructor(
    config: Partial<FailoverManagerConfig> = {},
    clock: Clock = systemClock,
    random: () => number = Math.random
  ) {
    this.config = { ...DEFAULT_FAILOVER_CONFIG, ...config };
    this.clock = clock;
    this.random = random;
  }

  registerConfig(
    modelType: string,
    alternatesByPrimary: Record<string, string[]>,
    cooldownSeconds: number = this.config.defaultCooldownSeconds
  ): void {
    const alternatives: Record<string, string[]> = {};
    for (const [primary, alternates] of Object.entries(alternatesByPrimary)) {
      alternatives[primary] = [...alternates];
      this.ensureStatus(primary);
      alternates.forEach(alt => this.ensureStatus(alt));
    }
    this.configs.set(modelType, { modelType, alternatives, cooldownSeconds });
    logger.debug(`Failover config registered for ${modelType}`, {
      primaries: Object.keys(alternatives).length,
      cooldownSeconds,
    });
  }

  /**
   * Add or replace the alternates of a single primary model at run time.
   */
  configureAlternatives(
    modelType: string,
    modelId: string,
    alternatives: string[],
    cooldownSeconds?: number
  ): void {
    const existing = this.configs.get(modelType);
    if (!existing) {
      this.registerConfig(modelType, { [modelId]: alternatives }, cooldownSeconds);
      return;
    }
    existing.alternatives[modelId] = [...alternatives];
    if (cooldownSeconds !== undefined) {
      existing.cooldownSeconds = cooldownSeconds;
    }
    this.ensureStatus(modelId);
    alternatives.forEach(alt => this.ensureStatus(alt));
    logger.info(`Failover alternatives updated for ${modelId}`, { modelType, alternatives });
  }

  getAlternative(modelType: string, originalModel: string): string | undefined {
    const config = this.configs.get(modelType);
    if (!config) {
      logger.warn(`No failover configuration for model type: ${modelType}`);
      return undefined;
    }

    const alternatives = config.alternatives[originalModel];
    if (!alternatives || alternatives.length === 0) {
      logger.warn(`No alternatives configured for model: ${originalModel}`);
      return undefined;
    }

    const now = this.clock.now();
    const eligible = alternatives.filter(
      alt => this.statuses.get(alt)?.shouldRetry(config.cooldownSeconds, now) ?? false
    );

    if (eligible.length === 0) {
      logger.warn(`No available alternatives for ${originalModel}`);
      return undefined;
    }

    return this.select(eligible);
  }

  markFailure(modelId: string): void {
    this.ensureStatus(modelId).markFailure(this.clock.now());
    logger.warn(`Model marked as failed: ${modelId}`);
  }

  markSuccess(modelId: string): void {
    if (this.ensureStatus(modelId).markSuccess()) {
      this.metrics.modelsRecovered++;
      logger.info(`Model recovered: ${modelId}`);
    }
  }

  /**
   * Manual reset of a known model's status
   */
  resetModel(modelId: string): boolean {
    if (!this.statuses.has(modelId)) {
      return false;
    }
    this.markSuccess(modelId);
    return true;
  }

  recordFailoverEvent(
    originalModel: string,
    alternativeModel: string,
    success: boolean,
    error?: string
  ): void {
    this.history.push({
      timestamp: this.clock.now(),
      originalModel,
      alternativeModel,
      success,
      error,
    });
    if (this.history.length > this.config.historySize) {
      this.history.shift();
    }

    this.metrics.totalFailovers++;
    if (success) {
      this.metrics.successfulFailovers++;
    } else {
      this.metrics.failedFailovers++;
    }
  }

  getHistory(limit?: number): FailoverEvent[] {
    const events = limit === undefined ? this.history : this.history.slice(-limit);
    return events.map(event => ({ ...event }));
  }

  getModelStatus(modelId: string): ModelStatusSnapshot | undefined {
    return this.statuses.get(modelId)?.snapshot();
  }

  getModelTypes(): ModelTypeConfig[] {
    return Array.from(this.configs.values()).map(config => ({
      ...config,
      alternatives: Object.fromEntries(
        Object.entries(config.alternatives).map(([primary, alts]) => [primary, [...alts]])
      ),
    }));
  }

  healthReport(): ModelHealthReport {
    const models: Record<string, ModelStatusSnapshot> = {};
    for (const [modelId, status] of this.statuses) {
      models[modelId] = status.snapshot();
    }
    return { metrics: { ...this.metrics }, models };
  }

  private ensureStatus(modelId: string): ModelStatus {
    let status = this.statuses.get(modelId);
    if (!status) {
      status = new ModelStatus(modelId);
      this.statuses.set(modelId, status);
    }
    return status;
  }

  private select(eligible: string[]): string {
    if (this.config.selectionStrategy === 'fewest-errors') {
      // Ties keep configuration order
      return eligible.reduce((best, candidate) =>
        (this.statuses.get(candidate)?.getCumulativeErrors() ?? 0) <
        (this.statuses.get(best)?.getCumulativeErrors() ?? 0)
          ? candidate
          : best
      );
    }
    const index = Math.min(eligible.length - 1, Math.floor(this.random() * eligible.length));
    return eligible[index];
  }
}
