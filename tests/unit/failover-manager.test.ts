/**
 * failover-manager.test.ts
 * Tests for model health tracking and alternate selection
 */

import { describe, it, expect, beforeEach } from 'vitest';

import { FailoverManager, ModelStatus } from '../../src/failover-manager.js';
import { ManualClock } from '../utils/manual-clock.js';

describe('ModelStatus', () => {
  it('should stretch the cooldown with repeated failures up to five times the base', () => {
    const status = new ModelStatus('model-a');
    const start = 1_000_000;

    status.markFailure(start);
    expect(status.shouldRetry(10, start + 10_000)).toBe(false);
    expect(status.shouldRetry(10, start + 10_001)).toBe(true);

    status.markFailure(start);
    expect(status.shouldRetry(10, start + 20_000)).toBe(false);
    expect(status.shouldRetry(10, start + 20_001)).toBe(true);

    for (let i = 0; i < 8; i++) {
      status.markFailure(start);
    }
    expect(status.shouldRetry(10, start + 50_001)).toBe(true);
  });

  it('should reset the failure count on success and count recoveries', () => {
    const status = new ModelStatus('model-a');
    status.markFailure(1000);
    status.markFailure(2000);

    expect(status.markSuccess()).toBe(true);
    expect(status.markSuccess()).toBe(false);
    expect(status.snapshot()).toEqual({
      modelId: 'model-a',
      available: true,
      failureCount: 0,
      lastFailureAt: 2000,
      recoveryCount: 1,
      cumulativeErrors: 2,
    });
  });

  it('should not flip back to available when the cooldown elapses', () => {
    const status = new ModelStatus('model-a');
    status.markFailure(0);

    expect(status.shouldRetry(1, 5000)).toBe(true);
    expect(status.isAvailable()).toBe(false);
  });
});

describe('FailoverManager', () => {
  let clock: ManualClock;

  beforeEach(() => {
    clock = new ManualClock();
  });

  describe('getAlternative', () => {
    it('should return undefined for an unknown model type or primary', () => {
      const manager = new FailoverManager({}, clock);
      manager.registerConfig('text', { primary: ['alt-1'] });

      expect(manager.getAlternative('video', 'primary')).toBeUndefined();
      expect(manager.getAlternative('text', 'other')).toBeUndefined();
    });

    it('should pick uniformly among eligible alternates with the injected random source', () => {
      const draws = [0, 0.5, 0.99];
      let call = 0;
      const manager = new FailoverManager({}, clock, () => draws[call++]);
      manager.registerConfig('text', { primary: ['alt-1', 'alt-2', 'alt-3'] });

      expect(manager.getAlternative('text', 'primary')).toBe('alt-1');
      expect(manager.getAlternative('text', 'primary')).toBe('alt-2');
      expect(manager.getAlternative('text', 'primary')).toBe('alt-3');
    });

    it('should skip alternates that are cooling down', () => {
      const manager = new FailoverManager({}, clock, () => 0);
      manager.registerConfig('text', { primary: ['alt-1', 'alt-2'] }, 60);

      manager.markFailure('alt-1');

      expect(manager.getAlternative('text', 'primary')).toBe('alt-2');
    });

    it('should return undefined when every alternate is cooling down and offer them again after', () => {
      const manager = new FailoverManager({}, clock, () => 0);
      manager.registerConfig('text', { primary: ['alt-1'] }, 60);
      manager.markFailure('alt-1');

      clock.advanceSeconds(60);
      expect(manager.getAlternative('text', 'primary')).toBeUndefined();

      clock.advance(1);
      expect(manager.getAlternative('text', 'primary')).toBe('alt-1');
    });

    it('should prefer the alternate with the fewest cumulative errors', () => {
      const manager = new FailoverManager({ selectionStrategy: 'fewest-errors' }, clock);
      manager.registerConfig('text', { primary: ['alt-1', 'alt-2', 'alt-3'] }, 1);

      manager.markFailure('alt-1');
      manager.markFailure('alt-1');
      manager.markFailure('alt-2');
      manager.markSuccess('alt-1');
      manager.markSuccess('alt-2');

      expect(manager.getAlternative('text', 'primary')).toBe('alt-3');

      manager.markFailure('alt-3');
      manager.markFailure('alt-3');
      manager.markSuccess('alt-3');
      expect(manager.getAlternative('text', 'primary')).toBe('alt-2');
    });

    it('should keep configuration order on ties', () => {
      const manager = new FailoverManager({ selectionStrategy: 'fewest-errors' }, clock);
      manager.registerConfig('text', { primary: ['alt-1', 'alt-2'] });

      expect(manager.getAlternative('text', 'primary')).toBe('alt-1');
    });
  });

  describe('configureAlternatives', () => {
    it('should replace the alternates of one primary', () => {
      const manager = new FailoverManager({}, clock, () => 0);
      manager.registerConfig('text', { primary: ['alt-1'], other: ['alt-9'] });

      manager.configureAlternatives('text', 'primary', ['alt-2'], 30);

      const [config] = manager.getModelTypes();
      expect(config.alternatives).toEqual({ primary: ['alt-2'], other: ['alt-9'] });
      expect(config.cooldownSeconds).toBe(30);
      expect(manager.getAlternative('text', 'primary')).toBe('alt-2');
    });

    it('should register a model type that has no configuration yet', () => {
      const manager = new FailoverManager({ defaultCooldownSeconds: 120 }, clock);
      manager.configureAlternatives('video', 'primary', ['alt-1']);

      expect(manager.getModelTypes()).toEqual([
        { modelType: 'video', alternatives: { primary: ['alt-1'] }, cooldownSeconds: 120 },
      ]);
    });
  });

  describe('history and metrics', () => {
    it('should keep only the most recent events', () => {
      const manager = new FailoverManager({ historySize: 3 }, clock);
      for (let i = 0; i < 5; i++) {
        clock.advance(1000);
        manager.recordFailoverEvent(`model-${i}`, 'alt', i % 2 === 0);
      }

      const history = manager.getHistory();
      expect(history.map(event => event.originalModel)).toEqual(['model-2', 'model-3', 'model-4']);
      expect(manager.getHistory(1)[0].originalModel).toBe('model-4');
      expect(manager.healthReport().metrics).toEqual({
        totalFailovers: 5,
        successfulFailovers: 3,
        failedFailovers: 2,
        modelsRecovered: 0,
      });
    });

    it('should count a recovery when a failed model succeeds', () => {
      const manager = new FailoverManager({}, clock);
      manager.registerConfig('text', { primary: ['alt-1'] });
      manager.markFailure('primary');
      manager.markSuccess('primary');
      manager.markSuccess('primary');

      expect(manager.healthReport().metrics.modelsRecovered).toBe(1);
    });

    it('should report every tracked model', () => {
      const manager = new FailoverManager({}, clock);
      manager.registerConfig('text', { primary: ['alt-1'] });
      manager.markFailure('primary');

      const report = manager.healthReport();
      expect(Object.keys(report.models).sort()).toEqual(['alt-1', 'primary']);
      expect(report.models.primary).toEqual({
        modelId: 'primary',
        available: false,
        failureCount: 1,
        lastFailureAt: clock.now(),
        recoveryCount: 0,
        cumulativeErrors: 1,
      });
    });
  });

  describe('resetModel', () => {
    it('should mark a known model available', () => {
      const manager = new FailoverManager({}, clock);
      manager.registerConfig('text', { primary: ['alt-1'] });
      manager.markFailure('alt-1');

      expect(manager.resetModel('alt-1')).toBe(true);
      expect(manager.getModelStatus('alt-1')?.available).toBe(true);
      expect(manager.getModelStatus('alt-1')?.failureCount).toBe(0);
    });

    it('should return false for an unknown model', () => {
      const manager = new FailoverManager({}, clock);
      expect(manager.resetModel('missing')).toBe(false);
    });
  });
});
