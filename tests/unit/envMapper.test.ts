/**
 * envMapper.test.ts
 * Tests for environment variable to config mapping
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

import { ENV_CONFIG_MAPPING, applyEnvOverrides, parseEnvValue } from '../../src/config/envMapper.js';
import { logger } from '../../src/utils/logger.js';

vi.mock('../../src/utils/logger.js');

describe('envMapper', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('ENV_CONFIG_MAPPING', () => {
    it('should have mapping for port', () => {
      expect(ENV_CONFIG_MAPPING.DISPATCH_PORT).toEqual({ path: 'port', kind: 'number' });
    });

    it('should have mapping for rate limit tiers', () => {
      expect(ENV_CONFIG_MAPPING.DISPATCH_RATE_LIMIT_IP_MAX).toEqual({
        path: 'rateLimit.ip.maxRequests',
        kind: 'number',
      });
    });

    it('should have mapping for api keys as a list', () => {
      expect(ENV_CONFIG_MAPPING.DISPATCH_API_KEYS).toEqual({
        path: 'security.apiKeys',
        kind: 'list',
      });
    });
  });

  describe('parseEnvValue', () => {
    it('should parse numbers', () => {
      expect(parseEnvValue(' 42 ', 'number')).toBe(42);
      expect(parseEnvValue('1.5', 'number')).toBe(1.5);
      expect(parseEnvValue('abc', 'number')).toBeUndefined();
      expect(parseEnvValue('', 'number')).toBeUndefined();
    });

    it('should parse booleans', () => {
      expect(parseEnvValue('TRUE', 'boolean')).toBe(true);
      expect(parseEnvValue('1', 'boolean')).toBe(true);
      expect(parseEnvValue('false', 'boolean')).toBe(false);
      expect(parseEnvValue('0', 'boolean')).toBe(false);
      expect(parseEnvValue('yes', 'boolean')).toBeUndefined();
    });

    it('should split lists and drop empty items', () => {
      expect(parseEnvValue('a, b,,c ', 'list')).toEqual(['a', 'b', 'c']);
    });

    it('should keep strings as they are', () => {
      expect(parseEnvValue(' spaced ', 'string')).toBe(' spaced ');
    });
  });

  describe('applyEnvOverrides', () => {
    it('should return an equal copy when no env vars are set', () => {
      const config = { port: 3000, security: { apiKeys: [] } };
      const result = applyEnvOverrides(config, {});

      expect(result).toEqual(config);
      expect(result).not.toBe(config);
    });

    it('should set nested values without mutating the input', () => {
      const config = { rateLimit: { ip: { maxRequests: 100, windowSeconds: 60 } } };

      const result = applyEnvOverrides(config, { DISPATCH_RATE_LIMIT_IP_MAX: '5' });

      expect(result).toEqual({ rateLimit: { ip: { maxRequests: 5, windowSeconds: 60 } } });
      expect(config.rateLimit.ip.maxRequests).toBe(100);
    });

    it('should create missing sections', () => {
      const result = applyEnvOverrides({}, { DISPATCH_MODEL_BACKEND_URL: 'http://models.test' });

      expect(result).toEqual({ modelBackend: { url: 'http://models.test' } });
    });

    it('should skip values that do not parse and warn', () => {
      const result = applyEnvOverrides({ port: 3000 }, { DISPATCH_PORT: 'eighty' });

      expect(result).toEqual({ port: 3000 });
      expect(logger.warn).toHaveBeenCalledWith('Ignoring DISPATCH_PORT: expected a number', {
        value: 'eighty',
      });
    });

    it('should ignore variables outside the mapping', () => {
      const result = applyEnvOverrides({ port: 3000 }, { PORT: '4000' });

      expect(result).toEqual({ port: 3000 });
      expect(logger.info).not.toHaveBeenCalled();
    });
  });
});
