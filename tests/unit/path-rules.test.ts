/**
 * path-rules.test.ts
 * Tests for include/exclude path matching
 */

import { describe, it, expect } from 'vitest';

import { isExcludedPath, isIncludedPath } from '../../src/utils/path-rules.js';

describe('path-rules', () => {
  const rules = {
    includePaths: ['/api/health'],
    includePrefixes: ['/api/inference/'],
    excludePaths: ['/api/inference/private'],
    excludePrefixes: ['/api/tasks'],
  };

  it('should match exact paths and prefixes', () => {
    expect(isExcludedPath('/api/tasks/123', rules)).toBe(true);
    expect(isExcludedPath('/api/inference/private', rules)).toBe(true);
    expect(isExcludedPath('/api/health', rules)).toBe(false);
  });

  it('should include listed paths and prefixes', () => {
    expect(isIncludedPath('/api/health', rules)).toBe(true);
    expect(isIncludedPath('/api/inference/models', rules)).toBe(true);
    expect(isIncludedPath('/api/failover/health', rules)).toBe(false);
  });

  it('should let exclusions win over inclusions', () => {
    expect(isIncludedPath('/api/inference/private', rules)).toBe(false);
  });

  it('should include nothing without include rules', () => {
    expect(isIncludedPath('/api/health', { excludePaths: [], excludePrefixes: [] })).toBe(false);
  });
});
