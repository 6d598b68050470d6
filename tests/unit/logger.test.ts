/**
 * logger.test.ts
 * Tests for logger utility
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { logger } from '../../src/utils/logger.js';

describe('Logger', () => {
  let consoleLogSpy: MockInstance<typeof console.log>;
  let consoleWarnSpy: MockInstance<typeof console.warn>;
  let consoleErrorSpy: MockInstance<typeof console.error>;
  const originalLogLevel = process.env.LOG_LEVEL;

  beforeEach(() => {
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    consoleWarnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    logger.clearLogs();
    process.env.LOG_LEVEL = 'info';
  });

  afterEach(() => {
    vi.restoreAllMocks();
    delete process.env.DEBUG;
    if (originalLogLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = originalLogLevel;
    }
    logger.clearLogs();
  });

  describe('info', () => {
    it('should log info message without meta', () => {
      logger.info('Test message');
      expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining('INFO: Test message'));
    });

    it('should log info message with meta', () => {
      const meta = { key: 'value' };
      logger.info('Test message', meta);
      expect(consoleLogSpy).toHaveBeenCalledWith(
        expect.stringContaining('INFO: Test message'),
        meta
      );
    });

    it('should store log entry', () => {
      logger.info('Test message');
      const logs = logger.getLogs();
      expect(logs).toHaveLength(1);
      expect(logs[0]).toMatchObject({
        level: 'info',
        message: 'Test message',
      });
      expect(Number.isNaN(Date.parse(logs[0].timestamp))).toBe(false);
    });

    it('should not log if level is below LOG_LEVEL', () => {
      process.env.LOG_LEVEL = 'warn';
      logger.info('Test message');
      expect(consoleLogSpy).not.toHaveBeenCalled();
      expect(logger.getLogs()).toHaveLength(0);
    });
  });

  describe('warn', () => {
    it('should log warn message with meta', () => {
      const meta = { error: 'details' };
      logger.warn('Test warning', meta);
      expect(consoleWarnSpy).toHaveBeenCalledWith(
        expect.stringContaining('WARN: Test warning'),
        meta
      );
    });
  });

  describe('error', () => {
    it('should always log errors', () => {
      process.env.LOG_LEVEL = 'error';
      logger.error('Test error');
      expect(consoleErrorSpy).toHaveBeenCalledWith(expect.stringContaining('ERROR: Test error'));
      expect(logger.getLogs()[0]).toMatchObject({ level: 'error', message: 'Test error' });
    });
  });

  describe('debug', () => {
    it('should not log debug at info level', () => {
      logger.debug('Debug message');
      expect(consoleLogSpy).not.toHaveBeenCalled();
      expect(logger.getLogs()).toHaveLength(0);
    });

    it('should log debug when DEBUG=true regardless of level', () => {
      process.env.DEBUG = 'true';
      const meta = { data: 'debug info' };
      logger.debug('Debug message', meta);
      expect(consoleLogSpy).toHaveBeenCalledWith(
        expect.stringContaining('DEBUG: Debug message'),
        meta
      );
    });
  });

  describe('setLevel', () => {
    it('should apply the configured level when LOG_LEVEL is unset', () => {
      delete process.env.LOG_LEVEL;
      logger.setLevel('error');
      logger.warn('quiet');
      expect(consoleWarnSpy).not.toHaveBeenCalled();

      logger.setLevel('info');
      logger.warn('loud');
      expect(consoleWarnSpy).toHaveBeenCalledTimes(1);
    });

    it('should let LOG_LEVEL win over the configured level', () => {
      process.env.LOG_LEVEL = 'debug';
      logger.setLevel('error');
      logger.debug('still shown');
      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
      logger.setLevel('info');
    });

    it('should ignore an unknown LOG_LEVEL value', () => {
      process.env.LOG_LEVEL = 'toString';
      logger.setLevel('info');
      logger.debug('hidden');
      logger.info('shown');
      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
    });
  });

  describe('getLogs', () => {
    it('should return all logs in order', () => {
      logger.info('Info 1');
      logger.warn('Warn 1');
      logger.error('Error 1');
      expect(logger.getLogs().map(l => l.level)).toEqual(['info', 'warn', 'error']);
    });

    it('should return last N logs when limit is specified', () => {
      for (let i = 0; i < 5; i++) {
        logger.info(`Message ${i}`);
      }
      const logs = logger.getLogs(3);
      expect(logs.map(l => l.message)).toEqual(['Message 2', 'Message 3', 'Message 4']);
    });

    it('should return a copy of the buffer', () => {
      logger.info('Test');
      logger.getLogs().pop();
      expect(logger.getLogs()).toHaveLength(1);
    });
  });

  describe('clearLogs', () => {
    it('should clear all logs', () => {
      logger.info('Test');
      logger.clearLogs();
      expect(logger.getLogs()).toHaveLength(0);
    });
  });
});
