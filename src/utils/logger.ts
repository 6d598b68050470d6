/**
 * logger.ts
 * Console + ring buffer + optional JSON-lines file logger
 */

import { appendFileSync, mkdirSync } from 'fs';

import { safeJsonStringify } from './json-utils.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  meta?: unknown;
}

const MAX_LOG_ENTRIES = parseInt(process.env.MAX_LOG_ENTRIES ?? '1000', 10);
const LOG_DIR = process.env.LOG_DIR ?? './logs';
const logBuffer: LogEntry[] = [];

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let configuredLevel: LogLevel | undefined;

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVELS, value);
}

function getLogLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL;
  if (fromEnv && isLogLevel(fromEnv)) {
    return fromEnv;
  }
  return configuredLevel ?? 'info';
}

function shouldLog(level: LogLevel): boolean {
  if (level === 'debug' && process.env.DEBUG === 'true') {
    return true;
  }
  return LOG_LEVELS[level] >= LOG_LEVELS[getLogLevel()];
}

function addToBuffer(entry: LogEntry): void {
  logBuffer.push(entry);
  if (logBuffer.length > MAX_LOG_ENTRIES) {
    logBuffer.shift();
  }
}

function getCurrentLogFile(): string {
  const dateStr = new Date().toISOString().split('T')[0]; // YYYY-MM-DD
  return `${LOG_DIR}/dispatch-${dateStr}.log`;
}

function writeToFile(entry: LogEntry): void {
  if (process.env.DISABLE_FILE_LOGGING === 'true') {
    return;
  }
  const line = safeJsonStringify(entry) ?? safeJsonStringify({ ...entry, meta: '[unserializable]' });
  if (line === undefined) {
    return;
  }
  try {
    mkdirSync(LOG_DIR, { recursive: true });
    appendFileSync(getCurrentLogFile(), line + '\n');
  } catch (err) {
    console.error('Failed to write to log file:', err);
  }
}

function logToConsole(entry: LogEntry): void {
  const prefix = `[${entry.timestamp}] ${entry.level.toUpperCase()}: ${entry.message}`;
  const args: unknown[] = entry.meta === undefined ? [prefix] : [prefix, entry.meta];
  switch (entry.level) {
    case 'error':
      console.error(...args);
      break;
    case 'warn':
      console.warn(...args);
      break;
    default:
      // eslint-disable-next-line no-console
      console.log(...args);
  }
}

function log(level: LogLevel, message: string, meta?: unknown): void {
  if (!shouldLog(level)) {
    return;
  }
  const entry: LogEntry = { timestamp: new Date().toISOString(), level, message, meta };
  addToBuffer(entry);
  writeToFile(entry);
  logToConsole(entry);
}

export const logger = {
  debug: (message: string, meta?: unknown): void => log('debug', message, meta),
  info: (message: string, meta?: unknown): void => log('info', message, meta),
  warn: (message: string, meta?: unknown): void => log('warn', message, meta),
  error: (message: string, meta?: unknown): void => log('error', message, meta),

  /**
   * Level from configuration; LOG_LEVEL in the environment still wins.
   */
  setLevel: (level: LogLevel): void => {
    configuredLevel = level;
  },

  getLogs: (limit?: number): LogEntry[] => {
    if (limit) {
      return logBuffer.slice(-limit);
    }
    return [...logBuffer];
  },

  clearLogs: (): void => {
    logBuffer.length = 0;
  },
};
