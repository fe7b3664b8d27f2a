/**
 * Structured logging utility
 */

import type { LogLevel } from './types.js';

export type { LogLevel };

export type LogSink = (level: LogLevel, line: string) => void;

const LOG_LEVELS: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

const MAX_DATA_LENGTH = 500;

// WARN and ERROR go to stderr
const consoleSink: LogSink = (level, line) => {
  if (level === 'WARN' || level === 'ERROR') {
    console.error(line);
  } else {
    console.log(line);
  }
};

let currentLogLevel: LogLevel = 'INFO';
let currentSink: LogSink = consoleSink;

export function setLogLevel(level: LogLevel): void {
  currentLogLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLogLevel;
}

/**
 * Replace the output sink. Passing nothing restores console output.
 */
export function setLogSink(sink?: LogSink): void {
  currentSink = sink ?? consoleSink;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[currentLogLevel];
}

function formatData(data: Record<string, unknown>): string {
  try {
    // Mask sensitive data
    const str = JSON.stringify(maskSensitiveData(data));
    return str.length > MAX_DATA_LENGTH ? str.slice(0, MAX_DATA_LENGTH) + '...' : str;
  } catch {
    return String(data);
  }
}

const SENSITIVE_KEYS = ['password', 'secret', 'token', 'authorization', 'apikey'];

function maskSensitiveData(data: unknown): unknown {
  if (Array.isArray(data)) return data.map(maskSensitiveData);
  if (typeof data !== 'object' || data === null) return data;

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    if (SENSITIVE_KEYS.some((k) => key.toLowerCase().includes(k))) {
      result[key] = '[MASKED]';
    } else {
      result[key] = maskSensitiveData(value);
    }
  }

  return result;
}

export function log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
  if (!shouldLog(level)) return;

  const timestamp = new Date().toISOString();
  const dataStr = data ? ` ${formatData(data)}` : '';
  currentSink(level, `[${timestamp}] [${level}] ${message}${dataStr}`);
}

export function debug(message: string, data?: Record<string, unknown>): void {
  log('DEBUG', message, data);
}

export function info(message: string, data?: Record<string, unknown>): void {
  log('INFO', message, data);
}

export function warn(message: string, data?: Record<string, unknown>): void {
  log('WARN', message, data);
}

export function error(message: string, data?: Record<string, unknown>): void {
  log('ERROR', message, data);
}

export const logger = {
  debug,
  info,
  warn,
  error,
  setLogLevel,
  getLogLevel,
  setLogSink,
};

export default logger;
