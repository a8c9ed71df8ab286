/**
 * Logging utilities
 *
 * Lines look like `[2024-05-01T10:00:00.000Z] [INFO] message {"key":"value"}`.
 * Written to stderr, or appended to a log file when one is set.
 */
import fs from 'fs';
import path from 'path';
import type { LogLevel } from './types/config.js';

export interface ScopedLogger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

let _logFile: string | null = null;
let _level: LogLevel = 'info';
let _sink: ((line: string) => void) | null = null;

/**
 * Set log file path. `{date}` is replaced by the current YYYY-MM-DD.
 * Pass null (or '') to log to stderr.
 */
export function setLogFile(logPath: string | null): void {
  if (!logPath) {
    _logFile = null;
    return;
  }
  _logFile = resolveLogPath(logPath, new Date());
  fs.mkdirSync(path.dirname(_logFile), { recursive: true });
}

export function resolveLogPath(template: string, now: Date): string {
  return template.replace('{date}', now.toISOString().slice(0, 10));
}

export function setLogLevel(level: LogLevel): void {
  _level = level;
}

/**
 * Redirect output (tests). Pass null to restore stderr/file output.
 */
export function setLogSink(sink: ((line: string) => void) | null): void {
  _sink = sink;
}

export function formatLogLine(level: LogLevel, message: string, context?: Record<string, unknown>, now = new Date()): string {
  const ctx = context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '';
  return `[${now.toISOString()}] [${level.toUpperCase()}] ${message}${ctx}`;
}

export function log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[_level]) return;
  const line = formatLogLine(level, message, context);

  if (_sink) {
    _sink(line);
  } else if (_logFile) {
    fs.appendFileSync(_logFile, line + '\n');
  } else {
    process.stderr.write(line + '\n');
  }
}

export const logDebug = (message: string, context?: Record<string, unknown>) => log('debug', message, context);
export const logInfo = (message: string, context?: Record<string, unknown>) => log('info', message, context);
export const logWarn = (message: string, context?: Record<string, unknown>) => log('warn', message, context);
export const logError = (message: string, context?: Record<string, unknown>) => log('error', message, context);

/**
 * Logger that prefixes every message with `[prefix]: `
 */
export function scopedLogger(prefix: string): ScopedLogger {
  const tag = (message: string) => `[${prefix}]: ${message}`;
  return {
    debug: (message, context) => log('debug', tag(message), context),
    info: (message, context) => log('info', tag(message), context),
    warn: (message, context) => log('warn', tag(message), context),
    error: (message, context) => log('error', tag(message), context)
  };
}
