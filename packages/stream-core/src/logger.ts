// ---------------------------------------------------------------------------
// Logging
// ---------------------------------------------------------------------------
// Level-filtered logger shared by the primitives. Hot paths never log; only
// construction-time decisions and rejected operations do.
// ---------------------------------------------------------------------------

import { readLogLevel } from './config.js';
import type { LogLevel } from './config.js';

export type { LogLevel } from './config.js';

const LOG_LEVELS = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  silent: 5,
} as const satisfies Record<LogLevel, number>;

export type EmittingLevel = Exclude<LogLevel, 'silent'>;

/** Receives every line that passes the level filter. */
export type LogSink = (level: EmittingLevel, line: string) => void;

export type LogFn = (message: string, context?: Record<string, unknown>) => void;

const consoleSink: LogSink = (level, line) => {
  const method = level === 'trace' ? 'debug' : level;
  console[method](line);
};

let currentLevel: LogLevel = readLogLevel();
let sink: LogSink = consoleSink;

/** Set the minimum level that is emitted. */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

/**
 * Redirect log output. Passing nothing restores console output.
 */
export function setLogSink(next?: LogSink): void {
  sink = next ?? consoleSink;
}

/** Render a context record; values JSON can't take (bigint, cycles) fall back to String. */
function formatContext(context: Record<string, unknown>): string {
  const parts = Object.entries(context).map(([key, value]) => {
    if (typeof value === 'bigint') return `${key}=${value}n`;
    if (typeof value === 'object' && value !== null) {
      try {
        return `${key}=${JSON.stringify(value)}`;
      } catch {
        return `${key}=${String(value)}`;
      }
    }
    return `${key}=${String(value)}`;
  });
  return parts.join(' ');
}

function createLogFn(level: EmittingLevel): LogFn {
  return (message, context) => {
    if (LOG_LEVELS[level] < LOG_LEVELS[currentLevel]) return;

    const suffix = context && Object.keys(context).length > 0 ? ` ${formatContext(context)}` : '';
    sink(level, `[${level.toUpperCase()}] ${message}${suffix}`);
  };
}

/**
 * Global logger instance providing methods for different log levels.
 */
export const logger = {
  trace: createLogFn('trace'),
  debug: createLogFn('debug'),
  info: createLogFn('info'),
  warn: createLogFn('warn'),
  error: createLogFn('error'),
};
