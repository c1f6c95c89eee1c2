/**
 * Multifeed — Logger
 *
 * Structured logging utility.
 * JSON lines in production, one readable line per entry otherwise.
 */

import { LogLevelSchema } from './config';
import type { LogLevel } from './config';

export interface LogContext {
  [key: string]: unknown;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(defaultContext: LogContext): Logger;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// Unrecognised LOG_LEVEL values fall back to 'info'
let currentLevel: LogLevel = LogLevelSchema.catch('info').parse(process.env.LOG_LEVEL);

/**
 * Override the level read from LOG_LEVEL at startup.
 */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel];
}

export function formatEntry(entry: LogEntry, production = process.env.NODE_ENV === 'production'): string {
  if (production) {
    return JSON.stringify(entry);
  }

  const { timestamp, level, message, context } = entry;
  const levelStr = level.toUpperCase().padEnd(5);
  const time = timestamp.split('T')[1]?.split('.')[0] ?? timestamp;

  let output = `${time} ${levelStr} ${message}`;

  if (context && Object.keys(context).length > 0) {
    output += ` ${JSON.stringify(context)}`;
  }

  return output;
}

function log(level: LogLevel, message: string, context?: LogContext): void {
  if (!shouldLog(level)) return;

  const formatted = formatEntry({
    timestamp: new Date().toISOString(),
    level,
    message,
    context,
  });

  switch (level) {
    case 'error':
      console.error(formatted);
      break;
    case 'warn':
      console.warn(formatted);
      break;
    default:
      console.log(formatted);
  }
}

function createLogger(defaultContext?: LogContext): Logger {
  const withDefaults = (context?: LogContext): LogContext | undefined =>
    defaultContext ? { ...defaultContext, ...context } : context;

  return {
    debug: (message, context) => log('debug', message, withDefaults(context)),
    info: (message, context) => log('info', message, withDefaults(context)),
    warn: (message, context) => log('warn', message, withDefaults(context)),
    error: (message, context) => log('error', message, withDefaults(context)),
    child: (childContext) => createLogger({ ...defaultContext, ...childContext }),
  };
}

export const logger: Logger = createLogger();

export interface Timed<T> {
  value: T;
  durationMs: number;
}

/**
 * Run an async operation and log how long it took at debug level.
 * Failures are logged with their duration and rethrown.
 */
export async function timeOperation<T>(
  name: string,
  operation: () => Promise<T>,
  log: Logger = logger
): Promise<Timed<T>> {
  const start = performance.now();

  try {
    const value = await operation();
    const durationMs = performance.now() - start;
    log.debug(`${name} completed`, { durationMs: Math.round(durationMs) });
    return { value, durationMs };
  } catch (error) {
    log.debug(`${name} failed`, { durationMs: Math.round(performance.now() - start) });
    throw error;
  }
}
