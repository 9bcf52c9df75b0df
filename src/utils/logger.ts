/**
 * Structured JSON Logger
 *
 * Every line is a single JSON object:
 * - timestamp: ISO 8601 format
 * - level: debug | info | warn | error
 * - event: event name for filtering
 *
 * Lines below the active level are dropped. The level starts at `info` and is
 * set once at startup from LOG_LEVEL or `logging.level` in config.yaml.
 */

import type { BridgeError } from './errors.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  channelId?: string;
  duration?: number;
  [key: string]: unknown;
}

type LogData = Omit<LogEntry, 'timestamp' | 'level'>;

/**
 * Extended log entry for BridgeError logging.
 */
export interface BridgeErrorLogEntry extends LogData {
  errorCode: string;
  errorMessage: string;
  recoverable: boolean;
  stack?: string;
  metadata?: Record<string, unknown>;
}

let activeLevel: LogLevel = 'info';

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

export function setLogLevel(level: LogLevel): void {
  activeLevel = level;
}

export function getLogLevel(): LogLevel {
  return activeLevel;
}

function enabled(level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(activeLevel);
}

function formatLog(level: LogLevel, data: LogData): string {
  return JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    ...data,
  });
}

export const logger = {
  debug: (data: LogData): void => {
    if (enabled('debug')) console.debug(formatLog('debug', data));
  },
  info: (data: LogData): void => {
    if (enabled('info')) console.log(formatLog('info', data));
  },
  warn: (data: LogData): void => {
    if (enabled('warn')) console.warn(formatLog('warn', data));
  },
  error: (data: LogData): void => {
    if (enabled('error')) console.error(formatLog('error', data));
  },

  /**
   * Log a BridgeError with its code, recoverability and the stack of the
   * underlying cause (or of the error itself when there is no cause).
   */
  bridgeError: (bridgeError: BridgeError, context: LogData): void => {
    const logData: BridgeErrorLogEntry = {
      ...context,
      errorCode: bridgeError.code,
      errorMessage: bridgeError.message,
      recoverable: bridgeError.recoverable,
      stack: bridgeError.cause?.stack ?? bridgeError.stack,
      metadata: bridgeError.metadata,
    };
    if (enabled('error')) console.error(formatLog('error', logData));
  },
};
