/**
 * Structured logging utilities for dynaquery operations
 */

import { DynaQueryError } from '../error/error.js';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'trace'];

export interface Logger {
  error(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  trace(message: string, context?: Record<string, unknown>): void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

/**
 * Returns true if the value names a known log level
 */
export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_PRIORITY;
}

/**
 * Console-based logger with structured output
 */
export class ConsoleLogger implements Logger {
  private minLevel: LogLevel;

  constructor(minLevel: LogLevel = 'info') {
    this.minLevel = minLevel;
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log('trace', message, context);
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.minLevel]) {
      return;
    }

    const timestamp = new Date().toISOString();
    const contextStr = context ? ` ${JSON.stringify(context)}` : '';

    const logMessage = `[${timestamp}] [${level.toUpperCase()}] ${message}${contextStr}`;

    switch (level) {
      case 'error':
        console.error(logMessage);
        break;
      case 'warn':
        console.warn(logMessage);
        break;
      case 'debug':
      case 'trace':
        console.debug(logMessage);
        break;
      default:
        console.log(logMessage);
    }
  }
}

/**
 * No-op logger for environments where logging is disabled
 */
export class NoopLogger implements Logger {
  error(_message: string, _context?: Record<string, unknown>): void {
    // No-op
  }

  warn(_message: string, _context?: Record<string, unknown>): void {
    // No-op
  }

  info(_message: string, _context?: Record<string, unknown>): void {
    // No-op
  }

  debug(_message: string, _context?: Record<string, unknown>): void {
    // No-op
  }

  trace(_message: string, _context?: Record<string, unknown>): void {
    // No-op
  }
}

/**
 * Store operations a table dispatches to
 */
export type DispatchOperation = 'Get' | 'BatchGet' | 'Query' | 'Scan' | 'Put' | 'Delete' | 'Update' | 'BatchWrite';

/**
 * Request shape recorded alongside a dispatch
 */
export interface DispatchDetails {
  /** The write carries a guard condition */
  guarded?: boolean;
  /** The query or scan carries a filter */
  filtered?: boolean;
  keys?: number;
  puts?: number;
  deletes?: number;
  updates?: number;
}

/**
 * Logs which store operation a table call resolved to
 */
export function logDispatch(
  logger: Logger,
  operation: DispatchOperation,
  tableName: string,
  details: DispatchDetails = {}
): void {
  logger.debug(`Dispatching ${operation} on ${tableName}`, {
    operation,
    tableName,
    ...details,
  });
}

/**
 * Request id the AWS SDK attaches to a service error, if any
 */
function sdkRequestId(error: Error): string | undefined {
  if (!('$metadata' in error) || typeof error.$metadata !== 'object' || error.$metadata === null) {
    return undefined;
  }
  const metadata = error.$metadata;
  return 'requestId' in metadata && typeof metadata.requestId === 'string' ? metadata.requestId : undefined;
}

/**
 * Logs a failed store call with the table it targeted
 */
export function logError(logger: Logger, operation: string, tableName: string, error: Error): void {
  logger.error(`${operation} on ${tableName} failed`, {
    operation,
    tableName,
    errorName: error.name,
    errorMessage: error.message,
    code: error instanceof DynaQueryError ? error.code : undefined,
    requestId: sdkRequestId(error),
  });
}
