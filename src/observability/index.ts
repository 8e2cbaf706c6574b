/**
 * Observability
 *
 * Structured logging for dynaquery.
 */

export type { DispatchDetails, DispatchOperation, Logger, LogLevel } from './logging.js';
export {
  ConsoleLogger,
  NoopLogger,
  LOG_LEVELS,
  isLogLevel,
  logDispatch,
  logError,
} from './logging.js';
