/**
 * Account Store Observability
 *
 * Structured logging for account store operations.
 */

export type { Logger, LogLevel, LogContext } from './logging.js';
export { ConsoleLogger, NoopLogger, LOG_LEVELS, isLogLevel, logOperation, logError } from './logging.js';
