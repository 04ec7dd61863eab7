/**
 * Logging Middleware
 *
 * Logs statement execution details for debugging and monitoring.
 * Supports configurable log levels and slow query detection.
 *
 * @example
 * ```typescript
 * const middleware = createLoggingMiddleware({
 *   logger: console,
 *   logLevel: 'debug',
 *   slowQueryThreshold: 1000, // Log slow queries > 1s
 * });
 * ```
 */

import { EXECUTION_DEFAULTS } from '../constants';
import { toError } from '../errors';
import { countRows } from './types';

import type { QueryMiddleware, LoggingMiddlewareOptions } from './types';
import type { Logger } from '../types';

/**
 * Default console logger
 */
/* eslint-disable no-console */
export const consoleLogger: Logger = {
  debug: (msg, ...args) => console.debug(`[keyql] ${msg}`, ...args),
  info: (msg, ...args) => console.info(`[keyql] ${msg}`, ...args),
  warn: (msg, ...args) => console.warn(`[keyql] ${msg}`, ...args),
  error: (msg, ...args) => console.error(`[keyql] ${msg}`, ...args),
};
/* eslint-enable no-console */

/**
 * Truncate long SQL for logging
 */
export function truncateSql(sql: string, maxLength: number = EXECUTION_DEFAULTS.maxSqlLength): string {
  if (sql.length <= maxLength) {
    return sql;
  }
  return `${sql.slice(0, maxLength)}...`;
}

/**
 * Format parameters for logging
 */
export function formatParams(params: unknown[], maxLength = 100): string {
  const str = JSON.stringify(params);
  if (str.length <= maxLength) {
    return str;
  }
  return `${str.slice(0, maxLength)}...`;
}

/**
 * Create a logging middleware with the given options
 */
export function createLoggingMiddleware(options: LoggingMiddlewareOptions = {}): QueryMiddleware {
  const {
    logger = consoleLogger,
    logLevel = 'debug',
    logParams = false,
    slowQueryThreshold = EXECUTION_DEFAULTS.slowQueryThreshold,
    maxSqlLength = EXECUTION_DEFAULTS.maxSqlLength,
  } = options;

  const log = (message: string, ...args: unknown[]): void => logger[logLevel](message, ...args);

  return async (context, next) => {
    const truncatedSql = truncateSql(context.sql, maxSqlLength);
    const startTime = Date.now();

    // Log statement start
    if (logParams) {
      log(`Executing ${context.operation} on ${context.table}: ${truncatedSql}`, formatParams(context.params));
    } else {
      log(`Executing ${context.operation} on ${context.table}: ${truncatedSql}`);
    }

    try {
      const result = await next(context);
      const duration = Date.now() - startTime;
      const rows = countRows(result.result);

      // Check for slow query
      if (duration >= slowQueryThreshold) {
        logger.warn(`Slow query detected (${duration}ms): ${truncatedSql}`, {
          duration,
          rowCount: rows,
        });
      }

      log(`${context.operation} completed in ${duration}ms (${rows} rows)`);

      return result;
    } catch (error) {
      const duration = Date.now() - startTime;
      logger.error(`${context.operation} failed after ${duration}ms: ${toError(error).message}`, {
        sql: truncatedSql,
        error,
      });
      throw error;
    }
  };
}
