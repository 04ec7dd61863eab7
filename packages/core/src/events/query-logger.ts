/**
 * Subscribe a logger to a table's query events: starts at debug, completions
 * at the configured level, slow completions at warn, failures at error.
 *
 * @example
 * ```typescript
 * const detach = attachQueryLogger(users.events, { logLevel: 'info', slowQueryThreshold: 500 });
 * // later
 * detach();
 * ```
 */

import { EXECUTION_DEFAULTS } from '../constants';
import { consoleLogger, truncateSql } from '../middleware/logging-middleware';

import type { QueryCompletedEvent, QueryEvents, QueryFailedEvent, QueryStartedEvent } from './query-events';
import type { LoggingMiddlewareOptions } from '../middleware/types';

export type QueryLoggerOptions = Omit<LoggingMiddlewareOptions, 'logParams'>;

export function attachQueryLogger(events: QueryEvents, options: QueryLoggerOptions = {}): () => void {
  const {
    logger = consoleLogger,
    logLevel = 'debug',
    slowQueryThreshold = EXECUTION_DEFAULTS.slowQueryThreshold,
    maxSqlLength = EXECUTION_DEFAULTS.maxSqlLength,
  } = options;

  const onStarted = (event: QueryStartedEvent): void => {
    logger.debug(`${event.operation} on ${event.table} started: ${truncateSql(event.sql, maxSqlLength)}`);
  };

  const onCompleted = (event: QueryCompletedEvent): void => {
    if (event.durationMs >= slowQueryThreshold) {
      logger.warn(`Slow ${event.operation} on ${event.table} (${event.durationMs}ms)`, {
        sql: truncateSql(event.sql, maxSqlLength),
      });
    }
    logger[logLevel](`${event.operation} on ${event.table} completed in ${event.durationMs}ms`, describe(event));
  };

  const onFailed = (event: QueryFailedEvent): void => {
    logger.error(`${event.operation} on ${event.table} failed after ${event.durationMs}ms: ${event.error}`, {
      sql: truncateSql(event.sql, maxSqlLength),
    });
  };

  events.on('query:started', onStarted);
  events.on('query:completed', onCompleted);
  events.on('query:failed', onFailed);

  return () => {
    events.off('query:started', onStarted);
    events.off('query:completed', onCompleted);
    events.off('query:failed', onFailed);
  };
}

function describe(event: QueryCompletedEvent): Record<string, number | string> {
  const details: Record<string, number | string> = {};
  if (event.field !== undefined) {
    details['field'] = event.field;
  }
  if (event.rowsReturned !== undefined) {
    details['rowsReturned'] = event.rowsReturned;
  }
  if (event.rowsAffected !== undefined) {
    details['rowsAffected'] = event.rowsAffected;
  }
  if (event.resultValue !== undefined) {
    details['resultValue'] = event.resultValue;
  }
  return details;
}
