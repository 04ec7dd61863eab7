/**
 * Middleware Types
 *
 * Type definitions for the statement middleware pattern.
 */

import type { ExecuteResult, Logger, QueryResult } from '../types';

export type StatementKind = 'query' | 'execute';

/**
 * Context passed through the middleware chain
 */
export interface QueryMiddlewareContext {
  sql: string;
  params: unknown[];
  kind: StatementKind;
  /** Logical operation, e.g. SELECT, UPDATE, COUNT */
  operation: string;
  table: string;
  timeout?: number;
  signal?: AbortSignal;
  startTime: number;
  metadata: Record<string, unknown>;
}

/**
 * Driver result for either statement kind
 */
export type StatementOutcome = QueryResult<unknown> | ExecuteResult;

/**
 * Result returned from middleware
 */
export interface QueryMiddlewareResult<R extends StatementOutcome = StatementOutcome> {
  result: R;
  duration?: number;
}

/**
 * Next function to call the next middleware in chain
 */
export type NextMiddleware<R extends StatementOutcome = StatementOutcome> = (
  context: QueryMiddlewareContext,
) => Promise<QueryMiddlewareResult<R>>;

/**
 * Middleware function signature. Middleware see both statement kinds, so they
 * are generic over the outcome they pass through.
 */
export type QueryMiddleware = <R extends StatementOutcome>(
  context: QueryMiddlewareContext,
  next: NextMiddleware<R>,
) => Promise<QueryMiddlewareResult<R>>;

/**
 * Timeout middleware specific options
 */
export interface TimeoutMiddlewareOptions {
  defaultTimeout?: number;
}

/**
 * Logging middleware specific options
 */
export interface LoggingMiddlewareOptions {
  logger?: Logger;
  logLevel?: 'debug' | 'info' | 'warn' | 'error';
  logParams?: boolean;
  slowQueryThreshold?: number;
  maxSqlLength?: number;
}

export function countRows(outcome: StatementOutcome): number {
  return 'rowCount' in outcome ? outcome.rowCount : outcome.affectedRows;
}
