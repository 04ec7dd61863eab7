/**
 * Query Context
 *
 * Shared context for all builders of one table containing:
 * - Table schema
 * - Database dialect
 * - Query executor
 * - Statement middleware and query events
 *
 * This separates execution concerns from query building. Every statement is
 * bound here, run through the middleware chain, and has driver failures
 * wrapped with the logical operation that issued it.
 */

import { EXECUTION_DEFAULTS } from '../constants';
import { CancellationError, QueryError, TimeoutError, toError } from '../errors';
import { runMiddleware } from '../middleware/pipeline';

import type { SQLDialect, BoundStatement } from '../dialect/sql-dialect';
import type { QueryEvents } from '../events';
import type {
  QueryMiddleware,
  QueryMiddlewareContext,
  StatementKind,
  StatementOutcome,
} from '../middleware/types';
import type { SchemaInstance } from '../schema';
import type { ExecOptions, ExecuteResult, Params, QueryExecutor, QueryResult } from '../types';

export interface QueryContextOptions {
  schema: SchemaInstance;
  dialect: SQLDialect;
  executor: QueryExecutor;
  events: QueryEvents;
  /** Outermost first */
  middleware?: readonly QueryMiddleware[];
  defaultTimeout?: number;
}

export class QueryContext {
  readonly schema: SchemaInstance;
  readonly dialect: SQLDialect;
  readonly executor: QueryExecutor;
  readonly events: QueryEvents;
  readonly middleware: readonly QueryMiddleware[];
  readonly defaultTimeout: number;

  constructor(options: QueryContextOptions) {
    this.schema = options.schema;
    this.dialect = options.dialect;
    this.executor = options.executor;
    this.events = options.events;
    this.middleware = options.middleware ?? [];
    this.defaultTimeout = options.defaultTimeout ?? EXECUTION_DEFAULTS.timeout;
  }

  get table(): string {
    return this.schema.tableName;
  }

  /**
   * Run a row-returning statement
   */
  async query<T>(
    operation: string,
    sql: string,
    params: Params,
    options: ExecOptions = {},
  ): Promise<QueryResult<T>> {
    const executor = options.tx ?? this.executor;
    return this.run(operation, 'query', this.dialect.bindParameters(sql, params), options, (ctx) =>
      executor.query<T>(ctx.sql, ctx.params, { signal: ctx.signal }),
    );
  }

  /**
   * Run a statement that reports affected rows
   */
  async execute(
    operation: string,
    sql: string,
    params: Params,
    options: ExecOptions = {},
  ): Promise<ExecuteResult> {
    const executor = options.tx ?? this.executor;
    return this.run(operation, 'execute', this.dialect.bindParameters(sql, params), options, (ctx) =>
      executor.execute(ctx.sql, ctx.params, { signal: ctx.signal }),
    );
  }

  private async run<R extends StatementOutcome>(
    operation: string,
    kind: StatementKind,
    bound: BoundStatement,
    options: ExecOptions,
    call: (context: QueryMiddlewareContext) => Promise<R>,
  ): Promise<R> {
    const context: QueryMiddlewareContext = {
      sql: bound.sql,
      params: bound.values,
      kind,
      operation,
      table: this.table,
      timeout: options.timeout ?? this.defaultTimeout,
      signal: options.signal,
      startTime: Date.now(),
      metadata: {},
    };

    try {
      const { result } = await runMiddleware(this.middleware, context, async (ctx) => ({
        result: await call(ctx),
      }));
      return result;
    } catch (error) {
      throw wrapExecutionError(operation, bound.sql, error);
    }
  }
}

/**
 * Wrap a driver failure with the logical operation that issued it.
 * Timeouts and cancellations pass through unchanged.
 */
export function wrapExecutionError(operation: string, sql: string, error: unknown): Error {
  if (error instanceof TimeoutError || error instanceof CancellationError) {
    return error;
  }
  const cause = toError(error);
  return new QueryError(`${operation} failed: ${cause.message}`, operation, sql, cause);
}
