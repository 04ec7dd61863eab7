/**
 * Table Factory
 *
 * Main entry point: describe a table once, then create builders for it.
 * The schema is validated here, so a malformed definition fails at startup
 * rather than on the first query.
 *
 * @example
 * ```typescript
 * interface User {
 *   id: number;
 *   email: string;
 *   age: number | null;
 * }
 *
 * const users = createTable<User>({
 *   schema: {
 *     name: 'users',
 *     columns: {
 *       id: { type: 'integer', primary: true },
 *       email: { type: 'string', unique: true },
 *       age: { type: 'integer', nullable: true },
 *     },
 *   },
 *   dialect: 'postgresql',
 *   executor: new PostgreSQLExecutor({ connectionString: process.env.DATABASE_URL }),
 *   logging: { slowQueryThreshold: 500 },
 * });
 *
 * const adults = await users.query().where('age', '>=', 'min_age').exec({ min_age: 18 });
 * const user = await users.insert().exec({ email: 'ada@example.com', age: 36 });
 * await users.remove().where('id', '=', 'id').exec({ id: user.id });
 * ```
 */

import { resolveDialect } from '../dialect/resolve-dialect';
import { QueryEvents } from '../events';
import { consoleLogger, createLoggingMiddleware } from '../middleware/logging-middleware';
import { createTimeoutMiddleware } from '../middleware/timeout-middleware';
import { SchemaInstance } from '../schema';
import { AggregateBuilder } from './aggregate-builder';
import { CompoundBuilder } from './compound-builder';
import { DeleteBuilder } from './delete-builder';
import { InsertBuilder } from './insert-builder';
import { QueryBuilder } from './query-builder';
import { QueryContext } from './query-context';
import { SelectBuilder } from './select-builder';
import { UpdateBuilder } from './update-builder';

import type { AggregateKind } from './aggregate-builder';
import type {
  AggregateSpec,
  CompoundQuerySpec,
  CreateSpec,
  DeleteSpec,
  OrderBySpec,
  QuerySpec,
  SelectSpec,
  UpdateSpec,
} from './query-spec';
import type { DialectDatabaseType } from '../dialect/resolve-dialect';
import type { SQLDialect } from '../dialect/sql-dialect';
import type { LoggingMiddlewareOptions, QueryMiddleware } from '../middleware/types';
import type { TableSchema } from '../schema';
import type { Logger, QueryExecutor, Row } from '../types';

export interface TableOptions {
  schema: TableSchema;
  /** A dialect instance, or the database type to create one for */
  dialect: SQLDialect | DialectDatabaseType;
  executor: QueryExecutor;
  /** Shared event sink; one is created per table when omitted */
  events?: QueryEvents;
  /** Receives statement logs and event listener failures */
  logger?: Logger;
  /** Statement logging; off unless set */
  logging?: boolean | Omit<LoggingMiddlewareOptions, 'logger'>;
  /** Extra middleware, run inside logging and timeout */
  middleware?: QueryMiddleware[];
  /** Per-statement limit in ms when a call sets none; 0 disables */
  defaultTimeout?: number;
}

export interface Table<T = Row> {
  readonly name: string;
  readonly context: QueryContext;
  readonly events: QueryEvents;

  instance(): SchemaInstance;

  select(): SelectBuilder<T>;
  query(): QueryBuilder<T>;
  insert(): InsertBuilder<T>;
  modify(): UpdateBuilder<T>;
  remove(): DeleteBuilder;

  count(): AggregateBuilder;
  sum(field: string): AggregateBuilder;
  avg(field: string): AggregateBuilder;
  min(field: string): AggregateBuilder;
  max(field: string): AggregateBuilder;

  selectFromSpec(spec: SelectSpec): SelectBuilder<T>;
  queryFromSpec(spec: QuerySpec): QueryBuilder<T>;
  insertFromSpec(spec: CreateSpec): InsertBuilder<T>;
  modifyFromSpec(spec: UpdateSpec): UpdateBuilder<T>;
  removeFromSpec(spec: DeleteSpec): DeleteBuilder;
  countFromSpec(spec: AggregateSpec): AggregateBuilder;
  sumFromSpec(spec: AggregateSpec): AggregateBuilder;
  avgFromSpec(spec: AggregateSpec): AggregateBuilder;
  minFromSpec(spec: AggregateSpec): AggregateBuilder;
  maxFromSpec(spec: AggregateSpec): AggregateBuilder;
  compoundFromSpec(spec: CompoundQuerySpec): CompoundBuilder<T>;
}

/**
 * Create a table handle. Throws ValidationError for a malformed schema or
 * an unknown database type.
 */
export function createTable<T = Row>(options: TableOptions): Table<T> {
  const schema = new SchemaInstance(options.schema);
  const dialect =
    typeof options.dialect === 'string' ? resolveDialect(options.dialect) : options.dialect;
  const logger = options.logger ?? consoleLogger;
  const events = options.events ?? new QueryEvents(logger);

  const context = new QueryContext({
    schema,
    dialect,
    executor: options.executor,
    events,
    middleware: buildMiddleware(options, logger),
    defaultTimeout: options.defaultTimeout,
  });

  const aggregate = (func: AggregateKind, field?: string): AggregateBuilder =>
    new AggregateBuilder(context, func, field);

  const table: Table<T> = {
    name: schema.tableName,
    context,
    events,

    instance: () => schema,

    select: () => new SelectBuilder<T>(context),
    query: () => new QueryBuilder<T>(context),
    insert: () => new InsertBuilder<T>(context),
    modify: () => new UpdateBuilder<T>(context),
    remove: () => new DeleteBuilder(context),

    count: () => aggregate('COUNT'),
    sum: (field) => aggregate('SUM', field),
    avg: (field) => aggregate('AVG', field),
    min: (field) => aggregate('MIN', field),
    max: (field) => aggregate('MAX', field),

    selectFromSpec: (spec) => new SelectBuilder<T>(context).applySpec(spec),
    queryFromSpec: (spec) => new QueryBuilder<T>(context).applySpec(spec),
    insertFromSpec: (spec) => new InsertBuilder<T>(context).applySpec(spec),
    modifyFromSpec: (spec) => new UpdateBuilder<T>(context).applySpec(spec),
    removeFromSpec: (spec) => new DeleteBuilder(context).applySpec(spec),
    countFromSpec: (spec) => aggregate('COUNT').applySpec(spec),
    sumFromSpec: (spec) => aggregate('SUM', spec.field).applySpec(spec),
    avgFromSpec: (spec) => aggregate('AVG', spec.field).applySpec(spec),
    minFromSpec: (spec) => aggregate('MIN', spec.field).applySpec(spec),
    maxFromSpec: (spec) => aggregate('MAX', spec.field).applySpec(spec),

    compoundFromSpec: (spec) => {
      const base = new QueryBuilder<T>(context).applySpec(spec.base);
      const compound = CompoundBuilder.from<T>(context, base.operand());
      for (const operand of spec.operands) {
        compound.combine(operand.operation, new QueryBuilder<T>(context).applySpec(operand.query));
      }
      for (const order of spec.order_by ?? []) {
        applyCompoundOrder(compound, order);
      }
      if (spec.limit !== undefined) {
        compound.limit(spec.limit);
      }
      if (spec.offset !== undefined) {
        compound.offset(spec.offset);
      }
      return compound;
    },
  };

  return table;
}

/**
 * Logging (outermost, so it sees timeouts), then timeout, then caller middleware
 */
function buildMiddleware(options: TableOptions, logger: Logger): QueryMiddleware[] {
  const middleware: QueryMiddleware[] = [];

  if (options.logging) {
    const loggingOptions = options.logging === true ? {} : options.logging;
    middleware.push(createLoggingMiddleware({ ...loggingOptions, logger }));
  }

  middleware.push(createTimeoutMiddleware({ defaultTimeout: options.defaultTimeout }));
  return [...middleware, ...(options.middleware ?? [])];
}

function applyCompoundOrder<T>(compound: CompoundBuilder<T>, order: OrderBySpec): void {
  if (order.operator && order.param) {
    compound.orderByExpr(order.field, order.operator, order.param, order.direction);
  } else if (order.nulls) {
    compound.orderByNulls(order.field, order.direction, order.nulls);
  } else {
    compound.orderBy(order.field, order.direction);
  }
}
