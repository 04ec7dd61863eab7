/**
 * SQL Dialect Abstraction Layer
 *
 * Renders statement trees per database and reports what each database can do.
 *
 * @module dialect
 */

export {
  SQLDialect,
  RenderState,
  type DialectConfig,
  type DialectCapabilities,
  type RenderedQuery,
  type BoundStatement,
  type ParamMapper,
} from './sql-dialect';
export { MySQLDialect } from './mysql-dialect';
export { PostgreSQLDialect } from './postgresql-dialect';
export { resolveDialect, type DialectDatabaseType } from './resolve-dialect';
