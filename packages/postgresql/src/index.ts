export { PostgreSQLExecutor } from './adapter/postgresql-executor';
export type { PostgreSQLExecutorOptions } from './adapter/postgresql-executor';
export { PostgreSQLTransaction } from './adapter/postgresql-transaction';
export { PostgreSQLConnectionPool } from './pool/connection-pool';
export { configureTypeParsers, parseBigInt } from './utils/pg-types';

// Re-export core types
export type {
  ConnectionConfig,
  ExecuteResult,
  QueryExecutor,
  QueryResult,
  Transaction,
  TransactionOptions,
} from '@keyql/core';
