export { MySQLExecutor } from './adapter/mysql-executor';
export type { MySQLExecutorOptions } from './adapter/mysql-executor';
export { MySQLTransaction } from './adapter/mysql-transaction';
export { MySQLConnectionPool } from './pool/connection-pool';
export { MYSQL_TYPE_MAP } from './utils/mysql-types';

export type {
  ConnectionConfig,
  ExecuteResult,
  QueryExecutor,
  QueryResult,
  Transaction,
  TransactionOptions,
} from '@keyql/core';
