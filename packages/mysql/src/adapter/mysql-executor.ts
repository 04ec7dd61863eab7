/**
 * MySQL Executor
 *
 * Runs statements bound by the MySQL dialect on a mysql2 connection pool.
 * Statements go through `query` rather than `execute` so that an array bound
 * to `IN (?)` expands into a value list.
 *
 * @example
 * ```typescript
 * const executor = new MySQLExecutor({
 *   host: 'localhost',
 *   database: 'shop',
 *   user: 'app',
 *   password: 'test-secret',
 * });
 * await executor.connect();
 *
 * const users = createTable<User>({ schema, dialect: 'mysql', executor });
 * ```
 */

import {
  CONNECTION_DEFAULTS,
  POOL_DEFAULTS,
  TransactionError,
  consoleLogger,
  toError,
  validateConnectionConfig,
} from '@keyql/core';

import { MySQLTransaction } from './mysql-transaction';
import { throwIfAborted } from './statement';
import { MySQLConnectionPool } from '../pool/connection-pool';
import { toFieldInfo } from '../utils/mysql-types';

import type {
  ConnectionConfig,
  ExecuteResult,
  Logger,
  PoolStats,
  QueryResult,
  Row,
  StatementOptions,
  TransactionalExecutor,
  TransactionOptions,
} from '@keyql/core';
import type { PoolOptions, ResultSetHeader, RowDataPacket } from 'mysql2/promise';

export interface MySQLExecutorOptions extends ConnectionConfig {
  logger?: Logger;
  /** Passed to mysql2's createPool last, overriding the mapped settings */
  mysql2Options?: PoolOptions;
  /** Return DECIMAL and safe BIGINT values as numbers; defaults to true */
  parseTypes?: boolean;
}

export class MySQLExecutor implements TransactionalExecutor {
  private readonly pool: MySQLConnectionPool;
  private readonly logger: Logger;

  constructor(private readonly options: MySQLExecutorOptions) {
    validateConnectionConfig(options);
    this.logger = options.logger ?? consoleLogger;
    this.pool = new MySQLConnectionPool(toPoolOptions(options), this.logger);
  }

  async connect(): Promise<void> {
    await this.pool.initialize();
    this.logger.info('Connected to MySQL database', { database: this.options.database });
  }

  async close(): Promise<void> {
    if (this.pool.isInitialized) {
      await this.pool.end();
      this.logger.info('Disconnected from MySQL database');
    }
  }

  async query<T = Row>(sql: string, values: unknown[], options: StatementOptions = {}): Promise<QueryResult<T>> {
    throwIfAborted(options.signal);

    const [rows, fields] = await this.pool.query<Array<T & RowDataPacket>>(sql, values);
    return {
      rows,
      rowCount: rows.length,
      fields: fields.map(toFieldInfo),
      command: 'SELECT',
    };
  }

  async execute(sql: string, values: unknown[], options: StatementOptions = {}): Promise<ExecuteResult> {
    throwIfAborted(options.signal);

    const [header] = await this.pool.query<ResultSetHeader>(sql, values);
    return { affectedRows: header.affectedRows, insertId: header.insertId, changedRows: header.changedRows };
  }

  async beginTransaction(options?: TransactionOptions): Promise<MySQLTransaction> {
    const connection = await this.pool.getConnection();
    const transaction = new MySQLTransaction(connection, options);

    try {
      await transaction.begin();
    } catch (error) {
      connection.release();
      throw error instanceof TransactionError
        ? error
        : new TransactionError('Failed to begin transaction', transaction.id, toError(error));
    }

    this.logger.debug('Transaction started', { id: transaction.id });
    return transaction;
  }

  async ping(): Promise<boolean> {
    try {
      const connection = await this.pool.getConnection();
      try {
        await connection.ping();
        return true;
      } finally {
        connection.release();
      }
    } catch (error) {
      this.logger.warn('MySQL ping failed', { error });
      return false;
    }
  }

  getPoolStats(): PoolStats {
    return this.pool.getStats();
  }
}

function toPoolOptions(options: MySQLExecutorOptions): PoolOptions {
  const config: PoolOptions = {
    host: options.host,
    port: options.port ?? CONNECTION_DEFAULTS.MYSQL_PORT,
    user: options.user,
    password: options.password,
    database: options.database,

    connectionLimit: options.pool?.max ?? POOL_DEFAULTS.max,
    waitForConnections: true,
    queueLimit: options.pool?.queueLimit ?? POOL_DEFAULTS.queueLimit,
    connectTimeout: options.connectionTimeout ?? CONNECTION_DEFAULTS.CONNECTION_TIMEOUT,
    idleTimeout: options.pool?.idleTimeout ?? options.idleTimeout ?? POOL_DEFAULTS.idleTimeout,
    enableKeepAlive: true,
    keepAliveInitialDelay: 10_000,
  };

  if (options.connectionString) {
    config.uri = options.connectionString;
  }

  if (options.ssl) {
    config.ssl = options.ssl === true ? {} : options.ssl;
  }

  if (options.parseTypes ?? true) {
    config.supportBigNumbers = true;
    config.bigNumberStrings = false;
    config.decimalNumbers = true;
  }

  return { ...config, ...options.mysql2Options };
}
