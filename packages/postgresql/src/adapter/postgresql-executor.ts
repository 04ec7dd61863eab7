/**
 * PostgreSQL Executor
 *
 * Runs statements bound by the PostgreSQL dialect on a pg connection pool.
 * Driver errors propagate unchanged; the table context wraps them with the
 * operation that issued the statement.
 *
 * @example
 * ```typescript
 * const executor = new PostgreSQLExecutor({
 *   host: 'localhost',
 *   database: 'shop',
 *   user: 'app',
 *   password: 'test-secret',
 * });
 * await executor.connect();
 *
 * const users = createTable<User>({ schema, dialect: 'postgresql', executor });
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

import { PostgreSQLConnectionPool } from '../pool/connection-pool';
import { configureTypeParsers, toFieldInfo } from '../utils/pg-types';
import { PostgreSQLTransaction } from './postgresql-transaction';
import { throwIfAborted } from './statement';

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
import type { PoolConfig, QueryResultRow } from 'pg';

export interface PostgreSQLExecutorOptions extends ConnectionConfig {
  logger?: Logger;
  /** Passed to pg's Pool last, overriding the mapped settings */
  pgOptions?: PoolConfig;
  /** Register numeric type parsers; defaults to true */
  parseTypes?: boolean;
}

export class PostgreSQLExecutor implements TransactionalExecutor {
  private readonly pool: PostgreSQLConnectionPool;
  private readonly logger: Logger;

  constructor(private readonly options: PostgreSQLExecutorOptions) {
    validateConnectionConfig(options);
    this.logger = options.logger ?? consoleLogger;
    this.pool = new PostgreSQLConnectionPool(toPoolConfig(options), this.logger);

    if (options.parseTypes ?? true) {
      configureTypeParsers();
    }
  }

  async connect(): Promise<void> {
    await this.pool.initialize();
    this.logger.info('Connected to PostgreSQL database', { database: this.options.database });
  }

  async close(): Promise<void> {
    if (this.pool.isInitialized) {
      await this.pool.end();
      this.logger.info('Disconnected from PostgreSQL database');
    }
  }

  async query<T = Row>(sql: string, values: unknown[], options: StatementOptions = {}): Promise<QueryResult<T>> {
    throwIfAborted(options.signal);

    const result = await this.pool.query<T & QueryResultRow>(sql, values);
    return {
      rows: result.rows,
      rowCount: result.rowCount ?? 0,
      fields: result.fields.map(toFieldInfo),
      command: result.command,
    };
  }

  async execute(sql: string, values: unknown[], options: StatementOptions = {}): Promise<ExecuteResult> {
    throwIfAborted(options.signal);

    const result = await this.pool.query(sql, values);
    return { affectedRows: result.rowCount ?? 0 };
  }

  /**
   * Check out a client and open a transaction on it. The client goes back
   * to the pool on commit or rollback.
   */
  async beginTransaction(options?: TransactionOptions): Promise<PostgreSQLTransaction> {
    const client = await this.pool.getClient();
    const transaction = new PostgreSQLTransaction(client, options);

    try {
      await transaction.begin();
    } catch (error) {
      client.release();
      throw error instanceof TransactionError
        ? error
        : new TransactionError('Failed to begin transaction', transaction.id, toError(error));
    }

    this.logger.debug('Transaction started', { id: transaction.id });
    return transaction;
  }

  async ping(): Promise<boolean> {
    try {
      await this.pool.query('SELECT 1', []);
      return true;
    } catch (error) {
      this.logger.warn('PostgreSQL ping failed', { error });
      return false;
    }
  }

  getPoolStats(): PoolStats {
    return this.pool.getStats();
  }
}

function toPoolConfig(options: PostgreSQLExecutorOptions): PoolConfig {
  const config: PoolConfig = {
    host: options.host,
    port: options.port ?? CONNECTION_DEFAULTS.POSTGRESQL_PORT,
    user: options.user,
    password: options.password,
    database: options.database,
    max: options.pool?.max ?? POOL_DEFAULTS.max,
    idleTimeoutMillis: options.pool?.idleTimeout ?? options.idleTimeout ?? POOL_DEFAULTS.idleTimeout,
    connectionTimeoutMillis: options.connectionTimeout ?? CONNECTION_DEFAULTS.CONNECTION_TIMEOUT,
  };

  if (options.connectionString) {
    config.connectionString = options.connectionString;
  }

  if (options.ssl) {
    config.ssl = options.ssl;
  }

  return { ...config, ...options.pgOptions };
}
