import { ConnectionError, toError } from '@keyql/core';
import { Pool } from 'pg';

import type { Logger, PoolStats } from '@keyql/core';
import type { PoolClient, PoolConfig, QueryResult, QueryResultRow } from 'pg';

export class PostgreSQLConnectionPool {
  private pool?: Pool;

  constructor(
    private readonly config: PoolConfig,
    private readonly logger: Logger,
  ) {}

  get isInitialized(): boolean {
    return this.pool !== undefined;
  }

  async initialize(): Promise<void> {
    try {
      this.pool = new Pool(this.config);

      this.pool.on('error', (error) => {
        this.logger.error('Unexpected error on idle PostgreSQL client', { error });
      });

      const client = await this.pool.connect();
      try {
        await client.query('SELECT 1');
      } finally {
        client.release();
      }
    } catch (error) {
      throw new ConnectionError('Failed to initialize PostgreSQL connection pool', toError(error));
    }
  }

  /**
   * Run one statement on any pooled client
   */
  async query<R extends QueryResultRow>(sql: string, values: unknown[]): Promise<QueryResult<R>> {
    return this.requirePool().query<R>(sql, values);
  }

  async getClient(): Promise<PoolClient> {
    const pool = this.requirePool();
    try {
      return await pool.connect();
    } catch (error) {
      throw new ConnectionError('Failed to get client from pool', toError(error));
    }
  }

  async end(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = undefined;
    }
  }

  getStats(): PoolStats {
    if (!this.pool) {
      return {
        total: 0,
        idle: 0,
        active: 0,
        waiting: 0,
      };
    }

    return {
      total: this.pool.totalCount,
      idle: this.pool.idleCount,
      active: this.pool.totalCount - this.pool.idleCount,
      waiting: this.pool.waitingCount,
    };
  }

  private requirePool(): Pool {
    if (!this.pool) {
      throw new ConnectionError('Database pool not initialized');
    }
    return this.pool;
  }
}
