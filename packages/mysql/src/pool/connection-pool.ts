import { ConnectionError, toError } from '@keyql/core';
import * as mysql from 'mysql2/promise';

import type { Logger, PoolStats } from '@keyql/core';

/**
 * mysql2 keeps no public pool counters, so they are tracked from pool events.
 * A released connection handed straight to a queued request stays active.
 */
interface PoolCounters {
  total: number;
  active: number;
  waiting: number;
}

export class MySQLConnectionPool {
  private pool?: mysql.Pool;
  private counters: PoolCounters = { total: 0, active: 0, waiting: 0 };

  constructor(
    private readonly options: mysql.PoolOptions,
    private readonly logger: Logger,
  ) {}

  get isInitialized(): boolean {
    return this.pool !== undefined;
  }

  async initialize(): Promise<void> {
    try {
      this.pool = mysql.createPool(this.options);
      this.track(this.pool);

      const connection = await this.pool.getConnection();
      try {
        await connection.ping();
      } finally {
        connection.release();
      }
    } catch (error) {
      throw new ConnectionError('Failed to initialize MySQL connection pool', toError(error));
    }
  }

  /**
   * Run one statement on any pooled connection
   */
  async query<R extends mysql.RowDataPacket[] | mysql.ResultSetHeader>(
    sql: string,
    values: unknown[],
  ): Promise<[R, mysql.FieldPacket[]]> {
    return this.requirePool().query<R>(sql, values);
  }

  async getConnection(): Promise<mysql.PoolConnection> {
    const pool = this.requirePool();
    try {
      return await pool.getConnection();
    } catch (error) {
      throw new ConnectionError('Failed to get connection from pool', toError(error));
    }
  }

  async end(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = undefined;
      this.counters = { total: 0, active: 0, waiting: 0 };
    }
  }

  getStats(): PoolStats {
    const { total, active, waiting } = this.counters;
    return {
      total,
      idle: Math.max(total - active, 0),
      active,
      waiting,
    };
  }

  private track(pool: mysql.Pool): void {
    pool.on('connection', () => {
      this.counters.total += 1;
      this.logger.debug('MySQL connection created', { total: this.counters.total });
    });
    pool.on('acquire', () => {
      this.counters.active += 1;
    });
    pool.on('enqueue', () => {
      this.counters.waiting += 1;
    });
    pool.on('release', () => {
      if (this.counters.waiting > 0) {
        this.counters.waiting -= 1;
      } else {
        this.counters.active = Math.max(this.counters.active - 1, 0);
      }
    });
  }

  private requirePool(): mysql.Pool {
    if (!this.pool) {
      throw new ConnectionError('Database pool not initialized');
    }
    return this.pool;
  }
}
