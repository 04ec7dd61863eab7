import { randomUUID } from 'node:crypto';

import { TransactionError, toError } from '@keyql/core';
import * as mysql from 'mysql2/promise';

import { toFieldInfo } from '../utils/mysql-types';
import { throwIfAborted } from './statement';

import type {
  ExecuteResult,
  QueryResult,
  Row,
  StatementOptions,
  Transaction,
  TransactionOptions,
} from '@keyql/core';

export class MySQLTransaction implements Transaction {
  readonly id: string;
  private _isActive = false;
  private savepoints: string[] = [];

  constructor(
    private readonly connection: mysql.PoolConnection,
    private readonly options?: TransactionOptions,
  ) {
    this.id = randomUUID();
  }

  get isActive(): boolean {
    return this._isActive;
  }

  /**
   * SET TRANSACTION applies to the next transaction only, so it runs before
   * the transaction starts.
   */
  async begin(): Promise<void> {
    if (this._isActive) {
      throw new TransactionError('Transaction already active', this.id);
    }

    try {
      if (this.options?.isolationLevel) {
        await this.connection.query(`SET TRANSACTION ISOLATION LEVEL ${this.options.isolationLevel}`);
      }

      if (this.options?.readOnly) {
        await this.connection.query('START TRANSACTION READ ONLY');
      } else {
        await this.connection.beginTransaction();
      }

      this._isActive = true;
    } catch (error) {
      throw new TransactionError('Failed to begin transaction', this.id, toError(error));
    }
  }

  async commit(): Promise<void> {
    this.requireActive();

    try {
      await this.connection.commit();
    } catch (error) {
      throw new TransactionError('Failed to commit transaction', this.id, toError(error));
    } finally {
      this.close();
    }
  }

  async rollback(): Promise<void> {
    this.requireActive();

    try {
      await this.connection.rollback();
    } catch (error) {
      throw new TransactionError('Failed to rollback transaction', this.id, toError(error));
    } finally {
      this.close();
    }
  }

  // ============ Savepoints ============

  async savepoint(name: string): Promise<void> {
    this.requireActive();
    if (this.savepoints.includes(name)) {
      throw new TransactionError(`Savepoint "${name}" already exists`, this.id);
    }

    await this.run(`SAVEPOINT ${mysql.escapeId(name)}`, `Failed to create savepoint "${name}"`);
    this.savepoints.push(name);
  }

  async releaseSavepoint(name: string): Promise<void> {
    const index = this.requireSavepoint(name);

    await this.run(`RELEASE SAVEPOINT ${mysql.escapeId(name)}`, `Failed to release savepoint "${name}"`);
    this.savepoints = this.savepoints.slice(0, index);
  }

  async rollbackToSavepoint(name: string): Promise<void> {
    const index = this.requireSavepoint(name);

    await this.run(
      `ROLLBACK TO SAVEPOINT ${mysql.escapeId(name)}`,
      `Failed to rollback to savepoint "${name}"`,
    );
    this.savepoints = this.savepoints.slice(0, index + 1);
  }

  // ============ Statements ============

  async query<T = Row>(sql: string, values: unknown[], options: StatementOptions = {}): Promise<QueryResult<T>> {
    this.requireActive();
    throwIfAborted(options.signal);

    const [rows, fields] = await this.connection.query<Array<T & mysql.RowDataPacket>>(sql, values);
    return {
      rows,
      rowCount: rows.length,
      fields: fields.map(toFieldInfo),
      command: 'SELECT',
    };
  }

  async execute(sql: string, values: unknown[], options: StatementOptions = {}): Promise<ExecuteResult> {
    this.requireActive();
    throwIfAborted(options.signal);

    const [header] = await this.connection.query<mysql.ResultSetHeader>(sql, values);
    return { affectedRows: header.affectedRows, insertId: header.insertId, changedRows: header.changedRows };
  }

  // ============ Internals ============

  private close(): void {
    this._isActive = false;
    this.savepoints = [];
    this.connection.release();
  }

  private async run(sql: string, failure: string): Promise<void> {
    try {
      await this.connection.query(sql);
    } catch (error) {
      throw new TransactionError(failure, this.id, toError(error));
    }
  }

  private requireActive(): void {
    if (!this._isActive) {
      throw new TransactionError('Transaction not active', this.id);
    }
  }

  private requireSavepoint(name: string): number {
    this.requireActive();
    const index = this.savepoints.indexOf(name);
    if (index === -1) {
      throw new TransactionError(`Savepoint "${name}" does not exist`, this.id);
    }
    return index;
  }
}
