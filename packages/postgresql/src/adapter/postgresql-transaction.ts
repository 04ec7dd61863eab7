import { randomUUID } from 'node:crypto';

import { TransactionError, isValidIdentifier, toError } from '@keyql/core';

import { toFieldInfo } from '../utils/pg-types';
import { throwIfAborted } from './statement';

import type {
  ExecuteResult,
  QueryResult,
  Row,
  StatementOptions,
  Transaction,
  TransactionOptions,
} from '@keyql/core';
import type { PoolClient, QueryResultRow } from 'pg';

export class PostgreSQLTransaction implements Transaction {
  readonly id: string;
  private _isActive = false;
  private savepoints: string[] = [];

  constructor(
    private readonly client: PoolClient,
    private readonly options?: TransactionOptions,
  ) {
    this.id = randomUUID();
  }

  get isActive(): boolean {
    return this._isActive;
  }

  async begin(): Promise<void> {
    if (this._isActive) {
      throw new TransactionError('Transaction already active', this.id);
    }

    try {
      await this.client.query('BEGIN');

      if (this.options?.isolationLevel) {
        await this.client.query(`SET TRANSACTION ISOLATION LEVEL ${this.options.isolationLevel}`);
      }
      await this.client.query(this.options?.readOnly ? 'SET TRANSACTION READ ONLY' : 'SET TRANSACTION READ WRITE');

      this._isActive = true;
    } catch (error) {
      throw new TransactionError('Failed to begin transaction', this.id, toError(error));
    }
  }

  async commit(): Promise<void> {
    await this.finish('COMMIT', 'Failed to commit transaction');
  }

  async rollback(): Promise<void> {
    await this.finish('ROLLBACK', 'Failed to rollback transaction');
  }

  // ============ Savepoints ============

  async savepoint(name: string): Promise<void> {
    this.requireActive();
    this.requireSavepointName(name);
    if (this.savepoints.includes(name)) {
      throw new TransactionError(`Savepoint "${name}" already exists`, this.id);
    }

    await this.run(`SAVEPOINT ${name}`, `Failed to create savepoint "${name}"`);
    this.savepoints.push(name);
  }

  async releaseSavepoint(name: string): Promise<void> {
    const index = this.requireSavepoint(name);

    await this.run(`RELEASE SAVEPOINT ${name}`, `Failed to release savepoint "${name}"`);
    this.savepoints = this.savepoints.slice(0, index);
  }

  /**
   * Savepoints created after `name` are discarded; `name` itself stays usable.
   */
  async rollbackToSavepoint(name: string): Promise<void> {
    const index = this.requireSavepoint(name);

    await this.run(`ROLLBACK TO SAVEPOINT ${name}`, `Failed to rollback to savepoint "${name}"`);
    this.savepoints = this.savepoints.slice(0, index + 1);
  }

  // ============ Statements ============

  async query<T = Row>(sql: string, values: unknown[], options: StatementOptions = {}): Promise<QueryResult<T>> {
    this.requireActive();
    throwIfAborted(options.signal);

    const result = await this.client.query<T & QueryResultRow>(sql, values);
    return {
      rows: result.rows,
      rowCount: result.rowCount ?? 0,
      fields: result.fields.map(toFieldInfo),
      command: result.command,
    };
  }

  async execute(sql: string, values: unknown[], options: StatementOptions = {}): Promise<ExecuteResult> {
    this.requireActive();
    throwIfAborted(options.signal);

    const result = await this.client.query(sql, values);
    return { affectedRows: result.rowCount ?? 0 };
  }

  // ============ Internals ============

  private async finish(command: 'COMMIT' | 'ROLLBACK', failure: string): Promise<void> {
    this.requireActive();

    try {
      await this.client.query(command);
    } catch (error) {
      throw new TransactionError(failure, this.id, toError(error));
    } finally {
      this._isActive = false;
      this.savepoints = [];
      this.client.release();
    }
  }

  private async run(sql: string, failure: string): Promise<void> {
    try {
      await this.client.query(sql);
    } catch (error) {
      throw new TransactionError(failure, this.id, toError(error));
    }
  }

  private requireActive(): void {
    if (!this._isActive) {
      throw new TransactionError('Transaction not active', this.id);
    }
  }

  private requireSavepointName(name: string): void {
    if (!isValidIdentifier(name)) {
      throw new TransactionError(`Invalid savepoint name "${name}"`, this.id);
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
