/**
 * Conflict clause builders for InsertBuilder.onConflict().
 *
 * PostgreSQL renders ON CONFLICT (columns) DO NOTHING | DO UPDATE SET ...;
 * MySQL renders INSERT IGNORE | ON DUPLICATE KEY UPDATE ...
 */

import { ConditionError, KeyqlError } from '../errors';

import type { InsertBuilder } from './insert-builder';
import type { Assignment, ConflictClause, FieldRef } from '../ast';
import type { SchemaInstance } from '../schema';
import type { ExecOptions, Params, Row } from '../types';

export type ConflictOutcome = { clause: ConflictClause } | { error: KeyqlError };

type Finish<T> = (outcome: ConflictOutcome) => InsertBuilder<T>;

export class ConflictBuilder<T = Row> {
  constructor(
    private readonly schema: SchemaInstance,
    private readonly columns: readonly string[],
    private readonly finish: Finish<T>,
  ) {}

  /**
   * ON CONFLICT DO NOTHING
   */
  doNothing(): InsertBuilder<T> {
    try {
      return this.finish({ clause: { columns: this.resolveColumns(), action: 'nothing' } });
    } catch (error) {
      if (!(error instanceof KeyqlError)) {
        throw error;
      }
      return this.finish({ error });
    }
  }

  /**
   * ON CONFLICT DO UPDATE SET ...
   */
  doUpdate(): ConflictUpdateBuilder<T> {
    return new ConflictUpdateBuilder(this.schema, () => this.resolveColumns(), this.finish);
  }

  private resolveColumns(): FieldRef[] {
    return this.columns.map((column) => this.schema.tryField(column));
  }
}

export class ConflictUpdateBuilder<T = Row> {
  private readonly assignments: Assignment[] = [];
  private error?: KeyqlError;

  constructor(
    private readonly schema: SchemaInstance,
    private readonly resolveColumns: () => FieldRef[],
    private readonly finish: Finish<T>,
  ) {}

  /**
   * SET field = :param on conflict
   */
  set(field: string, param: string): this {
    if (this.error) {
      return this;
    }
    try {
      this.assignments.push({
        field: this.schema.tryField(field),
        value: { kind: 'param', param: this.schema.tryParam(param) },
      });
    } catch (error) {
      if (!(error instanceof KeyqlError)) {
        throw error;
      }
      this.error = error;
    }
    return this;
  }

  /**
   * Attach the clause and return to the insert builder
   */
  build(): InsertBuilder<T> {
    if (this.error) {
      return this.finish({ error: this.error });
    }
    if (this.assignments.length === 0) {
      return this.finish({ error: new ConditionError('ON CONFLICT DO UPDATE requires at least one SET clause') });
    }
    try {
      return this.finish({
        clause: { columns: this.resolveColumns(), action: 'update', assignments: [...this.assignments] },
      });
    } catch (error) {
      if (!(error instanceof KeyqlError)) {
        throw error;
      }
      return this.finish({ error });
    }
  }

  async exec(record: Params, options: ExecOptions = {}): Promise<T> {
    return this.build().exec(record, options);
  }
}
