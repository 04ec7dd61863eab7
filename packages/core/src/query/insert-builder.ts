/**
 * Insert Query Builder
 *
 * INSERT of one record, or of many records in a single statement. Every
 * column the database does not generate is supplied, each from the param
 * named after its column.
 *
 * @example
 * ```typescript
 * // Single insert, returns the stored row
 * const user = await users.insert().exec({ email: 'ada@example.com', age: 36 });
 *
 * // Batch insert, returns affected rows
 * const count = await users.insert().execBatch([
 *   { email: 'ada@example.com', age: 36 },
 *   { email: 'alan@example.com', age: 41 },
 * ]);
 *
 * // Upsert
 * await users.insert()
 *   .onConflict('email')
 *   .doUpdate()
 *   .set('age', 'age')
 *   .exec({ email: 'ada@example.com', age: 37 });
 * ```
 */

import { AstBuilder } from '../ast';
import { ValidationError } from '../errors';
import { executeInsert } from '../execution/mutation';
import { executeWrite } from '../execution/run';
import { ConflictBuilder } from './conflict-builder';
import { StatementBuilder } from './statement-builder';

import type { ConflictOutcome } from './conflict-builder';
import type { QueryContext } from './query-context';
import type { CreateSpec } from './query-spec';
import type { RenderedQuery } from '../dialect/sql-dialect';
import type { SchemaInstance } from '../schema';
import type { ExecOptions, Params, Row } from '../types';

export class InsertBuilder<T = Row> extends StatementBuilder {
  constructor(ctx: QueryContext) {
    super(ctx, insertAst(ctx.schema));
  }

  /**
   * Start a conflict clause on the given columns
   */
  onConflict(...columns: string[]): ConflictBuilder<T> {
    return new ConflictBuilder<T>(this.ctx.schema, columns, (outcome) => this.attachConflict(outcome));
  }

  /**
   * Apply a JSON create spec: the conflict clause, if any
   */
  applySpec(spec: CreateSpec): InsertBuilder<T> {
    if (!spec.on_conflict || spec.on_conflict.length === 0) {
      return this;
    }

    const action = (spec.conflict_action ?? 'nothing').toLowerCase();
    if (action === 'nothing') {
      return this.onConflict(...spec.on_conflict).doNothing();
    }
    if (action === 'update') {
      const update = this.onConflict(...spec.on_conflict).doUpdate();
      for (const [field, param] of Object.entries(spec.conflict_set ?? {})) {
        update.set(field, param);
      }
      return update.build();
    }
    return this.fail(
      new ValidationError('spec', action, `invalid conflict action "${action}": must be nothing or update`),
    );
  }

  /**
   * Insert one record and return the stored row. Columns the record omits
   * are stored as NULL.
   */
  async exec(record: Params, options: ExecOptions = {}): Promise<T> {
    this.checkReady();
    const params: Params = { ...record };
    for (const field of this.ctx.schema.insertableColumns()) {
      params[field.name] = record[field.name] ?? null;
    }
    return executeInsert<T>(this.ctx, this.ast.build(), params, options);
  }

  /**
   * Insert every record in one multi-row statement. Params are named
   * `column_index`, omitted columns are NULL. Returns affected rows; an
   * empty list runs nothing.
   */
  async execBatch(records: readonly Params[], options: ExecOptions = {}): Promise<number> {
    this.checkReady();
    if (records.length === 0) {
      return 0;
    }

    const { schema } = this.ctx;
    const columns = schema.insertableColumns();
    const params: Params = {};
    let ast = AstBuilder.create('INSERT', schema.tableRef());

    records.forEach((record, index) => {
      ast = ast.values(
        columns.map((field) => {
          const name = `${field.name}_${index}`;
          params[name] = record[field.name] ?? null;
          return { field, param: schema.tryParam(name) };
        }),
      );
    });

    const conflict = this.ast.build().conflict;
    if (conflict) {
      ast = ast.conflict(conflict);
    }

    const { sql } = this.ctx.dialect.render(ast.build());
    return executeWrite(this.ctx, 'INSERT', sql, params, options);
  }

  /**
   * RETURNING is dropped where the dialect lacks it; exec() reads the row back instead.
   */
  protected override renderQuery(): RenderedQuery {
    const ast = this.ast.build();
    if (this.ctx.dialect.capabilities.insertReturning) {
      return this.ctx.dialect.render(ast);
    }
    return this.ctx.dialect.render({ ...ast, returning: [] });
  }

  private attachConflict(outcome: ConflictOutcome): this {
    if ('error' in outcome) {
      return this.fail(outcome.error);
    }
    return this.apply(() => {
      this.ast = this.ast.conflict(outcome.clause);
    });
  }
}

function insertAst(schema: SchemaInstance): AstBuilder {
  const row = schema.insertableColumns().map((field) => ({ field, param: schema.tryParam(field.name) }));
  return AstBuilder.create('INSERT', schema.tableRef()).values(row).returning(schema.columns());
}
