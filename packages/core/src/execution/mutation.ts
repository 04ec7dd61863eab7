/**
 * Mutations that must hand back the affected row.
 *
 * Where the dialect supports RETURNING the row comes back inline. Otherwise
 * the write runs on its own, its affected-row count is checked, and the row
 * is read back with a SELECT built from the same WHERE nodes (or, for an
 * insert, the primary key). Both statements are rendered before either runs.
 */

import { AstBuilder } from '../ast';
import { CardinalityError, QueryError } from '../errors';
import { exactlyOne, INSERT_MESSAGES, observe, SELECT_MESSAGES, UPDATE_MESSAGES } from './run';

import type { ConditionNode, QueryAst } from '../ast';
import type { CardinalityMessages } from './run';
import type { QueryContext } from '../query/query-context';
import type { ExecOptions, Params } from '../types';

export async function executeUpdate<T>(
  ctx: QueryContext,
  ast: QueryAst,
  where: readonly ConditionNode[],
  params: Params,
  options: ExecOptions = {},
): Promise<T> {
  const { dialect } = ctx;

  if (dialect.capabilities.updateReturning) {
    const { sql } = dialect.render(ast);
    return observe(
      ctx,
      { operation: 'UPDATE', sql },
      async () => {
        const { rows } = await ctx.query<T>('UPDATE', sql, params, options);
        return exactlyOne(rows, 'UPDATE', UPDATE_MESSAGES);
      },
      () => ({ rowsAffected: 1 }),
    );
  }

  const update = dialect.render(withoutReturning(ast));
  const read = dialect.render(selectAll(ctx, where));

  return observe(
    ctx,
    { operation: 'UPDATE', sql: update.sql },
    async () => {
      const { affectedRows } = await ctx.execute('UPDATE', update.sql, params, options);
      requireSingleRow(affectedRows, 'UPDATE', UPDATE_MESSAGES);

      const { rows } = await ctx.query<T>('UPDATE', read.sql, params, options);
      return exactlyOne(rows, 'UPDATE', SELECT_MESSAGES);
    },
    () => ({ rowsAffected: 1 }),
  );
}

export async function executeInsert<T>(
  ctx: QueryContext,
  ast: QueryAst,
  params: Params,
  options: ExecOptions = {},
): Promise<T> {
  const { dialect, schema } = ctx;

  if (dialect.capabilities.insertReturning) {
    const { sql } = dialect.render(ast);
    return observe(
      ctx,
      { operation: 'INSERT', sql },
      async () => {
        const { rows } = await ctx.query<T>('INSERT', sql, params, options);
        return exactlyOne(rows, 'INSERT', INSERT_MESSAGES);
      },
      () => ({ rowsAffected: 1 }),
    );
  }

  const primaryKey = schema.primaryKey();
  if (!primaryKey) {
    throw new QueryError(
      `INSERT on ${ctx.table} cannot read back the row: the table declares no primary key`,
      'INSERT',
    );
  }

  const insert = dialect.render(withoutReturning(ast));
  const read = dialect.render(
    selectAll(ctx, [
      { kind: 'compare', field: primaryKey, operator: '=', param: schema.tryParam(primaryKey.name) },
    ]),
  );

  return observe(
    ctx,
    { operation: 'INSERT', sql: insert.sql },
    async () => {
      const result = await ctx.execute('INSERT', insert.sql, params, options);
      requireSingleRow(result.affectedRows, 'INSERT', INSERT_MESSAGES);

      const key = result.insertId || params[primaryKey.name];
      if (key === undefined || key === null || key === '') {
        throw new QueryError(
          `INSERT on ${ctx.table} cannot read back the row: no value for primary key "${primaryKey.name}"`,
          'INSERT',
          insert.sql,
        );
      }

      const { rows } = await ctx.query<T>('INSERT', read.sql, { [primaryKey.name]: key }, options);
      return exactlyOne(rows, 'INSERT', SELECT_MESSAGES);
    },
    () => ({ rowsAffected: 1 }),
  );
}

/**
 * MySQL reports 2 affected rows when ON DUPLICATE KEY UPDATE changes an existing row.
 */
function requireSingleRow(affectedRows: number, operation: string, messages: CardinalityMessages): void {
  if (affectedRows === 0) {
    throw new CardinalityError(messages.none, operation, 'none');
  }
  if (affectedRows > 1 && operation !== 'INSERT') {
    throw new CardinalityError(messages.multiple, operation, 'multiple');
  }
}

function withoutReturning(ast: QueryAst): QueryAst {
  return { ...ast, returning: [] };
}

function selectAll(ctx: QueryContext, where: readonly ConditionNode[]): QueryAst {
  return where
    .reduce((builder, condition) => builder.where(condition), AstBuilder.select(ctx.schema.tableRef()))
    .fields(ctx.schema.columns())
    .build();
}
