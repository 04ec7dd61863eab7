/**
 * Query Builder Module
 *
 * Fluent, string-keyed builders, one per statement kind:
 * - SelectBuilder / QueryBuilder: exactly one row / many rows
 * - CompoundBuilder: UNION, INTERSECT and EXCEPT chains
 * - InsertBuilder, UpdateBuilder, DeleteBuilder: writes
 * - AggregateBuilder: COUNT, SUM, AVG, MIN, MAX as a number
 *
 * Every name is checked against the table schema as it is added. The first
 * failure is kept and reported at render or exec time.
 *
 * @module query
 */

export { QueryContext, wrapExecutionError, type QueryContextOptions } from './query-context';
export { StatementBuilder, type RenderOutcome } from './statement-builder';
export { WhereBuilder } from './where-builder';
export { SelectChain } from './select-chain';
export { SelectBuilder } from './select-builder';
export { QueryBuilder, type OperandOutcome } from './query-builder';
export { CompoundBuilder } from './compound-builder';
export { InsertBuilder } from './insert-builder';
export { ConflictBuilder, ConflictUpdateBuilder, type ConflictOutcome } from './conflict-builder';
export { UpdateBuilder } from './update-builder';
export { DeleteBuilder } from './delete-builder';
export { AggregateBuilder, type AggregateKind } from './aggregate-builder';
export { CaseBuilder, type ExpressionOutcome } from './case-builder';
export { WindowBuilder } from './window-builder';
export {
  C,
  Null,
  NotNull,
  Between,
  NotBetween,
  resolveCondition,
  type Condition,
  type CompareCondition,
  type NullCondition,
  type BetweenCondition,
} from './condition';
export * from './operators';
export * from './query-spec';
export { createTable, type TableOptions, type Table } from './query-factory';
