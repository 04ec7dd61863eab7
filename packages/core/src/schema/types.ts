/**
 * Table schema types
 * The declared shape every builder validates names against
 */

export type ColumnType =
  | 'integer'
  | 'bigInteger'
  | 'smallInteger'
  | 'float'
  | 'double'
  | 'decimal'
  | 'string'
  | 'text'
  | 'boolean'
  | 'date'
  | 'datetime'
  | 'timestamp'
  | 'time'
  | 'json'
  | 'jsonb'
  | 'uuid'
  | 'binary'
  | 'vector';

export interface ColumnDefinition {
  type: ColumnType;
  primary?: boolean;
  /** Value is produced by the database (serial, identity, defaults). Defaults to `primary`. */
  generated?: boolean;
  nullable?: boolean;
  unique?: boolean;
}

/**
 * @example
 * ```typescript
 * const users: TableSchema = {
 *   name: 'users',
 *   columns: {
 *     id: { type: 'integer', primary: true },
 *     email: { type: 'string', unique: true },
 *     age: { type: 'integer', nullable: true },
 *   },
 * };
 * ```
 */
export interface TableSchema {
  name: string;
  /** Column order is the declaration order of the keys */
  columns: Record<string, ColumnDefinition>;
}
