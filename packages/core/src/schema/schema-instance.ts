/**
 * SchemaInstance
 *
 * Resolves string names against a declared table schema and hands out the
 * validated tokens the AST is built from. Every try* method throws a
 * ValidationError naming what failed to resolve.
 */

import { FieldRef, ParamRef, TableRef } from '../ast/tokens';
import { ValidationError } from '../errors';
import { isValidIdentifier } from '../utils/validation';

import type { ColumnDefinition, TableSchema } from './types';

export class SchemaInstance {
  readonly tableName: string;
  private readonly table: TableRef;
  private readonly fields = new Map<string, FieldRef>();
  private readonly definitions = new Map<string, ColumnDefinition>();
  private readonly primary?: FieldRef;

  constructor(schema: TableSchema) {
    validateTableSchema(schema);

    this.tableName = schema.name;
    this.table = new TableRef(schema.name);

    for (const [name, definition] of Object.entries(schema.columns)) {
      const field = new FieldRef(name);
      this.fields.set(name, field);
      this.definitions.set(name, definition);
      if (definition.primary) {
        this.primary = field;
      }
    }
  }

  tryTable(name: string): TableRef {
    if (name !== this.tableName) {
      throw new ValidationError('table', name);
    }
    return this.table;
  }

  tryField(name: string): FieldRef {
    const field = this.fields.get(name);
    if (!field) {
      throw new ValidationError('field', name);
    }
    return field;
  }

  /** Parameter names are free-form but must be plain identifiers. */
  tryParam(name: string): ParamRef {
    if (!isValidIdentifier(name)) {
      throw new ValidationError('param', name);
    }
    return new ParamRef(name);
  }

  tryAlias(name: string): string {
    if (!isValidIdentifier(name)) {
      throw new ValidationError('alias', name);
    }
    return name;
  }

  tableRef(): TableRef {
    return this.table;
  }

  /** All columns in declaration order */
  columns(): FieldRef[] {
    return [...this.fields.values()];
  }

  primaryKey(): FieldRef | undefined {
    return this.primary;
  }

  /** Columns an INSERT supplies: everything the database does not generate */
  insertableColumns(): FieldRef[] {
    return this.columns().filter((field) => {
      const definition = this.definitions.get(field.name);
      return !(definition?.generated ?? definition?.primary ?? false);
    });
  }

  column(name: string): ColumnDefinition | undefined {
    return this.definitions.get(name);
  }
}

export function validateTableSchema(schema: TableSchema): void {
  if (!isValidIdentifier(schema.name)) {
    throw new ValidationError(
      'schema',
      schema.name,
      `Table name "${schema.name}" must start with a letter or underscore and contain only letters, numbers, and underscores`,
    );
  }

  const names = Object.keys(schema.columns);
  if (names.length === 0) {
    throw new ValidationError('schema', schema.name, `Table "${schema.name}" declares no columns`);
  }

  const invalid = names.find((name) => !isValidIdentifier(name));
  if (invalid !== undefined) {
    throw new ValidationError(
      'schema',
      invalid,
      `Column name "${invalid}" must start with a letter or underscore and contain only letters, numbers, and underscores`,
    );
  }

  const primaries = names.filter((name) => schema.columns[name]?.primary);
  if (primaries.length > 1) {
    throw new ValidationError(
      'schema',
      schema.name,
      `Table "${schema.name}" declares more than one primary key: ${primaries.join(', ')}`,
    );
  }
}
