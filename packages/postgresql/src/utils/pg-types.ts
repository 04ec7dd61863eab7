import { types } from 'pg';

import type { FieldDef } from 'pg';
import type { FieldInfo } from '@keyql/core';

const FIELD_TYPES: Record<number, string> = {
  [types.builtins.BOOL]: 'boolean',
  [types.builtins.INT2]: 'smallint',
  [types.builtins.INT4]: 'integer',
  [types.builtins.INT8]: 'bigint',
  [types.builtins.FLOAT4]: 'real',
  [types.builtins.FLOAT8]: 'double',
  [types.builtins.NUMERIC]: 'numeric',
  [types.builtins.VARCHAR]: 'varchar',
  [types.builtins.TEXT]: 'text',
  [types.builtins.DATE]: 'date',
  [types.builtins.TIMESTAMP]: 'timestamp',
  [types.builtins.TIMESTAMPTZ]: 'timestamptz',
  [types.builtins.JSON]: 'json',
  [types.builtins.JSONB]: 'jsonb',
  [types.builtins.UUID]: 'uuid',
};

export function toFieldInfo(field: FieldDef): FieldInfo {
  return { name: field.name, type: FIELD_TYPES[field.dataTypeID] ?? 'unknown' };
}

/**
 * BIGINT becomes a number while it fits; NUMERIC and floats become numbers.
 * Process-wide: pg keeps one parser registry.
 */
export function configureTypeParsers(): void {
  types.setTypeParser(types.builtins.INT8, parseBigInt);
  types.setTypeParser(types.builtins.FLOAT4, Number.parseFloat);
  types.setTypeParser(types.builtins.FLOAT8, Number.parseFloat);
  types.setTypeParser(types.builtins.NUMERIC, Number.parseFloat);
}

export function parseBigInt(value: string): number | string {
  const parsed = Number.parseInt(value, 10);
  return Number.isSafeInteger(parsed) ? parsed : value;
}
