import type { FieldInfo } from '@keyql/core';
import type { FieldPacket } from 'mysql2';

/** Column type codes from the MySQL client/server protocol */
export const MYSQL_TYPE_MAP: Record<number, string> = {
  0: 'decimal',
  1: 'tinyint',
  2: 'smallint',
  3: 'int',
  4: 'float',
  5: 'double',
  7: 'timestamp',
  8: 'bigint',
  9: 'mediumint',
  10: 'date',
  11: 'time',
  12: 'datetime',
  13: 'year',
  15: 'varchar',
  16: 'bit',
  245: 'json',
  246: 'decimal',
  247: 'enum',
  248: 'set',
  249: 'tinyblob',
  250: 'mediumblob',
  251: 'longblob',
  252: 'blob',
  253: 'varchar',
  254: 'char',
  255: 'geometry',
};

export function toFieldInfo(field: FieldPacket): FieldInfo {
  const type = field.type === undefined ? undefined : MYSQL_TYPE_MAP[field.type];
  return { name: field.name, type: type ?? 'unknown' };
}
