import type { ColumnType } from '@frameschema/core';
import { ColumnTypes, datetime } from '@frameschema/core';

const SIGNED: Readonly<Record<string, ColumnType>> = {
  TINYINT: ColumnTypes.Int8,
  SMALLINT: ColumnTypes.Int16,
  INT2: ColumnTypes.Int16,
  MEDIUMINT: ColumnTypes.Int32,
  INT: ColumnTypes.Int32,
  INT4: ColumnTypes.Int32,
  INTEGER: ColumnTypes.Int32,
  BIGINT: ColumnTypes.Int64,
  INT8: ColumnTypes.Int64,
};

const UNSIGNED: Readonly<Record<string, ColumnType>> = {
  TINYINT: ColumnTypes.UInt8,
  SMALLINT: ColumnTypes.UInt16,
  MEDIUMINT: ColumnTypes.UInt32,
  INT: ColumnTypes.UInt32,
  INTEGER: ColumnTypes.UInt32,
  BIGINT: ColumnTypes.UInt64,
};

const OTHER: Readonly<Record<string, ColumnType>> = {
  REAL: ColumnTypes.Float32,
  FLOAT: ColumnTypes.Float32,
  FLOAT4: ColumnTypes.Float32,
  DOUBLE: ColumnTypes.Float64,
  'DOUBLE PRECISION': ColumnTypes.Float64,
  FLOAT8: ColumnTypes.Float64,
  DECIMAL: ColumnTypes.Float64,
  NUMERIC: ColumnTypes.Float64,
  BOOLEAN: ColumnTypes.Boolean,
  BOOL: ColumnTypes.Boolean,
  DATE: ColumnTypes.Date,
  TIME: ColumnTypes.Time,
  'TIME WITHOUT TIME ZONE': ColumnTypes.Time,
  DATETIME: datetime('us'),
  TIMESTAMP: datetime('us'),
  'TIMESTAMP WITHOUT TIME ZONE': datetime('us'),
  'TIMESTAMP WITH TIME ZONE': datetime('us', 'UTC'),
  TIMESTAMPTZ: datetime('us', 'UTC'),
};

/**
 * Map a column type name as reported by the database (e.g. `VARCHAR(255)`,
 * `INTEGER UNSIGNED`, `TIMESTAMP WITH TIME ZONE`) to a column type.
 *
 * Time zone aware timestamps are stored normalized to UTC, so they map to a UTC datetime.
 * Names outside the table map to `String`.
 */
export function mapSqlType(sqlType: string): ColumnType {
  const normalized = sqlType.trim().toUpperCase().replace(/\s+/g, ' ');

  // MySQL and SQLite spell booleans as TINYINT(1).
  if (/^TINYINT\(1\)/.test(normalized)) return ColumnTypes.Boolean;

  const unsigned = /\bUNSIGNED\b/.test(normalized);
  const base = normalized
    .replace(/\(.*?\)/g, '')
    .replace(/\b(UNSIGNED|ZEROFILL)\b/g, '')
    .replace(/\s+/g, ' ')
    .trim();

  const integer = unsigned ? UNSIGNED[base] : SIGNED[base];
  return integer ?? OTHER[base] ?? ColumnTypes.String;
}
