import type { ColumnType } from './ColumnType.js';

/**
 * Column name to column type mapping read from a real table. The column count is `size`.
 * Iteration order is the table's column order.
 */
export type ObservedSchema = ReadonlyMap<string, ColumnType>;

/** Build an observed schema from a record or an ordered list of entries. */
export function observedSchema(
  columns: Readonly<Record<string, ColumnType>> | Iterable<readonly [string, ColumnType]>,
): ObservedSchema {
  if (isEntryIterable(columns)) {
    return new Map(columns);
  }
  return new Map(Object.entries(columns));
}

function isEntryIterable(
  value: Readonly<Record<string, ColumnType>> | Iterable<readonly [string, ColumnType]>,
): value is Iterable<readonly [string, ColumnType]> {
  return Symbol.iterator in value;
}
