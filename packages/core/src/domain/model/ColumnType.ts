/** Time resolution of a `Datetime` column. */
export type TimeUnit = 'ns' | 'us' | 'ms';

/** Column type tags without parameters. */
export type SimpleColumnKind =
  | 'Int8'
  | 'Int16'
  | 'Int32'
  | 'Int64'
  | 'UInt8'
  | 'UInt16'
  | 'UInt32'
  | 'UInt64'
  | 'Float32'
  | 'Float64'
  | 'Boolean'
  | 'String'
  | 'Date'
  | 'Time';

export interface SimpleColumnType {
  readonly kind: SimpleColumnKind;
}

export interface DatetimeColumnType {
  readonly kind: 'Datetime';
  readonly unit: TimeUnit;
  /** IANA zone label, or `null` for naive (timezone-less) values. */
  readonly timeZone: string | null;
}

/** Semantic data type of a table column. */
export type ColumnType = SimpleColumnType | DatetimeColumnType;

export type ColumnKind = ColumnType['kind'];

function simple(kind: SimpleColumnKind): SimpleColumnType {
  return Object.freeze({ kind });
}

/** Shared instances of every parameterless column type. */
export const ColumnTypes = {
  Int8: simple('Int8'),
  Int16: simple('Int16'),
  Int32: simple('Int32'),
  Int64: simple('Int64'),
  UInt8: simple('UInt8'),
  UInt16: simple('UInt16'),
  UInt32: simple('UInt32'),
  UInt64: simple('UInt64'),
  Float32: simple('Float32'),
  Float64: simple('Float64'),
  Boolean: simple('Boolean'),
  String: simple('String'),
  Date: simple('Date'),
  Time: simple('Time'),
} as const satisfies Record<SimpleColumnKind, SimpleColumnType>;

/** Create a `Datetime` column type. */
export function datetime(unit: TimeUnit, timeZone: string | null = null): DatetimeColumnType {
  return Object.freeze({ kind: 'Datetime', unit, timeZone });
}

/** Equal when tag, resolution and time zone all match. */
export function columnTypeEquals(a: ColumnType, b: ColumnType): boolean {
  if (a.kind === 'Datetime' || b.kind === 'Datetime') {
    return a.kind === 'Datetime' && b.kind === 'Datetime' && a.unit === b.unit && a.timeZone === b.timeZone;
  }
  return a.kind === b.kind;
}

/** Render a column type, e.g. `Int32`, `Datetime(us)` or `Datetime(us, UTC)`. */
export function formatColumnType(type: ColumnType): string {
  if (type.kind === 'Datetime') {
    return type.timeZone === null ? `Datetime(${type.unit})` : `Datetime(${type.unit}, ${type.timeZone})`;
  }
  return type.kind;
}
