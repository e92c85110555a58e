import type { ColumnType, ObservedSchema } from '@frameschema/core';
import { ColumnTypes, columnTypeEquals, datetime } from '@frameschema/core';

export interface InferenceOptions {
  /** Number of rows inspected per column. Default: `100`. */
  readonly inferSchemaLength?: number;
  /** Recognize ISO dates and date-times in text values. Default: `false`. */
  readonly tryParseDates?: boolean;
  /** Text values treated as null and skipped. Default: `['']`. */
  readonly nullValues?: readonly string[];
}

export const DEFAULT_INFER_SCHEMA_LENGTH = 100;

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.\d*|\.\d+|\d+(?:\.\d*)?[eE][+-]?\d+|inf|nan)$/i;
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const DATETIME_PATTERN = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?$/;
const UTC_DATETIME_PATTERN = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]00:?00)$/;

const NAIVE_DATETIME = datetime('us');
const UTC_DATETIME = datetime('us', 'UTC');
const JS_DATE = datetime('ms');

/**
 * Domain service that infers column types from sampled values.
 *
 * Each column keeps the narrowest type that fits every non-null sample:
 * integers widen to `Float64`, any other conflict settles on `String`.
 */
export class TypeInference {
  /** Rows inspected per column. */
  readonly inferSchemaLength: number;
  private readonly tryParseDates: boolean;
  private readonly nullValues: ReadonlySet<string>;

  constructor(options?: InferenceOptions) {
    this.inferSchemaLength = options?.inferSchemaLength ?? DEFAULT_INFER_SCHEMA_LENGTH;
    this.tryParseDates = options?.tryParseDates ?? false;
    this.nullValues = new Set(options?.nullValues ?? ['']);
  }

  /** Infer an observed schema from rows. `columns` fixes the column order; other keys are appended as first seen. */
  inferSchema(rows: Iterable<Readonly<Record<string, unknown>>>, columns: readonly string[] = []): ObservedSchema {
    const inferred = new Map<string, ColumnType | null>(columns.map((name) => [name, null]));
    let sampled = 0;

    for (const row of rows) {
      if (sampled >= this.inferSchemaLength) break;
      sampled++;

      for (const [name, value] of Object.entries(row)) {
        const current = inferred.get(name) ?? null;
        const valueType = this.inferValue(value);
        inferred.set(name, valueType === null ? current : current === null ? valueType : this.merge(current, valueType));
      }
    }

    const schema = new Map<string, ColumnType>();
    for (const [name, type] of inferred) {
      schema.set(name, type ?? ColumnTypes.String);
    }
    return schema;
  }

  /** Column type of a single value, or `null` for null-like values. */
  inferValue(value: unknown): ColumnType | null {
    if (value === null || value === undefined) return null;
    if (typeof value === 'string') return this.inferText(value);
    if (typeof value === 'boolean') return ColumnTypes.Boolean;
    if (typeof value === 'bigint') return ColumnTypes.Int64;
    if (typeof value === 'number') return Number.isInteger(value) ? ColumnTypes.Int64 : ColumnTypes.Float64;
    if (value instanceof Date) return JS_DATE;
    return ColumnTypes.String;
  }

  /** Column type of a text value, or `null` for configured null values. */
  inferText(raw: string): ColumnType | null {
    if (this.nullValues.has(raw)) return null;

    const value = raw.trim();
    if (INTEGER_PATTERN.test(value)) return ColumnTypes.Int64;
    if (FLOAT_PATTERN.test(value)) return ColumnTypes.Float64;

    const lower = value.toLowerCase();
    if (lower === 'true' || lower === 'false') return ColumnTypes.Boolean;

    if (this.tryParseDates) {
      if (DATE_PATTERN.test(value)) return ColumnTypes.Date;
      if (DATETIME_PATTERN.test(value)) return NAIVE_DATETIME;
      if (UTC_DATETIME_PATTERN.test(value)) return UTC_DATETIME;
    }

    return ColumnTypes.String;
  }

  /** Common supertype of two inferred types. */
  merge(a: ColumnType, b: ColumnType): ColumnType {
    if (columnTypeEquals(a, b)) return a;
    if (isNumeric(a) && isNumeric(b)) return ColumnTypes.Float64;
    return ColumnTypes.String;
  }
}

function isNumeric(type: ColumnType): boolean {
  return type.kind === 'Int64' || type.kind === 'Float64';
}
