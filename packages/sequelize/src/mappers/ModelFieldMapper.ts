import type { DataType, Dialect, Model, ModelStatic } from 'sequelize';
import type { DeclaredType, FieldSpec } from '@frameschema/core';
import { t } from '@frameschema/core';

const DECLARED_BY_KEY: Readonly<Record<string, readonly [signed: DeclaredType, unsigned: DeclaredType]>> = {
  TINYINT: [t.i8, t.u8],
  SMALLINT: [t.i16, t.u16],
  MEDIUMINT: [t.i32, t.u32],
  INTEGER: [t.i32, t.u32],
  BIGINT: [t.i64, t.u64],
  FLOAT: [t.f32, t.f32],
  REAL: [t.f32, t.f32],
  DOUBLE: [t.f64, t.f64],
  'DOUBLE PRECISION': [t.f64, t.f64],
  DECIMAL: [t.f64, t.f64],
  BOOLEAN: [t.bool, t.bool],
  STRING: [t.string, t.string],
  CHAR: [t.string, t.string],
  TEXT: [t.string, t.string],
  CITEXT: [t.string, t.string],
  UUID: [t.string, t.string],
  ENUM: [t.string, t.string],
  DATEONLY: [t.date, t.date],
  DATE: [t.dateTime, t.dateTime],
  TIME: [t.time, t.time],
};

/** Dialects whose created columns read back as the types `declaredTypeOf()` declares. */
export const SUPPORTED_DIALECTS: readonly Dialect[] = ['sqlite', 'mysql', 'mariadb', 'postgres'];

/**
 * Declared type of a Sequelize data type, as the dialect stores it. Date and time
 * keys map to the temporal descriptors, so schemas built from models need
 * `temporalTypes()` for them. Unlisted keys become named types and fall back to `String`.
 *
 * Without a dialect, the MySQL/SQLite column types are assumed.
 */
export function declaredTypeOf(type: DataType, dialect?: Dialect): DeclaredType {
  if (typeof type === 'string') return t.named(type);

  const sql = typeof type === 'function' ? type.key : type.toSql();
  if (dialect === 'postgres') {
    const stored = postgresDeclaredType(type.key, sql);
    if (stored) return stored;
  }

  const entry = DECLARED_BY_KEY[type.key];
  if (!entry) return t.named(type.key);
  return /\bUNSIGNED\b/i.test(sql) ? entry[1] : entry[0];
}

// PostgreSQL stores DATE as TIMESTAMP WITH TIME ZONE, and FLOAT(p) as REAL
// for p <= 24, DOUBLE PRECISION otherwise. It has no unsigned or one-byte integers.
function postgresDeclaredType(key: string, sql: string): DeclaredType | undefined {
  switch (key) {
    case 'TINYINT':
      return t.i16;
    case 'MEDIUMINT':
      return t.i32;
    case 'DATE':
      return t.zonedDateTime('UTC');
    case 'FLOAT': {
      const precision = /^FLOAT\((\d+)/i.exec(sql)?.[1];
      return precision !== undefined && Number(precision) <= 24 ? t.f32 : t.f64;
    }
    default: {
      const entry = DECLARED_BY_KEY[key];
      return entry?.[0];
    }
  }
}

export interface FieldsFromModelOptions {
  /** Dialect the table lives in. Default: the dialect of the model's Sequelize instance. */
  readonly dialect?: Dialect;
}

/**
 * Field specs for a model's stored attributes, in definition order.
 *
 * Uses the column name (`field`) rather than the attribute name, wraps nullable
 * attributes in `optional`, and skips `VIRTUAL` attributes. Types follow the
 * dialect, so the fields validate against the table the model syncs to.
 */
export function fieldsFromModel(model: ModelStatic<Model>, options?: FieldsFromModelOptions): FieldSpec[] {
  const dialect = resolveDialect(options?.dialect ?? model.sequelize?.getDialect());
  const fields: FieldSpec[] = [];

  for (const [name, attribute] of Object.entries(model.getAttributes())) {
    const type = attribute.type;
    if (typeof type !== 'string' && type.key === 'VIRTUAL') continue;

    const declared = declaredTypeOf(type, dialect);
    fields.push({
      name: attribute.field ?? name,
      type: attribute.allowNull === false ? declared : t.optional(declared),
    });
  }

  return fields;
}

function resolveDialect(dialect: string | undefined): Dialect | undefined {
  if (dialect === undefined || isSupportedDialect(dialect)) return dialect;
  throw new Error(`fieldsFromModel: unsupported dialect '${dialect}' (supported: ${SUPPORTED_DIALECTS.join(', ')})`);
}

function isSupportedDialect(dialect: string): dialect is Dialect {
  return SUPPORTED_DIALECTS.some((supported) => supported === dialect);
}
