/** Machine-readable codes for schema mismatches. */
export type SchemaErrorCode = 'MISSING_COLUMN' | 'TYPE_MISMATCH' | 'COLUMN_COUNT_MISMATCH' | 'UNEXPECTED_COLUMN';

/** An expected column is absent from the table. */
export interface MissingColumnError {
  readonly code: 'MISSING_COLUMN';
  readonly column: string;
  readonly message: string;
}

/** A column exists but its type differs from the expected one. */
export interface TypeMismatchError {
  readonly code: 'TYPE_MISMATCH';
  readonly column: string;
  /** Expected column type, rendered with `formatColumnType()`. */
  readonly expectedType: string;
  /** Actual column type, rendered with `formatColumnType()`. */
  readonly actualType: string;
  readonly message: string;
}

/** Strict mode only: the table has a different number of columns than the schema. */
export interface ColumnCountMismatchError {
  readonly code: 'COLUMN_COUNT_MISMATCH';
  readonly expectedCount: number;
  readonly actualCount: number;
  readonly message: string;
}

/** Strict mode only: the table has a column the schema does not declare. */
export interface UnexpectedColumnError {
  readonly code: 'UNEXPECTED_COLUMN';
  readonly column: string;
  readonly message: string;
}

/** The first structural defect found while comparing a table against a schema. */
export type SchemaError = MissingColumnError | TypeMismatchError | ColumnCountMismatchError | UnexpectedColumnError;

export function missingColumn(column: string): MissingColumnError {
  return { code: 'MISSING_COLUMN', column, message: `Column '${column}' not found in DataFrame` };
}

export function typeMismatch(column: string, expectedType: string, actualType: string): TypeMismatchError {
  return {
    code: 'TYPE_MISMATCH',
    column,
    expectedType,
    actualType,
    message: `Column '${column}' has type ${actualType} but expected ${expectedType}`,
  };
}

export function columnCountMismatch(expectedCount: number, actualCount: number): ColumnCountMismatchError {
  return {
    code: 'COLUMN_COUNT_MISMATCH',
    expectedCount,
    actualCount,
    message: `Column count mismatch: DataFrame has ${String(actualCount)} columns but schema expects ${String(expectedCount)}`,
  };
}

export function unexpectedColumn(column: string): UnexpectedColumnError {
  return { code: 'UNEXPECTED_COLUMN', column, message: `Unexpected column '${column}' found in DataFrame` };
}

/** Render a schema error as a human-readable message. */
export function formatSchemaError(error: SchemaError): string {
  switch (error.code) {
    case 'MISSING_COLUMN':
      return missingColumn(error.column).message;
    case 'TYPE_MISMATCH':
      return typeMismatch(error.column, error.expectedType, error.actualType).message;
    case 'COLUMN_COUNT_MISMATCH':
      return columnCountMismatch(error.expectedCount, error.actualCount).message;
    case 'UNEXPECTED_COLUMN':
      return unexpectedColumn(error.column).message;
  }
}

/** Thrown by the asserting APIs when a table does not conform. Wraps the structured error in `detail`. */
export class SchemaValidationError extends Error {
  readonly detail: SchemaError;

  constructor(detail: SchemaError) {
    super(formatSchemaError(detail));
    this.name = 'SchemaValidationError';
    this.detail = detail;
  }

  get code(): SchemaErrorCode {
    return this.detail.code;
  }
}

/** Thrown when a schema cannot be derived from its field definitions. */
export class SchemaDefinitionError extends Error {
  readonly fields: readonly string[];

  constructor(message: string, fields: readonly string[]) {
    super(message);
    this.name = 'SchemaDefinitionError';
    this.fields = fields;
  }
}
