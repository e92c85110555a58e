import type { ExpectedSchema } from '../model/FieldSpec.js';
import type { ObservedSchema } from '../model/ObservedSchema.js';
import type { ValidationResult } from '../model/ValidationResult.js';
import { validResult, invalidResult } from '../model/ValidationResult.js';
import { columnTypeEquals, formatColumnType } from '../model/ColumnType.js';
import { missingColumn, typeMismatch, columnCountMismatch, unexpectedColumn } from '../model/SchemaError.js';

/**
 * Domain service that compares observed table schemas against one expected schema.
 *
 * Both modes stop at the first defect. Strict mode checks the column count first,
 * then every expected column, then looks for columns the schema does not declare.
 */
export class SchemaValidator {
  private readonly expectedNames: ReadonlySet<string>;

  constructor(private readonly expected: ExpectedSchema) {
    this.expectedNames = new Set(expected.map((column) => column.name));
  }

  /** Permissive mode: every expected column must exist with an equal type. Extra columns are ignored. */
  validate(observed: ObservedSchema): ValidationResult {
    for (const column of this.expected) {
      const actual = observed.get(column.name);
      if (actual === undefined) {
        return invalidResult(missingColumn(column.name));
      }
      if (!columnTypeEquals(actual, column.type)) {
        return invalidResult(typeMismatch(column.name, formatColumnType(column.type), formatColumnType(actual)));
      }
    }
    return validResult();
  }

  /** Strict mode: the table must contain exactly the expected columns, with equal types. */
  validateStrict(observed: ObservedSchema): ValidationResult {
    if (observed.size !== this.expected.length) {
      return invalidResult(columnCountMismatch(this.expected.length, observed.size));
    }

    const columns = this.validate(observed);
    if (!columns.isValid) return columns;

    for (const name of observed.keys()) {
      if (!this.expectedNames.has(name)) {
        return invalidResult(unexpectedColumn(name));
      }
    }

    return validResult();
  }
}

/** Validate an observed schema against an expected schema in permissive mode. */
export function validateSchema(expected: ExpectedSchema, observed: ObservedSchema): ValidationResult {
  return new SchemaValidator(expected).validate(observed);
}

/** Validate an observed schema against an expected schema in strict mode. */
export function validateSchemaStrict(expected: ExpectedSchema, observed: ObservedSchema): ValidationResult {
  return new SchemaValidator(expected).validateStrict(observed);
}
