import type { SchemaError } from './SchemaError.js';
import { SchemaValidationError } from './SchemaError.js';

/** Which comparison produced a result. */
export type ValidationMode = 'permissive' | 'strict';

export interface ValidResult {
  readonly isValid: true;
}

export interface InvalidResult {
  readonly isValid: false;
  readonly error: SchemaError;
}

/** Result of validating one table against a schema: success, or the first defect found. */
export type ValidationResult = ValidResult | InvalidResult;

const VALID: ValidResult = Object.freeze({ isValid: true });

/** Create a passing validation result. */
export function validResult(): ValidResult {
  return VALID;
}

/** Create a failing validation result for the given error. */
export function invalidResult(error: SchemaError): InvalidResult {
  return { isValid: false, error };
}

/** Throw a `SchemaValidationError` when the result is a failure. */
export function assertValid(result: ValidationResult): asserts result is ValidResult {
  if (!result.isValid) {
    throw new SchemaValidationError(result.error);
  }
}
