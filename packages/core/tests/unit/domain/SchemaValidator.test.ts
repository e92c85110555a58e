import { describe, it, expect } from 'vitest';
import { SchemaValidator, validateSchema, validateSchemaStrict } from '../../../src/domain/services/SchemaValidator.js';
import { ColumnTypes, datetime } from '../../../src/domain/model/ColumnType.js';
import { observedSchema } from '../../../src/domain/model/ObservedSchema.js';
import type { ExpectedSchema } from '../../../src/domain/model/FieldSpec.js';
import type { ColumnType } from '../../../src/domain/model/ColumnType.js';

const idAndName: ExpectedSchema = [
  { name: 'id', type: ColumnTypes.Int32 },
  { name: 'name', type: ColumnTypes.String },
];

describe('SchemaValidator', () => {
  describe('validate (permissive)', () => {
    it('should pass when every column matches', () => {
      const observed = observedSchema({ id: ColumnTypes.Int32, name: ColumnTypes.String });
      expect(validateSchema(idAndName, observed)).toEqual({ isValid: true });
    });

    it('should report a type mismatch with both types', () => {
      const observed = observedSchema({ id: ColumnTypes.String, name: ColumnTypes.String });
      const result = validateSchema(idAndName, observed);

      expect(result).toEqual({
        isValid: false,
        error: {
          code: 'TYPE_MISMATCH',
          column: 'id',
          expectedType: 'Int32',
          actualType: 'String',
          message: "Column 'id' has type String but expected Int32",
        },
      });
    });

    it('should report a missing column', () => {
      const expected: ExpectedSchema = [
        { name: 'id', type: ColumnTypes.Int32 },
        { name: 'value', type: ColumnTypes.Float64 },
      ];
      const result = validateSchema(expected, observedSchema({ id: ColumnTypes.Int32 }));

      expect(result).toEqual({
        isValid: false,
        error: { code: 'MISSING_COLUMN', column: 'value', message: "Column 'value' not found in DataFrame" },
      });
    });

    it('should stop at the first defect in schema order', () => {
      const observed = observedSchema({ name: ColumnTypes.Int64 });
      const result = validateSchema(idAndName, observed);

      expect(result.isValid).toBe(false);
      if (result.isValid) return;
      expect(result.error.code).toBe('MISSING_COLUMN');
    });

    it('should ignore extra columns', () => {
      const observed = observedSchema({ id: ColumnTypes.Int32, extra: ColumnTypes.String, name: ColumnTypes.String });
      expect(validateSchema(idAndName, observed).isValid).toBe(true);
    });

    it('should compare datetime parameters', () => {
      const expected: ExpectedSchema = [{ name: 'at', type: datetime('us', 'UTC') }];
      const result = validateSchema(expected, observedSchema({ at: datetime('us') }));

      expect(result.isValid).toBe(false);
      if (result.isValid) return;
      expect(result.error.message).toBe("Column 'at' has type Datetime(us) but expected Datetime(us, UTC)");
    });

    it('should pass an empty schema against any table', () => {
      expect(validateSchema([], observedSchema({ a: ColumnTypes.Int8 })).isValid).toBe(true);
    });
  });

  describe('validateStrict', () => {
    it('should pass on an exact match in any column order', () => {
      const observed = observedSchema([
        ['name', ColumnTypes.String],
        ['id', ColumnTypes.Int32],
      ]);
      expect(validateSchemaStrict(idAndName, observed)).toEqual({ isValid: true });
    });

    it('should report a count mismatch for an extra column', () => {
      const expected: ExpectedSchema = [{ name: 'id', type: ColumnTypes.Int32 }];
      const observed = observedSchema({ id: ColumnTypes.Int32, extra: ColumnTypes.String });

      expect(validateSchema(expected, observed).isValid).toBe(true);
      expect(validateSchemaStrict(expected, observed)).toEqual({
        isValid: false,
        error: {
          code: 'COLUMN_COUNT_MISMATCH',
          expectedCount: 1,
          actualCount: 2,
          message: 'Column count mismatch: DataFrame has 2 columns but schema expects 1',
        },
      });
    });

    it('should check the count before per-column checks', () => {
      const observed = observedSchema({ id: ColumnTypes.Int32, name: ColumnTypes.String, extra: ColumnTypes.String });
      const result = validateSchemaStrict(idAndName, observed);

      expect(result.isValid).toBe(false);
      if (result.isValid) return;
      expect(result.error.code).toBe('COLUMN_COUNT_MISMATCH');
    });

    it('should report a count mismatch for too few columns even when present ones mismatch', () => {
      const result = validateSchemaStrict(idAndName, observedSchema({ id: ColumnTypes.Boolean }));

      expect(result.isValid).toBe(false);
      if (result.isValid) return;
      expect(result.error).toMatchObject({ code: 'COLUMN_COUNT_MISMATCH', expectedCount: 2, actualCount: 1 });
    });

    it('should report a missing column before an unexpected one when a name is swapped', () => {
      const observed = observedSchema({ id: ColumnTypes.Int32, label: ColumnTypes.String });
      const result = validateSchemaStrict(idAndName, observed);

      expect(result).toEqual({
        isValid: false,
        error: { code: 'MISSING_COLUMN', column: 'name', message: "Column 'name' not found in DataFrame" },
      });
    });

    it('should report type mismatches in strict mode', () => {
      const observed = observedSchema({ id: ColumnTypes.Int64, name: ColumnTypes.String });
      const result = validateSchemaStrict(idAndName, observed);

      expect(result.isValid).toBe(false);
      if (result.isValid) return;
      expect(result.error).toMatchObject({ code: 'TYPE_MISMATCH', column: 'id', expectedType: 'Int32', actualType: 'Int64' });
    });
  });

  describe('unexpected column scan', () => {
    // Lookups succeed for a name it does not list, so equal counts and passing
    // lookups can still leave an undeclared column behind.
    class AliasingSchema extends Map<string, ColumnType> {
      get(key: string): ColumnType | undefined {
        return key === 'key' ? ColumnTypes.Int32 : super.get(key);
      }
    }

    it('should report the first observed column the schema does not declare', () => {
      const expected: ExpectedSchema = [
        { name: 'id', type: ColumnTypes.Int32 },
        { name: 'key', type: ColumnTypes.Int32 },
      ];
      const result = new SchemaValidator(expected).validateStrict(
        new AliasingSchema([
          ['id', ColumnTypes.Int32],
          ['legacy_id', ColumnTypes.Int32],
        ]),
      );

      expect(result).toEqual({
        isValid: false,
        error: {
          code: 'UNEXPECTED_COLUMN',
          column: 'legacy_id',
          message: "Unexpected column 'legacy_id' found in DataFrame",
        },
      });
    });
  });
});
