import { describe, it, expect } from 'vitest';
import { defineSchema, t, temporalTypes } from '@frameschema/core';
import { CsvSchemaSource } from '../../src/infrastructure/CsvSchemaSource.js';
import { JsonSchemaSource } from '../../src/infrastructure/JsonSchemaSource.js';

const transactions = defineSchema(
  { transaction_id: t.i64, amount: t.f64, customer_name: t.string, is_completed: t.bool },
  { name: 'transactions' },
);

describe('validating loaded files', () => {
  it('should accept a CSV export that matches the schema', async () => {
    const csv = 'transaction_id,amount,customer_name,is_completed\n1001,150.50,Alice,true\n1002,45,Bob,false\n';

    await expect(transactions.check(new CsvSchemaSource(csv), { strict: true })).resolves.toEqual({ isValid: true });
  });

  it('should flag a CSV column that does not parse as the declared type', async () => {
    const csv = 'transaction_id,amount,customer_name,is_completed\nT-1001,150.50,Alice,true\n';
    const result = await transactions.check(new CsvSchemaSource(csv));

    expect(result).toMatchObject({
      isValid: false,
      error: { message: "Column 'transaction_id' has type String but expected Int64" },
    });
  });

  it('should flag an extra column in strict mode only', async () => {
    const csv = 'transaction_id,amount,customer_name,is_completed,note\n1,2.5,Alice,true,hi\n';
    const source = new CsvSchemaSource(csv);

    expect((await transactions.check(source)).isValid).toBe(true);
    expect(await transactions.check(source, { strict: true })).toMatchObject({
      isValid: false,
      error: { code: 'COLUMN_COUNT_MISMATCH', expectedCount: 4, actualCount: 5 },
    });
  });

  it('should validate JSON records with parsed timestamps', async () => {
    const schema = defineSchema({ id: t.i64, at: t.zonedDateTime('UTC') }, { plugins: [temporalTypes()] });
    const json = '[{"id": 1, "at": "2024-05-01T00:00:00Z"}]';

    await expect(schema.check(JsonSchemaSource.fromText(json, { tryParseDates: true }), { strict: true })).resolves.toEqual({
      isValid: true,
    });
  });
});
