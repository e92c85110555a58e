import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import { ColumnTypes } from '@frameschema/core';
import { CsvSchemaSource } from '../../src/infrastructure/CsvSchemaSource.js';

const csv = ['id,name,score,active,joined', '1,Alice,9.5,true,2024-01-15', '2,Bob,7,false,2024-02-01', '3,,8.25,TRUE,'].join(
  '\n',
);

describe('CsvSchemaSource', () => {
  it('should infer column types from the rows', async () => {
    const schema = await new CsvSchemaSource(csv).describe();

    expect([...schema.entries()]).toEqual([
      ['id', ColumnTypes.Int64],
      ['name', ColumnTypes.String],
      ['score', ColumnTypes.Float64],
      ['active', ColumnTypes.Boolean],
      ['joined', ColumnTypes.String],
    ]);
  });

  it('should parse dates when asked', async () => {
    const schema = await new CsvSchemaSource(csv, { tryParseDates: true }).describe();
    expect(schema.get('joined')).toEqual(ColumnTypes.Date);
  });

  it('should accept a Buffer', async () => {
    const schema = await new CsvSchemaSource(Buffer.from('a,b\n1,x\n')).describe();
    expect(schema.get('a')).toEqual(ColumnTypes.Int64);
    expect(schema.get('b')).toEqual(ColumnTypes.String);
  });

  it('should name columns by position without a header', async () => {
    const schema = await new CsvSchemaSource('1,true\n2,false\n', { hasHeader: false }).describe();
    expect([...schema.keys()]).toEqual(['column_1', 'column_2']);
    expect(schema.get('column_2')).toEqual(ColumnTypes.Boolean);
  });

  it('should use an explicit delimiter', async () => {
    const schema = await new CsvSchemaSource('a|b\n1|2.5\n', { delimiter: '|' }).describe();
    expect([...schema.entries()]).toEqual([
      ['a', ColumnTypes.Int64],
      ['b', ColumnTypes.Float64],
    ]);
  });

  it('should report a header-only file as text columns', async () => {
    const schema = await new CsvSchemaSource('a,b\n').describe();
    expect([...schema.entries()]).toEqual([
      ['a', ColumnTypes.String],
      ['b', ColumnTypes.String],
    ]);
  });

  it('should describe empty content as a table without columns', async () => {
    const schema = await new CsvSchemaSource('').describe();
    expect(schema.size).toBe(0);
  });

  it('should reject duplicate header names', async () => {
    await expect(new CsvSchemaSource('a,b,a\n1,2,3\n').describe()).rejects.toThrow(
      "CsvSchemaSource: duplicate column 'a' in header",
    );
  });

  it('should read a file and detect its delimiter', async () => {
    const path = fileURLToPath(new URL('../fixtures/people.csv', import.meta.url));
    const schema = await CsvSchemaSource.fromFile(path, { tryParseDates: true }).describe();

    expect([...schema.entries()]).toEqual([
      ['id', ColumnTypes.Int64],
      ['name', ColumnTypes.String],
      ['score', ColumnTypes.Float64],
      ['active', ColumnTypes.Boolean],
      ['joined', ColumnTypes.Date],
    ]);
  });

  it('should propagate file errors', async () => {
    await expect(CsvSchemaSource.fromFile('/nonexistent/frameschema/missing.csv').describe()).rejects.toThrow(
      'ENOENT',
    );
  });

  it('should describe a large file from its sampled rows', async () => {
    const lines = ['id,name'];
    for (let i = 1; i <= 300_000; i++) lines.push(`${String(i)},user${String(i)}`);
    lines[200_000] = 'not-a-number,late';

    const schema = await new CsvSchemaSource(lines.join('\n')).describe();

    expect([...schema.entries()]).toEqual([
      ['id', ColumnTypes.Int64],
      ['name', ColumnTypes.String],
    ]);
  });

  it('should take the widest sampled row as the width without a header', async () => {
    const schema = await new CsvSchemaSource('1\n2,x,true\n3,y\n4,z,false,extra\n', {
      hasHeader: false,
      delimiter: ',',
      inferSchemaLength: 3,
    }).describe();

    expect([...schema.keys()]).toEqual(['column_1', 'column_2', 'column_3']);
  });
});
