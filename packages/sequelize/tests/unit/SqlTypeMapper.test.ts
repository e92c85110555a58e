import { describe, it, expect } from 'vitest';
import { ColumnTypes, datetime } from '@frameschema/core';
import { mapSqlType } from '../../src/mappers/SqlTypeMapper.js';

describe('mapSqlType', () => {
  it('should map integer widths', () => {
    expect(mapSqlType('TINYINT')).toEqual(ColumnTypes.Int8);
    expect(mapSqlType('smallint')).toEqual(ColumnTypes.Int16);
    expect(mapSqlType('INTEGER')).toEqual(ColumnTypes.Int32);
    expect(mapSqlType('int(11)')).toEqual(ColumnTypes.Int32);
    expect(mapSqlType('BIGINT')).toEqual(ColumnTypes.Int64);
    expect(mapSqlType('int8')).toEqual(ColumnTypes.Int64);
  });

  it('should map unsigned integers', () => {
    expect(mapSqlType('TINYINT UNSIGNED')).toEqual(ColumnTypes.UInt8);
    expect(mapSqlType('INTEGER UNSIGNED')).toEqual(ColumnTypes.UInt32);
    expect(mapSqlType('bigint(20) unsigned zerofill')).toEqual(ColumnTypes.UInt64);
  });

  it('should map floating point and decimal types', () => {
    expect(mapSqlType('REAL')).toEqual(ColumnTypes.Float32);
    expect(mapSqlType('FLOAT')).toEqual(ColumnTypes.Float32);
    expect(mapSqlType('DOUBLE PRECISION')).toEqual(ColumnTypes.Float64);
    expect(mapSqlType('DECIMAL(10,2)')).toEqual(ColumnTypes.Float64);
  });

  it('should map booleans, including TINYINT(1)', () => {
    expect(mapSqlType('BOOLEAN')).toEqual(ColumnTypes.Boolean);
    expect(mapSqlType('TINYINT(1)')).toEqual(ColumnTypes.Boolean);
  });

  it('should map temporal types', () => {
    expect(mapSqlType('DATE')).toEqual(ColumnTypes.Date);
    expect(mapSqlType('TIME')).toEqual(ColumnTypes.Time);
    expect(mapSqlType('DATETIME')).toEqual(datetime('us'));
    expect(mapSqlType('timestamp(6) without time zone')).toEqual(datetime('us'));
    expect(mapSqlType('TIMESTAMP WITH  TIME ZONE')).toEqual(datetime('us', 'UTC'));
  });

  it('should map text and unknown types to String', () => {
    expect(mapSqlType('VARCHAR(255)')).toEqual(ColumnTypes.String);
    expect(mapSqlType('TEXT')).toEqual(ColumnTypes.String);
    expect(mapSqlType('UUID')).toEqual(ColumnTypes.String);
    expect(mapSqlType('JSONB')).toEqual(ColumnTypes.String);
  });
});
