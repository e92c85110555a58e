import type { Sequelize } from 'sequelize';
import type { ColumnType, ObservedSchema, SchemaSource } from '@frameschema/core';
import { mapSqlType } from './mappers/SqlTypeMapper.js';

export interface SequelizeTableSourceOptions {
  /** Database schema (e.g. a PostgreSQL schema) holding the table. */
  readonly schema?: string;
}

/**
 * Schema source for a database table, read through Sequelize's `QueryInterface.describeTable()`.
 *
 * Column types are read for SQLite, MySQL, MariaDB and PostgreSQL; type names
 * from other dialects map to `String` unless they share a name with these. The
 * table is described on every call, so migrations applied between checks are picked up.
 */
export class SequelizeTableSource implements SchemaSource {
  constructor(
    private readonly sequelize: Sequelize,
    private readonly tableName: string,
    private readonly options?: SequelizeTableSourceOptions,
  ) {}

  async describe(): Promise<ObservedSchema> {
    const table = this.options?.schema ? { tableName: this.tableName, schema: this.options.schema } : this.tableName;
    const description = await this.sequelize.getQueryInterface().describeTable(table);

    const schema = new Map<string, ColumnType>();
    for (const [column, attributes] of Object.entries(description)) {
      schema.set(column, mapSqlType(attributes.type));
    }
    return schema;
  }
}
