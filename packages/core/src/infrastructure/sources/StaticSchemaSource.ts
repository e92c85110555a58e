import type { SchemaSource } from '../../domain/ports/SchemaSource.js';
import type { ColumnType } from '../../domain/model/ColumnType.js';
import type { ObservedSchema } from '../../domain/model/ObservedSchema.js';
import { observedSchema } from '../../domain/model/ObservedSchema.js';

/** Schema source over a fixed column mapping, e.g. one captured from an in-memory table. */
export class StaticSchemaSource implements SchemaSource {
  private readonly schema: ObservedSchema;

  constructor(columns: Readonly<Record<string, ColumnType>> | Iterable<readonly [string, ColumnType]>) {
    this.schema = observedSchema(columns);
  }

  describe(): Promise<ObservedSchema> {
    return Promise.resolve(this.schema);
  }
}
