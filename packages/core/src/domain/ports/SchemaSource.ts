import type { ObservedSchema } from '../model/ObservedSchema.js';

/**
 * Port for reading the column schema of a concrete table (file, query result, payload).
 *
 * Implementations only need read access to the table's ordered column names and types.
 */
export interface SchemaSource {
  describe(): Promise<ObservedSchema>;
}
