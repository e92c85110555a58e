import type { ColumnType } from './ColumnType.js';
import type { DeclaredType } from './DeclaredType.js';

/** A field of a structured type: its name and declared type. */
export interface FieldSpec {
  readonly name: string;
  readonly type: DeclaredType;
}

/** A single column the table is expected to contain. */
export interface ExpectedColumn {
  readonly name: string;
  readonly type: ColumnType;
}

/** Ordered expected columns, one per field. Names are unique. */
export type ExpectedSchema = readonly ExpectedColumn[];

/**
 * Field definitions accepted by `defineSchema()`.
 *
 * The record form follows property order. Integer-like keys are ordered first by
 * the JavaScript runtime, so use the array form when such names must keep their place.
 */
export type FieldsDefinition =
  | Readonly<Record<string, DeclaredType>>
  | readonly (FieldSpec | readonly [string, DeclaredType])[];

/** Normalize a fields definition into ordered field specs. Rejects duplicate names. */
export function toFieldSpecs(definition: FieldsDefinition): readonly FieldSpec[] {
  const specs: FieldSpec[] = isFieldList(definition)
    ? definition.map((entry) => (isFieldTuple(entry) ? { name: entry[0], type: entry[1] } : entry))
    : Object.entries(definition).map(([name, type]) => ({ name, type }));

  const seen = new Set<string>();
  for (const spec of specs) {
    if (seen.has(spec.name)) {
      throw new Error(`toFieldSpecs: duplicate field '${spec.name}'`);
    }
    seen.add(spec.name);
  }

  return Object.freeze(specs);
}

function isFieldList(
  definition: FieldsDefinition,
): definition is readonly (FieldSpec | readonly [string, DeclaredType])[] {
  return Array.isArray(definition);
}

function isFieldTuple(entry: FieldSpec | readonly [string, DeclaredType]): entry is readonly [string, DeclaredType] {
  return Array.isArray(entry);
}
