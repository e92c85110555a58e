/** A host type referenced by name, e.g. `i32` or `zonedDateTime<UTC>`. */
export interface NamedType {
  readonly kind: 'named';
  readonly name: string;
  readonly params: readonly string[];
}

/** Marks a field as nullable. Carries no column type of its own. */
export interface OptionalType {
  readonly kind: 'optional';
  readonly inner: DeclaredType;
}

/** Declared type of a field in a structured type definition. */
export type DeclaredType = NamedType | OptionalType;

/** Build a named type descriptor for any host type. */
export function named(name: string, ...params: string[]): NamedType {
  return Object.freeze({ kind: 'named', name, params: Object.freeze([...params]) });
}

/**
 * Wrap a type as optional. Only one level of wrapping is supported, so passing
 * an optional type throws.
 */
export function optional(inner: DeclaredType): OptionalType {
  if (inner.kind === 'optional') {
    throw new Error(`optional: nested optional types are not supported (${describeDeclaredType(inner)})`);
  }
  return Object.freeze({ kind: 'optional', inner });
}

/**
 * Declared type builders.
 *
 * @example
 * ```typescript
 * const fields = { id: t.i32, name: t.string, createdAt: t.optional(t.zonedDateTime('UTC')) };
 * ```
 */
export const t = {
  i8: named('i8'),
  i16: named('i16'),
  i32: named('i32'),
  i64: named('i64'),
  u8: named('u8'),
  u16: named('u16'),
  u32: named('u32'),
  u64: named('u64'),
  f32: named('f32'),
  f64: named('f64'),
  bool: named('bool'),
  string: named('string'),
  /** Calendar date without time of day. Needs the temporal plugin. */
  date: named('date'),
  /** Date and time without a zone. Needs the temporal plugin. */
  dateTime: named('dateTime'),
  /** Time of day. Needs the temporal plugin. */
  time: named('time'),
  /** Date and time in a zone. Needs the temporal plugin; only `UTC` is recognized. */
  zonedDateTime: (timeZone: string): NamedType => named('zonedDateTime', timeZone),
  named,
  optional,
} as const;

/** Render a declared type for messages, e.g. `Option<i32>`. */
export function describeDeclaredType(type: DeclaredType): string {
  if (type.kind === 'optional') {
    return `Option<${describeDeclaredType(type.inner)}>`;
  }
  return type.params.length === 0 ? type.name : `${type.name}<${type.params.join(', ')}>`;
}
