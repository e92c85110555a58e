import type { ColumnType } from '../model/ColumnType.js';
import { ColumnTypes } from '../model/ColumnType.js';
import type { DeclaredType, NamedType } from '../model/DeclaredType.js';
import { describeDeclaredType } from '../model/DeclaredType.js';
import type { ExpectedSchema, FieldSpec } from '../model/FieldSpec.js';
import { SchemaDefinitionError } from '../model/SchemaError.js';
import type { TypeMappingPlugin } from '../ports/TypeMappingPlugin.js';

/** What to do with declared types no rule recognizes. */
export type UnknownTypePolicy = 'fallback' | 'reject';

export interface SchemaMapperConfig {
  /** Extra lookup rules, consulted in order after the built-in table. */
  readonly plugins?: readonly TypeMappingPlugin[];
  /**
   * `'fallback'` maps unrecognized types to `String`; `'reject'` makes `deriveSchema()`
   * throw instead. `mapType()` always falls back. Default: `'fallback'`.
   */
  readonly unknownTypes?: UnknownTypePolicy;
}

/** Called by `deriveSchema()` for each field whose type fell back to `String`. */
export type FallbackListener = (field: FieldSpec) => void;

const BUILTIN_TYPES: ReadonlyMap<string, ColumnType> = new Map<string, ColumnType>([
  ['i8', ColumnTypes.Int8],
  ['i16', ColumnTypes.Int16],
  ['i32', ColumnTypes.Int32],
  ['i64', ColumnTypes.Int64],
  ['u8', ColumnTypes.UInt8],
  ['u16', ColumnTypes.UInt16],
  ['u32', ColumnTypes.UInt32],
  ['u64', ColumnTypes.UInt64],
  ['f32', ColumnTypes.Float32],
  ['f64', ColumnTypes.Float64],
  ['bool', ColumnTypes.Boolean],
  ['boolean', ColumnTypes.Boolean],
  ['string', ColumnTypes.String],
  ['str', ColumnTypes.String],
]);

/**
 * Domain service mapping declared field types to column types.
 *
 * Pure and stateless after construction: the same declared type always yields
 * an equal column type, and no mapping depends on another field.
 */
export class SchemaMapper {
  private readonly plugins: readonly TypeMappingPlugin[];
  private readonly unknownTypes: UnknownTypePolicy;

  constructor(config?: SchemaMapperConfig) {
    const plugins = config?.plugins ?? [];
    const names = new Set<string>();
    for (const plugin of plugins) {
      if (names.has(plugin.name)) {
        throw new Error(`SchemaMapper: plugin '${plugin.name}' is registered twice`);
      }
      names.add(plugin.name);
    }
    this.plugins = plugins;
    this.unknownTypes = config?.unknownTypes ?? 'fallback';
  }

  /** Names of the configured plugins, in lookup order. */
  get pluginNames(): string[] {
    return this.plugins.map((plugin) => plugin.name);
  }

  /** Map a declared type to its column type. Never throws; unrecognized types map to `String`. */
  mapType(type: DeclaredType): ColumnType {
    return this.lookup(this.unwrap(type)) ?? ColumnTypes.String;
  }

  /** Whether the built-in table or a plugin recognizes the type (after unwrapping `optional`). */
  isRecognized(type: DeclaredType): boolean {
    return this.lookup(this.unwrap(type)) !== undefined;
  }

  /** Derive the expected schema for an ordered list of fields. */
  deriveSchema(fields: readonly FieldSpec[], onFallback?: FallbackListener): ExpectedSchema {
    const unrecognized = fields.filter((field) => !this.isRecognized(field.type));

    if (unrecognized.length > 0 && this.unknownTypes === 'reject') {
      const list = unrecognized.map((f) => `'${f.name}' (${describeDeclaredType(f.type)})`).join(', ');
      throw new SchemaDefinitionError(
        `SchemaMapper: unrecognized field types: ${list}`,
        unrecognized.map((f) => f.name),
      );
    }

    if (onFallback) {
      for (const field of unrecognized) onFallback(field);
    }

    return Object.freeze(fields.map((field) => Object.freeze({ name: field.name, type: this.mapType(field.type) })));
  }

  // Only the outermost optional is unwrapped; an optional inside it stays unrecognized.
  private unwrap(type: DeclaredType): DeclaredType {
    return type.kind === 'optional' ? type.inner : type;
  }

  private lookup(type: DeclaredType): ColumnType | undefined {
    if (type.kind !== 'named') return undefined;
    return this.lookupNamed(type);
  }

  private lookupNamed(type: NamedType): ColumnType | undefined {
    if (type.params.length === 0) {
      const builtin = BUILTIN_TYPES.get(type.name);
      if (builtin) return builtin;
    }

    for (const plugin of this.plugins) {
      const resolved = plugin.resolve(type);
      if (resolved) return resolved;
    }

    return undefined;
  }
}
