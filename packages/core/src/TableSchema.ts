import type { ExpectedSchema, FieldSpec, FieldsDefinition } from './domain/model/FieldSpec.js';
import { toFieldSpecs } from './domain/model/FieldSpec.js';
import type { ObservedSchema } from './domain/model/ObservedSchema.js';
import type { ValidationMode, ValidationResult } from './domain/model/ValidationResult.js';
import { assertValid } from './domain/model/ValidationResult.js';
import { describeDeclaredType } from './domain/model/DeclaredType.js';
import type { TypeMappingPlugin } from './domain/ports/TypeMappingPlugin.js';
import type { SchemaSource } from './domain/ports/SchemaSource.js';
import type { DomainEvent, EventPayload, EventType } from './domain/events/DomainEvents.js';
import { SchemaMapper, type UnknownTypePolicy } from './domain/services/SchemaMapper.js';
import { SchemaValidator } from './domain/services/SchemaValidator.js';
import { EventBus } from './application/EventBus.js';

/** Configuration for a table schema. */
export interface TableSchemaConfig {
  /** Name reported in events. Default: `'schema'`. */
  readonly name?: string;
  /** Extra type mapping rules, e.g. `temporalTypes()`. */
  readonly plugins?: readonly TypeMappingPlugin[];
  /** Policy for unrecognized declared types. Default: `'fallback'` (map to `String`). */
  readonly unknownTypes?: UnknownTypePolicy;
  /**
   * Event bus to publish on. Default: a private bus. Handlers added through
   * `on()` and `onAny()` only see this schema's events, even on a shared bus.
   */
  readonly eventBus?: EventBus;
}

export interface CheckOptions {
  /** Require exactly the declared columns. Default: `false`. */
  readonly strict?: boolean;
}

/**
 * Facade tying a structured type's fields to table validation.
 *
 * The expected schema is derived on first use and cached; validation itself is
 * synchronous and keeps no state between calls.
 *
 * @example
 * ```typescript
 * const people = defineSchema({ id: t.i32, name: t.string, joined: t.optional(t.date) }, {
 *   plugins: [temporalTypes()],
 * });
 * const result = people.validateStrict(observedSchema({ id: ColumnTypes.Int32, ... }));
 * if (!result.isValid) console.error(result.error.message);
 * ```
 */
export class TableSchema {
  readonly name: string;
  readonly fields: readonly FieldSpec[];
  private readonly mapper: SchemaMapper;
  private readonly eventBus: EventBus;
  private validator: SchemaValidator | null = null;
  private expectedSchema: ExpectedSchema | null = null;

  constructor(fields: FieldsDefinition, config?: TableSchemaConfig) {
    this.name = config?.name ?? 'schema';
    this.fields = toFieldSpecs(fields);
    this.mapper = new SchemaMapper({ plugins: config?.plugins, unknownTypes: config?.unknownTypes });
    this.eventBus = config?.eventBus ?? new EventBus();
  }

  /** The expected columns, in field order. */
  expected(): ExpectedSchema {
    return this.derive().expected;
  }

  /** Check that every declared column exists with the right type. Extra columns are allowed. */
  validate(observed: ObservedSchema): ValidationResult {
    return this.report('permissive', observed, this.derive().validator.validate(observed));
  }

  /** Check that the table has exactly the declared columns, with the right types. */
  validateStrict(observed: ObservedSchema): ValidationResult {
    return this.report('strict', observed, this.derive().validator.validateStrict(observed));
  }

  /** Read a table's schema from a source and validate it. */
  async check(source: SchemaSource, options?: CheckOptions): Promise<ValidationResult> {
    const observed = await source.describe();
    return options?.strict ? this.validateStrict(observed) : this.validate(observed);
  }

  /** Like `validate()` / `validateStrict()`, but throws `SchemaValidationError` on failure. */
  assertValid(observed: ObservedSchema, options?: CheckOptions): void {
    const result = options?.strict ? this.validateStrict(observed) : this.validate(observed);
    assertValid(result);
  }

  /** Subscribe to this schema's events of a specific type. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.eventBus.on(type, handler, { schemaName: this.name });
    return this;
  }

  /** Unsubscribe a handler previously registered with `on()`. */
  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.eventBus.off(type, handler);
    return this;
  }

  /** Subscribe to all of this schema's events regardless of type. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.eventBus.onAny(handler, { schemaName: this.name });
    return this;
  }

  /** Unsubscribe a wildcard handler previously registered with `onAny()`. */
  offAny(handler: (event: DomainEvent) => void): this {
    this.eventBus.offAny(handler);
    return this;
  }

  private derive(): { expected: ExpectedSchema; validator: SchemaValidator } {
    if (this.expectedSchema && this.validator) {
      return { expected: this.expectedSchema, validator: this.validator };
    }

    const expected = this.mapper.deriveSchema(this.fields, (field) => {
      this.eventBus.emit({
        type: 'schema:type-fallback',
        schemaName: this.name,
        field: field.name,
        declaredType: describeDeclaredType(field.type),
        timestamp: Date.now(),
      });
    });
    const validator = new SchemaValidator(expected);

    this.expectedSchema = expected;
    this.validator = validator;
    this.eventBus.emit({
      type: 'schema:derived',
      schemaName: this.name,
      columnCount: expected.length,
      timestamp: Date.now(),
    });

    return { expected, validator };
  }

  private report(mode: ValidationMode, observed: ObservedSchema, result: ValidationResult): ValidationResult {
    if (result.isValid) {
      this.eventBus.emit({
        type: 'validation:passed',
        schemaName: this.name,
        mode,
        columnCount: observed.size,
        timestamp: Date.now(),
      });
    } else {
      this.eventBus.emit({
        type: 'validation:failed',
        schemaName: this.name,
        mode,
        error: result.error,
        timestamp: Date.now(),
      });
    }
    return result;
  }
}

/** Create a table schema from field definitions. */
export function defineSchema(fields: FieldsDefinition, config?: TableSchemaConfig): TableSchema {
  return new TableSchema(fields, config);
}
