import type { SchemaError } from '../model/SchemaError.js';
import type { ValidationMode } from '../model/ValidationResult.js';

/** Emitted once, when a schema's expected columns are first derived. */
export interface SchemaDerivedEvent {
  readonly type: 'schema:derived';
  readonly schemaName: string;
  readonly columnCount: number;
  readonly timestamp: number;
}

/** Emitted during derivation for each field whose declared type was not recognized and became `String`. */
export interface TypeFallbackEvent {
  readonly type: 'schema:type-fallback';
  readonly schemaName: string;
  readonly field: string;
  /** Declared type as rendered by `describeDeclaredType()`. */
  readonly declaredType: string;
  readonly timestamp: number;
}

/** Emitted when a table conforms to the schema. */
export interface ValidationPassedEvent {
  readonly type: 'validation:passed';
  readonly schemaName: string;
  readonly mode: ValidationMode;
  readonly columnCount: number;
  readonly timestamp: number;
}

/** Emitted when a table does not conform to the schema. */
export interface ValidationFailedEvent {
  readonly type: 'validation:failed';
  readonly schemaName: string;
  readonly mode: ValidationMode;
  readonly error: SchemaError;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent = SchemaDerivedEvent | TypeFallbackEvent | ValidationPassedEvent | ValidationFailedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
