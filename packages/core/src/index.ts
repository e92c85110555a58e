// Main entry point
export { TableSchema, defineSchema } from './TableSchema.js';
export type { TableSchemaConfig, CheckOptions } from './TableSchema.js';

// Domain model
export type {
  ColumnType,
  ColumnKind,
  SimpleColumnKind,
  SimpleColumnType,
  DatetimeColumnType,
  TimeUnit,
} from './domain/model/ColumnType.js';
export { ColumnTypes, datetime, columnTypeEquals, formatColumnType } from './domain/model/ColumnType.js';
export type { DeclaredType, NamedType, OptionalType } from './domain/model/DeclaredType.js';
export { t, named, optional, describeDeclaredType } from './domain/model/DeclaredType.js';
export type { FieldSpec, FieldsDefinition, ExpectedColumn, ExpectedSchema } from './domain/model/FieldSpec.js';
export { toFieldSpecs } from './domain/model/FieldSpec.js';
export type { ObservedSchema } from './domain/model/ObservedSchema.js';
export { observedSchema } from './domain/model/ObservedSchema.js';
export type {
  SchemaError,
  SchemaErrorCode,
  MissingColumnError,
  TypeMismatchError,
  ColumnCountMismatchError,
  UnexpectedColumnError,
} from './domain/model/SchemaError.js';
export {
  missingColumn,
  typeMismatch,
  columnCountMismatch,
  unexpectedColumn,
  formatSchemaError,
  SchemaValidationError,
  SchemaDefinitionError,
} from './domain/model/SchemaError.js';
export type { ValidationResult, ValidResult, InvalidResult, ValidationMode } from './domain/model/ValidationResult.js';
export { validResult, invalidResult, assertValid } from './domain/model/ValidationResult.js';

// Domain services
export { SchemaMapper } from './domain/services/SchemaMapper.js';
export type { SchemaMapperConfig, UnknownTypePolicy, FallbackListener } from './domain/services/SchemaMapper.js';
export { SchemaValidator, validateSchema, validateSchemaStrict } from './domain/services/SchemaValidator.js';

// Plugins
export { temporalTypes } from './domain/plugins/temporalTypes.js';
export type { TemporalTypesOptions } from './domain/plugins/temporalTypes.js';

// Ports (for custom implementations)
export type { SchemaSource } from './domain/ports/SchemaSource.js';
export type { TypeMappingPlugin } from './domain/ports/TypeMappingPlugin.js';

// Infrastructure adapters
export { StaticSchemaSource } from './infrastructure/sources/StaticSchemaSource.js';

// Application
export { EventBus } from './application/EventBus.js';
export type { SubscribeOptions } from './application/EventBus.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  SchemaDerivedEvent,
  TypeFallbackEvent,
  ValidationPassedEvent,
  ValidationFailedEvent,
} from './domain/events/DomainEvents.js';
