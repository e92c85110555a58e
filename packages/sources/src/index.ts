// Schema sources
export { CsvSchemaSource } from './infrastructure/CsvSchemaSource.js';
export type { CsvSchemaSourceOptions } from './infrastructure/CsvSchemaSource.js';
export { JsonSchemaSource } from './infrastructure/JsonSchemaSource.js';
export type { JsonSchemaSourceOptions } from './infrastructure/JsonSchemaSource.js';

// Domain services
export { TypeInference, DEFAULT_INFER_SCHEMA_LENGTH } from './domain/services/TypeInference.js';
export type { InferenceOptions } from './domain/services/TypeInference.js';
