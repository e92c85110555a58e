export { SequelizeTableSource } from './SequelizeTableSource.js';
export type { SequelizeTableSourceOptions } from './SequelizeTableSource.js';
export { mapSqlType } from './mappers/SqlTypeMapper.js';
export { fieldsFromModel, declaredTypeOf, SUPPORTED_DIALECTS } from './mappers/ModelFieldMapper.js';
export type { FieldsFromModelOptions } from './mappers/ModelFieldMapper.js';
