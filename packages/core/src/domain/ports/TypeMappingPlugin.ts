import type { ColumnType } from '../model/ColumnType.js';
import type { NamedType } from '../model/DeclaredType.js';

/**
 * Extra lookup rules for the schema mapper.
 *
 * Return a column type for the named types the plugin recognizes and `undefined`
 * for everything else, so later plugins and the fallback still apply.
 */
export interface TypeMappingPlugin {
  /** Plugin name. A mapper accepts each name once. */
  readonly name: string;
  resolve(type: NamedType): ColumnType | undefined;
}
