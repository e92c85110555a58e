import type { TypeMappingPlugin } from '../ports/TypeMappingPlugin.js';
import type { TimeUnit } from '../model/ColumnType.js';
import { ColumnTypes, datetime } from '../model/ColumnType.js';

export interface TemporalTypesOptions {
  /** Resolution assigned to date-time columns. Default: `'us'`. */
  readonly timeUnit?: TimeUnit;
}

/**
 * Date and time support for the schema mapper.
 *
 * Maps `date` to `Date`, `time` to `Time`, `dateTime` to a naive `Datetime` and
 * `zonedDateTime<UTC>` to a UTC `Datetime`. Zones other than UTC are left unrecognized.
 */
export function temporalTypes(options?: TemporalTypesOptions): TypeMappingPlugin {
  const unit = options?.timeUnit ?? 'us';
  const naive = datetime(unit);
  const utc = datetime(unit, 'UTC');

  return {
    name: 'temporal',
    resolve(type) {
      switch (type.name) {
        case 'date':
          return ColumnTypes.Date;
        case 'time':
          return ColumnTypes.Time;
        case 'dateTime':
          return naive;
        case 'zonedDateTime':
          return type.params.length === 1 && type.params[0] === 'UTC' ? utc : undefined;
        default:
          return undefined;
      }
    },
  };
}
