import { KdbArgumentError } from '@/connection/errors.js';

import { k } from './factories.js';
import { INT_NULL, LONG_NULL, SHORT_NULL } from './temporal.js';
import type { KValue } from './types.js';

/**
 * One-letter type codes, indexed by wire type code. Position 0 (space) is
 * the generic null, position 3 is unused.
 */
export const TYPE_CHARS = ' bg xhijefcspmdznuvt';

export const NULL_GUID = '00000000-0000-0000-0000-000000000000';

/**
 * Canonical null value of a type letter.
 *
 * @param typeChar - One of `" bgxhijefcspmdznuvt"`
 * @throws KdbArgumentError for any other letter
 *
 * @example
 * ```typescript
 * NULL('j'); // { kind: 'long', value: -9223372036854775808n }
 * NULL(' '); // { kind: 'null' }
 * ```
 */
export function NULL(typeChar: string): KValue {
  switch (typeChar) {
    case ' ':
      return k.nil();
    case 'b':
      return k.bool(false);
    case 'g':
      return k.guid(NULL_GUID);
    case 'x':
      return k.byte(0);
    case 'h':
      return k.short(SHORT_NULL);
    case 'i':
      return k.int(INT_NULL);
    case 'j':
      return k.long(LONG_NULL);
    case 'e':
      return k.real(Number.NaN);
    case 'f':
      return k.float(Number.NaN);
    case 'c':
      return k.char(' ');
    case 's':
      return k.symbol('');
    case 'p':
      return k.timestamp(LONG_NULL);
    case 'm':
      return k.month(INT_NULL);
    case 'd':
      return k.date(INT_NULL);
    case 'z':
      return k.datetime(Number.NaN);
    case 'n':
      return k.timespan(LONG_NULL);
    case 'u':
      return k.minute(INT_NULL);
    case 'v':
      return k.second(INT_NULL);
    case 't':
      return k.time(INT_NULL);
    default:
      throw new KdbArgumentError(`Unknown type character: '${typeChar}'`);
  }
}

/**
 * Check whether a value is the null of its type.
 *
 * Only atoms and the generic null can be null; vectors, lists, dictionaries
 * and tables never are.
 */
export function isNull(value: KValue): boolean {
  switch (value.kind) {
    case 'null':
      return true;
    case 'boolean':
      return value.value === false;
    case 'guid':
      return value.value === NULL_GUID;
    case 'byte':
      return value.value === 0;
    case 'short':
      return value.value === SHORT_NULL;
    case 'int':
    case 'month':
    case 'date':
    case 'minute':
    case 'second':
    case 'time':
      return value.value === INT_NULL;
    case 'long':
    case 'timestamp':
    case 'timespan':
      return value.value === LONG_NULL;
    case 'real':
    case 'float':
    case 'datetime':
      return Number.isNaN(value.value);
    case 'char':
      return value.value === ' ';
    case 'symbol':
      return value.value === '';
    default:
      return false;
  }
}
