import { KdbArgumentError } from '@/connection/errors.js';

import { isKValueLike } from './typeCode.js';
import { datetimeFromJs } from './temporal.js';
import {
  ATTRIBUTES,
  type Attribute,
  type AtomValues,
  type HostValue,
  type KAtomOf,
  type KCharVector,
  type KDict,
  type KList,
  type KNull,
  type KTable,
  type KValue,
  type KVectorOf,
  type VectorKind,
} from './types.js';

function atom<K extends keyof AtomValues>(kind: K, value: AtomValues[K]): KAtomOf<K> {
  return { kind, value };
}

/**
 * Constructors for every value variant.
 *
 * @example
 * ```typescript
 * const call = k.list(k.chars('.u.upd'), k.symbol('trade'), k.vector('long', [1n, 2n]));
 * ```
 */
export const k = {
  bool: (value: boolean): KAtomOf<'boolean'> => atom('boolean', value),
  guid: (value: string): KAtomOf<'guid'> => atom('guid', value.toLowerCase()),
  byte: (value: number): KAtomOf<'byte'> => atom('byte', value),
  short: (value: number): KAtomOf<'short'> => atom('short', value),
  int: (value: number): KAtomOf<'int'> => atom('int', value),
  long: (value: bigint | number): KAtomOf<'long'> => atom('long', BigInt(value)),
  real: (value: number): KAtomOf<'real'> => atom('real', Math.fround(value)),
  float: (value: number): KAtomOf<'float'> => atom('float', value),
  char: (value: string): KAtomOf<'char'> => atom('char', value),
  symbol: (value: string): KAtomOf<'symbol'> => atom('symbol', value),
  timestamp: (value: bigint): KAtomOf<'timestamp'> => atom('timestamp', value),
  month: (value: number): KAtomOf<'month'> => atom('month', value),
  date: (value: number): KAtomOf<'date'> => atom('date', value),
  datetime: (value: number): KAtomOf<'datetime'> => atom('datetime', value),
  timespan: (value: bigint): KAtomOf<'timespan'> => atom('timespan', value),
  minute: (value: number): KAtomOf<'minute'> => atom('minute', value),
  second: (value: number): KAtomOf<'second'> => atom('second', value),
  time: (value: number): KAtomOf<'time'> => atom('time', value),

  chars: (value: string, attribute: Attribute = ATTRIBUTES.NONE): KCharVector => ({
    kind: 'chars',
    value,
    attribute,
  }),

  vector: <K extends VectorKind>(
    of: K,
    values: readonly AtomValues[K][],
    attribute: Attribute = ATTRIBUTES.NONE
  ): KVectorOf<K> => ({ kind: 'vector', of, attribute, values }),

  list: (...items: KValue[]): KList => ({ kind: 'list', attribute: ATTRIBUTES.NONE, items }),

  dict: (keys: KValue, values: KValue, sorted = false): KDict => ({
    kind: 'dict',
    keys,
    values,
    sorted,
  }),

  table: (columns: readonly string[], data: readonly KValue[]): KTable => {
    if (columns.length !== data.length) {
      throw new KdbArgumentError(
        `Table has ${columns.length} column names but ${data.length} columns`
      );
    }
    return { kind: 'table', attribute: ATTRIBUTES.NONE, columns, data };
  },

  nil: (): KNull => ({ kind: 'null' }),
};

/**
 * Convert a plain JavaScript value into a `KValue`.
 *
 * strings become symbols, numbers floats, bigints longs, booleans booleans,
 * dates datetimes, `Uint8Array` a byte vector and arrays general lists.
 * A value that already is a `KValue` is returned unchanged.
 */
export function fromHost(x: HostValue | KValue): KValue {
  if (typeof x === 'string') return k.symbol(x);
  if (typeof x === 'number') return k.float(x);
  if (typeof x === 'bigint') return k.long(x);
  if (typeof x === 'boolean') return k.bool(x);
  if (x instanceof Date) return k.datetime(datetimeFromJs(x));
  if (x instanceof Uint8Array) return k.vector('byte', Array.from(x));
  if (isKValueLike(x)) return x;
  return { kind: 'list', attribute: ATTRIBUTES.NONE, items: x.map(fromHost) };
}
