import type { AtomKind, HostValue, KValue } from './types.js';

/**
 * Positive wire type code of each atom kind. Atoms travel as the negated
 * code, vectors as the code itself.
 */
export const ATOM_TYPE_CODES: Readonly<Record<AtomKind, number>> = {
  boolean: 1,
  guid: 2,
  byte: 4,
  short: 5,
  int: 6,
  long: 7,
  real: 8,
  float: 9,
  char: 10,
  symbol: 11,
  timestamp: 12,
  month: 13,
  date: 14,
  datetime: 15,
  timespan: 16,
  minute: 17,
  second: 18,
  time: 19,
};

/**
 * Element size in bytes indexed by type code (0 = variable or unused).
 */
export const ELEMENT_SIZES: readonly number[] = [
  0, 1, 16, 0, 1, 2, 4, 8, 4, 8, 1, 0, 8, 4, 4, 8, 8, 4, 4, 4,
];

export const TYPE_CODES = {
  LIST: 0,
  CHARS: 10,
  SYMBOLS: 11,
  TABLE: 98,
  DICT: 99,
  LAMBDA: 100,
  UNARY_PRIMITIVE: 101,
  PROJECTION: 104,
  COMPOSITION: 105,
  DYNAMIC_LOAD: 112,
  SORTED_DICT: 127,
  ERROR: -128,
} as const;

export const ATOM_KINDS: readonly AtomKind[] = [
  'boolean',
  'guid',
  'byte',
  'short',
  'int',
  'long',
  'real',
  'float',
  'char',
  'symbol',
  'timestamp',
  'month',
  'date',
  'datetime',
  'timespan',
  'minute',
  'second',
  'time',
];

const KINDS_BY_CODE = new Map<number, AtomKind>(
  ATOM_KINDS.map((kind) => [ATOM_TYPE_CODES[kind], kind])
);

/**
 * Atom kind for a positive type code in 1..19, if any.
 */
export function kindForCode(code: number): AtomKind | undefined {
  return KINDS_BY_CODE.get(code);
}

/**
 * Element size of an atom kind in bytes (0 for symbols).
 */
export function elementSize(kind: AtomKind): number {
  return ELEMENT_SIZES[ATOM_TYPE_CODES[kind]] ?? 0;
}

/**
 * Wire type code of a value.
 */
export function typeCode(value: KValue): number {
  switch (value.kind) {
    case 'vector':
      return ATOM_TYPE_CODES[value.of];
    case 'chars':
      return TYPE_CODES.CHARS;
    case 'list':
      return TYPE_CODES.LIST;
    case 'dict':
      return value.sorted ? TYPE_CODES.SORTED_DICT : TYPE_CODES.DICT;
    case 'table':
      return TYPE_CODES.TABLE;
    case 'null':
      return TYPE_CODES.UNARY_PRIMITIVE;
    case 'function':
      return value.type;
    default:
      return -ATOM_TYPE_CODES[value.kind];
  }
}

function isKValue(x: object): x is KValue {
  return 'kind' in x && typeof x.kind === 'string';
}

/**
 * Wire type code a host value would serialize as.
 *
 * Total over `unknown`: anything not recognised maps to the general list
 * code 0.
 */
export function inferTypeCode(x: unknown): number {
  switch (typeof x) {
    case 'boolean':
      return -ATOM_TYPE_CODES.boolean;
    case 'bigint':
      return -ATOM_TYPE_CODES.long;
    case 'number':
      return -ATOM_TYPE_CODES.float;
    case 'string':
      return -ATOM_TYPE_CODES.symbol;
    case 'object':
      if (x === null) return TYPE_CODES.LIST;
      if (x instanceof Date) return -ATOM_TYPE_CODES.datetime;
      if (x instanceof Uint8Array) return ATOM_TYPE_CODES.byte;
      if (Array.isArray(x)) return TYPE_CODES.LIST;
      return isKValue(x) ? typeCode(x) : TYPE_CODES.LIST;
    default:
      return TYPE_CODES.LIST;
  }
}

/**
 * Check whether a host value or `KValue` is already a `KValue`.
 */
export function isKValueLike(x: HostValue | KValue): x is KValue {
  return typeof x === 'object' && isKValue(x);
}
