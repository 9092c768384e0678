/**
 * kdb+ value model.
 *
 * Every value that crosses the wire is one variant of the closed `KValue`
 * union. Dispatch happens on the `kind` tag, so adding a variant breaks every
 * switch that does not handle it.
 */

/**
 * Host representation of each atom kind.
 *
 * Temporal kinds keep the raw wire count (days, ms, ns...) so that every
 * value, null sentinels included, survives a round trip bit for bit.
 */
export interface AtomValues {
  boolean: boolean;
  /** Canonical lowercase uuid string */
  guid: string;
  byte: number;
  short: number;
  int: number;
  long: bigint;
  /** Single precision, stored as a JS number */
  real: number;
  float: number;
  /** Single ISO-8859-1 character */
  char: string;
  symbol: string;
  /** Nanoseconds since 2000.01.01 */
  timestamp: bigint;
  /** Months since 2000.01 */
  month: number;
  /** Days since 2000.01.01 */
  date: number;
  /** Fractional days since 2000.01.01 */
  datetime: number;
  /** Nanoseconds */
  timespan: bigint;
  minute: number;
  second: number;
  /** Milliseconds since midnight */
  time: number;
}

export type AtomKind = keyof AtomValues;

/**
 * Element kinds that form a typed vector. Char vectors are their own
 * variant (`KCharVector`) because strings travel that way.
 */
export type VectorKind = Exclude<AtomKind, 'char'>;

/**
 * Vector attribute byte. Preserved on the wire, never interpreted.
 */
export const ATTRIBUTES = {
  NONE: 0,
  SORTED: 1,
  UNIQUE: 2,
  PARTED: 3,
  GROUPED: 4,
} as const;

export type Attribute = number;

export interface KAtomOf<K extends AtomKind> {
  readonly kind: K;
  readonly value: AtomValues[K];
}

export type KAtom = { [K in AtomKind]: KAtomOf<K> }[AtomKind];

export interface KVectorOf<K extends VectorKind> {
  readonly kind: 'vector';
  readonly of: K;
  readonly attribute: Attribute;
  readonly values: readonly AtomValues[K][];
}

export type KVector = { [K in VectorKind]: KVectorOf<K> }[VectorKind];

/**
 * String sent as a char vector (type 10) rather than a symbol.
 *
 * Function names must travel this way: the server evaluates char vectors and
 * looks up symbols.
 */
export interface KCharVector {
  readonly kind: 'chars';
  readonly value: string;
  readonly attribute: Attribute;
}

/** General (mixed) list, type 0 */
export interface KList {
  readonly kind: 'list';
  readonly attribute: Attribute;
  readonly items: readonly KValue[];
}

export interface KDict {
  readonly kind: 'dict';
  readonly keys: KValue;
  readonly values: KValue;
  /** Sorted dictionaries travel as type 127 */
  readonly sorted: boolean;
}

/**
 * Table (flip of a column dictionary).
 */
export interface KTable {
  readonly kind: 'table';
  readonly attribute: Attribute;
  readonly columns: readonly string[];
  readonly data: readonly KValue[];
}

/** The generic null `::` */
export interface KNull {
  readonly kind: 'null';
}

/**
 * Lambda, primitive, projection or adverb received from the server.
 * Its body is consumed on read and not reconstructed.
 */
export interface KFunction {
  readonly kind: 'function';
  readonly type: number;
}

export type KValue = KAtom | KVector | KCharVector | KList | KDict | KTable | KNull | KFunction;

/**
 * Plain JavaScript values accepted where a `KValue` is expected.
 * See `fromHost` for the mapping.
 */
export type HostValue =
  | string
  | number
  | bigint
  | boolean
  | Date
  | Uint8Array
  | readonly HostValue[];
