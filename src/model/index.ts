/**
 * Value model barrel export.
 */

export { k, fromHost } from './factories.js';
export { NULL, NULL_GUID, TYPE_CHARS, isNull } from './nulls.js';
export { column, count, unkey } from './table.js';
export {
  ATOM_KINDS,
  ATOM_TYPE_CODES,
  ELEMENT_SIZES,
  TYPE_CODES,
  elementSize,
  inferTypeCode,
  isKValueLike,
  kindForCode,
  typeCode,
} from './typeCode.js';
export * from './temporal.js';
export { ATTRIBUTES } from './types.js';
export type {
  AtomKind,
  AtomValues,
  Attribute,
  HostValue,
  KAtom,
  KAtomOf,
  KCharVector,
  KDict,
  KFunction,
  KList,
  KNull,
  KTable,
  KValue,
  KVector,
  KVectorOf,
  VectorKind,
} from './types.js';
