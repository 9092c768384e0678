import { KdbArgumentError } from '@/connection/errors.js';
import { elementSize } from '@/model/index.js';
import type { KValue } from '@/model/index.js';

/** Type byte + attribute byte + int count */
const VECTOR_OVERHEAD = 6;

function symbolBytes(symbols: readonly string[]): number {
  let total = 0;
  for (const symbol of symbols) {
    total += symbol.length + 1;
  }
  return total;
}

/**
 * Exact serialized size of a value in bytes.
 *
 * The writer allocates this many bytes up front and never grows, so the
 * count must match what `KWriter.write` emits for every variant. Strings
 * count one byte per UTF-16 unit; anything outside ISO-8859-1 is rejected
 * later by the writer.
 *
 * @throws KdbArgumentError for function placeholders, which cannot be written
 */
export function sizeOf(value: KValue): number {
  switch (value.kind) {
    case 'vector':
      if (value.of === 'symbol') {
        return VECTOR_OVERHEAD + symbolBytes(value.values);
      }
      return VECTOR_OVERHEAD + value.values.length * elementSize(value.of);
    case 'chars':
      return VECTOR_OVERHEAD + value.value.length;
    case 'list': {
      let total = VECTOR_OVERHEAD;
      for (const item of value.items) {
        total += sizeOf(item);
      }
      return total;
    }
    case 'dict':
      return 1 + sizeOf(value.keys) + sizeOf(value.values);
    case 'table': {
      // 98, attribute, 99, then the column-name symbol vector and the column list
      let total = 3 + VECTOR_OVERHEAD + symbolBytes(value.columns) + VECTOR_OVERHEAD;
      for (const column of value.data) {
        total += sizeOf(column);
      }
      return total;
    }
    case 'null':
      return 2;
    case 'function':
      throw new KdbArgumentError(`Cannot serialize function of type ${value.type}`);
    case 'symbol':
      return 2 + value.value.length;
    default:
      return 1 + elementSize(value.kind);
  }
}
