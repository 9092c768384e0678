import { HEADER_SIZE } from '@/constants.js';

/** Offset of the uncompressed length inside a compressed message */
const ORIGINAL_LENGTH_OFFSET = 8;

/** Header plus uncompressed length plus the first control byte */
const COMPRESSED_PREFIX = 12;

/** Room kept free for one full group of eight tokens */
const GROUP_HEADROOM = 17;

const MAX_EXTRA_MATCH = 255;

/** Smallest output buffer that can hold the prefix and one group */
const MIN_OUTPUT_SIZE = COMPRESSED_PREFIX + GROUP_HEADROOM;

function writeInt32(target: Uint8Array, offset: number, value: number, littleEndian: boolean): void {
  new DataView(target.buffer, target.byteOffset, target.byteLength).setInt32(offset, value, littleEndian);
}

/**
 * Compress a complete IPC message, header included.
 *
 * Output is bounded by half the input size. When the compressed stream would
 * not fit, the input array is returned unchanged, so callers compare by
 * identity to know whether compression happened.
 *
 * Format: bytes 0..3 copied from the input with byte 2 set to 1, total length
 * at 4, uncompressed length at 8, then groups of eight tokens each preceded
 * by a control byte. A set control bit marks a back-reference (hash slot,
 * extra match length); a clear bit a literal byte.
 */
export function compress(message: Uint8Array): Uint8Array {
  const total = message.length;
  const limit = Math.floor(total / 2);
  if (limit < MIN_OUTPUT_SIZE) {
    return message;
  }

  const littleEndian = message[0] === 1;
  const y = message;
  const out = new Uint8Array(limit);
  const table = new Int32Array(256);

  out.set(y.subarray(0, 4));
  out[2] = 1;
  writeInt32(out, ORIGINAL_LENGTH_OFFSET, total, littleEndian);

  let controlBit = 0;
  let control = 0;
  let controlPos = COMPRESSED_PREFIX;
  let d = COMPRESSED_PREFIX;
  let s = HEADER_SIZE;
  let pendingHash = 0;
  let pendingPos = 0;

  while (s < total) {
    if (controlBit === 0) {
      if (d > limit - GROUP_HEADROOM) {
        return message;
      }
      controlBit = 1;
      out[controlPos] = control;
      controlPos = d++;
      control = 0;
    }

    let hash = 0;
    let candidate = 0;
    let literal = s > total - 3;
    if (!literal) {
      hash = (y[s] ?? 0) ^ (y[s + 1] ?? 0);
      candidate = table[hash] ?? 0;
      literal = candidate === 0 || y[s] !== y[candidate];
    }

    // Literal positions enter the table one token late, when the
    // decompressor is also able to hash them
    if (pendingPos > 0) {
      table[pendingHash] = pendingPos;
      pendingPos = 0;
    }

    if (literal) {
      pendingHash = hash;
      pendingPos = s;
      out[d++] = y[s] ?? 0;
      s++;
    } else {
      table[hash] = s;
      control |= controlBit;
      let p = candidate + 2;
      s += 2;
      const start = s;
      const end = Math.min(s + MAX_EXTRA_MATCH, total);
      while (s < end && y[p] === y[s]) {
        p++;
        s++;
      }
      out[d++] = hash;
      out[d++] = s - start;
    }

    controlBit = (controlBit << 1) & 0xff;
  }

  out[controlPos] = control;
  writeInt32(out, 4, d, littleEndian);
  return out.slice(0, d);
}
