import { HEADER_SIZE } from '@/constants.js';
import { KdbProtocolError } from '@/connection/errors.js';

/** First control byte of a compressed stream */
const STREAM_START = 12;

/**
 * Most bytes one stream byte can expand to: a back-reference takes two
 * stream bytes and yields at most 2 + 255.
 */
const MAX_EXPANSION = 129;

/**
 * Expand a compressed IPC message into the uncompressed message it encodes.
 *
 * The returned message carries the original header bytes with the
 * compressed flag cleared and the total length set to the uncompressed size.
 *
 * @throws KdbProtocolError when the declared size is more than the stream
 * can expand to, the stream is truncated or has trailing bytes, or a
 * back-reference points outside the bytes produced so far
 */
export function decompress(message: Uint8Array): Uint8Array {
  if (message.length < STREAM_START) {
    throw new KdbProtocolError(`Compressed message too short: ${message.length} bytes`);
  }

  const littleEndian = message[0] === 1;
  const view = new DataView(message.buffer, message.byteOffset, message.byteLength);
  const size = view.getInt32(HEADER_SIZE, littleEndian);
  if (size < HEADER_SIZE) {
    throw new KdbProtocolError(`Invalid uncompressed length ${size}`);
  }
  const maxSize = HEADER_SIZE + (message.length - STREAM_START) * MAX_EXPANSION;
  if (size > maxSize) {
    throw new KdbProtocolError(
      `Uncompressed length ${size} exceeds what ${message.length} compressed bytes can hold (${maxSize})`
    );
  }

  const dst = new Uint8Array(size);
  dst.set(message.subarray(0, HEADER_SIZE));
  dst[2] = 0;
  new DataView(dst.buffer).setInt32(4, size, littleEndian);

  const table = new Int32Array(256);
  let d = STREAM_START;
  let s = HEADER_SIZE;
  let p = s;
  let controlBit = 0;
  let control = 0;

  const next = (): number => {
    if (d >= message.length) {
      throw new KdbProtocolError(`Compressed stream truncated at byte ${d} of ${message.length}`);
    }
    return message[d++] ?? 0;
  };

  while (s < size) {
    if (controlBit === 0) {
      control = next();
      controlBit = 1;
    }

    let extra = 0;
    const isReference = (control & controlBit) !== 0;

    if (isReference) {
      let r = table[next()] ?? 0;
      extra = next();
      if (r < HEADER_SIZE || r >= s || s + 2 + extra > size) {
        throw new KdbProtocolError(`Invalid back-reference at byte ${d - 2} of compressed stream`);
      }
      dst[s++] = dst[r++] ?? 0;
      dst[s++] = dst[r++] ?? 0;
      for (let m = 0; m < extra; m++) {
        dst[s + m] = dst[r + m] ?? 0;
      }
    } else {
      dst[s++] = next();
    }

    while (p < s - 1) {
      table[(dst[p] ?? 0) ^ (dst[p + 1] ?? 0)] = p;
      p++;
    }

    if (isReference) {
      s += extra;
      p = s;
    }

    controlBit = (controlBit << 1) & 0xff;
  }

  if (d !== message.length) {
    throw new KdbProtocolError(`Compressed stream has ${message.length - d} trailing bytes`);
  }
  return dst;
}
