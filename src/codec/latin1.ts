/**
 * ISO-8859-1 helpers for symbols and char vectors.
 */

import { KdbEncodingError } from '@/connection/errors.js';

export const ENCODING = 'latin1' as const;

const MAX_LATIN1_CODE = 0xff;

/**
 * Encode text as ISO-8859-1 bytes.
 *
 * @param text - Text to encode
 * @param allowNul - Whether U+0000 may appear (char vectors yes, symbols no)
 * @throws KdbEncodingError for characters above U+00FF or a forbidden NUL
 */
export function encodeLatin1(text: string, allowNul: boolean): Uint8Array {
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    if (code > MAX_LATIN1_CODE) {
      throw new KdbEncodingError(
        `Character U+${code.toString(16).toUpperCase().padStart(4, '0')} at index ${i} of '${text}' is outside ISO-8859-1`
      );
    }
    if (code === 0 && !allowNul) {
      throw new KdbEncodingError(`Symbol '${text.replace(/\0/g, '\\0')}' contains a NUL character`);
    }
  }
  return Buffer.from(text, ENCODING);
}

export function decodeLatin1(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString(ENCODING);
}
