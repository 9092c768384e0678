/**
 * Binary codec barrel export.
 */

export { KReader, decodeValue } from './reader.js';
export { KWriter, encodeValue } from './writer.js';
export { sizeOf } from './size.js';
export { ENCODING, decodeLatin1, encodeLatin1 } from './latin1.js';
