import { COMPRESSION_THRESHOLD, HEADER_SIZE, MAX_PROTOCOL_VERSION } from '@/constants.js';
import { KReader, KWriter, sizeOf } from '@/codec/index.js';
import { compress, decompress } from '@/compression/index.js';
import { KdbProtocolError } from '@/connection/errors.js';
import { TYPE_CODES } from '@/model/index.js';
import type { KValue } from '@/model/index.js';
import { createLogger } from '@/ui/logging/index.js';

import { MESSAGE_KINDS, parseHeader } from './header.js';
import type { MessageHeader, MessageKind } from './header.js';

const log = createLogger('framing');

export interface EncodeOptions {
  /** Compress messages above the threshold (default false) */
  compress?: boolean;
  /** Peer is on the loopback interface; never compress */
  loopback?: boolean;
  /** Negotiated protocol version (default 3) */
  ipcVersion?: number;
}

export interface DecodedMessage {
  header: MessageHeader;
  value: KValue;
}

function writeHeader(writer: KWriter, kind: MessageKind, length: number): void {
  writer.writeByte(0); // always big-endian, see KWriter
  writer.writeByte(kind);
  writer.writeByte(0);
  writer.writeByte(0);
  writer.writeInt(length);
}

/**
 * Frame a value as a complete message.
 *
 * Compression is attempted only when enabled, the peer is remote and the
 * message exceeds 2000 bytes; it still falls back to the plain message when
 * the data does not shrink enough.
 */
export function encodeMessage(kind: MessageKind, value: KValue, options: EncodeOptions = {}): Uint8Array {
  const length = HEADER_SIZE + sizeOf(value);
  const writer = new KWriter(length, options.ipcVersion ?? MAX_PROTOCOL_VERSION);
  writeHeader(writer, kind, length);
  writer.write(value);

  const message = writer.bytes();
  if (options.compress !== true || options.loopback === true || length <= COMPRESSION_THRESHOLD) {
    return message;
  }

  const compressed = compress(message);
  if (compressed === message) {
    log.debug(`Compression skipped for ${length}-byte message (insufficient gain)`);
  } else {
    log.debug(`Compressed ${length} bytes to ${compressed.length}`);
  }
  return compressed;
}

/**
 * Frame an error reply: kind 2, body 0x80 followed by the NUL-terminated text.
 */
export function encodeErrorMessage(text: string): Uint8Array {
  const length = HEADER_SIZE + 1 + text.length + 1;
  const writer = new KWriter(length);
  writeHeader(writer, MESSAGE_KINDS.RESPONSE, length);
  writer.writeByte(TYPE_CODES.ERROR);
  writer.writeSymbol(text);
  return writer.bytes();
}

/**
 * Decode a complete message, decompressing it first when flagged.
 *
 * @throws KdbRemoteError when the body is an error
 * @throws KdbProtocolError for a malformed message
 */
export function decodeMessage(bytes: Uint8Array): DecodedMessage {
  const header = parseHeader(bytes);
  if (header.length !== bytes.length) {
    throw new KdbProtocolError(`Header declares ${header.length} bytes but message has ${bytes.length}`);
  }

  const body = header.compressed ? decompress(bytes) : bytes;
  const value = new KReader(body, header.littleEndian, HEADER_SIZE).read();
  return { header, value };
}
