import { HEADER_SIZE } from '@/constants.js';
import { KReader } from '@/codec/index.js';
import { KdbProtocolError } from '@/connection/errors.js';

/**
 * Message kinds carried in header byte 1.
 */
export const MESSAGE_KINDS = {
  ASYNC: 0,
  SYNC: 1,
  RESPONSE: 2,
} as const;

export type MessageKind = (typeof MESSAGE_KINDS)[keyof typeof MESSAGE_KINDS];

export interface MessageHeader {
  /** Byte 0: 1 for little-endian payloads, 0 for big-endian */
  littleEndian: boolean;
  kind: MessageKind;
  /** Byte 2 */
  compressed: boolean;
  /** Total message length on the wire, header included */
  length: number;
}

function toMessageKind(byte: number): MessageKind {
  switch (byte) {
    case MESSAGE_KINDS.ASYNC:
    case MESSAGE_KINDS.SYNC:
    case MESSAGE_KINDS.RESPONSE:
      return byte;
    default:
      throw new KdbProtocolError(`Unknown message kind ${byte}`);
  }
}

export type MessageKindName = 'async' | 'sync' | 'response';

export function describeKind(kind: MessageKind): MessageKindName {
  switch (kind) {
    case MESSAGE_KINDS.ASYNC:
      return 'async';
    case MESSAGE_KINDS.SYNC:
      return 'sync';
    case MESSAGE_KINDS.RESPONSE:
      return 'response';
  }
}

/**
 * Parse the 8-byte header at the start of `bytes`.
 *
 * The length field is read in the byte order the header declares.
 *
 * @throws KdbProtocolError for short input, an unknown kind or a length
 * smaller than the header itself
 */
export function parseHeader(bytes: Uint8Array): MessageHeader {
  if (bytes.length < HEADER_SIZE) {
    throw new KdbProtocolError(`Message header needs ${HEADER_SIZE} bytes, got ${bytes.length}`);
  }

  const reader = new KReader(bytes, bytes[0] === 1);
  const littleEndian = reader.readByte() === 1;
  const kind = toMessageKind(reader.readByte());
  const compressed = reader.readByte() === 1;
  reader.readByte();
  const length = reader.readInt();

  if (length < HEADER_SIZE) {
    throw new KdbProtocolError(`Invalid message length ${length}`);
  }

  return { littleEndian, kind, compressed, length };
}
