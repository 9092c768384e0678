import { MAX_PROTOCOL_VERSION } from '@/constants.js';
import { KdbArgumentError, KdbEncodingError, KdbProtocolError } from '@/connection/errors.js';
import { ATOM_TYPE_CODES, TYPE_CODES, typeCode } from '@/model/index.js';
import type { KAtom, KValue, KVector } from '@/model/index.js';

import { encodeLatin1 } from './latin1.js';
import { sizeOf } from './size.js';

const GUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

// Protocol versions that introduced newer types
const GUID_MIN_VERSION = 3;
const NANOS_MIN_VERSION = 1;

/** Inclusive bounds of the integer widths atoms are written in */
const INTEGER_RANGES = {
  byte: [0, 0xff],
  short: [-0x8000, 0x7fff],
  int: [-0x8000_0000, 0x7fff_ffff],
} as const;

/**
 * Reject values the wire width cannot hold instead of letting them wrap.
 */
function checkInteger(kind: string, x: number, width: keyof typeof INTEGER_RANGES): number {
  const [min, max] = INTEGER_RANGES[width];
  if (!Number.isInteger(x) || x < min || x > max) {
    throw new KdbArgumentError(`${kind} out of range: ${x}`);
  }
  return x;
}

function checkLong(kind: string, x: bigint): bigint {
  if (BigInt.asIntN(64, x) !== x) {
    throw new KdbArgumentError(`${kind} out of range: ${x}`);
  }
  return x;
}

const GUID_TOO_NEW_ERROR = 'Guid not valid pre kdb+3.0';
const TIMESTAMP_TOO_NEW_ERROR = 'Timestamp not valid pre kdb+2.6';
const TIMESPAN_TOO_NEW_ERROR = 'Timespan not valid pre kdb+2.6';

/**
 * Cursor-based serializer over a fixed-size buffer.
 *
 * Every multi-byte value is written big-endian, composed from narrower
 * writes (long = two ints, int = two shorts, short = two bytes).
 *
 * NOTE: the reader honours the endianness flag of each inbound message but
 * the writer always emits big-endian and declares it in header byte 0. kdb+
 * peers accept both, and existing clients write this way. Do not make the
 * writer follow the reader's flag.
 */
export class KWriter {
  private readonly buffer: Uint8Array;
  private position = 0;
  private readonly scratch = new DataView(new ArrayBuffer(8));

  /**
   * @param size - Exact number of bytes that will be written
   * @param ipcVersion - Negotiated protocol version, gates GUID and nanosecond types
   */
  constructor(
    size: number,
    private readonly ipcVersion: number = MAX_PROTOCOL_VERSION
  ) {
    this.buffer = new Uint8Array(size);
  }

  get offset(): number {
    return this.position;
  }

  /**
   * The underlying buffer. Complete once `offset` equals its length.
   */
  bytes(): Uint8Array {
    return this.buffer;
  }

  /**
   * Move the cursor, e.g. to patch a header field.
   */
  seek(position: number): void {
    this.position = position;
  }

  writeByte(x: number): void {
    if (this.position >= this.buffer.length) {
      throw new KdbProtocolError(
        `Write past end of ${this.buffer.length}-byte buffer (size computation mismatch)`
      );
    }
    this.buffer[this.position++] = x & 0xff;
  }

  writeShort(x: number): void {
    this.writeByte(x >> 8);
    this.writeByte(x);
  }

  writeInt(x: number): void {
    this.writeShort(x >> 16);
    this.writeShort(x);
  }

  writeLong(x: bigint): void {
    this.writeInt(Number(BigInt.asIntN(32, x >> 32n)));
    this.writeInt(Number(BigInt.asIntN(32, x)));
  }

  writeReal(x: number): void {
    this.scratch.setFloat32(0, x);
    this.writeInt(this.scratch.getInt32(0));
  }

  writeFloat(x: number): void {
    this.scratch.setFloat64(0, x);
    this.writeLong(this.scratch.getBigInt64(0));
  }

  writeBytes(bytes: Uint8Array): void {
    for (const b of bytes) {
      this.writeByte(b);
    }
  }

  /**
   * NUL-terminated ISO-8859-1 symbol.
   */
  writeSymbol(symbol: string): void {
    this.writeBytes(encodeLatin1(symbol, false));
    this.writeByte(0);
  }

  private writeGuid(guid: string): void {
    if (this.ipcVersion < GUID_MIN_VERSION) {
      throw new KdbProtocolError(GUID_TOO_NEW_ERROR);
    }
    if (!GUID_PATTERN.test(guid)) {
      throw new KdbEncodingError(`Invalid guid: '${guid}'`);
    }
    this.writeBytes(Buffer.from(guid.replace(/-/g, ''), 'hex'));
  }

  private writeChar(char: string): void {
    if (char.length !== 1) {
      throw new KdbEncodingError(`Char atom must be exactly one character, got '${char}'`);
    }
    this.writeBytes(encodeLatin1(char, true));
  }

  private requireNanos(message: string): void {
    if (this.ipcVersion < NANOS_MIN_VERSION) {
      throw new KdbProtocolError(message);
    }
  }

  /**
   * Serialize one value, type byte first.
   */
  write(value: KValue): void {
    const type = typeCode(value);
    this.writeByte(type);

    switch (value.kind) {
      case 'null':
        this.writeByte(0);
        return;
      case 'function':
        throw new KdbArgumentError(`Cannot serialize function of type ${value.type}`);
      case 'dict':
        this.write(value.keys);
        this.write(value.values);
        return;
      case 'table':
        this.writeByte(value.attribute);
        this.writeByte(TYPE_CODES.DICT);
        this.writeByte(ATOM_TYPE_CODES.symbol);
        this.writeByte(0);
        this.writeInt(value.columns.length);
        for (const column of value.columns) {
          this.writeSymbol(column);
        }
        this.writeByte(TYPE_CODES.LIST);
        this.writeByte(0);
        this.writeInt(value.data.length);
        for (const column of value.data) {
          this.write(column);
        }
        return;
      case 'list':
        this.writeByte(value.attribute);
        this.writeInt(value.items.length);
        for (const item of value.items) {
          this.write(item);
        }
        return;
      case 'chars': {
        const bytes = encodeLatin1(value.value, true);
        this.writeByte(value.attribute);
        this.writeInt(bytes.length);
        this.writeBytes(bytes);
        return;
      }
      case 'vector':
        this.writeByte(value.attribute);
        this.writeInt(value.values.length);
        this.writeVectorElements(value);
        return;
      default:
        this.writeAtom(value);
    }
  }

  private writeAtom(atom: KAtom): void {
    switch (atom.kind) {
      case 'boolean':
        this.writeByte(atom.value ? 1 : 0);
        return;
      case 'guid':
        this.writeGuid(atom.value);
        return;
      case 'byte':
        this.writeByte(checkInteger('byte', atom.value, 'byte'));
        return;
      case 'short':
        this.writeShort(checkInteger('short', atom.value, 'short'));
        return;
      case 'int':
      case 'month':
      case 'date':
      case 'minute':
      case 'second':
      case 'time':
        this.writeInt(checkInteger(atom.kind, atom.value, 'int'));
        return;
      case 'long':
        this.writeLong(checkLong('long', atom.value));
        return;
      case 'timestamp':
        this.requireNanos(TIMESTAMP_TOO_NEW_ERROR);
        this.writeLong(checkLong('timestamp', atom.value));
        return;
      case 'timespan':
        this.requireNanos(TIMESPAN_TOO_NEW_ERROR);
        this.writeLong(checkLong('timespan', atom.value));
        return;
      case 'real':
        this.writeReal(atom.value);
        return;
      case 'float':
      case 'datetime':
        this.writeFloat(atom.value);
        return;
      case 'char':
        this.writeChar(atom.value);
        return;
      case 'symbol':
        this.writeSymbol(atom.value);
        return;
    }
  }

  private writeVectorElements(vector: KVector): void {
    switch (vector.of) {
      case 'boolean':
        vector.values.forEach((x) => this.writeByte(x ? 1 : 0));
        return;
      case 'guid':
        vector.values.forEach((x) => this.writeGuid(x));
        return;
      case 'byte':
        vector.values.forEach((x) => this.writeByte(checkInteger('byte', x, 'byte')));
        return;
      case 'short':
        vector.values.forEach((x) => this.writeShort(checkInteger('short', x, 'short')));
        return;
      case 'int':
      case 'month':
      case 'date':
      case 'minute':
      case 'second':
      case 'time': {
        const kind = vector.of;
        vector.values.forEach((x) => this.writeInt(checkInteger(kind, x, 'int')));
        return;
      }
      case 'long':
        vector.values.forEach((x) => this.writeLong(checkLong('long', x)));
        return;
      case 'timestamp':
        this.requireNanos(TIMESTAMP_TOO_NEW_ERROR);
        vector.values.forEach((x) => this.writeLong(checkLong('timestamp', x)));
        return;
      case 'timespan':
        this.requireNanos(TIMESPAN_TOO_NEW_ERROR);
        vector.values.forEach((x) => this.writeLong(checkLong('timespan', x)));
        return;
      case 'real':
        vector.values.forEach((x) => this.writeReal(x));
        return;
      case 'float':
      case 'datetime':
        vector.values.forEach((x) => this.writeFloat(x));
        return;
      case 'symbol':
        vector.values.forEach((x) => this.writeSymbol(x));
        return;
    }
  }
}

/**
 * Serialize a value into a new exact-size buffer.
 */
export function encodeValue(value: KValue, ipcVersion: number = MAX_PROTOCOL_VERSION): Uint8Array {
  const writer = new KWriter(sizeOf(value), ipcVersion);
  writer.write(value);
  return writer.bytes();
}
