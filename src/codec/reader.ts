import { KdbProtocolError, KdbRemoteError } from '@/connection/errors.js';
import { TYPE_CODES, k, kindForCode } from '@/model/index.js';
import type { AtomKind, Attribute, KAtom, KValue, KVector, VectorKind } from '@/model/index.js';

import { decodeLatin1 } from './latin1.js';

const GUID_BYTES = 16;

/**
 * Cursor-based deserializer.
 *
 * Multi-byte values are composed from narrower reads (short from two bytes,
 * int from two shorts, long from two ints) in the byte order declared by the
 * message being read. See `KWriter` for why writes are always big-endian.
 */
export class KReader {
  private position: number;
  private readonly scratch = new DataView(new ArrayBuffer(8));

  /**
   * @param buffer - Bytes to read
   * @param littleEndian - Byte order declared in byte 0 of the message header
   * @param offset - Initial cursor position
   */
  constructor(
    private readonly buffer: Uint8Array,
    public littleEndian: boolean,
    offset = 0
  ) {
    this.position = offset;
  }

  get offset(): number {
    return this.position;
  }

  get remaining(): number {
    return this.buffer.length - this.position;
  }

  private ensure(count: number): void {
    if (count < 0 || this.position + count > this.buffer.length) {
      throw new KdbProtocolError(
        `Unexpected end of message: need ${count} bytes at offset ${this.position} of ${this.buffer.length}`
      );
    }
  }

  readByte(): number {
    this.ensure(1);
    return this.buffer[this.position++] ?? 0;
  }

  readSignedByte(): number {
    return (this.readByte() << 24) >> 24;
  }

  readShort(): number {
    const x = this.readByte();
    const y = this.readByte();
    const bits = this.littleEndian ? (y << 8) | x : (x << 8) | y;
    return (bits << 16) >> 16;
  }

  readInt(): number {
    const x = this.readShort() & 0xffff;
    const y = this.readShort() & 0xffff;
    return this.littleEndian ? (y << 16) | x : (x << 16) | y;
  }

  readLong(): bigint {
    const x = BigInt(this.readInt() >>> 0);
    const y = BigInt(this.readInt() >>> 0);
    return BigInt.asIntN(64, this.littleEndian ? (y << 32n) | x : (x << 32n) | y);
  }

  readReal(): number {
    this.scratch.setInt32(0, this.readInt());
    return this.scratch.getFloat32(0);
  }

  readFloat(): number {
    this.scratch.setBigInt64(0, this.readLong());
    return this.scratch.getFloat64(0);
  }

  readBytes(count: number): Uint8Array {
    this.ensure(count);
    const bytes = this.buffer.subarray(this.position, this.position + count);
    this.position += count;
    return bytes;
  }

  /**
   * NUL-terminated ISO-8859-1 symbol.
   */
  readSymbol(): string {
    const end = this.buffer.indexOf(0, this.position);
    if (end === -1) {
      throw new KdbProtocolError(`Unterminated symbol at offset ${this.position}`);
    }
    const text = decodeLatin1(this.buffer.subarray(this.position, end));
    this.position = end + 1;
    return text;
  }

  /**
   * GUIDs are 16 bytes in network order whatever the message endianness.
   */
  readGuid(): string {
    const hex = Buffer.from(this.readBytes(GUID_BYTES)).toString('hex');
    return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
  }

  private readChar(): string {
    return String.fromCharCode(this.readByte());
  }

  private many<T>(count: number, readOne: () => T): T[] {
    const items: T[] = [];
    for (let i = 0; i < count; i++) {
      items.push(readOne());
    }
    return items;
  }

  private readCount(): number {
    const count = this.readInt();
    if (count < 0) {
      throw new KdbProtocolError(`Negative element count ${count} at offset ${this.position - 4}`);
    }
    return count;
  }

  /**
   * Deserialize one value, type byte first.
   *
   * @throws KdbRemoteError when the value is an error (type -128)
   * @throws KdbProtocolError on unknown type codes or truncated input
   */
  read(): KValue {
    const type = this.readSignedByte();

    if (type === TYPE_CODES.ERROR) {
      throw new KdbRemoteError(this.readSymbol());
    }

    if (type < 0) {
      return this.readAtom(this.requireKind(-type));
    }

    if (type > TYPE_CODES.DICT) {
      return this.readExtended(type);
    }

    if (type === TYPE_CODES.DICT) {
      return k.dict(this.read(), this.read());
    }

    const attribute = this.readByte();

    if (type === TYPE_CODES.TABLE) {
      return this.readTable(attribute);
    }

    const count = this.readCount();

    if (type === TYPE_CODES.LIST) {
      return { kind: 'list', attribute, items: this.many(count, () => this.read()) };
    }

    if (type === TYPE_CODES.CHARS) {
      return k.chars(decodeLatin1(this.readBytes(count)), attribute);
    }

    const kind = this.requireKind(type);
    if (kind === 'char') {
      throw new KdbProtocolError('Char vectors are read as type 10');
    }
    return this.readVector(kind, attribute, count);
  }

  private requireKind(code: number): AtomKind {
    const kind = kindForCode(code);
    if (kind === undefined) {
      throw new KdbProtocolError(`Unsupported type code ${code} at offset ${this.position - 1}`);
    }
    return kind;
  }

  /**
   * Function placeholders (100-112) and sorted dictionaries (127).
   *
   * Function bodies are consumed but not reconstructed; skipping the wrong
   * number of bytes here would corrupt every later read of the message.
   */
  private readExtended(type: number): KValue {
    if (type === TYPE_CODES.SORTED_DICT) {
      return k.dict(this.read(), this.read(), true);
    }

    if (type === TYPE_CODES.LAMBDA) {
      this.readSymbol(); // context
      this.read(); // body as char vector
    } else if (type < TYPE_CODES.PROJECTION) {
      const primitive = this.readByte();
      if (type === TYPE_CODES.UNARY_PRIMITIVE && primitive === 0) {
        return k.nil();
      }
    } else if (type <= TYPE_CODES.COMPOSITION) {
      const count = this.readCount();
      for (let i = 0; i < count; i++) {
        this.read();
      }
    } else if (type <= TYPE_CODES.DYNAMIC_LOAD) {
      this.read();
    } else {
      throw new KdbProtocolError(`Unsupported type code ${type} at offset ${this.position - 1}`);
    }

    return { kind: 'function', type };
  }

  private readTable(attribute: Attribute): KValue {
    const flipped = this.read();
    if (flipped.kind !== 'dict') {
      throw new KdbProtocolError(`Table body must be a dictionary, got ${flipped.kind}`);
    }

    const { keys, values } = flipped;
    if (keys.kind !== 'vector' || keys.of !== 'symbol') {
      throw new KdbProtocolError('Table column names must be a symbol vector');
    }
    if (values.kind !== 'list' || values.items.length !== keys.values.length) {
      throw new KdbProtocolError('Table columns must be a list matching the column names');
    }

    return { kind: 'table', attribute, columns: keys.values, data: values.items };
  }

  private readAtom(kind: AtomKind): KAtom {
    switch (kind) {
      case 'boolean':
        return k.bool(this.readByte() === 1);
      case 'guid':
        return k.guid(this.readGuid());
      case 'byte':
        return k.byte(this.readByte());
      case 'short':
        return k.short(this.readShort());
      case 'int':
        return k.int(this.readInt());
      case 'long':
        return k.long(this.readLong());
      case 'real':
        return k.real(this.readReal());
      case 'float':
        return k.float(this.readFloat());
      case 'char':
        return k.char(this.readChar());
      case 'symbol':
        return k.symbol(this.readSymbol());
      case 'timestamp':
        return k.timestamp(this.readLong());
      case 'month':
        return k.month(this.readInt());
      case 'date':
        return k.date(this.readInt());
      case 'datetime':
        return k.datetime(this.readFloat());
      case 'timespan':
        return k.timespan(this.readLong());
      case 'minute':
        return k.minute(this.readInt());
      case 'second':
        return k.second(this.readInt());
      case 'time':
        return k.time(this.readInt());
    }
  }

  private readVector(kind: VectorKind, attribute: Attribute, count: number): KVector {
    const readInts = (): number[] => this.many(count, () => this.readInt());
    const readLongs = (): bigint[] => this.many(count, () => this.readLong());

    switch (kind) {
      case 'boolean':
        return k.vector(kind, this.many(count, () => this.readByte() === 1), attribute);
      case 'guid':
        return k.vector(kind, this.many(count, () => this.readGuid()), attribute);
      case 'byte':
        return k.vector(kind, Array.from(this.readBytes(count)), attribute);
      case 'short':
        return k.vector(kind, this.many(count, () => this.readShort()), attribute);
      case 'int':
        return k.vector(kind, readInts(), attribute);
      case 'long':
        return k.vector(kind, readLongs(), attribute);
      case 'real':
        return k.vector(kind, this.many(count, () => this.readReal()), attribute);
      case 'float':
        return k.vector(kind, this.many(count, () => this.readFloat()), attribute);
      case 'symbol':
        return k.vector(kind, this.many(count, () => this.readSymbol()), attribute);
      case 'timestamp':
        return k.vector(kind, readLongs(), attribute);
      case 'month':
        return k.vector(kind, readInts(), attribute);
      case 'date':
        return k.vector(kind, readInts(), attribute);
      case 'datetime':
        return k.vector(kind, this.many(count, () => this.readFloat()), attribute);
      case 'timespan':
        return k.vector(kind, readLongs(), attribute);
      case 'minute':
        return k.vector(kind, readInts(), attribute);
      case 'second':
        return k.vector(kind, readInts(), attribute);
      case 'time':
        return k.vector(kind, readInts(), attribute);
    }
  }
}

/**
 * Deserialize a single value from a buffer holding just its bytes.
 */
export function decodeValue(bytes: Uint8Array, littleEndian = false): KValue {
  return new KReader(bytes, littleEndian).read();
}
