/**
 * Codec unit tests
 *
 * Wire layout of each value family, decoding in both byte orders, version
 * gating and consumption of function bodies.
 */

import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { hex } from '@/__testutils__/assertions.js';
import { KWriter, decodeValue, encodeValue, sizeOf } from '@/codec/index.js';
import {
  KdbArgumentError,
  KdbEncodingError,
  KdbProtocolError,
  KdbRemoteError,
} from '@/connection/errors.js';
import { ATTRIBUTES, INT_NULL, LONG_NULL, NULL, isNull, k } from '@/model/index.js';
import type { KValue } from '@/model/index.js';

const fromHex = (text: string): Uint8Array => new Uint8Array(Buffer.from(text.replace(/\s+/g, ''), 'hex'));

const SAMPLES: Array<[string, KValue]> = [
  ['boolean', k.bool(true)],
  ['guid', k.guid('0a1b2c3d-4e5f-6071-8293-a4b5c6d7e8f9')],
  ['byte', k.byte(0xab)],
  ['short', k.short(-2)],
  ['int null', k.int(INT_NULL)],
  ['long', k.long(-9_000_000_000n)],
  ['long null', k.long(LONG_NULL)],
  ['real', k.real(1.5)],
  ['float NaN', k.float(Number.NaN)],
  ['char', k.char('z')],
  ['symbol', k.symbol('trade')],
  ['timestamp', k.timestamp(86_400_000_000_123n)],
  ['month', k.month(290)],
  ['date', k.date(-1)],
  ['datetime', k.datetime(1.25)],
  ['timespan', k.timespan(-5n)],
  ['minute', k.minute(61)],
  ['second', k.second(3661)],
  ['time', k.time(3_723_004)],
  ['sorted int vector', k.vector('int', [1, 2, 3], ATTRIBUTES.SORTED)],
  ['symbol vector', k.vector('symbol', ['a', '', 'ccc'])],
  ['byte vector', k.vector('byte', [0, 255])],
  ['guid vector', k.vector('guid', ['00000000-0000-0000-0000-000000000001'])],
  ['empty float vector', k.vector('float', [])],
  ['chars with latin1', k.chars('café\u0000x')],
  ['general list', k.list(k.long(1n), k.symbol('a'), k.chars('b'), k.nil())],
  ['dict', k.dict(k.vector('symbol', ['a', 'b']), k.vector('long', [1n, 2n]))],
  ['sorted dict', k.dict(k.vector('int', [1]), k.vector('int', [2]), true)],
  ['table', k.table(['sym', 'px'], [k.vector('symbol', ['x', 'y']), k.vector('float', [1.5, 2])])],
  [
    'keyed table',
    k.dict(k.table(['id'], [k.vector('long', [7n])]), k.table(['v'], [k.list(k.chars('text'))])),
  ],
  ['generic null', k.nil()],
];

void describe('encodeValue', () => {
  void it('writes atoms type byte first, big-endian', () => {
    assert.equal(hex(encodeValue(k.int(1))), 'fa00000001');
    assert.equal(hex(encodeValue(k.short(-2))), 'fbfffe');
    assert.equal(hex(encodeValue(k.long(1n))), 'f90000000000000001');
    assert.equal(hex(encodeValue(k.float(1.5))), 'f73ff8000000000000');
    assert.equal(hex(encodeValue(k.symbol('ab'))), 'f5616200');
  });

  void it('writes vectors with attribute byte and count', () => {
    assert.equal(hex(encodeValue(k.vector('long', [1n]))), '0700000000010000000000000001');
    assert.equal(hex(encodeValue(k.chars('hi'))), '0a00000000026869');
    assert.equal(hex(encodeValue(k.vector('boolean', [true, false], ATTRIBUTES.UNIQUE))), '0102000000020100');
  });

  void it('writes the generic null as type 101 and byte 0', () => {
    assert.equal(hex(encodeValue(k.nil())), '6500');
  });

  void it('writes a table as a flipped column dictionary', () => {
    assert.equal(
      hex(encodeValue(k.table(['a'], [k.vector('int', [5])]))),
      '6200' + '63' + '0b000000000161' + '00' + '000000000001' + '06000000000100000005'
    );
  });

  void it('writes guids in network order', () => {
    assert.equal(
      hex(encodeValue(k.guid('0A1B2C3D-4E5F-6071-8293-A4B5C6D7E8F9'))),
      'fe0a1b2c3d4e5f60718293a4b5c6d7e8f9'
    );
  });
});

void describe('sizeOf', () => {
  void it('matches the bytes the writer emits', () => {
    for (const [name, value] of SAMPLES) {
      const writer = new KWriter(sizeOf(value));
      writer.write(value);
      assert.equal(writer.offset, sizeOf(value), name);
    }
  });

  void it('rejects function placeholders', () => {
    assert.throws(() => sizeOf({ kind: 'function', type: 100 }), KdbArgumentError);
  });
});

void describe('decodeValue', () => {
  void it('reads back what the writer wrote', () => {
    for (const [name, value] of SAMPLES) {
      assert.deepEqual(decodeValue(encodeValue(value)), value, name);
    }
  });

  void it('honours the little-endian flag', () => {
    assert.deepEqual(decodeValue(fromHex('06 00 02000000 01000000 feffffff'), true), k.vector('int', [1, -2]));
    assert.deepEqual(decodeValue(fromHex('f9 0100000000000000'), true), k.long(1n));
    assert.deepEqual(decodeValue(fromHex('f7 000000000000f83f'), true), k.float(1.5));
    assert.deepEqual(decodeValue(fromHex('fb feff'), true), k.short(-2));
  });

  void it('reads guids in network order whatever the flag', () => {
    const bytes = fromHex('fe 0a1b2c3d4e5f60718293a4b5c6d7e8f9');
    const expected = k.guid('0a1b2c3d-4e5f-6071-8293-a4b5c6d7e8f9');
    assert.deepEqual(decodeValue(bytes, false), expected);
    assert.deepEqual(decodeValue(bytes, true), expected);
  });

  void it('throws the server error text', () => {
    assert.throws(
      () => decodeValue(fromHex('80 74797065 00')),
      (error: unknown) => error instanceof KdbRemoteError && error.remoteMessage === 'type'
    );
  });

  void it('consumes lambda bodies and keeps reading', () => {
    const bytes = fromHex(
      '00 00 00000002' + // list of 2
        '64 00 0a00000000037b787d' + // lambda {x} in the root context
        'fa 00000007'
    );
    assert.deepEqual(decodeValue(bytes), k.list({ kind: 'function', type: 100 }, k.int(7)));
  });

  void it('consumes projections and single-value functions', () => {
    assert.deepEqual(decodeValue(fromHex('68 00000002 fa00000001 6500')), { kind: 'function', type: 104 });
    assert.deepEqual(decodeValue(fromHex('6a fa00000001')), { kind: 'function', type: 106 });
    assert.deepEqual(decodeValue(fromHex('66 05')), { kind: 'function', type: 102 });
  });

  void it('reads type 101 with a non-zero byte as a primitive', () => {
    assert.deepEqual(decodeValue(fromHex('6505')), { kind: 'function', type: 101 });
    assert.deepEqual(decodeValue(fromHex('6500')), k.nil());
  });

  void it('rejects unknown type codes', () => {
    assert.throws(() => decodeValue(fromHex('14 00 00000000')), KdbProtocolError);
    assert.throws(() => decodeValue(fromHex('71 00')), KdbProtocolError);
    assert.throws(() => decodeValue(fromHex('ec 00')), KdbProtocolError);
  });

  void it('rejects truncated input', () => {
    assert.throws(() => decodeValue(encodeValue(k.long(5n)).subarray(0, 5)), KdbProtocolError);
    assert.throws(() => decodeValue(fromHex('f5 6162')), KdbProtocolError);
  });

  void it('rejects negative counts', () => {
    assert.throws(() => decodeValue(fromHex('07 00 ffffffff')), /Negative element count/);
  });

  void it('rejects tables whose column names are not symbols', () => {
    const bytes = fromHex('62 00 63' + '06 00 00000001 00000001' + '00 00 00000001 fa00000001');
    assert.throws(() => decodeValue(bytes), /symbol vector/);
  });
});

void describe('null round trip', () => {
  void it('encodes and decodes the null of every type letter', () => {
    for (const letter of ' bgxhijefcspmdznuvt') {
      const value = NULL(letter);
      const bytes = encodeValue(value);
      const decoded = decodeValue(bytes);

      assert.equal(bytes.length, sizeOf(value), `NULL('${letter}')`);
      assert.deepEqual(decoded, value, `NULL('${letter}')`);
      assert.equal(isNull(decoded), true, `NULL('${letter}')`);
    }
  });
});

void describe('integer ranges', () => {
  void it('rejects values the wire width cannot hold', () => {
    assert.throws(() => encodeValue(k.int(2 ** 31)), KdbArgumentError);
    assert.throws(() => encodeValue(k.int(1.5)), /int out of range: 1\.5/);
    assert.throws(() => encodeValue(k.byte(300)), KdbArgumentError);
    assert.throws(() => encodeValue(k.byte(-1)), KdbArgumentError);
    assert.throws(() => encodeValue(k.short(40_000)), KdbArgumentError);
    assert.throws(() => encodeValue(k.date(Number.NaN)), KdbArgumentError);
    assert.throws(() => encodeValue(k.long(2n ** 63n)), KdbArgumentError);
    assert.throws(() => encodeValue(k.vector('time', [0, 86_400_000.5])), /time out of range/);
  });

  void it('accepts the limits of each width', () => {
    assert.equal(hex(encodeValue(k.byte(255))), 'fcff');
    assert.equal(hex(encodeValue(k.short(-32768))), 'fb8000');
    assert.equal(hex(encodeValue(k.int(2147483647))), 'fa7fffffff');
    assert.equal(hex(encodeValue(k.long(-(2n ** 63n)))), 'f98000000000000000');
  });
});

void describe('protocol version gating', () => {
  void it('refuses guids before version 3', () => {
    assert.throws(() => encodeValue(k.guid('00000000-0000-0000-0000-000000000001'), 2), /Guid not valid pre kdb\+3\.0/);
    assert.equal(encodeValue(k.guid('00000000-0000-0000-0000-000000000001'), 3).length, 17);
  });

  void it('refuses timestamps and timespans at version 0', () => {
    assert.throws(() => encodeValue(k.timestamp(0n), 0), KdbProtocolError);
    assert.throws(() => encodeValue(k.vector('timespan', [0n]), 0), KdbProtocolError);
    assert.equal(encodeValue(k.timestamp(0n), 1).length, 9);
  });
});

void describe('text encoding', () => {
  void it('rejects symbols outside ISO-8859-1', () => {
    assert.throws(() => encodeValue(k.symbol('€')), KdbEncodingError);
  });

  void it('rejects NUL inside symbols but not inside char vectors', () => {
    assert.throws(() => encodeValue(k.symbol('a\u0000b')), KdbEncodingError);
    assert.equal(hex(encodeValue(k.chars('a\u0000b'))), '0a0000000003610062');
  });

  void it('rejects malformed guids', () => {
    assert.throws(() => encodeValue(k.guid('not-a-guid')), KdbEncodingError);
  });
});
