/**
 * Type code unit tests
 *
 * inferTypeCode agrees with the code a value serializes as, for KValues
 * and for the host values fromHost converts.
 */

import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { ATOM_KINDS, ATOM_TYPE_CODES, NULL, TYPE_CHARS, fromHost, inferTypeCode, k, typeCode } from '@/model/index.js';
import type { HostValue, VectorKind } from '@/model/index.js';

const ATOM_LETTERS = 'bgxhijefcspmdznuvt';

void describe('inferTypeCode', () => {
  void it('returns the negated type code of every atom kind', () => {
    for (const letter of ATOM_LETTERS) {
      assert.equal(inferTypeCode(NULL(letter)), -TYPE_CHARS.indexOf(letter), `NULL('${letter}')`);
    }
  });

  void it('returns the positive type code of every vector kind', () => {
    const vectorKinds = ATOM_KINDS.filter((kind): kind is VectorKind => kind !== 'char');
    assert.equal(vectorKinds.length, 17);
    for (const kind of vectorKinds) {
      assert.equal(inferTypeCode(k.vector(kind, [])), ATOM_TYPE_CODES[kind], kind);
    }
    assert.equal(inferTypeCode(k.chars('ab')), 10);
  });

  void it('returns the codes of compound values', () => {
    assert.equal(inferTypeCode(k.list(k.long(1n), k.symbol('a'))), 0);
    assert.equal(inferTypeCode(k.dict(k.vector('symbol', ['a']), k.vector('long', [1n]))), 99);
    assert.equal(inferTypeCode(k.dict(k.vector('int', [1]), k.vector('int', [2]), true)), 127);
    assert.equal(inferTypeCode(k.table(['a'], [k.vector('long', [1n])])), 98);
    assert.equal(inferTypeCode(k.nil()), 101);
    assert.equal(inferTypeCode({ kind: 'function', type: 104 }), 104);
  });

  void it('maps host values the way fromHost converts them', () => {
    const hostValues: Array<[HostValue, number]> = [
      [true, -1],
      [5n, -7],
      [1.5, -9],
      ['trade', -11],
      [new Date(0), -15],
      [new Uint8Array([1, 2]), 4],
      [[1n, 'a'], 0],
    ];
    for (const [value, expected] of hostValues) {
      assert.equal(inferTypeCode(value), expected, String(value));
      assert.equal(typeCode(fromHost(value)), expected, String(value));
    }
  });

  void it('falls back to the general list code for anything else', () => {
    assert.equal(inferTypeCode(null), 0);
    assert.equal(inferTypeCode(undefined), 0);
    assert.equal(inferTypeCode({ name: 'x' }), 0);
    assert.equal(inferTypeCode(() => 1), 0);
  });
});
