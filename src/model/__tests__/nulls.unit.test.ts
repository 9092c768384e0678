/**
 * Null sentinel unit tests
 *
 * Every type letter maps to the null of its type, and that null is
 * recognised by isNull.
 */

import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { KdbArgumentError } from '@/connection/errors.js';
import { INT_NULL, LONG_NULL, NULL, NULL_GUID, TYPE_CHARS, isNull, k, typeCode } from '@/model/index.js';

const ATOM_LETTERS = 'bgxhijefcspmdznuvt';

void describe('NULL', () => {
  void it('returns a null recognised by isNull for every type letter', () => {
    for (const letter of ` ${ATOM_LETTERS}`) {
      assert.equal(isNull(NULL(letter)), true, `NULL('${letter}')`);
    }
  });

  void it('returns an atom whose type code matches the letter position', () => {
    for (const letter of ATOM_LETTERS) {
      assert.equal(typeCode(NULL(letter)), -TYPE_CHARS.indexOf(letter), `NULL('${letter}')`);
    }
  });

  void it('returns the generic null for a space', () => {
    assert.deepEqual(NULL(' '), { kind: 'null' });
    assert.equal(typeCode(NULL(' ')), 101);
  });

  void it('uses the documented sentinels', () => {
    assert.deepEqual(NULL('j'), k.long(LONG_NULL));
    assert.deepEqual(NULL('d'), k.date(INT_NULL));
    assert.deepEqual(NULL('g'), k.guid(NULL_GUID));
    assert.deepEqual(NULL('s'), k.symbol(''));
    assert.deepEqual(NULL('c'), k.char(' '));
  });

  void it('rejects unknown letters', () => {
    assert.throws(() => NULL('q'), KdbArgumentError);
    assert.throws(() => NULL('bb'), KdbArgumentError);
  });
});

void describe('isNull', () => {
  void it('is false for non-null atoms', () => {
    assert.equal(isNull(k.long(0n)), false);
    assert.equal(isNull(k.float(0)), false);
    assert.equal(isNull(k.symbol('a')), false);
  });

  void it('is false for collections even when they hold nulls', () => {
    assert.equal(isNull(k.vector('int', [INT_NULL])), false);
    assert.equal(isNull(k.list(k.nil())), false);
  });
});
