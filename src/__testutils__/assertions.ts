/**
 * assertions - Custom assertion helpers for contract tests
 *
 * Provides ergonomic assertions for common test patterns.
 */

import assert from 'node:assert/strict';

/**
 * Assert that a promise rejects with an instance of `errorClass`.
 *
 * @returns The rejection, for further assertions
 */
export async function assertRejectsWith<E extends Error>(
  promise: Promise<unknown>,
  errorClass: abstract new (...args: never[]) => E
): Promise<E> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof errorClass) {
      return err;
    }
    assert.fail(`Expected ${errorClass.name}, got ${err instanceof Error ? err.name : String(err)}`);
  }
  assert.fail(`Expected ${errorClass.name} to be thrown`);
}

/**
 * Lowercase hex dump of bytes, for readable wire assertions.
 */
export function hex(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('hex');
}
