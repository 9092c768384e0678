/**
 * CommandError unit tests
 *
 * Client errors keep their exit code and report whether the connection
 * survived them.
 */

import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  KdbArgumentError,
  KdbHandshakeError,
  KdbProtocolError,
  KdbRemoteError,
} from '@/connection/errors.js';
import { CommandError } from '@/ui/errors/index.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

const TARGET = 'localhost:5010';

void describe('CommandError.fromKdbError', () => {
  void it('keeps the remote message of a server error and marks it non-fatal', () => {
    const error = new KdbRemoteError('type');
    const failure = CommandError.fromKdbError(error, TARGET);

    assert.equal(failure.message, 'Remote error: type');
    assert.equal(failure.exitCode, EXIT_CODES.REMOTE_ERROR);
    assert.equal(failure.cause, error);
    assert.deepEqual(failure.metadata, {
      code: 'KDB_REMOTE_ERROR',
      fatal: false,
      remoteMessage: 'type',
      suggestion: 'The server evaluated the request and reported the error above',
    });
  });

  void it('marks handshake failures fatal and points at the credentials', () => {
    const failure = CommandError.fromKdbError(new KdbHandshakeError('Access denied'), TARGET);

    assert.equal(failure.exitCode, EXIT_CODES.ACCESS_DENIED);
    assert.deepEqual(failure.metadata, {
      code: 'KDB_ACCESS_DENIED',
      fatal: true,
      suggestion: 'Check the credentials passed with --user for localhost:5010',
    });
  });

  void it('marks protocol errors fatal', () => {
    const failure = CommandError.fromKdbError(new KdbProtocolError('Malformed frame'), TARGET);

    assert.equal(failure.message, 'Malformed frame');
    assert.equal(failure.exitCode, EXIT_CODES.PROTOCOL_ERROR);
    assert.equal(failure.metadata.fatal, true);
    assert.equal(failure.metadata.code, 'KDB_PROTOCOL_ERROR');
  });

  void it('omits the suggestion when none applies', () => {
    const failure = CommandError.fromKdbError(new KdbArgumentError('Unknown type character'), TARGET);

    assert.equal(failure.exitCode, EXIT_CODES.INVALID_ARGUMENTS);
    assert.deepEqual(failure.metadata, { code: 'KDB_INVALID_ARGUMENT', fatal: false });
  });
});

void describe('CommandError.from', () => {
  void it('returns command errors unchanged', () => {
    const error = new CommandError('bad flag', {}, EXIT_CODES.INVALID_ARGUMENTS);
    assert.equal(CommandError.from(error, TARGET), error);
  });

  void it('maps client errors through fromKdbError', () => {
    const failure = CommandError.from(new KdbRemoteError('length'), TARGET);
    assert.equal(failure.exitCode, EXIT_CODES.REMOTE_ERROR);
    assert.equal(failure.metadata.remoteMessage, 'length');
  });

  void it('treats anything else as an unhandled exception', () => {
    const error = new Error('boom');
    const failure = CommandError.from(error, TARGET);

    assert.equal(failure.message, 'boom');
    assert.equal(failure.exitCode, EXIT_CODES.UNHANDLED_EXCEPTION);
    assert.equal(failure.cause, error);
    assert.deepEqual(failure.metadata, {});
    assert.equal(CommandError.from('boom', TARGET).message, 'boom');
  });
});
