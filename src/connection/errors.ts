/**
 * Connection layer error classes.
 *
 * Provides structured error handling for the kdb+ client. Codec and framer
 * errors propagate unchanged to the connection, which decides whether the
 * socket survives them.
 */

import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Base error class for all kdb+ client errors.
 *
 * Extends native Error with error codes for programmatic handling,
 * exit codes for the CLI, and cause chaining for nested errors.
 */
export abstract class KdbError extends Error {
  abstract readonly code: string;
  abstract readonly exitCode: number;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = this.constructor.name;
    if (cause) {
      this.cause = cause;
    }
  }
}

/**
 * Handshake failed.
 *
 * Examples:
 * - Wrong user or password (server closes without sending its version byte)
 * - Server refuses the client's host
 */
export class KdbHandshakeError extends KdbError {
  readonly code = 'KDB_ACCESS_DENIED';
  readonly exitCode = EXIT_CODES.ACCESS_DENIED;
}

/**
 * Socket-level failure. Fatal for the connection.
 *
 * Examples:
 * - Connection refused
 * - Peer closed the socket in the middle of a message
 * - A read or write outlasted the configured timeout
 */
export class KdbTransportError extends KdbError {
  readonly code = 'KDB_TRANSPORT_ERROR';
  readonly exitCode = EXIT_CODES.CONNECTION_FAILURE;
}

/**
 * Server answered with an error message (`'type`, `'length`...).
 *
 * The connection stays usable.
 */
export class KdbRemoteError extends KdbError {
  readonly code = 'KDB_REMOTE_ERROR';
  readonly exitCode = EXIT_CODES.REMOTE_ERROR;

  /** Text sent by the server, without the leading quote */
  readonly remoteMessage: string;

  constructor(remoteMessage: string) {
    super(`Remote error: ${remoteMessage}`);
    this.remoteMessage = remoteMessage;
  }
}

/**
 * Wire protocol violated, by the peer or by the caller.
 *
 * Examples:
 * - Response sent while no request is outstanding
 * - Malformed compressed message or unknown type code
 * - GUID sent to a server that negotiated a version below 3
 */
export class KdbProtocolError extends KdbError {
  readonly code = 'KDB_PROTOCOL_ERROR';
  readonly exitCode = EXIT_CODES.PROTOCOL_ERROR;
}

/**
 * Value cannot be represented on the wire.
 *
 * Examples:
 * - Symbol containing a character above U+00FF
 * - Symbol containing an embedded NUL
 */
export class KdbEncodingError extends KdbError {
  readonly code = 'KDB_ENCODING_ERROR';
  readonly exitCode = EXIT_CODES.ENCODING_ERROR;
}

/**
 * Caller passed a value the client cannot work with.
 *
 * Examples:
 * - Unknown type character for NULL()
 * - Function placeholder passed to the writer
 */
export class KdbArgumentError extends KdbError {
  readonly code = 'KDB_INVALID_ARGUMENT';
  readonly exitCode = EXIT_CODES.INVALID_ARGUMENTS;
}

/**
 * Check whether an error leaves the connection dead.
 *
 * Remote errors, encoding and argument errors are raised before anything
 * touches the socket state; everything else is fatal.
 */
export function isFatalError(error: unknown): boolean {
  return !(
    error instanceof KdbRemoteError ||
    error instanceof KdbEncodingError ||
    error instanceof KdbArgumentError
  );
}

export { getErrorMessage } from '@/utils/errors.js';
