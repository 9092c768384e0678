/**
 * Command failures of the kdbipc CLI.
 *
 * Every error that ends a command is turned into a CommandError before it
 * is printed, so human and `--json` output report the same exit code and
 * kdb+ context.
 */

import { KdbError, KdbRemoteError, isFatalError } from '@/connection/errors.js';
import { kdbErrorSuggestion } from '@/ui/messages/errors.js';
import { getErrorMessage } from '@/utils/errors.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Context reported alongside the message. Every field is optional; `--json`
 * output includes the ones that are set.
 */
export interface ErrorMetadata {
  /** Next step printed below the message */
  suggestion?: string;
  /** Client error code, e.g. `KDB_REMOTE_ERROR` */
  code?: string;
  /** Text of the server's signal, without the leading quote */
  remoteMessage?: string;
  /** Whether the failure closed the connection */
  fatal?: boolean;
}

/**
 * Error ending a command, with the exit code the process leaves with.
 *
 * @example
 * ```typescript
 * throw new CommandError(
 *   "Invalid value for --port: 'abc' (expected an integer between 1 and 65535)",
 *   {},
 *   EXIT_CODES.INVALID_ARGUMENTS
 * );
 * ```
 */
export class CommandError extends Error {
  public readonly metadata: ErrorMetadata;
  public readonly exitCode: number;

  constructor(
    message: string,
    metadata: ErrorMetadata = {},
    exitCode: number = EXIT_CODES.GENERIC_FAILURE,
    cause?: Error
  ) {
    super(message, cause ? { cause } : undefined);
    this.name = 'CommandError';
    this.metadata = metadata;
    this.exitCode = exitCode;
  }

  /**
   * Describe a client error raised while talking to `target`.
   *
   * The exit code and error code come from the KdbError subclass; `fatal`
   * tells whether the connection was torn down.
   */
  static fromKdbError(error: KdbError, target: string): CommandError {
    const suggestion = kdbErrorSuggestion(error, target);
    return new CommandError(
      error.message,
      {
        code: error.code,
        fatal: isFatalError(error),
        ...(error instanceof KdbRemoteError ? { remoteMessage: error.remoteMessage } : {}),
        ...(suggestion ? { suggestion } : {}),
      },
      error.exitCode,
      error
    );
  }

  /**
   * Normalize anything a command threw. Errors the client does not know
   * about exit with UNHANDLED_EXCEPTION.
   */
  static from(error: unknown, target: string): CommandError {
    if (error instanceof CommandError) {
      return error;
    }
    if (error instanceof KdbError) {
      return CommandError.fromKdbError(error, target);
    }
    return new CommandError(
      getErrorMessage(error),
      {},
      EXIT_CODES.UNHANDLED_EXCEPTION,
      error instanceof Error ? error : undefined
    );
  }
}
