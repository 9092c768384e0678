/**
 * Common error messages and patterns.
 *
 * Centralized location for reusable error messages with consistent formatting.
 */

import {
  KdbEncodingError,
  KdbHandshakeError,
  KdbProtocolError,
  KdbRemoteError,
  KdbTransportError,
} from '@/connection/errors.js';

/**
 * Generate generic error message with optional context.
 *
 * @param message - Error message
 * @param context - Optional additional context
 *
 * @example
 * ```typescript
 * console.error(genericError('Query failed', 'Remote error: type'));
 * ```
 */
export function genericError(message: string, context?: string): string {
  if (context) {
    return `Error: ${message}\n${context}`;
  }
  return `Error: ${message}`;
}

/**
 * Generate "invalid option value" error message.
 *
 * @param option - Flag name including dashes
 * @param value - Raw value given on the command line
 * @param expected - Description of accepted values
 */
export function invalidOptionError(option: string, value: string, expected: string): string {
  return `Invalid value for ${option}: '${value}' (expected ${expected})`;
}

/**
 * Suggest a next step for a client error, if one applies.
 *
 * @param error - Error raised by the client
 * @param target - `host:port` the command talked to
 */
export function kdbErrorSuggestion(error: Error, target: string): string | undefined {
  if (error instanceof KdbHandshakeError) {
    return `Check the credentials passed with --user for ${target}`;
  }
  if (error instanceof KdbTransportError) {
    return `Check that a kdb+ process is listening on ${target}`;
  }
  if (error instanceof KdbRemoteError) {
    return 'The server evaluated the request and reported the error above';
  }
  if (error instanceof KdbEncodingError) {
    return 'Symbols and char vectors carry ISO-8859-1 text only';
  }
  if (error instanceof KdbProtocolError) {
    return 'Run again with --debug to trace the messages exchanged';
  }
  return undefined;
}
