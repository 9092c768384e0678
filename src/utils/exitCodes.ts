/**
 * Semantic exit codes for the kdbipc command line.
 *
 * Exit codes follow semantic ranges for predictable automation:
 * - **0**: Success
 * - **1**: Generic failure
 * - **80-99**: User errors (invalid input, credentials, bad values)
 * - **100-119**: Software and integration errors (transport, protocol, server)
 *
 * Scripts can test ranges (80-99 = fix your input, 100-119 = the connection
 * or the server failed) or individual codes.
 */

export const EXIT_CODES = {
  /** Command completed successfully */
  SUCCESS: 0,

  /** Generic failure (use specific codes when possible) */
  GENERIC_FAILURE: 1,

  // User Errors (80-99)

  /** Invalid command-line arguments or options */
  INVALID_ARGUMENTS: 81,

  /** Server rejected the credentials during the handshake */
  ACCESS_DENIED: 82,

  /** Value cannot be encoded (e.g. symbol outside ISO-8859-1) */
  ENCODING_ERROR: 83,

  // Software Errors (100-119)

  /** TCP/TLS connection failed, closed or timed out */
  CONNECTION_FAILURE: 101,

  /** Server answered with an error message */
  REMOTE_ERROR: 102,

  /** Peer broke the wire protocol or the client misused it */
  PROTOCOL_ERROR: 103,

  /** Unhandled exception in code */
  UNHANDLED_EXCEPTION: 104,

  /** Generic software error (use specific codes when possible) */
  SOFTWARE_ERROR: 110,
} as const;
