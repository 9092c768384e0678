/**
 * Centralized configuration constants for the kdb+ IPC client
 *
 * Protocol limits, defaults and timing values used throughout the library and
 * the CLI. Anything a caller can override lives in `connection/config.ts`.
 */

// ============================================================================
// PROTOCOL
// ============================================================================

/**
 * Highest protocol version this client speaks (kdb+ 3.0 and later)
 */
export const MAX_PROTOCOL_VERSION = 3;

/**
 * Fixed size of every message header in bytes
 */
export const HEADER_SIZE = 8;

/**
 * Messages longer than this (header included) are compressed when the
 * connection allows it and the peer is not on loopback
 */
export const COMPRESSION_THRESHOLD = 2000;

/**
 * Terminator appended to the handshake credentials
 */
export const HANDSHAKE_TERMINATOR = 0;

// ============================================================================
// CONNECTION DEFAULTS
// ============================================================================

/**
 * Default kdb+ host
 */
export const DEFAULT_KDB_HOST = 'localhost';

/**
 * Default kdb+ port
 */
export const DEFAULT_KDB_PORT = 5010;

/**
 * Expression evaluated by liveness checks
 */
export const DEFAULT_PING_EXPRESSION = '1+1';

/**
 * Bound on connecting and on each pending read or write, in milliseconds;
 * 0 disables it
 */
export const DEFAULT_SOCKET_TIMEOUT_MS = 0;

// ============================================================================
// PUBLISHER DEFAULTS
// ============================================================================

/**
 * Remote function receiving published payloads
 */
export const DEFAULT_PUBLISH_FUNCTION = '.u.updjson';

/**
 * Table name passed to the publish function
 */
export const DEFAULT_PUBLISH_TABLE = 'events';

// ============================================================================
// ENVIRONMENT
// ============================================================================

/**
 * Environment variable that enables debug logging
 */
export const DEBUG_ENV_VAR = 'KDB_DEBUG';
