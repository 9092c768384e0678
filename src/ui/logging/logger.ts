/**
 * Logging utilities for consistent formatted output with log level support.
 *
 * By default only 'info' level logs are shown. Set KDB_DEBUG=1 or pass the
 * --debug flag to enable verbose 'debug' level logs (frame traces, handshake
 * details, compression ratios).
 */

import { DEBUG_ENV_VAR } from '@/constants.js';

// ============================================================================
// Global Debug State
// ============================================================================

let debugEnabled = false;

/**
 * Enable debug logging globally.
 *
 * Called during CLI initialization when --debug flag is detected.
 */
export function enableDebugLogging(): void {
  debugEnabled = true;
}

/**
 * Check if debug logging is currently enabled.
 */
export function isDebugEnabled(): boolean {
  return debugEnabled || process.env[DEBUG_ENV_VAR] === '1';
}

// ============================================================================
// Log Levels
// ============================================================================

/**
 * - 'info': Always shown (failures, key milestones)
 * - 'debug': Only shown in debug mode (frame traces, internal state)
 */
export type LogLevel = 'info' | 'debug';

/**
 * Log contexts for different components.
 * Used to prefix log messages with component name.
 */
export type LogContext = 'kdbipc' | 'connection' | 'framing' | 'publisher';

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Logger instance with support for different log levels.
 */
export interface Logger {
  /** Log an info message (always shown). */
  info: (message: string) => void;

  /** Log a debug message (only shown in debug mode). */
  debug: (message: string) => void;

  /** Log a message at debug level. */
  (message: string): void;
}

// ============================================================================
// Logger Implementation
// ============================================================================

/**
 * Create a logger instance for a specific context.
 *
 * Messages go to stderr so that stdout stays reserved for command output.
 *
 * @param context - Component context for log prefix
 *
 * @example
 * ```typescript
 * const log = createLogger('connection');
 *
 * // Always shown
 * log.info('Connected to localhost:5010 (protocol version 3)');
 *
 * // Only shown with --debug or KDB_DEBUG=1
 * log.debug('Sent sync message (42 bytes)');
 * ```
 */
export function createLogger(context: LogContext): Logger {
  const logMessage = (message: string, level: LogLevel = 'debug'): void => {
    log(context, message, level);
  };

  return Object.assign((message: string) => logMessage(message, 'debug'), {
    info: (message: string) => logMessage(message, 'info'),
    debug: (message: string) => logMessage(message, 'debug'),
  });
}

/**
 * Log a message with a specific context (one-off usage).
 *
 * @param context - Component context for log prefix
 * @param message - Log message
 * @param level - Log level (defaults to 'debug' - only shown with --debug)
 */
export function log(context: LogContext, message: string, level: LogLevel = 'debug'): void {
  if (level === 'debug' && !isDebugEnabled()) {
    return;
  }
  console.error(`[${context}] ${message}`);
}
