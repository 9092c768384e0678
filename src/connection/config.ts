/**
 * kdb+ connection configuration.
 *
 * Provides type-safe configuration objects to replace direct constant imports.
 * Allows runtime configuration and easier testing.
 */

import {
  DEFAULT_KDB_HOST,
  DEFAULT_KDB_PORT,
  DEFAULT_PING_EXPRESSION,
  DEFAULT_SOCKET_TIMEOUT_MS,
} from '@/constants.js';

/**
 * Configuration for one kdb+ connection.
 */
export interface KdbConnectionConfig {
  /** Server host name or address (default: localhost) */
  host: string;
  /** Server port (default: 5010) */
  port: number;
  /** User name sent in the handshake (default: empty) */
  user: string;
  /** Password sent in the handshake after the colon (default: empty) */
  password: string;
  /** Wrap the stream in TLS (default: false) */
  tls: boolean;
  /**
   * Bound in milliseconds on connecting and on each read or write left
   * waiting; fatal when it elapses, never applied to an idle connection
   * (default: 0, disabled)
   */
  timeoutMs: number;
  /** Compress large messages to remote peers (default: false) */
  compress: boolean;
  /** Expression evaluated by `isConnected()` (default: 1+1) */
  pingExpression: string;
}

/**
 * Default connection configuration values.
 */
export const DEFAULT_CONNECTION_CONFIG: Readonly<KdbConnectionConfig> = {
  host: DEFAULT_KDB_HOST,
  port: DEFAULT_KDB_PORT,
  user: '',
  password: '',
  tls: false,
  timeoutMs: DEFAULT_SOCKET_TIMEOUT_MS,
  compress: false,
  pingExpression: DEFAULT_PING_EXPRESSION,
};

/**
 * Merge partial options over a base configuration, ignoring undefined fields.
 */
export function resolveConfig(
  options: Partial<KdbConnectionConfig> = {},
  base: Readonly<KdbConnectionConfig> = DEFAULT_CONNECTION_CONFIG
): KdbConnectionConfig {
  return {
    host: options.host ?? base.host,
    port: options.port ?? base.port,
    user: options.user ?? base.user,
    password: options.password ?? base.password,
    tls: options.tls ?? base.tls,
    timeoutMs: options.timeoutMs ?? base.timeoutMs,
    compress: options.compress ?? base.compress,
    pingExpression: options.pingExpression ?? base.pingExpression,
  };
}

/**
 * Handshake text: `user:password`, empty when neither is set.
 *
 * A user without a password still sends the colon (`alice:`).
 */
export function credentialsOf(config: Pick<KdbConnectionConfig, 'user' | 'password'>): string {
  return config.user === '' && config.password === '' ? '' : `${config.user}:${config.password}`;
}
