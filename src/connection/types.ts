/**
 * Connection module type definitions.
 */

import type { Duplex } from 'node:stream';

import type { MessageKindName } from '@/framing/index.js';
import type { HostValue, KValue } from '@/model/index.js';

import type { KdbConnectionConfig } from './config.js';

/**
 * Byte stream a connection talks over.
 *
 * `net.Socket` and `tls.TLSSocket` satisfy it; tests substitute an
 * in-process duplex.
 */
export interface KdbSocket extends Duplex {
  /** Peer address, used to detect loopback peers */
  readonly remoteAddress?: string | undefined;
}

/**
 * Where and how to open the byte stream.
 */
export interface SocketTarget {
  host: string;
  port: number;
  tls: boolean;
  /** Bound on establishing the connection in milliseconds; 0 disables it */
  timeoutMs: number;
}

/**
 * Factory for connected sockets.
 *
 * Resolves once the stream is connected (and the TLS session established),
 * rejects with a KdbTransportError otherwise.
 */
export type SocketFactory = (target: SocketTarget) => Promise<KdbSocket>;

/**
 * Lifecycle states. Any fatal error returns the connection to
 * 'disconnected'; only an explicit connect leaves it.
 */
export type ConnectionState = 'disconnected' | 'connecting' | 'handshaking' | 'ready';

/**
 * Anything a request can carry: a wire value or a host value converted by
 * `fromHost` (strings become symbols).
 */
export type KArgument = KValue | HostValue;

/**
 * Options for `new KdbConnection()` and `KdbConnection.open()`.
 *
 * Configuration fields override `DEFAULT_CONNECTION_CONFIG` one by one.
 */
export interface KdbConnectionOptions extends Partial<KdbConnectionConfig> {
  /** Logger instance for connection lifecycle events */
  logger?: Logger;
  /** Socket factory, defaults to TCP/TLS via node:net and node:tls */
  socketFactory?: SocketFactory;
}

/**
 * One message read from the peer.
 */
export interface InboundMessage {
  kind: MessageKindName;
  value: KValue;
}

/**
 * Logger interface for connection module.
 *
 * Allows dependency injection of different logging implementations
 * without coupling to specific UI or logging libraries.
 *
 * Compatible with both console and the CLI's Logger.
 */
export interface Logger {
  /** Log informational message */
  info(message: string): void;
  /** Log debug message (only shown with debug flag) */
  debug(message: string): void;
}
