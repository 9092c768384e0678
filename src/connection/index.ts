/**
 * Connection module barrel export.
 *
 * Provides a clean public API for kdb+ IPC connections.
 */

// Core classes
export { KdbConnection, buildRequest } from './KdbConnection.js';
export { SocketReader } from './SocketReader.js';

// Error classes
export {
  KdbArgumentError,
  KdbEncodingError,
  KdbError,
  KdbHandshakeError,
  KdbProtocolError,
  KdbRemoteError,
  KdbTransportError,
  getErrorMessage,
  isFatalError,
} from './errors.js';

// Functions
export { createSocket, isLoopbackAddress } from './socket.js';

// Types
export type {
  ConnectionState,
  InboundMessage,
  KArgument,
  KdbConnectionOptions,
  KdbSocket,
  Logger,
  SocketFactory,
  SocketTarget,
} from './types.js';
export type { KdbConnectionConfig } from './config.js';

// Configuration
export { DEFAULT_CONNECTION_CONFIG, credentialsOf, resolveConfig } from './config.js';
