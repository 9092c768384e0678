import { HANDSHAKE_TERMINATOR, HEADER_SIZE, MAX_PROTOCOL_VERSION } from '@/constants.js';
import { encodeLatin1 } from '@/codec/index.js';
import {
  MESSAGE_KINDS,
  decodeMessage,
  describeKind,
  encodeErrorMessage,
  encodeMessage,
  parseHeader,
} from '@/framing/index.js';
import type { MessageHeader, MessageKind } from '@/framing/index.js';
import { fromHost, k } from '@/model/index.js';
import type { KValue } from '@/model/index.js';
import { createLogger } from '@/ui/logging/index.js';
import { getErrorMessage, toError } from '@/utils/errors.js';

import { credentialsOf, resolveConfig } from './config.js';
import type { KdbConnectionConfig } from './config.js';
import {
  KdbArgumentError,
  KdbError,
  KdbHandshakeError,
  KdbProtocolError,
  KdbRemoteError,
  KdbTransportError,
  isFatalError,
} from './errors.js';
import { SocketReader } from './SocketReader.js';
import { createSocket, isLoopbackAddress } from './socket.js';
import type {
  ConnectionState,
  InboundMessage,
  KArgument,
  KdbConnectionOptions,
  KdbSocket,
  Logger,
  SocketFactory,
} from './types.js';

/** Client's maximum protocol version, sent after the credentials */
const CLIENT_VERSION_BYTE = MAX_PROTOCOL_VERSION;

const MAX_FUNCTION_ARGS = 3;

interface RawMessage {
  header: MessageHeader;
  bytes: Uint8Array;
}

/**
 * Build the value a request carries.
 *
 * A lone string is an expression and travels as a char vector. With
 * arguments, the query names a function: it becomes the head of a general
 * list, as a char vector when given as a string, followed by the arguments
 * (strings among them stay symbols).
 */
export function buildRequest(query: KArgument, args: readonly KArgument[]): KValue {
  if (args.length > MAX_FUNCTION_ARGS) {
    throw new KdbArgumentError(`At most ${MAX_FUNCTION_ARGS} function arguments are supported, got ${args.length}`);
  }

  const head = typeof query === 'string' ? k.chars(query) : fromHost(query);
  if (args.length === 0) {
    return head;
  }
  return k.list(head, ...args.map(fromHost));
}

function handshakeBytes(credentials: string): Uint8Array {
  const text = encodeLatin1(credentials, false);
  const bytes = new Uint8Array(text.length + 2);
  bytes.set(text);
  bytes[text.length] = CLIENT_VERSION_BYTE;
  bytes[text.length + 1] = HANDSHAKE_TERMINATOR;
  return bytes;
}

function concatBytes(head: Uint8Array, tail: Uint8Array): Uint8Array {
  const bytes = new Uint8Array(head.length + tail.length);
  bytes.set(head);
  bytes.set(tail, head.length);
  return bytes;
}

/**
 * Client connection to a kdb+ process.
 *
 * Handles the handshake, message framing and the synchronous request and
 * response exchange. Any transport failure or stream-level protocol
 * violation destroys the socket and leaves the connection 'disconnected';
 * nothing reconnects it except an explicit `connect()`. Remote errors leave
 * it usable.
 *
 * Not safe for concurrent use: one call at a time per connection. There is
 * no internal lock; a second `sendSync` issued before the first settles has
 * already written its request when its read is refused, so the stream is
 * out of step and the connection is torn down. Callers needing parallel
 * requests open one connection each or serialize their calls.
 *
 * @example
 * ```typescript
 * const conn = await KdbConnection.open({ host: 'localhost', port: 5010 });
 * const result = await conn.sendSync('til 3');
 * await conn.sendAsync('upd', 'trade', k.chars('{"px":1}'));
 * conn.close();
 * ```
 */
export class KdbConnection {
  private config: KdbConnectionConfig;
  private readonly logger: Logger;
  private readonly socketFactory: SocketFactory;

  private socket: KdbSocket | null = null;
  private reader: SocketReader | null = null;
  private currentState: ConnectionState = 'disconnected';
  private ipcVersion = MAX_PROTOCOL_VERSION;
  private loopback = false;
  private compressionEnabled: boolean;
  private pendingSync = 0;
  private inboundLittleEndian = false;

  constructor(options: KdbConnectionOptions = {}) {
    const { logger, socketFactory, ...config } = options;
    this.config = resolveConfig(config);
    this.logger = logger ?? createLogger('connection');
    this.socketFactory = socketFactory ?? createSocket;
    this.compressionEnabled = this.config.compress;
  }

  /**
   * Create a connection and connect it.
   */
  static async open(options: KdbConnectionOptions = {}): Promise<KdbConnection> {
    const connection = new KdbConnection(options);
    await connection.connect();
    return connection;
  }

  get state(): ConnectionState {
    return this.currentState;
  }

  /** Negotiated protocol version, 0 to 3 */
  get version(): number {
    return this.ipcVersion;
  }

  get isLoopback(): boolean {
    return this.loopback;
  }

  get compression(): boolean {
    return this.compressionEnabled;
  }

  /** Synchronous requests awaiting a response, in either direction */
  get pendingRequests(): number {
    return this.pendingSync;
  }

  /** Byte order declared by the most recently received message */
  get littleEndian(): boolean {
    return this.inboundLittleEndian;
  }

  get target(): string {
    return `${this.config.host}:${this.config.port}`;
  }

  /**
   * Enable or disable compression of outbound messages above 2000 bytes.
   * Never applied to loopback peers.
   */
  setCompression(enabled: boolean): void {
    this.compressionEnabled = enabled;
  }

  /**
   * Open the socket and perform the handshake.
   *
   * @param overrides - Configuration fields replacing those given at construction
   * @throws KdbTransportError when the socket cannot be opened
   * @throws KdbHandshakeError when the server closes before answering the handshake
   * @throws KdbProtocolError when called on a connection that is not disconnected
   */
  async connect(overrides: Partial<KdbConnectionConfig> = {}): Promise<void> {
    if (this.currentState !== 'disconnected') {
      throw new KdbProtocolError(`Cannot connect while ${this.currentState}`);
    }

    this.config = resolveConfig(overrides, this.config);
    const { host, port, tls, timeoutMs } = this.config;
    const credentials = handshakeBytes(credentialsOf(this.config));

    this.reader?.dispose();
    this.reader = null;
    this.currentState = 'connecting';
    this.logger.debug(`Connecting to ${this.target}${tls ? ' (TLS)' : ''}`);

    let socket: KdbSocket;
    try {
      socket = await this.socketFactory({ host, port, tls, timeoutMs });
    } catch (error) {
      this.currentState = 'disconnected';
      throw error instanceof KdbError
        ? error
        : new KdbTransportError(`Cannot connect to ${this.target}: ${getErrorMessage(error)}`, toError(error));
    }

    this.socket = socket;
    this.reader = new SocketReader(socket, (error) => this.handleStreamFailure(socket, error), timeoutMs);
    this.loopback = isLoopbackAddress(socket.remoteAddress);
    this.currentState = 'handshaking';

    try {
      await this.write(credentials);
      const reply = await this.requireReader()
        .readExactly(1)
        .catch((error: unknown) => {
          throw new KdbHandshakeError('access', toError(error));
        });
      this.ipcVersion = Math.min(MAX_PROTOCOL_VERSION, reply[0] ?? 0);
    } catch (error) {
      this.teardown();
      throw error;
    }

    this.pendingSync = 0;
    this.currentState = 'ready';
    this.logger.debug(
      `Connected to ${this.target} (protocol version ${this.ipcVersion}${this.loopback ? ', loopback' : ''})`
    );
  }

  /**
   * Send a message without waiting for a reply.
   *
   * @param query - Expression, or function name when arguments follow
   * @param args - Up to three function arguments
   */
  async sendAsync(query: KArgument, ...args: KArgument[]): Promise<void> {
    this.requireReady();
    const message = this.encode(MESSAGE_KINDS.ASYNC, buildRequest(query, args));
    await this.guard(() => this.write(message));
  }

  /**
   * Send a request and wait for its response.
   *
   * Async messages the peer pushes before the response are discarded. Sync
   * requests from the peer are discarded too but stay counted, so the
   * caller may still answer them with `sendResponse` or `sendError`.
   *
   * @param query - Expression, or function name when arguments follow
   * @param args - Up to three function arguments
   * @throws KdbRemoteError when the server answers with an error
   */
  async sendSync(query: KArgument, ...args: KArgument[]): Promise<KValue> {
    this.requireReady();
    const message = this.encode(MESSAGE_KINDS.SYNC, buildRequest(query, args));

    return this.guard(async () => {
      await this.write(message);
      this.pendingSync++;

      for (;;) {
        const raw = await this.receive();
        if (raw.header.kind === MESSAGE_KINDS.RESPONSE) {
          this.pendingSync--;
          return decodeMessage(raw.bytes).value;
        }
        this.logger.debug(`Discarded ${describeKind(raw.header.kind)} message received while awaiting a response`);
      }
    });
  }

  /**
   * Read the next message from the peer.
   *
   * An inbound sync request is counted until answered.
   *
   * @throws KdbRemoteError when the message is an error
   */
  async readMessage(): Promise<InboundMessage> {
    this.requireReady();
    return this.guard(async () => {
      const raw = await this.receive();
      const { value } = decodeMessage(raw.bytes);
      return { kind: describeKind(raw.header.kind), value };
    });
  }

  /**
   * Answer an inbound sync request.
   *
   * @throws KdbProtocolError when no request is outstanding
   */
  async sendResponse(value: KArgument): Promise<void> {
    this.requireReady();
    this.requireOutstandingRequest('response');
    const message = this.encode(MESSAGE_KINDS.RESPONSE, fromHost(value));
    this.pendingSync--;
    await this.guard(() => this.write(message));
  }

  /**
   * Answer an inbound sync request with an error.
   *
   * @throws KdbProtocolError when no request is outstanding
   */
  async sendError(text: string): Promise<void> {
    this.requireReady();
    this.requireOutstandingRequest('error');
    const message = encodeErrorMessage(text);
    this.pendingSync--;
    await this.guard(() => this.write(message));
  }

  /**
   * Liveness check: round-trips the ping expression.
   *
   * A remote error still proves the peer is alive. Never rejects.
   */
  async isConnected(): Promise<boolean> {
    if (this.currentState !== 'ready') {
      return false;
    }
    try {
      await this.sendSync(this.config.pingExpression);
      return true;
    } catch (error) {
      if (error instanceof KdbRemoteError) {
        return true;
      }
      this.logger.debug(`Liveness check against ${this.target} failed: ${getErrorMessage(error)}`);
      return false;
    }
  }

  /**
   * Close the socket. Safe to call repeatedly.
   */
  close(): void {
    if (this.socket) {
      this.logger.debug(`Closing connection to ${this.target}`);
    }
    this.teardown();
  }

  private encode(kind: MessageKind, value: KValue): Uint8Array {
    return encodeMessage(kind, value, {
      compress: this.compressionEnabled,
      loopback: this.loopback,
      ipcVersion: this.ipcVersion,
    });
  }

  private async receive(): Promise<RawMessage> {
    const reader = this.requireReader();
    const head = await reader.readExactly(HEADER_SIZE);
    const header = parseHeader(head);
    this.inboundLittleEndian = header.littleEndian;
    if (header.kind === MESSAGE_KINDS.SYNC) {
      this.pendingSync++;
    }

    const body = await reader.readExactly(header.length - HEADER_SIZE);
    this.logger.debug(
      `Received ${describeKind(header.kind)} message (${header.length} bytes${header.compressed ? ', compressed' : ''})`
    );
    return { header, bytes: concatBytes(head, body) };
  }

  private write(bytes: Uint8Array): Promise<void> {
    const socket = this.socket;
    if (!socket) {
      return Promise.reject(new KdbTransportError('Not connected'));
    }
    const { timeoutMs } = this.config;
    return new Promise((resolve, reject) => {
      const timer =
        timeoutMs > 0
          ? setTimeout(() => {
              reject(new KdbTransportError(`Write to ${this.target} not flushed within ${timeoutMs}ms`));
            }, timeoutMs)
          : undefined;
      socket.write(bytes, (error) => {
        clearTimeout(timer);
        if (error) {
          reject(new KdbTransportError(`Write to ${this.target} failed: ${error.message}`, error));
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * Run a socket operation; fatal errors tear the connection down before
   * propagating.
   */
  private async guard<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (isFatalError(error)) {
        this.logger.debug(`Connection to ${this.target} failed: ${getErrorMessage(error)}`);
        this.teardown();
      }
      throw error;
    }
  }

  private handleStreamFailure(socket: KdbSocket, error: KdbTransportError): void {
    if (this.socket !== socket) {
      return;
    }
    this.logger.debug(`Connection to ${this.target} lost: ${error.message}`);
    socket.destroy();
    this.socket = null;
    this.currentState = 'disconnected';
  }

  private teardown(): void {
    this.reader?.dispose();
    this.reader = null;
    this.socket?.destroy();
    this.socket = null;
    this.currentState = 'disconnected';
    this.pendingSync = 0;
  }

  private requireReady(): void {
    if (this.currentState !== 'ready') {
      throw new KdbTransportError(`Not connected to ${this.target}`);
    }
  }

  private requireReader(): SocketReader {
    if (!this.reader) {
      throw new KdbTransportError(`Not connected to ${this.target}`);
    }
    return this.reader;
  }

  private requireOutstandingRequest(what: string): void {
    if (this.pendingSync === 0) {
      throw new KdbProtocolError(`Unexpected ${what} message: no synchronous request outstanding`);
    }
  }
}
