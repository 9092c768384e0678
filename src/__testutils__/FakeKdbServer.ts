/**
 * FakeKdbServer - scripted kdb+ peer for contract tests
 *
 * Provides a SocketFactory whose sockets speak the server side of the
 * handshake and hand every decoded client message to a request handler.
 * Replies are delivered on the next turn of the event loop, as a real
 * peer's would be.
 */

import { KdbRemoteError } from '@/connection/index.js';
import type { SocketFactory, SocketTarget } from '@/connection/index.js';
import { decodeLatin1 } from '@/codec/index.js';
import { HEADER_SIZE } from '@/constants.js';
import {
  MESSAGE_KINDS,
  decodeMessage,
  encodeErrorMessage,
  encodeMessage,
  parseHeader,
} from '@/framing/index.js';
import type { DecodedMessage, MessageKind } from '@/framing/index.js';
import { fromHost } from '@/model/index.js';
import type { HostValue, KValue } from '@/model/index.js';

import { FakeKdbSocket } from './FakeKdbSocket.js';

/** Frames to send back for one client message */
export type RequestHandler = (message: DecodedMessage, socket: FakeKdbSocket) => Uint8Array[];

export interface FakeKdbServerOptions {
  /** Byte answered to the handshake; null hangs up instead (default 3) */
  version?: number | null;
  /** Peer address the sockets report (default 10.1.2.3) */
  remoteAddress?: string;
  /** Called for each complete client message (default: no reply) */
  onRequest?: RequestHandler;
}

export function frame(kind: MessageKind, value: KValue | HostValue): Uint8Array {
  return encodeMessage(kind, fromHost(value));
}

export function response(value: KValue | HostValue): Uint8Array {
  return frame(MESSAGE_KINDS.RESPONSE, value);
}

export function errorResponse(text: string): Uint8Array {
  return encodeErrorMessage(text);
}

export class FakeKdbServer {
  /** Sockets handed out, oldest first */
  readonly sockets: FakeKdbSocket[] = [];
  /** Targets the factory was called with */
  readonly targets: SocketTarget[] = [];
  /** Handshake credentials text, one per connection */
  readonly credentials: string[] = [];
  /** Version bytes clients announced in their handshakes */
  readonly clientVersions: number[] = [];
  /** Every decoded client message */
  readonly messages: DecodedMessage[] = [];
  /** Text of error replies the client sent */
  readonly errors: string[] = [];
  /** Raw client messages as written, compressed ones included */
  readonly frames: Uint8Array[] = [];

  private readonly version: number | null;
  private readonly remoteAddress: string;
  private onRequest: RequestHandler;

  constructor(options: FakeKdbServerOptions = {}) {
    this.version = options.version === undefined ? 3 : options.version;
    this.remoteAddress = options.remoteAddress ?? '10.1.2.3';
    this.onRequest = options.onRequest ?? (() => []);
  }

  /**
   * Factory to pass as `socketFactory`.
   */
  readonly factory: SocketFactory = (target) => {
    this.targets.push(target);
    const socket = new FakeKdbSocket(this.remoteAddress);
    this.attach(socket);
    this.sockets.push(socket);
    return Promise.resolve(socket);
  };

  /** Replace the request handler */
  respondWith(handler: RequestHandler): void {
    this.onRequest = handler;
  }

  /** Resolve once pending deliveries and stream events have run */
  static flush(): Promise<void> {
    return new Promise((resolve) => setImmediate(resolve));
  }

  /** Most recent socket */
  get socket(): FakeKdbSocket {
    const socket = this.sockets[this.sockets.length - 1];
    if (!socket) {
      throw new Error('No connection has been opened');
    }
    return socket;
  }

  private attach(socket: FakeKdbSocket): void {
    let buffer = Buffer.alloc(0);
    let handshaken = false;

    socket.onWrite((chunk) => {
      buffer = Buffer.concat([buffer, chunk]);

      if (!handshaken) {
        const end = buffer.indexOf(0);
        if (end === -1) {
          return;
        }
        const hello = buffer.subarray(0, end);
        buffer = buffer.subarray(end + 1);
        handshaken = true;
        this.credentials.push(decodeLatin1(hello.subarray(0, hello.length - 1)));
        this.clientVersions.push(hello[hello.length - 1] ?? -1);

        const version = this.version;
        setImmediate(() => {
          if (version === null) {
            socket.hangUp();
          } else {
            socket.deliver(Uint8Array.of(version));
          }
        });
      }

      while (buffer.length >= HEADER_SIZE) {
        const { length } = parseHeader(buffer);
        if (buffer.length < length) {
          return;
        }
        const bytes = new Uint8Array(buffer.subarray(0, length));
        buffer = buffer.subarray(length);
        this.frames.push(bytes);

        let message: DecodedMessage;
        try {
          message = decodeMessage(bytes);
        } catch (error) {
          if (error instanceof KdbRemoteError) {
            this.errors.push(error.remoteMessage);
            continue;
          }
          throw error;
        }
        this.messages.push(message);
        const replies = this.onRequest(message, socket);
        setImmediate(() => {
          for (const reply of replies) {
            socket.deliver(reply);
          }
        });
      }
    });
  }
}
