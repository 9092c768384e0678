/**
 * FakeKdbSocket - in-process byte stream standing in for a TCP socket
 *
 * Everything the client writes is recorded and handed to an optional
 * listener (see FakeKdbServer); tests push server bytes with `deliver()`.
 */

import { Duplex } from 'node:stream';

import type { KdbSocket } from '@/connection/index.js';

export type WriteListener = (chunk: Uint8Array) => void;

export class FakeKdbSocket extends Duplex implements KdbSocket {
  readonly remoteAddress: string | undefined;

  private readonly chunks: Uint8Array[] = [];
  private listener: WriteListener | null = null;

  constructor(remoteAddress: string | undefined = '10.1.2.3') {
    super();
    this.remoteAddress = remoteAddress;
  }

  /**
   * Route future writes to `listener`.
   */
  onWrite(listener: WriteListener): void {
    this.listener = listener;
  }

  override _read(): void {
    // data arrives through deliver()
  }

  override _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    const bytes = new Uint8Array(chunk);
    this.chunks.push(bytes);
    this.listener?.(bytes);
    callback();
  }

  // Test control methods

  /** Push bytes to the client as if the server sent them */
  deliver(bytes: Uint8Array): void {
    this.push(Buffer.from(bytes));
  }

  /** End the readable side, as a server closing its socket */
  hangUp(): void {
    this.push(null);
  }

  /** All bytes the client wrote, concatenated */
  get written(): Uint8Array {
    return new Uint8Array(Buffer.concat(this.chunks));
  }
}
