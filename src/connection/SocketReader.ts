/**
 * Exact-length reads over a byte stream.
 *
 * Accumulates incoming chunks until a pending read can be satisfied, the
 * binary counterpart of a line buffer for newline-delimited streams.
 */

import type { Duplex } from 'node:stream';

import { KdbProtocolError, KdbTransportError } from './errors.js';

interface PendingRead {
  size: number;
  resolve: (bytes: Uint8Array) => void;
  reject: (error: Error) => void;
}

export class SocketReader {
  private buffer: Buffer = Buffer.alloc(0);
  private pending: PendingRead | null = null;
  private failure: KdbTransportError | null = null;
  private timer: NodeJS.Timeout | null = null;

  /**
   * @param socket - Stream to read from; listeners are attached immediately
   * @param onFailure - Called once when the stream ends, closes, errors or a read times out
   * @param timeoutMs - Longest a read may wait for data; 0 waits forever
   */
  constructor(
    private readonly socket: Duplex,
    private readonly onFailure?: (error: KdbTransportError) => void,
    private readonly timeoutMs = 0
  ) {
    socket.on('data', this.handleData);
    socket.on('error', this.handleError);
    socket.on('end', this.handleEnd);
    socket.on('close', this.handleClose);
  }

  /**
   * Bytes received but not yet consumed.
   */
  get buffered(): number {
    return this.buffer.length;
  }

  /**
   * Resolve with exactly `size` bytes, waiting for more data as needed.
   *
   * Bytes already buffered are served even after the stream has ended. An
   * idle stream is never timed out; only a read left waiting is, and that
   * failure is final for the reader.
   *
   * @throws KdbTransportError when the stream ends, fails or times out first
   * @throws KdbProtocolError when another read is still pending
   */
  readExactly(size: number): Promise<Uint8Array> {
    if (this.pending) {
      return Promise.reject(new KdbProtocolError('Concurrent reads on one connection are not supported'));
    }
    return new Promise((resolve, reject) => {
      this.pending = { size, resolve, reject };
      this.drain();
      if (this.pending && this.timeoutMs > 0) {
        this.timer = setTimeout(() => {
          this.timer = null;
          this.fail(new KdbTransportError(`No data from peer within ${this.timeoutMs}ms`));
        }, this.timeoutMs);
      }
    });
  }

  /**
   * Detach from the stream and fail any pending read.
   */
  dispose(): void {
    this.socket.off('data', this.handleData);
    this.socket.off('error', this.handleError);
    this.socket.off('end', this.handleEnd);
    this.socket.off('close', this.handleClose);
    this.buffer = Buffer.alloc(0);
    this.failure ??= new KdbTransportError('Connection closed');
    this.drain();
  }

  private readonly handleData = (chunk: Buffer | string): void => {
    const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'latin1') : chunk;
    this.buffer = this.buffer.length === 0 ? bytes : Buffer.concat([this.buffer, bytes]);
    this.drain();
  };

  private readonly handleError = (error: Error): void => {
    this.fail(
      error instanceof KdbTransportError ? error : new KdbTransportError(`Socket error: ${error.message}`, error)
    );
  };

  private readonly handleEnd = (): void => {
    this.fail(new KdbTransportError('Connection closed by peer'));
  };

  private readonly handleClose = (): void => {
    this.fail(new KdbTransportError('Connection closed'));
  };

  private fail(error: KdbTransportError): void {
    if (this.failure) {
      return;
    }
    this.failure = error;
    this.drain();
    this.onFailure?.(error);
  }

  private drain(): void {
    const pending = this.pending;
    if (!pending) {
      return;
    }

    if (this.buffer.length >= pending.size) {
      const bytes = this.buffer.subarray(0, pending.size);
      this.buffer = this.buffer.subarray(pending.size);
      this.settle();
      pending.resolve(bytes);
    } else if (this.failure) {
      this.settle();
      pending.reject(this.failure);
    }
  }

  private settle(): void {
    this.pending = null;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
