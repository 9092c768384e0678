/**
 * TCP/TLS socket factory.
 *
 * Opens the stream a KdbConnection talks over, with Nagle's algorithm
 * disabled and keepalive enabled.
 */

import { connect as connectTcp, isIP } from 'node:net';
import { connect as connectTls } from 'node:tls';

import type { Socket } from 'node:net';

import { getErrorMessage } from '@/utils/errors.js';

import { KdbTransportError } from './errors.js';
import type { KdbSocket, SocketTarget } from './types.js';

const LOOPBACK_ADDRESSES = new Set(['127.0.0.1', '::1', '0.0.0.0', '::ffff:127.0.0.1']);

/**
 * Whether a peer address is the local host.
 */
export function isLoopbackAddress(address: string | undefined): boolean {
  return address !== undefined && LOOPBACK_ADDRESSES.has(address);
}

/**
 * Create and configure a connected socket.
 *
 * A configured timeout bounds the connection attempt only; it is cleared
 * once the stream is ready, so idle connections stay open.
 */
export function createSocket(target: SocketTarget): Promise<KdbSocket> {
  const { host, port, timeoutMs } = target;

  return new Promise((resolve, reject) => {
    const socket: Socket = target.tls
      ? connectTls({ host, port, ...(isIP(host) === 0 ? { servername: host } : {}) })
      : connectTcp({ host, port });
    const readyEvent = target.tls ? 'secureConnect' : 'connect';

    const onTimeout = (): void => {
      socket.destroy(new KdbTransportError(`No connection within ${timeoutMs}ms`));
    };
    if (timeoutMs > 0) {
      socket.setTimeout(timeoutMs);
      socket.once('timeout', onTimeout);
    }

    const onError = (error: Error): void => {
      socket.destroy();
      reject(new KdbTransportError(`Cannot connect to ${host}:${port}: ${getErrorMessage(error)}`, error));
    };

    socket.once('error', onError);
    socket.once(readyEvent, () => {
      socket.off('error', onError);
      socket.off('timeout', onTimeout);
      socket.setTimeout(0);
      socket.setNoDelay(true);
      socket.setKeepAlive(true);
      resolve(socket);
    });
  });
}
