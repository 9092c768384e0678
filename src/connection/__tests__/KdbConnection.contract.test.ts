/**
 * KdbConnection contract tests
 *
 * Drives the public API against FakeKdbServer, an in-process peer that
 * speaks the server side of the handshake and answers with scripted frames.
 *
 * Coverage:
 * 1. Handshake - credentials, version negotiation, refusal
 * 2. Request/response - expressions, function calls, remote errors
 * 3. Interleaving - async and sync messages arriving before a response
 * 4. Serving - readMessage, sendResponse, sendError
 * 5. Lifecycle - liveness, peer hang-up, close and reconnect
 * 6. Compression and byte order
 */

import assert from 'node:assert/strict';
import { afterEach, beforeEach, describe, it } from 'node:test';

import { FakeKdbServer, errorResponse, frame, response } from '@/__testutils__/FakeKdbServer.js';
import { assertRejectsWith } from '@/__testutils__/assertions.js';
import {
  KdbArgumentError,
  KdbConnection,
  KdbHandshakeError,
  KdbProtocolError,
  KdbRemoteError,
  KdbTransportError,
  buildRequest,
} from '@/connection/index.js';
import type { KdbConnectionOptions } from '@/connection/index.js';
import { MESSAGE_KINDS } from '@/framing/index.js';
import { k } from '@/model/index.js';

const quiet = { info: (): void => {}, debug: (): void => {} };

void describe('KdbConnection contract', () => {
  let server: FakeKdbServer;
  let conn: KdbConnection;

  function open(options: KdbConnectionOptions = {}): Promise<KdbConnection> {
    return KdbConnection.open({ socketFactory: server.factory, logger: quiet, ...options });
  }

  beforeEach(() => {
    server = new FakeKdbServer({ onRequest: () => [response(k.long(2n))] });
  });

  afterEach(() => {
    conn?.close();
  });

  void describe('Handshake', () => {
    void it('sends user:password followed by version 3 and a terminator', async () => {
      conn = await open({ user: 'alice', password: 'test-secret' });

      assert.deepEqual(server.credentials, ['alice:test-secret']);
      assert.deepEqual(server.clientVersions, [3]);
      assert.deepEqual(Array.from(server.socket.written), [...Buffer.from('alice:test-secret'), 3, 0]);
    });

    void it('keeps the colon when there is no password', async () => {
      conn = await open({ user: 'alice' });
      assert.deepEqual(server.credentials, ['alice:']);
    });

    void it('sends empty credentials when neither user nor password is set', async () => {
      conn = await open();
      assert.deepEqual(server.credentials, ['']);
      assert.deepEqual(Array.from(server.socket.written), [3, 0]);
    });

    void it('caps the negotiated version at 3', async () => {
      server = new FakeKdbServer({ version: 5 });
      conn = await open();
      assert.equal(conn.version, 3);
      assert.equal(conn.state, 'ready');
    });

    void it('accepts an older server version', async () => {
      server = new FakeKdbServer({ version: 1 });
      conn = await open();
      assert.equal(conn.version, 1);
    });

    void it('reports access denied when the server closes instead of answering', async () => {
      server = new FakeKdbServer({ version: null });
      conn = new KdbConnection({ socketFactory: server.factory, logger: quiet });

      const error = await assertRejectsWith(conn.connect(), KdbHandshakeError);
      assert.equal(error.message, 'access');
      assert.equal(conn.state, 'disconnected');
    });

    void it('wraps socket factory failures as transport errors', async () => {
      conn = new KdbConnection({
        socketFactory: () => Promise.reject(new Error('ECONNREFUSED')),
        logger: quiet,
      });

      const error = await assertRejectsWith(conn.connect(), KdbTransportError);
      assert.equal(error.message, 'Cannot connect to localhost:5010: ECONNREFUSED');
      assert.equal(conn.state, 'disconnected');
    });

    void it('passes host, port, TLS and timeout to the socket factory', async () => {
      conn = await open({ host: 'tick', port: 6000, tls: true, timeoutMs: 250 });
      assert.deepEqual(server.targets, [{ host: 'tick', port: 6000, tls: true, timeoutMs: 250 }]);
      assert.equal(conn.target, 'tick:6000');
    });

    void it('refuses to connect twice', async () => {
      conn = await open();
      await assertRejectsWith(conn.connect(), KdbProtocolError);
      assert.equal(conn.state, 'ready');
    });
  });

  void describe('Requests', () => {
    void it('sends an expression as a char vector in a sync message', async () => {
      conn = await open();
      const result = await conn.sendSync('1+1');

      assert.deepEqual(result, k.long(2n));
      const [message] = server.messages;
      assert.equal(message?.header.kind, MESSAGE_KINDS.SYNC);
      assert.deepEqual(message?.value, k.chars('1+1'));
      assert.equal(conn.pendingRequests, 0);
    });

    void it('sends a function call as a list headed by the function name', async () => {
      conn = await open();
      await conn.sendSync('.u.upd', 'trade', k.chars('{}'), 1n);

      assert.deepEqual(
        server.messages[0]?.value,
        k.list(k.chars('.u.upd'), k.symbol('trade'), k.chars('{}'), k.long(1n))
      );
    });

    void it('sends async messages without waiting', async () => {
      conn = await open();
      await conn.sendAsync('upd', 'quote');

      assert.equal(server.messages[0]?.header.kind, MESSAGE_KINDS.ASYNC);
      assert.deepEqual(server.messages[0]?.value, k.list(k.chars('upd'), k.symbol('quote')));
    });

    void it('rejects more than three function arguments before sending', async () => {
      conn = await open();
      await assertRejectsWith(conn.sendSync('f', 1, 2, 3, 4), KdbArgumentError);

      assert.equal(server.messages.length, 0);
      assert.equal(conn.state, 'ready');
    });

    void it('raises remote errors and stays usable', async () => {
      server.respondWith(() => [errorResponse('type')]);
      conn = await open();

      const error = await assertRejectsWith(conn.sendSync('1+`a'), KdbRemoteError);
      assert.equal(error.remoteMessage, 'type');
      assert.equal(conn.state, 'ready');

      server.respondWith(() => [response(k.int(3))]);
      assert.deepEqual(await conn.sendSync('1i+2i'), k.int(3));
    });

    void it('decodes little-endian responses', async () => {
      server.respondWith(() => [new Uint8Array(Buffer.from('010200000d000000fa05000000', 'hex'))]);
      conn = await open();

      assert.deepEqual(await conn.sendSync('5i'), k.int(5));
      assert.equal(conn.littleEndian, true);
    });

    void it('reassembles responses split across chunks', async () => {
      const reply = response(k.vector('long', [1n, 2n, 3n]));
      server.respondWith((_message, socket) => {
        setImmediate(() => {
          socket.deliver(reply.subarray(0, 3));
          socket.deliver(reply.subarray(3, 11));
          socket.deliver(reply.subarray(11));
        });
        return [];
      });
      conn = await open();

      assert.deepEqual(await conn.sendSync('1 2 3'), k.vector('long', [1n, 2n, 3n]));
    });
  });

  void describe('Interleaved messages', () => {
    void it('discards async messages received while awaiting a response', async () => {
      server.respondWith(() => [frame(MESSAGE_KINDS.ASYNC, k.symbol('ignored')), response(k.long(42n))]);
      conn = await open();

      assert.deepEqual(await conn.sendSync('42'), k.long(42n));
      assert.equal(conn.pendingRequests, 0);
    });

    void it('keeps counting a sync request received while awaiting a response', async () => {
      server.respondWith(() => [frame(MESSAGE_KINDS.SYNC, k.chars('who')), response(k.int(1))]);
      conn = await open();

      assert.deepEqual(await conn.sendSync('1i'), k.int(1));
      assert.equal(conn.pendingRequests, 1);

      server.respondWith(() => []);
      await conn.sendResponse(k.int(9));
      assert.equal(conn.pendingRequests, 0);
      assert.equal(server.messages[1]?.header.kind, MESSAGE_KINDS.RESPONSE);
      assert.deepEqual(server.messages[1]?.value, k.int(9));
    });
  });

  void describe('Serving requests', () => {
    void it('reads an inbound sync request and answers it', async () => {
      server.respondWith(() => []);
      conn = await open();

      server.socket.deliver(frame(MESSAGE_KINDS.SYNC, k.chars('til 2')));
      const inbound = await conn.readMessage();

      assert.deepEqual(inbound, { kind: 'sync', value: k.chars('til 2') });
      assert.equal(conn.pendingRequests, 1);

      await conn.sendResponse([1, 2]);
      assert.deepEqual(server.messages[0]?.value, k.list(k.float(1), k.float(2)));
      assert.equal(conn.pendingRequests, 0);
    });

    void it('answers an inbound request with an error', async () => {
      server.respondWith(() => []);
      conn = await open();

      server.socket.deliver(frame(MESSAGE_KINDS.SYNC, k.chars('bad')));
      await conn.readMessage();
      await conn.sendError('nyi');

      assert.deepEqual(server.errors, ['nyi']);
      assert.equal(conn.pendingRequests, 0);
    });

    void it('reads async messages without counting them', async () => {
      conn = await open();
      server.socket.deliver(frame(MESSAGE_KINDS.ASYNC, k.symbol('tick')));

      assert.deepEqual(await conn.readMessage(), { kind: 'async', value: k.symbol('tick') });
      assert.equal(conn.pendingRequests, 0);
    });

    void it('refuses a response when no request is outstanding', async () => {
      conn = await open();

      await assertRejectsWith(conn.sendResponse(k.int(1)), KdbProtocolError);
      await assertRejectsWith(conn.sendError('oops'), KdbProtocolError);
      assert.equal(conn.state, 'ready');
      assert.equal(server.frames.length, 0);
    });
  });

  void describe('Lifecycle', () => {
    void it('reports liveness by round-tripping the ping expression', async () => {
      conn = await open({ pingExpression: '2+2' });

      assert.equal(await conn.isConnected(), true);
      assert.deepEqual(server.messages[0]?.value, k.chars('2+2'));
    });

    void it('counts a remote error as alive', async () => {
      server.respondWith(() => [errorResponse('rank')]);
      conn = await open();

      assert.equal(await conn.isConnected(), true);
    });

    void it('reports a hung-up peer as not connected', async () => {
      conn = await open();
      server.socket.hangUp();
      await FakeKdbServer.flush();

      assert.equal(conn.state, 'disconnected');
      assert.equal(await conn.isConnected(), false);
    });

    void it('fails a request when the peer closes mid-response', async () => {
      server.respondWith((_message, socket) => {
        setImmediate(() => {
          socket.deliver(response(k.long(7n)).subarray(0, 10));
          socket.hangUp();
        });
        return [];
      });
      conn = await open();

      const error = await assertRejectsWith(conn.sendSync('7'), KdbTransportError);
      assert.equal(error.message, 'Connection closed by peer');
      assert.equal(conn.state, 'disconnected');
    });

    void it('rejects requests after close and reconnects on demand', async () => {
      conn = await open();
      conn.close();
      conn.close();

      const error = await assertRejectsWith(conn.sendSync('1+1'), KdbTransportError);
      assert.equal(error.message, 'Not connected to localhost:5010');

      await conn.connect();
      assert.deepEqual(await conn.sendSync('1+1'), k.long(2n));
      assert.equal(server.sockets.length, 2);
    });
  });

  void describe('Timeouts', () => {
    void it('fails a request left unanswered and drops the connection', async () => {
      server.respondWith(() => []);
      conn = await open({ timeoutMs: 30 });

      const error = await assertRejectsWith(conn.sendSync('hang'), KdbTransportError);
      assert.equal(error.message, 'No data from peer within 30ms');
      assert.equal(conn.state, 'disconnected');
    });

    void it('keeps idle connections open past the timeout', async () => {
      conn = await open({ timeoutMs: 20 });
      await new Promise((resolve) => setTimeout(resolve, 60));

      assert.equal(conn.state, 'ready');
      assert.deepEqual(await conn.sendSync('1+1'), k.long(2n));
    });
  });

  void describe('Compression', () => {
    const bigPayload = k.chars('x'.repeat(4000));

    void it('compresses large messages to remote peers when enabled', async () => {
      conn = await open({ compress: true });
      await conn.sendAsync(bigPayload);

      const [raw] = server.frames;
      assert.equal(raw?.[2], 1);
      assert.ok((raw?.length ?? 0) < 2000);
      assert.deepEqual(server.messages[0]?.value, bigPayload);
    });

    void it('never compresses for loopback peers', async () => {
      server = new FakeKdbServer({ remoteAddress: '127.0.0.1' });
      conn = await open({ compress: true });
      await conn.sendAsync(bigPayload);

      assert.equal(conn.isLoopback, true);
      assert.equal(server.frames[0]?.[2], 0);
      assert.equal(server.frames[0]?.length, 4014);
    });

    void it('can be switched on after connecting', async () => {
      conn = await open();
      assert.equal(conn.compression, false);

      conn.setCompression(true);
      await conn.sendAsync(bigPayload);
      assert.equal(server.frames[0]?.[2], 1);
    });
  });
});

void describe('buildRequest', () => {
  void it('sends a lone expression as a char vector', () => {
    assert.deepEqual(buildRequest('til 3', []), k.chars('til 3'));
  });

  void it('converts host arguments', () => {
    assert.deepEqual(
      buildRequest('f', ['a', 1.5, true]),
      k.list(k.chars('f'), k.symbol('a'), k.float(1.5), k.bool(true))
    );
  });

  void it('keeps a non-string query as is', () => {
    assert.deepEqual(buildRequest(k.symbol('f'), [k.int(1)]), k.list(k.symbol('f'), k.int(1)));
  });
});
