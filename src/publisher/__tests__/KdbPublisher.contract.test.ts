/**
 * KdbPublisher contract tests
 *
 * The publisher never rejects: every failure is logged, kept in lastError
 * and reported as false.
 */

import assert from 'node:assert/strict';
import { afterEach, beforeEach, describe, it } from 'node:test';

import { FakeKdbServer, errorResponse, response } from '@/__testutils__/FakeKdbServer.js';
import { KdbConnection, KdbPublisher, MESSAGE_KINDS, k } from '@/lib.js';
import type { KdbPublisherOptions } from '@/lib.js';

void describe('KdbPublisher contract', () => {
  let server: FakeKdbServer;
  let publisher: KdbPublisher;
  let infoLines: string[];

  function createPublisher(options: KdbPublisherOptions = {}): KdbPublisher {
    return new KdbPublisher({
      socketFactory: server.factory,
      logger: { info: (message) => infoLines.push(message), debug: () => {} },
      ...options,
    });
  }

  beforeEach(() => {
    infoLines = [];
    server = new FakeKdbServer({
      onRequest: (message) => (message.header.kind === MESSAGE_KINDS.SYNC ? [response(k.nil())] : []),
    });
  });

  afterEach(() => {
    publisher?.close();
  });

  void it('connects lazily and calls the default function synchronously', async () => {
    publisher = createPublisher();

    assert.equal(await publisher.publish('{"a":1}'), true);
    assert.equal(server.messages[0]?.header.kind, MESSAGE_KINDS.SYNC);
    assert.deepEqual(
      server.messages[0]?.value,
      k.list(k.chars('.u.updjson'), k.symbol('events'), k.chars('{"a":1}'))
    );
    assert.equal(publisher.lastError, null);
    assert.deepEqual(infoLines, ['Connected to kdb+ at localhost:5010']);
  });

  void it('uses configured names and async delivery', async () => {
    publisher = createPublisher({ functionName: 'upd', tableName: 'sensors', async: true });

    assert.equal(await publisher.publish('{}'), true);
    assert.equal(server.messages[0]?.header.kind, MESSAGE_KINDS.ASYNC);
    assert.deepEqual(server.messages[0]?.value, k.list(k.chars('upd'), k.symbol('sensors'), k.chars('{}')));
  });

  void it('lets a single send override the delivery mode', async () => {
    publisher = createPublisher({ async: true });

    assert.equal(await publisher.send('.u.upd', 'trade', '[]', { async: false }), true);
    assert.equal(server.messages[0]?.header.kind, MESSAGE_KINDS.SYNC);
  });

  void it('reports a remote error as false and keeps its text', async () => {
    server.respondWith(() => [errorResponse('upd')]);
    publisher = createPublisher();

    assert.equal(await publisher.publish('{}'), false);
    assert.equal(publisher.lastError, 'Remote error: upd');
    assert.equal(infoLines[1], 'Send to .u.updjson failed: Remote error: upd');

    server.respondWith(() => [response(k.nil())]);
    assert.equal(await publisher.publish('{}'), true);
    assert.equal(publisher.lastError, null);
    assert.equal(server.sockets.length, 1);
  });

  void it('reports a refused handshake as false', async () => {
    server = new FakeKdbServer({ version: null });
    publisher = createPublisher({ user: 'bob', password: 'wrong' });

    assert.equal(await publisher.connect(), false);
    assert.equal(publisher.lastError, 'access');
    assert.deepEqual(infoLines, ['Connection to localhost:5010 failed: access']);
    assert.equal(await publisher.publish('{}'), false);
  });

  void it('reconnects after the peer drops the connection', async () => {
    publisher = createPublisher();
    assert.equal(await publisher.publish('{"n":1}'), true);

    server.socket.hangUp();
    await FakeKdbServer.flush();
    assert.equal(await publisher.isConnected(), false);

    assert.equal(await publisher.publish('{"n":2}'), true);
    assert.equal(server.sockets.length, 2);
  });

  void it('publishes over a supplied connection', async () => {
    const connection = new KdbConnection({ socketFactory: server.factory, logger: { info: () => {}, debug: () => {} } });
    publisher = new KdbPublisher({ connection, logger: { info: () => {}, debug: () => {} } });

    assert.equal(await publisher.connect(), true);
    assert.equal(connection.state, 'ready');
    assert.equal(await publisher.isConnected(), true);
  });
});
