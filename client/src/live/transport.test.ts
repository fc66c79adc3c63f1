// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import { type Server, type Socket, createServer } from 'node:net';
import { afterEach, describe, expect, it } from 'vitest';
import { WebSocketServer } from 'ws';
import { ConnectionError, TransportError } from '../_exceptions.js';
import { initializeLogger } from '../log.js';
import { FakeLiveServer } from '../testutils/fake_live_server.js';
import { WebSocketTransport } from './transport.js';

initializeLogger({ pretty: false, level: 'silent' });

const credentials = { apiKey: 'test-key' };

/** TCP server that accepts connections and never answers the upgrade. */
async function createSilentServer(): Promise<{ server: Server; port: number; close: () => void }> {
  const sockets: Socket[] = [];
  const server = createServer((socket) => sockets.push(socket));
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') throw new Error('no port');
  return {
    server,
    port: address.port,
    close: () => {
      sockets.forEach((socket) => socket.destroy());
      server.close();
    },
  };
}

describe('WebSocketTransport', () => {
  const transport = new WebSocketTransport();
  let server: FakeLiveServer | undefined;

  afterEach(async () => {
    await server?.close();
    server = undefined;
  });

  describe('connect', () => {
    it('sends the API key as a query parameter by default', async () => {
      server = await FakeLiveServer.start();
      const connection = await transport.connect(server.url, credentials, { timeoutMs: 2000 });
      const peer = await server.nextPeer();

      const url = new URL(peer.request.url ?? '', 'ws://localhost');
      expect(url.pathname).toBe('/live');
      expect(url.searchParams.get('key')).toBe('test-key');
      expect(peer.request.headers['x-goog-api-key']).toBeUndefined();
      await connection.close();
    });

    it('sends the API key as a header when asked to', async () => {
      server = await FakeLiveServer.start();
      const connection = await transport.connect(
        server.url,
        { apiKey: 'test-key', placement: 'header' },
        { timeoutMs: 2000 },
      );
      const peer = await server.nextPeer();

      const url = new URL(peer.request.url ?? '', 'ws://localhost');
      expect(url.searchParams.has('key')).toBe(false);
      expect(peer.request.headers['x-goog-api-key']).toBe('test-key');
      await connection.close();
    });

    it('keeps the status code of a rejected upgrade', async () => {
      const wss = await new Promise<WebSocketServer>((resolve) => {
        const s: WebSocketServer = new WebSocketServer(
          { port: 0, verifyClient: (_info, cb) => cb(false, 401, 'Unauthorized') },
          () => resolve(s),
        );
      });
      const address = wss.address();
      if (typeof address === 'string') throw new Error('no port');

      const error = await transport
        .connect(`ws://127.0.0.1:${address.port}`, credentials, { timeoutMs: 2000 })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConnectionError);
      if (!(error instanceof ConnectionError)) return;
      expect(error.statusCode).toBe(401);
      expect(error.retryable).toBe(false);
      expect(error.message).toBe('WebSocket upgrade rejected with status 401');
      await new Promise<void>((resolve) => wss.close(() => resolve()));
    });

    it('fails when nothing listens on the port', async () => {
      const closed = await FakeLiveServer.start();
      const url = closed.url;
      await closed.close();

      const error = await transport
        .connect(url, credentials, { timeoutMs: 2000 })
        .catch((e: unknown) => e);
      expect(error).toBeInstanceOf(ConnectionError);
      if (!(error instanceof ConnectionError)) return;
      expect(error.retryable).toBe(true);
      expect(error.statusCode).toBeNull();
      expect(error.cause).toBeInstanceOf(Error);
    });

    it('times out when the upgrade never completes', async () => {
      const silent = await createSilentServer();
      try {
        const error = await transport
          .connect(`ws://127.0.0.1:${silent.port}`, credentials, { timeoutMs: 50 })
          .catch((e: unknown) => e);
        expect(error).toBeInstanceOf(ConnectionError);
        if (!(error instanceof ConnectionError)) return;
        expect(error.message).toBe(`timed out connecting to 127.0.0.1:${silent.port}`);
      } finally {
        silent.close();
      }
    });

    it('fails right away with an aborted signal', async () => {
      const controller = new AbortController();
      controller.abort();
      await expect(
        transport.connect('ws://127.0.0.1:1', credentials, {
          timeoutMs: 2000,
          signal: controller.signal,
        }),
      ).rejects.toThrow('connect aborted');
    });

    it('stops connecting when the signal aborts', async () => {
      const silent = await createSilentServer();
      const controller = new AbortController();
      try {
        const pending = transport.connect(`ws://127.0.0.1:${silent.port}`, credentials, {
          timeoutMs: 2000,
          signal: controller.signal,
        });
        setTimeout(() => controller.abort(), 20);
        await expect(pending).rejects.toThrow('connect aborted');
      } finally {
        silent.close();
      }
    });

    it('rejects invalid endpoints', async () => {
      await expect(
        transport.connect('not a url', credentials, { timeoutMs: 2000 }),
      ).rejects.toBeInstanceOf(ConnectionError);
    });
  });

  describe('connection', () => {
    it('receives text and binary frames in order', async () => {
      server = await FakeLiveServer.start((peer) => {
        peer.send('one', { binary: false });
        peer.send('two');
        peer.send({ three: 3 });
      });
      const connection = await transport.connect(server.url, credentials, { timeoutMs: 2000 });

      expect(await connection.receive()).toEqual({ type: 'message', data: 'one' });
      expect(await connection.receive()).toEqual({ type: 'message', data: 'two' });
      expect(await connection.receive()).toEqual({ type: 'message', data: '{"three":3}' });
      await connection.close();
    });

    it('sends frames to the peer', async () => {
      server = await FakeLiveServer.start();
      const connection = await transport.connect(server.url, credentials, { timeoutMs: 2000 });
      const peer = await server.nextPeer();

      await connection.send('{"realtimeInput":{"text":"hi"}}');
      expect(await peer.nextMessage()).toEqual({
        type: 'realtime_input',
        input: { kind: 'text', text: 'hi' },
      });
      await connection.close();
    });

    it('keeps returning the peer close', async () => {
      server = await FakeLiveServer.start((peer) => peer.close(4000, 'bye'));
      const connection = await transport.connect(server.url, credentials, { timeoutMs: 2000 });

      expect(await connection.receive()).toEqual({ type: 'closed', code: 4000, reason: 'bye' });
      expect(await connection.receive()).toEqual({ type: 'closed', code: 4000, reason: 'bye' });
      await connection.close();
    });

    it('reports a dropped socket as code 1006', async () => {
      server = await FakeLiveServer.start((peer) => {
        setTimeout(() => peer.socket.terminate(), 20);
      });
      const connection = await transport.connect(server.url, credentials, { timeoutMs: 2000 });

      expect(await connection.receive()).toEqual({ type: 'closed', code: 1006, reason: '' });
    });

    it('closes once, with a close frame', async () => {
      server = await FakeLiveServer.start();
      const connection = await transport.connect(server.url, credentials, { timeoutMs: 2000 });
      const peer = await server.nextPeer();

      const first = connection.close();
      const second = connection.close(4001, 'ignored');
      expect(second).toBe(first);
      await first;

      expect(await peer.closed.await).toEqual({ code: 1000, reason: '' });
      expect(await connection.receive()).toEqual({ type: 'closed', code: 1000, reason: '' });
    });

    it('rejects sends once closed', async () => {
      server = await FakeLiveServer.start();
      const connection = await transport.connect(server.url, credentials, { timeoutMs: 2000 });
      expect(connection.open).toBe(true);
      await connection.close();

      expect(connection.open).toBe(false);
      await expect(connection.send('{}')).rejects.toBeInstanceOf(TransportError);
    });
  });
});
