// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import type { IncomingMessage } from 'node:http';
import { WebSocket, WebSocketServer } from 'ws';
import { type OutboundMessage, decodeClientMessage } from '../live/messages.js';
import { Future, Queue, toError } from '../utils.js';

/**
 * Server side of one test connection.
 */
export class FakePeer {
  readonly socket: WebSocket;
  readonly request: IncomingMessage;
  /** Client frames as received, in order. */
  readonly frames: string[] = [];
  /** Frames that did not decode as client messages. */
  readonly errors: Error[] = [];
  /** Resolves with the close code and reason once the socket is closed. */
  readonly closed = new Future<{ code: number; reason: string }>();
  #messages = new Queue<OutboundMessage>();

  constructor(socket: WebSocket, request: IncomingMessage) {
    this.socket = socket;
    this.request = request;
    socket.on('message', (data) => {
      const frame = data.toString();
      this.frames.push(frame);
      try {
        void this.#messages.put(decodeClientMessage(frame));
      } catch (error) {
        this.errors.push(toError(error));
      }
    });
    socket.on('close', (code, reason) => {
      this.closed.resolve({ code, reason: reason.toString() });
    });
  }

  /** Waits for the next client message. */
  nextMessage(): Promise<OutboundMessage> {
    return this.#messages.get();
  }

  /** Sends a server frame; objects are serialized, in a binary frame like the real server. */
  send(frame: string | object, { binary = true }: { binary?: boolean } = {}): void {
    const payload = typeof frame === 'string' ? frame : JSON.stringify(frame);
    this.socket.send(binary ? Buffer.from(payload) : payload);
  }

  sendSetupComplete(): void {
    this.send({ setupComplete: {} });
  }

  close(code = 1000, reason = ''): void {
    this.socket.close(code, reason);
  }
}

export type PeerHandler = (peer: FakePeer) => void | Promise<void>;

/**
 * In-process Live endpoint on a random local port.
 */
export class FakeLiveServer {
  readonly wss: WebSocketServer;
  readonly peers: FakePeer[] = [];
  /** Errors thrown by the peer handler. */
  readonly handlerErrors: Error[] = [];
  #pending = new Queue<FakePeer>();

  private constructor(wss: WebSocketServer, handler?: PeerHandler) {
    this.wss = wss;
    wss.on('connection', (socket, request) => {
      const peer = new FakePeer(socket, request);
      this.peers.push(peer);
      void this.#pending.put(peer);
      if (handler) {
        void Promise.resolve(handler(peer)).catch((error: unknown) => {
          this.handlerErrors.push(toError(error));
          peer.socket.terminate();
        });
      }
    });
  }

  static async start(handler?: PeerHandler): Promise<FakeLiveServer> {
    const wss = await new Promise<WebSocketServer>((resolve) => {
      const server: WebSocketServer = new WebSocketServer({ port: 0 }, () => resolve(server));
    });
    return new FakeLiveServer(wss, handler);
  }

  get port(): number {
    const address = this.wss.address();
    if (typeof address === 'string') {
      throw new Error(`server is not listening on a port: ${address}`);
    }
    return address.port;
  }

  get url(): string {
    return `ws://127.0.0.1:${this.port}/live`;
  }

  /** Waits for the next client to connect. */
  nextPeer(): Promise<FakePeer> {
    return this.#pending.get();
  }

  async close(): Promise<void> {
    for (const client of this.wss.clients) {
      client.terminate();
    }
    await new Promise<void>((resolve, reject) => {
      this.wss.close((err) => (err ? reject(err) : resolve()));
    });
  }
}

/**
 * Handler that acknowledges the setup frame, then answers every client content turn with
 * `reply` and a complete turn.
 */
export function echoHandler(reply = 'Hi there'): PeerHandler {
  return async (peer) => {
    const setup = await peer.nextMessage();
    if (setup.type !== 'setup') {
      peer.close(1002, 'expected setup');
      return;
    }
    peer.sendSetupComplete();
    for (;;) {
      const message = await peer.nextMessage();
      if (message.type === 'client_content' && message.turnComplete) {
        peer.send({ serverContent: { modelTurn: { role: 'model', parts: [{ text: reply }] } } });
        peer.send({ serverContent: { turnComplete: true } });
      }
    }
  };
}
