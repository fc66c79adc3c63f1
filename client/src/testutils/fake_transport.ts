// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import { ConnectionError } from '../_exceptions.js';
import type {
  Connection,
  ReceiveResult,
  Transport,
  TransportConnectOptions,
} from '../live/transport.js';
import type { Credentials } from '../types.js';
import { Queue } from '../utils.js';

export const SETUP_COMPLETE_FRAME = JSON.stringify({ setupComplete: {} });

/**
 * In-memory connection driven by the test: frames pushed with {@link push} are what the
 * session receives, and every frame the session sends is kept in {@link sent}.
 */
export class FakeConnection implements Connection {
  readonly sent: string[] = [];
  readonly closeCalls: Array<{ code?: number; reason?: string }> = [];
  /** Runs on every sent frame, e.g. to answer it. */
  onSend?: (payload: string, connection: FakeConnection) => void;
  /** When set, `send` rejects with it. */
  sendError?: Error;
  /** When false, `close` does not answer with a close of its own. */
  echoClose = true;
  open = true;

  #queue = new Queue<ReceiveResult>();
  #terminal?: ReceiveResult;
  #terminalDelivered = false;

  push(frame: string | object): void {
    void this.#queue.put({
      type: 'message',
      data: typeof frame === 'string' ? frame : JSON.stringify(frame),
    });
  }

  pushClose(code: number, reason = ''): void {
    this.#end({ type: 'closed', code, reason });
  }

  pushError(error: Error): void {
    this.#end({ type: 'error', error });
  }

  #end(result: ReceiveResult) {
    if (this.#terminal) return;
    this.open = false;
    this.#terminal = result;
    void this.#queue.put(result);
  }

  async send(payload: string): Promise<void> {
    if (this.sendError) throw this.sendError;
    this.sent.push(payload);
    this.onSend?.(payload, this);
  }

  async receive(): Promise<ReceiveResult> {
    if (this.#terminalDelivered && this.#terminal) {
      return this.#terminal;
    }
    const result = await this.#queue.get();
    if (result.type !== 'message') {
      this.#terminalDelivered = true;
    }
    return result;
  }

  async close(code?: number, reason?: string): Promise<void> {
    this.closeCalls.push({ code, reason });
    if (this.echoClose) {
      this.pushClose(code ?? 1000, reason ?? '');
    }
  }
}

export interface FakeTransportOptions {
  /** Answer the setup frame with a setup acknowledgement. */
  autoAck?: boolean;
  /** When set, `connect` rejects with it. */
  connectError?: Error;
  /** Runs on each new connection before it is returned. */
  onConnect?: (connection: FakeConnection) => void;
}

export class FakeTransport implements Transport {
  readonly connections: FakeConnection[] = [];
  readonly calls: Array<{
    endpoint: string;
    credentials: Credentials;
    options: TransportConnectOptions;
  }> = [];
  #opts: FakeTransportOptions;

  constructor(opts: FakeTransportOptions = {}) {
    this.#opts = opts;
  }

  get lastConnection(): FakeConnection | undefined {
    return this.connections[this.connections.length - 1];
  }

  async connect(
    endpoint: string,
    credentials: Credentials,
    options: TransportConnectOptions,
  ): Promise<FakeConnection> {
    this.calls.push({ endpoint, credentials, options });
    if (options.signal?.aborted) {
      throw new ConnectionError({ message: 'connect aborted', options: { retryable: false } });
    }
    if (this.#opts.connectError) {
      throw this.#opts.connectError;
    }

    const connection = new FakeConnection();
    if (this.#opts.autoAck) {
      connection.onSend = (payload, conn) => {
        if (payload.startsWith('{"setup"')) conn.push(SETUP_COMPLETE_FRAME);
      };
    }
    this.#opts.onConnect?.(connection);
    this.connections.push(connection);
    return connection;
  }
}
