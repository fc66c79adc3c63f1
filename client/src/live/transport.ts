// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import type { ClientRequest, IncomingMessage } from 'node:http';
import { type RawData, WebSocket } from 'ws';
import { ConnectionError, TransportError } from '../_exceptions.js';
import { log } from '../log.js';
import { type Credentials, DEFAULT_LIVE_CONNECT_OPTIONS } from '../types.js';
import { Future, Queue, TIMEOUT_SENTINEL, toError, withTimeout } from '../utils.js';

/**
 * Outcome of a single {@link Connection.receive} call. `closed` and `error` are terminal and
 * repeat on every later call.
 */
export type ReceiveResult =
  | { type: 'message'; data: string }
  | { type: 'closed'; code: number; reason: string }
  | { type: 'error'; error: Error };

export interface Connection {
  /** False once either side has started closing the socket. */
  readonly open: boolean;
  /** Resolves once the frame has been handed to the socket. */
  send(payload: string): Promise<void>;
  /** Suspends until a whole frame arrives, the peer closes or the socket fails. */
  receive(): Promise<ReceiveResult>;
  /** Idempotent; safe to call after the peer closed. */
  close(code?: number, reason?: string): Promise<void>;
}

export interface TransportConnectOptions {
  timeoutMs: number;
  /** Bound on the close handshake of the returned connection. */
  closeTimeoutMs?: number;
  signal?: AbortSignal;
}

export interface Transport {
  /**
   * @throws ConnectionError when the socket cannot be opened
   */
  connect(
    endpoint: string,
    credentials: Credentials,
    options: TransportConnectOptions,
  ): Promise<Connection>;
}

export const API_KEY_HEADER = 'x-goog-api-key';
export const API_KEY_QUERY_PARAM = 'key';

/**
 * Transport over the `ws` package.
 */
export class WebSocketTransport implements Transport {
  async connect(
    endpoint: string,
    credentials: Credentials,
    {
      timeoutMs,
      closeTimeoutMs = DEFAULT_LIVE_CONNECT_OPTIONS.closeTimeoutMs,
      signal,
    }: TransportConnectOptions,
  ): Promise<Connection> {
    let url: URL;
    try {
      url = new URL(endpoint);
    } catch (error) {
      throw new ConnectionError({
        message: `invalid endpoint: ${endpoint}`,
        options: { retryable: false, cause: error },
      });
    }

    const headers: Record<string, string> = {};
    if (credentials.placement === 'header') {
      headers[API_KEY_HEADER] = credentials.apiKey;
    } else {
      url.searchParams.set(API_KEY_QUERY_PARAM, credentials.apiKey);
    }

    if (signal?.aborted) {
      throw new ConnectionError({
        message: 'connect aborted',
        options: { retryable: false, cause: signal.reason },
      });
    }

    const socket = new WebSocket(url, { headers });
    const logger = log().child({ host: url.host });
    // listen before the upgrade completes, frames can arrive with the 101 response
    const connection = new WebSocketConnection(socket, closeTimeoutMs);

    await new Promise<void>((resolve, reject) => {
      let settled = false;
      const settle = (error?: ConnectionError) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeout);
        signal?.removeEventListener('abort', onAbort);
        socket.off('open', onOpen);
        socket.off('unexpected-response', onUnexpectedResponse);
        socket.off('close', onClose);
        socket.off('error', onError);
        if (error) {
          if (socket.readyState !== WebSocket.CLOSED) socket.terminate();
          reject(error);
        } else {
          resolve();
        }
      };

      const onOpen = () => settle();
      const onError = (err: Error) =>
        settle(
          new ConnectionError({ message: `error connecting to ${url.host}`, options: { cause: err } }),
        );
      const onUnexpectedResponse = (_req: ClientRequest, res: IncomingMessage) => {
        res.resume();
        settle(
          new ConnectionError({
            message: `WebSocket upgrade rejected with status ${res.statusCode}`,
            options: { statusCode: res.statusCode },
          }),
        );
      };
      const onClose = (code: number) =>
        settle(new ConnectionError({ message: `connection closed during upgrade (code ${code})` }));
      const onAbort = () =>
        settle(
          new ConnectionError({
            message: 'connect aborted',
            options: { retryable: false, cause: signal?.reason },
          }),
        );

      const timeout = setTimeout(
        () => settle(new ConnectionError({ message: `timed out connecting to ${url.host}` })),
        timeoutMs,
      );
      socket.once('open', onOpen);
      socket.once('error', onError);
      socket.once('unexpected-response', onUnexpectedResponse);
      socket.once('close', onClose);
      signal?.addEventListener('abort', onAbort, { once: true });
    });

    logger.debug('websocket connected');
    return connection;
  }
}

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  return Buffer.from(data).toString('utf8');
}

/**
 * An open WebSocket. Text and binary frames are both read as UTF-8 JSON text; the server
 * sends its JSON in binary frames.
 */
export class WebSocketConnection implements Connection {
  #socket: WebSocket;
  #closeTimeoutMs: number;
  #queue = new Queue<ReceiveResult>();
  #terminal?: ReceiveResult;
  #terminalDelivered = false;
  #socketClosed = new Future<void>();
  #closing?: Promise<void>;
  #logger = log();

  constructor(socket: WebSocket, closeTimeoutMs: number) {
    this.#socket = socket;
    this.#closeTimeoutMs = closeTimeoutMs;

    socket.on('message', (data) => {
      void this.#queue.put({ type: 'message', data: rawDataToString(data) });
    });
    socket.on('error', (err) => {
      this.#logger.debug({ err }, 'websocket error');
      this.#end({ type: 'error', error: new TransportError(err.message, { cause: err }) });
    });
    socket.on('close', (code, reason) => {
      this.#end({ type: 'closed', code, reason: reason.toString('utf8') });
      this.#socketClosed.resolve();
    });
  }

  #end(result: ReceiveResult) {
    // the first terminal result wins: an error is followed by a 1006 close
    if (this.#terminal) return;
    this.#terminal = result;
    void this.#queue.put(result);
  }

  get open(): boolean {
    return this.#socket.readyState === WebSocket.OPEN;
  }

  async send(payload: string): Promise<void> {
    if (this.#socket.readyState !== WebSocket.OPEN) {
      throw new TransportError('socket is not open', { retryable: false });
    }
    await new Promise<void>((resolve, reject) => {
      this.#socket.send(payload, (err) => {
        if (err) {
          reject(new TransportError(`failed to send frame: ${err.message}`, { cause: err }));
        } else {
          resolve();
        }
      });
    });
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

  close(code = 1000, reason = ''): Promise<void> {
    if (!this.#closing) {
      this.#closing = this.#close(code, reason);
    }
    return this.#closing;
  }

  async #close(code: number, reason: string) {
    const state = this.#socket.readyState;
    if (state === WebSocket.CLOSED) return;
    if (state === WebSocket.OPEN) {
      try {
        this.#socket.close(code, reason);
      } catch (error) {
        this.#logger.warn({ err: toError(error) }, 'failed to start close handshake');
        this.#socket.terminate();
      }
    }

    const result = await withTimeout(this.#socketClosed.await, this.#closeTimeoutMs);
    if (result === TIMEOUT_SENTINEL) {
      this.#logger.warn(
        { closeTimeoutMs: this.#closeTimeoutMs },
        'close handshake timed out, terminating socket',
      );
      this.#socket.terminate();
    }
  }
}
