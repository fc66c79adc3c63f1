// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import { Mutex } from '@livekit/mutex';
import type { Logger } from 'pino';
import {
  ConnectionError,
  HandshakeError,
  ProtocolError,
  SessionClosedError,
  TransportError,
  UsageError,
  isAPIError,
} from '../_exceptions.js';
import { log } from '../log.js';
import {
  type Credentials,
  DEFAULT_LIVE_CONNECT_OPTIONS,
  type LiveConnectOptions,
} from '../types.js';
import { Future, TIMEOUT_SENTINEL, shortuuid, toError, withTimeout } from '../utils.js';
import { EventStream } from './event_stream.js';
import {
  type InboundEvent,
  type OutboundMessage,
  type Setup,
  decodeServerMessage,
  encodeClientMessage,
} from './messages.js';
import type { Connection, Transport } from './transport.js';

export type SessionState =
  | 'connecting'
  | 'awaiting_setup_ack'
  | 'ready'
  | 'closing'
  | 'closed'
  | 'errored';

const TRANSITIONS: Readonly<Record<SessionState, readonly SessionState[]>> = {
  connecting: ['awaiting_setup_ack', 'errored'],
  awaiting_setup_ack: ['ready', 'errored'],
  ready: ['closing', 'closed', 'errored'],
  closing: ['closed'],
  closed: [],
  errored: [],
};

const isTerminal = (state: SessionState) => state === 'closed' || state === 'errored';

// WebSocket close codes
const CLOSE_NORMAL = 1000;
const CLOSE_PROTOCOL_ERROR = 1002;
const CLOSE_ABNORMAL = 1006;
const CLOSE_INTERNAL_ERROR = 1011;

const LOGGED_BASE64_CHARS = 32;

function truncateBase64(key: string, value: unknown): unknown {
  if (key === 'data' && typeof value === 'string' && value.length > LOGGED_BASE64_CHARS) {
    return `${value.slice(0, LOGGED_BASE64_CHARS)}…(${value.length} chars)`;
  }
  return value;
}

function loggableFrame(frame: string): string {
  try {
    return JSON.stringify(JSON.parse(frame), truncateBase64);
  } catch {
    return frame.length > 256 ? `${frame.slice(0, 256)}…` : frame;
  }
}

export interface LiveSessionOptions {
  transport: Transport;
  endpoint: string;
  credentials: Credentials;
  setup: Setup;
  connectOptions?: LiveConnectOptions;
  /** Aborting closes the session, or fails `start()` while it is still connecting. */
  signal?: AbortSignal;
}

/**
 * State machine of one Live connection.
 *
 * `start()` opens the transport, sends the setup frame and waits for the acknowledgement.
 * From then on a receive loop decodes every inbound frame into {@link events}, in arrival
 * order, until the connection ends. Outbound frames go through {@link send}, one at a time.
 */
export class LiveSession {
  readonly id = shortuuid('live_');
  readonly setup: Setup;
  readonly events: EventStream;

  #transport: Transport;
  #endpoint: string;
  #credentials: Credentials;
  #opts: LiveConnectOptions;
  #state: SessionState = 'connecting';
  #connection?: Connection;
  #sendLock = new Mutex();
  #handshake = new Future<void>();
  #handshakeResult: Promise<Error | null>;
  #abortController = new AbortController();
  #callerSignal?: AbortSignal;
  #receiveTask?: Promise<void>;
  #closing?: Promise<void>;
  #resumptionHandle?: string;
  #started = false;
  #logger: Logger;

  constructor({
    transport,
    endpoint,
    credentials,
    setup,
    connectOptions = DEFAULT_LIVE_CONNECT_OPTIONS,
    signal,
  }: LiveSessionOptions) {
    this.#transport = transport;
    this.#endpoint = endpoint;
    this.#credentials = credentials;
    this.#opts = connectOptions;
    this.setup = setup;
    this.#callerSignal = signal;
    this.#logger = log().child({ sessionId: this.id });
    this.events = new EventStream({
      warnThreshold: connectOptions.eventBufferWarnThreshold,
      logger: this.#logger,
    });
    this.#handshakeResult = this.#handshake.await.then(
      () => null,
      (error: unknown) => toError(error),
    );
  }

  get state(): SessionState {
    return this.#state;
  }

  /** Latest handle the server marked resumable; pass it to a new session to resume. */
  get resumptionHandle(): string | undefined {
    return this.#resumptionHandle;
  }

  /**
   * Connects and performs the setup handshake.
   *
   * @throws ConnectionError when the transport cannot be opened or the signal aborts
   * @throws HandshakeError when the server does not acknowledge the setup
   */
  async start(): Promise<void> {
    if (this.#started) {
      throw new UsageError('session already started');
    }
    this.#started = true;

    const signal = this.#callerSignal;
    if (signal) {
      if (signal.aborted) {
        this.#abortController.abort(signal.reason);
      } else {
        signal.addEventListener('abort', this.#onAbort, { once: true });
      }
    }

    let connection: Connection;
    try {
      connection = await this.#transport.connect(this.#endpoint, this.#credentials, {
        timeoutMs: this.#opts.connectTimeoutMs,
        closeTimeoutMs: this.#opts.closeTimeoutMs,
        signal: this.#abortController.signal,
      });
    } catch (error) {
      this.#transition('errored');
      this.#finish();
      throw isAPIError(error)
        ? error
        : new ConnectionError({ message: 'failed to connect', options: { cause: error } });
    }

    this.#connection = connection;
    if (this.#abortController.signal.aborted) {
      this.#transition('errored');
      this.#finish();
      void this.#closeConnection(CLOSE_NORMAL, 'aborted');
      throw new ConnectionError({ message: 'connect aborted', options: { retryable: false } });
    }

    this.#transition('awaiting_setup_ack');
    const setupFrame = encodeClientMessage({ type: 'setup', setup: this.setup });
    this.#logOutbound(setupFrame);
    try {
      await connection.send(setupFrame);
    } catch (error) {
      this.#failHandshake(
        new HandshakeError({
          message: 'failed to send the setup frame',
          reason: 'transport',
          cause: error,
        }),
      );
    }

    this.#receiveTask = this.#receiveLoop(connection);

    const result = await withTimeout(this.#handshakeResult, this.#opts.handshakeTimeoutMs);
    if (result === TIMEOUT_SENTINEL) {
      const error = new HandshakeError({
        message: `no setup acknowledgement within ${this.#opts.handshakeTimeoutMs}ms`,
        reason: 'timeout',
      });
      this.#failHandshake(error);
      throw error;
    }
    if (result) {
      throw result;
    }
  }

  /**
   * Sends one message. Sends are forwarded in call order, one frame at a time.
   *
   * @throws UsageError when the session is not ready yet, or for a setup message
   * @throws SessionClosedError once the session is closing or has ended
   */
  async send(message: OutboundMessage): Promise<void> {
    this.#checkSendable(message);
    const unlock = await this.#sendLock.lock();
    try {
      // the session may have ended while this send was waiting for its turn
      this.#checkSendable(message);
      const connection = this.#connection;
      if (!connection) {
        throw new SessionClosedError();
      }
      const frame = encodeClientMessage(message);
      if (!(message.type === 'realtime_input' && message.input.kind === 'audio')) {
        this.#logOutbound(frame);
      }
      try {
        await connection.send(frame);
      } catch (error) {
        // the peer started closing before the session noticed
        if (!connection.open) {
          throw new SessionClosedError('connection is closing', { cause: error });
        }
        throw error;
      }
    } finally {
      unlock();
    }
  }

  /**
   * Closes the session and waits for the connection to end. Bounded by `closeTimeoutMs`
   * once the close handshake is started. Safe to call in any state.
   */
  close(): Promise<void> {
    if (!this.#closing) {
      this.#closing = this.#close();
    }
    return this.#closing;
  }

  async #close(): Promise<void> {
    switch (this.#state) {
      case 'connecting':
        this.#abortController.abort(new SessionClosedError('session closed while connecting'));
        return;
      case 'awaiting_setup_ack':
        this.#failHandshake(
          new HandshakeError({
            message: 'session closed before the setup acknowledgement',
            reason: 'closed',
          }),
        );
        return;
      case 'ready':
        this.#transition('closing');
        await this.#closeConnection(CLOSE_NORMAL, '');
        await this.#receiveTask;
        return;
      case 'closing':
      case 'closed':
      case 'errored':
        await this.#receiveTask;
        return;
    }
  }

  #onAbort = () => {
    this.#logger.debug('session aborted by signal');
    this.#abortController.abort(this.#callerSignal?.reason);
    if (this.#state === 'awaiting_setup_ack') {
      this.#failHandshake(
        new ConnectionError({ message: 'connect aborted', options: { retryable: false } }),
      );
    } else if (this.#state === 'ready') {
      void this.close();
    }
  };

  #checkSendable(message: OutboundMessage) {
    if (message.type === 'setup') {
      throw new UsageError('the setup frame is sent by the session itself');
    }
    switch (this.#state) {
      case 'connecting':
      case 'awaiting_setup_ack':
        throw new UsageError(`cannot send ${message.type} before the session is ready`);
      case 'closing':
      case 'closed':
      case 'errored':
        throw new SessionClosedError();
      case 'ready':
        return;
    }
  }

  #transition(next: SessionState) {
    if (!TRANSITIONS[this.#state].includes(next)) {
      throw new Error(`illegal session transition: ${this.#state} -> ${next}`);
    }
    this.#logger.debug({ from: this.#state, to: next }, 'session state changed');
    this.#state = next;
    if (isTerminal(next)) {
      this.#callerSignal?.removeEventListener('abort', this.#onAbort);
    }
  }

  /** Ends the event stream, after its terminal event when there is one. */
  #finish(event?: InboundEvent) {
    if (event) {
      this.events.push(event);
    }
    this.events.end();
  }

  #failHandshake(error: Error) {
    if (this.#state !== 'awaiting_setup_ack') return;
    this.#logger.warn({ err: error }, 'setup handshake failed');
    this.#transition('errored');
    this.#finish();
    this.#handshake.reject(error);
    const code =
      error instanceof HandshakeError && error.reason === 'protocol'
        ? CLOSE_PROTOCOL_ERROR
        : CLOSE_NORMAL;
    void this.#closeConnection(code, '');
  }

  async #closeConnection(code: number, reason: string) {
    try {
      await this.#connection?.close(code, reason);
    } catch (error) {
      this.#logger.warn({ err: toError(error) }, 'error closing connection');
    }
  }

  async #receiveLoop(connection: Connection) {
    try {
      for (;;) {
        const result = await connection.receive();
        if (isTerminal(this.#state)) {
          return;
        }
        switch (result.type) {
          case 'message':
            this.#handleFrame(result.data);
            break;
          case 'closed':
            this.#handlePeerClose(result.code, result.reason);
            return;
          case 'error':
            this.#handleTransportError(result.error);
            return;
        }
      }
    } catch (error) {
      this.#logger.error({ err: toError(error) }, 'error in receive loop');
      this.#handleTransportError(toError(error));
      await this.#closeConnection(CLOSE_INTERNAL_ERROR, 'internal error');
    }
  }

  #handleFrame(frame: string) {
    if (this.#logger.isLevelEnabled('debug')) {
      this.#logger.debug({ frame: loggableFrame(frame) }, '<<< server frame');
    }
    const event = decodeServerMessage(frame);

    if (event.type === 'session_error') {
      this.#logger.warn({ err: event.error }, 'dropping malformed server frame');
      this.events.push(event);
      return;
    }

    if (this.#state === 'awaiting_setup_ack') {
      if (event.type === 'setup_complete') {
        this.#transition('ready');
        this.events.push(event);
        this.#handshake.resolve();
        return;
      }
      const cause = new ProtocolError(`received ${event.type} before the setup acknowledgement`);
      this.#failHandshake(
        new HandshakeError({ message: cause.message, reason: 'protocol', cause }),
      );
      return;
    }

    if (event.type === 'setup_complete' && this.#state === 'ready') {
      const error = new ProtocolError('received a second setup acknowledgement');
      this.#logger.error({ err: error }, 'protocol violation, closing session');
      this.#transition('errored');
      this.#finish({ type: 'session_error', reason: 'protocol', error, fatal: true });
      void this.#closeConnection(CLOSE_PROTOCOL_ERROR, 'protocol error');
      return;
    }
    if (event.type === 'setup_complete') {
      this.#logger.debug({ state: this.#state }, 'ignoring setup acknowledgement');
      return;
    }

    if (event.type === 'session_resumption_update' && event.resumable && event.newHandle) {
      this.#resumptionHandle = event.newHandle;
    }
    if (event.type === 'go_away') {
      this.#logger.info({ timeLeftMs: event.timeLeftMs }, 'server is going away');
    }
    this.events.push(event);
  }

  #handlePeerClose(code: number, reason: string) {
    this.#logger.debug({ code, reason }, 'connection closed');
    switch (this.#state) {
      case 'awaiting_setup_ack':
        this.#failHandshake(
          new HandshakeError({
            message: `connection closed before the setup acknowledgement (code ${code})`,
            reason: code === CLOSE_ABNORMAL ? 'transport' : 'closed',
            closeCode: code,
          }),
        );
        return;
      case 'ready':
        if (code === CLOSE_ABNORMAL) {
          this.#handleTransportError(
            new TransportError(`connection lost (code ${code})`, { body: { code, reason } }),
          );
          return;
        }
        this.#transition('closed');
        this.#finish({ type: 'closed', code, reason });
        return;
      case 'closing':
        this.#transition('closed');
        this.#finish({ type: 'closed', code, reason });
        return;
      case 'connecting':
      case 'closed':
      case 'errored':
        return;
    }
  }

  #handleTransportError(error: Error) {
    switch (this.#state) {
      case 'awaiting_setup_ack':
        this.#failHandshake(
          new HandshakeError({
            message: `transport failed before the setup acknowledgement: ${error.message}`,
            reason: 'transport',
            cause: error,
          }),
        );
        return;
      case 'ready':
        this.#logger.error({ err: error }, 'transport failed');
        this.#transition('errored');
        this.#finish({ type: 'session_error', reason: 'transport', error, fatal: true });
        return;
      case 'closing':
        // a failure while closing still ends the session normally
        this.#transition('closed');
        this.#finish({ type: 'closed', code: CLOSE_ABNORMAL, reason: error.message });
        return;
      case 'connecting':
      case 'closed':
      case 'errored':
        return;
    }
  }

  #logOutbound(frame: string) {
    if (this.#logger.isLevelEnabled('debug')) {
      this.#logger.debug({ frame: loggableFrame(frame) }, '>>> client frame');
    }
  }
}
