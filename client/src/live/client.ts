// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import { SessionClosedError, UsageError } from '../_exceptions.js';
import { loadEnvConfig } from '../config.js';
import { log } from '../log.js';
import {
  type CredentialPlacement,
  type Credentials,
  DEFAULT_LIVE_ENDPOINT,
  LiveConnectOptions,
} from '../types.js';
import type { EventStream } from './event_stream.js';
import {
  type AudioChunk,
  type Content,
  type FunctionResponse,
  type MediaChunk,
  type OutboundMessage,
  type SetupConfig,
  createSetup,
  userContent,
} from './messages.js';
import { LiveSession, type SessionState } from './session.js';
import { type Transport, WebSocketTransport } from './transport.js';

export interface ConnectOptions {
  /** @defaultValue the public BidiGenerateContent endpoint */
  endpoint?: string;
  /** Timeouts and buffering; unset fields take their defaults. */
  connectOptions?: Partial<LiveConnectOptions>;
  /** Aborting fails a pending `connect`, or closes the session once it is ready. */
  signal?: AbortSignal;
  /** @internal Replaces the WebSocket transport in tests. */
  transport?: Transport;
}

export interface LiveConnection {
  sender: LiveSender;
  events: EventStream;
}

/**
 * Send half of a Live session. Use it from one place only; sends are forwarded in call order.
 */
export class LiveSender {
  #session: LiveSession;
  #released = false;
  #onRelease: () => void;

  /** @internal */
  constructor(session: LiveSession, onRelease: () => void) {
    this.#session = session;
    this.#onRelease = onRelease;
  }

  get sessionId(): string {
    return this.#session.id;
  }

  get state(): SessionState {
    return this.#session.state;
  }

  /** Latest resumable handle sent by the server, if any. */
  get resumptionHandle(): string | undefined {
    return this.#session.resumptionHandle;
  }

  /**
   * Appends turns to the conversation. With `turnComplete` (the default), the model starts
   * generating once the turns are received.
   */
  async sendClientContent(
    turns: Content | Content[],
    { turnComplete = true }: { turnComplete?: boolean } = {},
  ): Promise<void> {
    await this.#send({
      type: 'client_content',
      turns: Array.isArray(turns) ? turns : [turns],
      turnComplete,
    });
  }

  /** Sends a single user text turn. */
  async sendText(text: string, options: { turnComplete?: boolean } = {}): Promise<void> {
    await this.sendClientContent(userContent(text), options);
  }

  /** Streams a chunk of audio, e.g. `audio/pcm;rate=16000`. */
  async sendAudio(chunk: AudioChunk): Promise<void> {
    await this.#send({ type: 'realtime_input', input: { kind: 'audio', ...chunk } });
  }

  /** Streams a single video frame, e.g. `image/jpeg`. */
  async sendVideo(frame: MediaChunk): Promise<void> {
    await this.#send({ type: 'realtime_input', input: { kind: 'video', ...frame } });
  }

  /** Streams text as realtime input rather than as a conversation turn. */
  async sendRealtimeText(text: string): Promise<void> {
    await this.#send({ type: 'realtime_input', input: { kind: 'text', text } });
  }

  /** Marks the start of user activity when automatic activity detection is disabled. */
  async startActivity(): Promise<void> {
    await this.#send({ type: 'realtime_input', input: { kind: 'activity_start' } });
  }

  async endActivity(): Promise<void> {
    await this.#send({ type: 'realtime_input', input: { kind: 'activity_end' } });
  }

  /** Tells the server the audio stream paused, so it can flush cached audio. */
  async endAudioStream(): Promise<void> {
    await this.#send({ type: 'realtime_input', input: { kind: 'audio_stream_end' } });
  }

  async sendToolResponse(responses: FunctionResponse | FunctionResponse[]): Promise<void> {
    await this.#send({
      type: 'tool_response',
      functionResponses: Array.isArray(responses) ? responses : [responses],
    });
  }

  /**
   * Closes the session. The event stream ends with a `closed` event.
   */
  async close(): Promise<void> {
    await this.#session.close();
  }

  /**
   * Drops this handle. Once the event stream is released as well (`return()`, or leaving a
   * `for await` loop), the session is closed.
   */
  release(): void {
    if (this.#released) return;
    this.#released = true;
    this.#onRelease();
  }

  async #send(message: OutboundMessage): Promise<void> {
    if (this.#released) {
      throw new SessionClosedError('sender was released');
    }
    await this.#session.send(message);
  }
}

/**
 * Opens a Live session and completes the setup handshake.
 *
 * The returned event stream starts with the `setup_complete` event; only non-fatal
 * `session_error` events for malformed frames received before the acknowledgement can
 * precede it.
 *
 * @throws ConnectionError when the socket cannot be opened
 * @throws HandshakeError when the server does not acknowledge the setup
 */
export async function connect(
  credentials: Credentials | string,
  setup: SetupConfig,
  {
    endpoint = DEFAULT_LIVE_ENDPOINT,
    connectOptions,
    signal,
    transport = new WebSocketTransport(),
  }: ConnectOptions = {},
): Promise<LiveConnection> {
  const session = new LiveSession({
    transport,
    endpoint,
    credentials: typeof credentials === 'string' ? { apiKey: credentials } : credentials,
    setup: createSetup(setup),
    connectOptions: new LiveConnectOptions(connectOptions),
    signal,
  });

  let released = 0;
  const release = () => {
    released += 1;
    if (released === 2) {
      log().child({ sessionId: session.id }).debug('both handles released, closing session');
      void session.close();
    }
  };
  session.events.onDetach(release);

  await session.start();
  return { sender: new LiveSender(session, release), events: session.events };
}

export interface LiveClientOptions {
  /** Falls back to `GEMINI_API_KEY`, then `GOOGLE_API_KEY`. */
  apiKey?: string;
  /** @defaultValue 'query' */
  placement?: CredentialPlacement;
  /** Falls back to `GEMINI_LIVE_ENDPOINT`, then the public endpoint. */
  endpoint?: string;
  connectOptions?: Partial<LiveConnectOptions>;
  /** @internal */
  transport?: Transport;
}

/**
 * Holds the credentials and defaults shared by the sessions it opens.
 */
export class LiveClient {
  readonly endpoint: string;
  #credentials: Credentials;
  #connectOptions?: Partial<LiveConnectOptions>;
  #transport?: Transport;

  constructor({ apiKey, placement, endpoint, connectOptions, transport }: LiveClientOptions = {}) {
    const env = apiKey && endpoint ? undefined : loadEnvConfig();
    const key = apiKey ?? env?.apiKey;
    if (!key) {
      throw new UsageError(
        'API key is required, either using the argument or by setting the GEMINI_API_KEY environment variable',
      );
    }
    this.#credentials = { apiKey: key, placement };
    this.endpoint = endpoint ?? env?.liveEndpoint ?? DEFAULT_LIVE_ENDPOINT;
    this.#connectOptions = connectOptions;
    this.#transport = transport;
  }

  /** Opens a session on the client's endpoint. */
  connect(setup: SetupConfig, options: { signal?: AbortSignal } = {}): Promise<LiveConnection> {
    return this.connectWithEndpoint(this.endpoint, setup, options);
  }

  /** Opens a session on another endpoint, e.g. a regional one or a proxy. */
  connectWithEndpoint(
    endpoint: string,
    setup: SetupConfig,
    { signal }: { signal?: AbortSignal } = {},
  ): Promise<LiveConnection> {
    return connect(this.#credentials, setup, {
      endpoint,
      connectOptions: this.#connectOptions,
      signal,
      transport: this.#transport,
    });
  }
}
