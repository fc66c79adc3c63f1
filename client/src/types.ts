// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0

export const DEFAULT_LIVE_ENDPOINT =
  'wss://generativelanguage.googleapis.com/ws/google.ai.generativelanguage.v1beta.GenerativeService.BidiGenerateContent';

export class LiveConnectOptions {
  /** Timeout for opening the socket, in milliseconds. */
  readonly connectTimeoutMs: number;
  /** Timeout for the setup acknowledgement once the socket is open, in milliseconds. */
  readonly handshakeTimeoutMs: number;
  /**
   * Time given to the close handshake before the socket is terminated, in milliseconds.
   * Also bounds the teardown triggered by releasing both handles or aborting the session.
   */
  readonly closeTimeoutMs: number;
  /**
   * Buffered, unconsumed events above which a warning is logged once. The event queue itself
   * is unbounded.
   */
  readonly eventBufferWarnThreshold: number;

  constructor(options: Partial<LiveConnectOptions> = {}) {
    this.connectTimeoutMs = options.connectTimeoutMs ?? 10000;
    this.handshakeTimeoutMs = options.handshakeTimeoutMs ?? 10000;
    this.closeTimeoutMs = options.closeTimeoutMs ?? 5000;
    this.eventBufferWarnThreshold = options.eventBufferWarnThreshold ?? 1024;

    if (this.connectTimeoutMs <= 0) {
      throw new Error('connectTimeoutMs must be greater than 0');
    }
    if (this.handshakeTimeoutMs <= 0) {
      throw new Error('handshakeTimeoutMs must be greater than 0');
    }
    if (this.closeTimeoutMs <= 0) {
      throw new Error('closeTimeoutMs must be greater than 0');
    }
    if (this.eventBufferWarnThreshold < 1) {
      throw new Error('eventBufferWarnThreshold must be greater than or equal to 1');
    }
  }
}

export const DEFAULT_LIVE_CONNECT_OPTIONS = new LiveConnectOptions();

/**
 * How the API key travels with the WebSocket upgrade request.
 */
export type CredentialPlacement = 'query' | 'header';

export interface Credentials {
  apiKey: string;
  /** @defaultValue 'query' */
  placement?: CredentialPlacement;
}
