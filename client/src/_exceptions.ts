// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0

/**
 * Interface for API error options
 */
interface APIErrorOptions {
  body?: object | null;
  retryable?: boolean;
  cause?: unknown;
}

const API_ERROR_SYMBOL = Symbol('APIError');

/**
 * Base class of every error raised by the client, on both the REST and the Live paths.
 */
export class APIError extends Error {
  readonly body: object | null;
  readonly retryable: boolean;

  constructor(message: string, { body = null, retryable = true, cause }: APIErrorOptions = {}) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'APIError';

    this.body = body;
    this.retryable = retryable;
    Error.captureStackTrace(this, APIError);
    Object.defineProperty(this, API_ERROR_SYMBOL, {
      value: true,
      writable: false,
      enumerable: false,
      configurable: false,
    });
  }

  toString(): string {
    return `${this.message} (body=${JSON.stringify(this.body)}, retryable=${this.retryable})`;
  }
}

/**
 * Interface for API status error options
 */
interface APIStatusErrorOptions extends APIErrorOptions {
  statusCode?: number;
  requestId?: string | null;
}

/**
 * Raised when an API response has a status code of 4xx or 5xx.
 */
export class APIStatusError extends APIError {
  readonly statusCode: number;
  readonly requestId: string | null;

  constructor({
    message = 'API error.',
    options = {},
  }: {
    message?: string;
    options?: APIStatusErrorOptions;
  }) {
    const statusCode = options.statusCode ?? -1;
    // 4xx errors are not retryable
    const isRetryable = options.retryable ?? !(statusCode >= 400 && statusCode < 500);

    super(message, { body: options.body, retryable: isRetryable, cause: options.cause });
    this.name = 'APIStatusError';

    this.statusCode = statusCode;
    this.requestId = options.requestId ?? null;
    Error.captureStackTrace(this, APIStatusError);
  }

  toString(): string {
    return (
      `${this.message} ` +
      `(statusCode=${this.statusCode}, ` +
      `requestId=${this.requestId}, ` +
      `body=${JSON.stringify(this.body)}, ` +
      `retryable=${this.retryable})`
    );
  }
}

/**
 * Raised when the transport cannot be established: DNS, TCP or TLS failures, a rejected
 * WebSocket upgrade (the HTTP status is kept in `statusCode`), a connect timeout or an abort.
 */
export class ConnectionError extends APIError {
  readonly statusCode: number | null;

  constructor({
    message = 'Connection error.',
    options = {},
  }: {
    message?: string;
    options?: APIStatusErrorOptions;
  }) {
    const statusCode = options.statusCode ?? null;
    super(message, {
      body: options.body ?? null,
      retryable: options.retryable ?? !(statusCode !== null && statusCode >= 400 && statusCode < 500),
      cause: options.cause,
    });
    this.name = 'ConnectionError';
    this.statusCode = statusCode;
    Error.captureStackTrace(this, ConnectionError);
  }
}

export type HandshakeFailureReason = 'timeout' | 'closed' | 'transport' | 'protocol';

/**
 * Raised by `connect` when the setup handshake does not reach the ready state.
 */
export class HandshakeError extends APIError {
  readonly reason: HandshakeFailureReason;
  /** Close code sent by the server, when the failure is a close during the handshake. */
  readonly closeCode: number | null;

  constructor({
    message,
    reason,
    closeCode = null,
    cause,
  }: {
    message: string;
    reason: HandshakeFailureReason;
    closeCode?: number | null;
    cause?: unknown;
  }) {
    super(message, { retryable: reason === 'timeout' || reason === 'transport', cause });
    this.name = 'HandshakeError';
    this.reason = reason;
    this.closeCode = closeCode;
    Error.captureStackTrace(this, HandshakeError);
  }
}

/**
 * Raised when the server breaks the frame ordering of the protocol, e.g. content before the
 * setup acknowledgement or a second acknowledgement.
 */
export class ProtocolError extends APIError {
  constructor(message: string, options: APIErrorOptions = {}) {
    super(message, { ...options, retryable: options.retryable ?? false });
    this.name = 'ProtocolError';
    Error.captureStackTrace(this, ProtocolError);
  }
}

/**
 * A single inbound frame could not be decoded. Never fatal to the session.
 */
export class MalformedFrameError extends APIError {
  /** The raw payload, truncated for logging. */
  readonly frame: string;

  constructor(message: string, frame: string, options: APIErrorOptions = {}) {
    super(message, { ...options, retryable: false });
    this.name = 'MalformedFrameError';
    this.frame = frame.length > 256 ? `${frame.slice(0, 256)}…` : frame;
    Error.captureStackTrace(this, MalformedFrameError);
  }
}

/**
 * Raised when the socket fails in the middle of a session.
 */
export class TransportError extends APIError {
  constructor(message = 'Transport error.', options: APIErrorOptions = {}) {
    super(message, options);
    this.name = 'TransportError';
    Error.captureStackTrace(this, TransportError);
  }
}

/**
 * Raised when the caller sends content before the session is ready.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
    Error.captureStackTrace(this, UsageError);
  }
}

/**
 * Raised by sends issued after the session started closing, or that were still waiting for
 * their turn on the socket when it closed.
 */
export class SessionClosedError extends Error {
  constructor(message = 'Session is closed.', options?: ErrorOptions) {
    super(message, options);
    this.name = 'SessionClosedError';
    Error.captureStackTrace(this, SessionClosedError);
  }
}

export function isAPIError(error: unknown): error is APIError {
  return error !== null && typeof error === 'object' && API_ERROR_SYMBOL in error;
}
