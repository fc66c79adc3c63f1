// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
export type { LiveAPIModels } from './api_proto.js';
export {
  LiveClient,
  LiveSender,
  connect,
  type ConnectOptions,
  type LiveClientOptions,
  type LiveConnection,
} from './client.js';
export { EventStream } from './event_stream.js';
export * from './messages.js';
export { LiveSession, type LiveSessionOptions, type SessionState } from './session.js';
export {
  API_KEY_HEADER,
  API_KEY_QUERY_PARAM,
  WebSocketConnection,
  WebSocketTransport,
  type Connection,
  type ReceiveResult,
  type Transport,
  type TransportConnectOptions,
} from './transport.js';
