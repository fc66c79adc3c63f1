// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0

/**
 * Client for the Gemini API: Live sessions over a bidirectional WebSocket, and
 * request/response generation over REST.
 *
 * @packageDocumentation
 */
import * as live from './live/index.js';
import * as rest from './rest/index.js';

export * from './_exceptions.js';
export * from './config.js';
export * from './log.js';
export * from './types.js';
export * from './version.js';

export { LiveClient, connect, createSetup, type LiveConnection } from './live/index.js';
export { RestClient } from './rest/index.js';
export { live, rest };
