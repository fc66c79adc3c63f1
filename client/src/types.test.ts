// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import { describe, expect, it } from 'vitest';
import { LiveConnectOptions } from './types.js';

describe('LiveConnectOptions', () => {
  it('fills in the defaults', () => {
    expect(new LiveConnectOptions()).toEqual({
      connectTimeoutMs: 10000,
      handshakeTimeoutMs: 10000,
      closeTimeoutMs: 5000,
      eventBufferWarnThreshold: 1024,
    });
  });

  it('keeps the given values', () => {
    const options = new LiveConnectOptions({ handshakeTimeoutMs: 50, eventBufferWarnThreshold: 1 });
    expect(options.handshakeTimeoutMs).toBe(50);
    expect(options.eventBufferWarnThreshold).toBe(1);
    expect(options.connectTimeoutMs).toBe(10000);
  });

  it.each([
    [{ connectTimeoutMs: 0 }, 'connectTimeoutMs must be greater than 0'],
    [{ handshakeTimeoutMs: -1 }, 'handshakeTimeoutMs must be greater than 0'],
    [{ closeTimeoutMs: 0 }, 'closeTimeoutMs must be greater than 0'],
    [{ eventBufferWarnThreshold: 0 }, 'eventBufferWarnThreshold must be greater than or equal to 1'],
  ])('rejects %o', (options, message) => {
    expect(() => new LiveConnectOptions(options)).toThrow(message);
  });
});
