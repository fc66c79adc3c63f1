// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import { describe, expect, it } from 'vitest';
import { DEFAULT_LIVE_MODEL, DEFAULT_REST_MODEL, loadEnvConfig } from './config.js';
import { DEFAULT_LIVE_ENDPOINT } from './types.js';

describe('loadEnvConfig', () => {
  it('uses the defaults for an empty environment', () => {
    expect(loadEnvConfig({})).toEqual({
      apiKey: undefined,
      liveModel: DEFAULT_LIVE_MODEL,
      restModel: DEFAULT_REST_MODEL,
      liveEndpoint: DEFAULT_LIVE_ENDPOINT,
      logLevel: 'info',
    });
  });

  it('prefers GEMINI_API_KEY over GOOGLE_API_KEY', () => {
    expect(loadEnvConfig({ GEMINI_API_KEY: 'test-key', GOOGLE_API_KEY: 'other-key' }).apiKey).toBe(
      'test-key',
    );
    expect(loadEnvConfig({ GOOGLE_API_KEY: 'other-key' }).apiKey).toBe('other-key');
  });

  it('treats empty variables as unset', () => {
    const config = loadEnvConfig({ GEMINI_API_KEY: '', GEMINI_LIVE_MODEL: '' });
    expect(config.apiKey).toBeUndefined();
    expect(config.liveModel).toBe(DEFAULT_LIVE_MODEL);
  });

  it('reads the models, endpoint and log level', () => {
    const config = loadEnvConfig({
      GEMINI_LIVE_MODEL: 'gemini-live-test',
      GEMINI_REST_MODEL: 'gemini-rest-test',
      GEMINI_LIVE_ENDPOINT: 'ws://127.0.0.1:9000/live',
      GEMINI_LOG_LEVEL: 'debug',
    });
    expect(config).toMatchObject({
      liveModel: 'gemini-live-test',
      restModel: 'gemini-rest-test',
      liveEndpoint: 'ws://127.0.0.1:9000/live',
      logLevel: 'debug',
    });
  });

  it('rejects endpoints that are not WebSocket URLs', () => {
    expect(() => loadEnvConfig({ GEMINI_LIVE_ENDPOINT: 'https://example.com/live' })).toThrow(
      'invalid environment configuration: GEMINI_LIVE_ENDPOINT: must be a ws:// or wss:// URL',
    );
  });

  it('rejects unknown log levels', () => {
    expect(() => loadEnvConfig({ GEMINI_LOG_LEVEL: 'loud' })).toThrow(
      /^invalid environment configuration: GEMINI_LOG_LEVEL: /,
    );
  });
});
