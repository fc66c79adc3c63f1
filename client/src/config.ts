// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import { z } from 'zod';
import { DEFAULT_LIVE_ENDPOINT } from './types.js';

export const DEFAULT_LIVE_MODEL = 'gemini-2.0-flash-live-001';
export const DEFAULT_REST_MODEL = 'gemini-2.0-flash';

const logLevels = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const envSchema = z.object({
  GEMINI_API_KEY: z.string().min(1).optional(),
  GOOGLE_API_KEY: z.string().min(1).optional(),
  GEMINI_LIVE_MODEL: z.string().min(1).default(DEFAULT_LIVE_MODEL),
  GEMINI_REST_MODEL: z.string().min(1).default(DEFAULT_REST_MODEL),
  GEMINI_LIVE_ENDPOINT: z
    .string()
    .url()
    .refine((value) => /^wss?:/.test(value), 'must be a ws:// or wss:// URL')
    .default(DEFAULT_LIVE_ENDPOINT),
  GEMINI_LOG_LEVEL: z.enum(logLevels).default('info'),
});

export interface EnvConfig {
  /** `GEMINI_API_KEY`, falling back to `GOOGLE_API_KEY`. */
  apiKey?: string;
  liveModel: string;
  restModel: string;
  liveEndpoint: string;
  logLevel: (typeof logLevels)[number];
}

/**
 * Reads the client configuration from the environment.
 *
 * @throws Error listing every invalid variable
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  // empty strings are treated as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`invalid environment configuration: ${issues}`);
  }

  const data = parsed.data;
  return {
    apiKey: data.GEMINI_API_KEY ?? data.GOOGLE_API_KEY,
    liveModel: data.GEMINI_LIVE_MODEL,
    restModel: data.GEMINI_REST_MODEL,
    liveEndpoint: data.GEMINI_LIVE_ENDPOINT,
    logLevel: data.GEMINI_LOG_LEVEL,
  };
}
