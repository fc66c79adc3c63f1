// SPDX-FileCopyrightText: 2024 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import type { Logger } from 'pino';
import { pino } from 'pino';

/** @internal */
export type LoggerOptions = {
  pretty: boolean;
  level?: string;
};

/** @internal */
let logger: Logger | undefined = undefined;

const createLogger = ({ pretty, level }: LoggerOptions): Logger =>
  pino(
    pretty
      ? {
          level: level || 'info',
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
            },
          },
        }
      : { level: level || 'info' },
  );

/**
 * Returns the library logger.
 *
 * Applications embedding the client usually call {@link initializeLogger} once at startup; when
 * they don't, a plain JSON logger is created on first use with the level taken from
 * `GEMINI_LOG_LEVEL`.
 */
export const log = (): Logger => {
  if (!logger) {
    logger = initializeLogger({ pretty: false, level: process.env.GEMINI_LOG_LEVEL });
  }
  return logger;
};

export const initializeLogger = ({ pretty, level }: LoggerOptions): Logger => {
  logger = createLogger({ pretty, level });
  return logger;
};
