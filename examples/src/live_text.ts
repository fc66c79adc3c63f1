// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import { Modality } from '@google/genai';
import { Command, Option } from 'commander';
import { LiveClient, initializeLogger, live, loadEnvConfig, log } from 'gemini-live-client';
import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { fileURLToPath } from 'node:url';

type Args = {
  model: string;
  endpoint?: string;
  system?: string;
  logLevel: string;
  pretty: boolean;
};

/** The parts of a Live connection the chat loop uses. */
export interface ChatConnection {
  sender: Pick<live.LiveSender, 'state' | 'sendText' | 'close'>;
  events: AsyncIterable<live.InboundEvent>;
}

/** Prints model text as it streams in; returns once the stream has ended. */
async function printEvents(events: ChatConnection['events'], output: Writable) {
  for await (const event of events) {
    switch (event.type) {
      case 'server_content':
        for (const part of event.content?.parts ?? []) {
          if (part.type === 'text' && !part.thought) output.write(part.text);
        }
        if (event.turnComplete) output.write('\n> ');
        break;
      case 'interrupted':
        output.write(' [interrupted]\n> ');
        break;
      case 'go_away':
        log().warn({ timeLeftMs: event.timeLeftMs }, 'server is going away');
        break;
      case 'session_error':
        log().error({ err: event.error, fatal: event.fatal }, 'session error');
        break;
      case 'closed':
        log().info({ code: event.code, reason: event.reason }, 'session closed');
        break;
    }
  }
}

/**
 * Sends each non-empty input line as a user turn until the input ends, the signal aborts or
 * the session ends, then closes the session.
 */
export async function chat(
  { sender, events }: ChatConnection,
  { input, output, signal }: { input: Readable; output: Writable; signal: AbortSignal },
) {
  const lines = createInterface({ input });
  const stop = () => lines.close();
  signal.addEventListener('abort', stop, { once: true });
  if (signal.aborted) stop();

  output.write('> ');
  const printing = printEvents(events, output).finally(stop);
  try {
    for await (const line of lines) {
      const text = line.trim();
      if (!text) continue;
      if (sender.state !== 'ready') break;
      await sender.sendText(text);
    }
  } finally {
    stop();
    signal.removeEventListener('abort', stop);
  }

  await sender.close();
  await printing;
}

async function run(args: Args) {
  initializeLogger({ pretty: args.pretty, level: args.logLevel });
  const logger = log();

  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger.debug('SIGINT received');
    controller.abort();
  });

  const client = new LiveClient({ endpoint: args.endpoint });
  const connection = await client.connect(
    {
      model: args.model,
      systemInstruction: args.system,
      generationConfig: { responseModalities: [Modality.TEXT] },
    },
    { signal: controller.signal },
  );
  logger.info(
    { sessionId: connection.sender.sessionId },
    'connected, type a message and press enter',
  );

  await chat(connection, {
    input: process.stdin,
    output: process.stdout,
    signal: controller.signal,
  });
}

const program = new Command()
  .name('live_text')
  .description('Chat with a Gemini Live model over a WebSocket session')
  .addOption(
    new Option('--model <model>', 'Live model to use').default(loadEnvConfig().liveModel),
  )
  .addOption(new Option('--endpoint <url>', 'Live endpoint').env('GEMINI_LIVE_ENDPOINT'))
  .addOption(new Option('--system <text>', 'system instruction'))
  .addOption(
    new Option('--log-level <level>', 'log level')
      .choices(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
      .default('info')
      .env('GEMINI_LOG_LEVEL'),
  )
  .addOption(new Option('--no-pretty', 'log JSON lines instead of pretty output'))
  .action(async (args: Args) => {
    try {
      await run(args);
    } catch (error) {
      log().fatal({ err: error }, 'live session failed');
      process.exitCode = 1;
    }
  });

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  await program.parseAsync();
}
