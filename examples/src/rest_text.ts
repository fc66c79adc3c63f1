// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import { Command, Option } from 'commander';
import { RestClient, initializeLogger, log } from 'gemini-live-client';
import { text } from 'node:stream/consumers';
import { fileURLToPath } from 'node:url';

type Args = {
  model?: string;
  system?: string;
  stream: boolean;
  logLevel: string;
};

async function run(prompt: string | undefined, args: Args) {
  initializeLogger({ pretty: true, level: args.logLevel });

  const contents = prompt ?? (await text(process.stdin)).trim();
  const client = new RestClient({ model: args.model });
  const request = { contents, systemInstruction: args.system };

  if (args.stream) {
    for await (const chunk of client.streamGenerateContent(request)) {
      process.stdout.write(chunk.text);
    }
    process.stdout.write('\n');
    return;
  }

  const result = await client.generateContent(request);
  console.log(result.text);
  log().debug({ usage: result.usageMetadata, modelVersion: result.modelVersion }, 'done');
}

const program = new Command()
  .name('rest_text')
  .description('Generate text with a single request; reads the prompt from stdin when omitted')
  .argument('[prompt]', 'prompt text')
  .addOption(new Option('--model <model>', 'model to use').env('GEMINI_REST_MODEL'))
  .addOption(new Option('--system <text>', 'system instruction'))
  .addOption(new Option('--stream', 'print the answer as it is generated').default(false))
  .addOption(
    new Option('--log-level <level>', 'log level')
      .choices(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
      .default('warn'),
  )
  .action(async (prompt: string | undefined, args: Args) => {
    try {
      await run(prompt, args);
    } catch (error) {
      log().fatal({ err: error }, 'request failed');
      process.exitCode = 1;
    }
  });

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  await program.parseAsync();
}
