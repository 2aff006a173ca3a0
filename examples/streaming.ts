/**
 * Streaming chat completion example
 *
 * Streams a completion from the prompt templates in `templates/` and writes
 * each text fragment to stdout as it arrives. Ctrl-C cancels the request.
 *
 * ## Usage
 *
 * ```bash
 * export ANTHROPIC_API_KEY=<api_key>
 * npx tsx examples/streaming.ts "add a docstring to this function"
 * ```
 */

import { ConsoleLogger, createChatClientFromEnv, MissingCredentialError } from '../src/index.js';

async function main() {
  console.log('Chat Stream Example');
  console.log('===================\n');

  const client = createChatClientFromEnv({}, {
    logger: new ConsoleLogger({ level: 'warn', format: 'compact' }),
  });

  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  const promptData = {
    user_query: process.argv[2] ?? 'Write a function that reverses a string.',
    current_buffer_path: 'example.ts',
    current_buffer_filetype: 'typescript',
    current_buffer_context: '',
    visual_selection: '',
  };

  console.log(`Model: ${client.getConfig().model.name}`);
  console.log('---');

  try {
    let characters = 0;
    for await (const text of client.stream(promptData, { signal: controller.signal })) {
      process.stdout.write(text);
      characters += text.length;
    }
    console.log('\n---');
    console.log(controller.signal.aborted ? 'Cancelled.' : `Done: ${characters} characters streamed.`);
  } catch (error) {
    if (error instanceof MissingCredentialError) {
      console.error(error.message);
    } else {
      console.error('\nStream failed:', error);
    }
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
