import { join } from 'path';
import type { ChatStreamConfig } from '../config/config.js';
import { createAuthManager, readApiKey } from '../auth/auth-manager.js';
import type { Logger } from '../observability/logging.js';
import type { PromptVariables, TemplateRenderer } from '../templates/renderer.js';
import type { BuiltRequest, DebugSink, RequestPayload, TransportArgs } from './types.js';

const JSON_CONTENT_TYPE = 'Content-Type: application/json';
const DUMP_SEPARATOR = '\n\n---\n\n';

export interface RequestBuilderDeps {
  renderer: TemplateRenderer;
  /** Environment the API key is read from. Defaults to `process.env`. */
  env?: NodeJS.ProcessEnv;
  debugSink?: DebugSink;
  logger?: Logger;
}

/**
 * Builds the payload and transport arguments for one streaming request.
 *
 * The credential is resolved first, so a missing key fails before any
 * template is rendered or any process is spawned.
 */
export function buildRequest(
  promptData: PromptVariables,
  config: ChatStreamConfig,
  deps: RequestBuilderDeps
): BuiltRequest {
  const apiKey = readApiKey(config.apiKeyEnvVar, deps.env);

  const payload: RequestPayload = {
    system: deps.renderer.render(join(config.templates.directory, config.templates.system), promptData),
    messages: [
      {
        role: 'user',
        content: deps.renderer.render(join(config.templates.directory, config.templates.user), promptData),
      },
    ],
    model: config.model.name,
    temperature: config.temperature,
    stream: true,
    max_tokens: config.model.maxOutputTokens,
  };

  if (config.debug && deps.debugSink) {
    writeRequestDump(payload, deps.debugSink);
  }

  const auth = createAuthManager({
    apiKey,
    apiVersion: config.apiVersion,
    betaFeatures: config.betaFeatures,
    customHeaders: config.headers,
    logger: deps.logger,
  });

  return {
    payload,
    transport: buildTransportArgs(payload, config.transportCommand, config.url, auth.getHeaders()),
  };
}

/**
 * Lays out the curl argv: silent, unbuffered POST with the JSON body, one
 * `-H` per header, and the URL last.
 */
export function buildTransportArgs(
  payload: RequestPayload,
  command: string,
  url: string,
  headers: Readonly<Record<string, string>>
): TransportArgs {
  const body = JSON.stringify(payload);
  const args = ['-s', '-N', '-X', 'POST', '-H', JSON_CONTENT_TYPE, '-d', body];

  for (const [name, value] of Object.entries(headers)) {
    args.push('-H', `${name}: ${value}`);
  }
  args.push(url);

  return { command, args, url, headers: { ...headers }, body };
}

/**
 * Human-readable dump of a request: model, system prompt, then each message.
 */
export function formatRequestDump(payload: RequestPayload): string[] {
  const parts = [`model: ${payload.model}`, DUMP_SEPARATOR, 'system:\n\n', payload.system, DUMP_SEPARATOR];
  for (const message of payload.messages) {
    parts.push(`${message.role}:\n\n`, message.content, DUMP_SEPARATOR);
  }
  return parts;
}

function writeRequestDump(payload: RequestPayload, sink: DebugSink): void {
  for (const part of formatRequestDump(payload)) {
    sink.write(part);
  }
}
