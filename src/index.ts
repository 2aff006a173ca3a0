/**
 * chat-stream-relay
 *
 * Streams Anthropic Messages API completions through a `curl` subprocess and
 * relays the decoded text to a host-supplied writer on the host's own
 * execution context.
 *
 * @example
 * ```typescript
 * import { createChatClientFromEnv } from 'chat-stream-relay';
 *
 * const client = createChatClientFromEnv();
 * const handle = client.invoke({ user_query: 'Explain this function' }, {
 *   onChunk: (text) => process.stdout.write(text),
 *   onExit: (outcome) => console.log(`\n[${outcome.status}]`),
 * });
 * ```
 */

// Client exports
export {
  createChatClient,
  createChatClientFromEnv,
  ChatClientImpl,
  type ChatClient,
  type ChatClientOptions,
  type StreamOptions,
} from './client/client.js';

// Configuration exports
export {
  type ChatStreamConfig,
  type TemplateConfig,
  ChatStreamConfigBuilder,
  createDefaultConfig,
  validateConfig,
  configFromEnv,
  DEFAULT_BASE_URL,
  DEFAULT_URL,
  DEFAULT_API_KEY_ENV_VAR,
  DEFAULT_API_VERSION,
  DEFAULT_BETA_FEATURES,
  DEFAULT_TEMPERATURE,
  DEFAULT_TRANSPORT_COMMAND,
  DEFAULT_TEMPLATES,
  DEFAULT_TEMPLATE_DIRECTORY,
} from './config/config.js';
export { type ModelSpec, DEFAULT_MODELS, DEFAULT_MODEL_INDEX, selectModel } from './config/models.js';

// Error exports
export {
  ChatStreamError,
  MissingCredentialError,
  ConfigurationError,
  TransportError,
  DecodeError,
} from './errors/index.js';

// Auth exports
export { readApiKey, createAuthManager, ApiKeyAuthManager, type AuthManager } from './auth/auth-manager.js';

// Request exports
export { buildRequest, buildTransportArgs, formatRequestDump, type RequestBuilderDeps } from './request/builder.js';
export type {
  Role,
  ChatMessage,
  RequestPayload,
  TransportArgs,
  BuiltRequest,
  DebugSink,
} from './request/types.js';

// Template exports
export { FileTemplateRenderer, type TemplateRenderer, type PromptVariables } from './templates/renderer.js';

// Stream parsing exports
export { SSEEventParser, type SSEEventParserOptions } from './stream/parser.js';
export {
  BENIGN_EVENT_TYPES,
  type StreamEvent,
  type StreamEventListener,
  type MessageStartEvent,
  type ContentBlockDeltaEvent,
  type MessageDeltaEvent,
  type MessageStopEvent,
  type ErrorEvent,
  type IgnoredEvent,
} from './stream/events.js';

// Transport exports
export {
  StreamingProcessRunner,
  spawnTransport,
  type StreamingProcessRunnerOptions,
} from './transport/process-runner.js';
export { ImmediateExecutor, QueueExecutor, type HostExecutor } from './transport/executor.js';
export type {
  TransportProcess,
  SpawnTransport,
  StreamOutcome,
  StreamCallbacks,
  StreamHandle,
} from './transport/types.js';

// Observability exports
export * from './observability/index.js';
