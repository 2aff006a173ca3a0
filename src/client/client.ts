import { configFromEnv, createDefaultConfig, validateConfig, type ChatStreamConfig } from '../config/config.js';
import { NoopLogger, type Logger } from '../observability/logging.js';
import { NoopMetricsCollector, type MetricsCollector } from '../observability/metrics.js';
import { buildRequest } from '../request/builder.js';
import type { DebugSink } from '../request/types.js';
import { FileTemplateRenderer, type PromptVariables, type TemplateRenderer } from '../templates/renderer.js';
import { ImmediateExecutor, type HostExecutor } from '../transport/executor.js';
import { StreamingProcessRunner } from '../transport/process-runner.js';
import type { SpawnTransport, StreamCallbacks, StreamHandle, StreamOutcome } from '../transport/types.js';

export interface ChatClientOptions {
  /** Defaults to `createDefaultConfig()` */
  config?: ChatStreamConfig;
  /** Defaults to `FileTemplateRenderer` */
  renderer?: TemplateRenderer;
  /**
   * Host execution context for every callback. Defaults to an `ImmediateExecutor`
   * sharing `logger`, or writing callback errors to stderr when no logger is given.
   */
  executor?: HostExecutor;
  spawn?: SpawnTransport;
  /** Environment the API key is read from. Defaults to `process.env`. */
  env?: NodeJS.ProcessEnv;
  /** Receives request dumps when `config.debug` is set */
  debugSink?: DebugSink;
  logger?: Logger;
  metrics?: MetricsCollector;
}

export interface StreamOptions {
  signal?: AbortSignal;
}

/**
 * Streams one chat completion per call into the host
 */
export interface ChatClient {
  /**
   * Builds the request and starts the transport.
   *
   * Request building failures throw synchronously and nothing is spawned:
   * MissingCredentialError for an absent key, ConfigurationError for an
   * unreadable template, or whatever a custom renderer throws. Once the
   * transport is started, every failure arrives through `onExit`.
   */
  invoke(promptData: PromptVariables, callbacks: StreamCallbacks): StreamHandle;

  /**
   * Yields text fragments as they arrive. Returns on completion or cancellation
   * and throws the TransportError of a failed run. Request building failures
   * are thrown from the first `next()`.
   */
  stream(promptData: PromptVariables, options?: StreamOptions): AsyncGenerator<string, void, undefined>;

  cancel(handle: StreamHandle): void;

  getConfig(): Readonly<ChatStreamConfig>;
}

export class ChatClientImpl implements ChatClient {
  private readonly config: ChatStreamConfig;
  private readonly renderer: TemplateRenderer;
  private readonly executor: HostExecutor;
  private readonly runner: StreamingProcessRunner;
  private readonly env?: NodeJS.ProcessEnv;
  private readonly debugSink?: DebugSink;
  private readonly logger: Logger;

  constructor(options: ChatClientOptions = {}) {
    this.config = validateConfig(options.config ?? createDefaultConfig());
    this.logger = options.logger ?? new NoopLogger();
    this.renderer = options.renderer ?? new FileTemplateRenderer();
    this.executor = options.executor ?? new ImmediateExecutor(options.logger);
    this.env = options.env;
    this.debugSink = options.debugSink;
    this.runner = new StreamingProcessRunner({
      spawn: options.spawn,
      executor: this.executor,
      logger: this.logger,
      metrics: options.metrics ?? new NoopMetricsCollector(),
    });
  }

  invoke(promptData: PromptVariables, callbacks: StreamCallbacks): StreamHandle {
    const request = buildRequest(promptData, this.config, {
      renderer: this.renderer,
      env: this.env,
      debugSink: this.marshaledDebugSink(),
      logger: this.logger,
    });

    this.logger.info('Streaming chat completion', {
      model: request.payload.model,
      maxTokens: request.payload.max_tokens,
    });

    return this.runner.run(request.transport, callbacks);
  }

  async *stream(
    promptData: PromptVariables,
    options: StreamOptions = {}
  ): AsyncGenerator<string, void, undefined> {
    const queue: string[] = [];
    const state: { outcome?: StreamOutcome; wake?: () => void } = {};
    const notify = (): void => {
      const wake = state.wake;
      state.wake = undefined;
      wake?.();
    };

    const handle = this.invoke(promptData, {
      onChunk: (text) => {
        queue.push(text);
        notify();
      },
      onExit: (outcome) => {
        state.outcome = outcome;
        notify();
      },
    });

    const { signal } = options;
    const abort = (): void => handle.cancel();
    signal?.addEventListener('abort', abort, { once: true });
    if (signal?.aborted) {
      handle.cancel();
    }

    try {
      for (;;) {
        const next = queue.shift();
        if (next !== undefined) {
          yield next;
          continue;
        }
        if (state.outcome) break;
        await new Promise<void>((resolve) => {
          state.wake = resolve;
        });
      }
    } finally {
      signal?.removeEventListener('abort', abort);
      // no-op once finished; stops the process when the consumer leaves early
      handle.cancel();
    }

    const outcome = state.outcome;
    if (outcome?.status === 'failed') {
      throw outcome.error;
    }
  }

  cancel(handle: StreamHandle): void {
    this.runner.cancel(handle);
  }

  getConfig(): Readonly<ChatStreamConfig> {
    return Object.freeze({ ...this.config });
  }

  private marshaledDebugSink(): DebugSink | undefined {
    const sink = this.debugSink;
    if (!sink) return undefined;
    return {
      write: (text) => this.executor.schedule(() => sink.write(text)),
    };
  }
}

export function createChatClient(options: ChatClientOptions = {}): ChatClient {
  return new ChatClientImpl(options);
}

/**
 * Creates a client whose configuration comes from the environment
 *
 * Expected environment variables:
 * - ANTHROPIC_API_KEY (required at invoke time, name configurable)
 * - ANTHROPIC_BASE_URL (optional)
 * - ANTHROPIC_API_VERSION (optional)
 */
export function createChatClientFromEnv(
  overrides: Partial<ChatStreamConfig> = {},
  options: Omit<ChatClientOptions, 'config'> = {}
): ChatClient {
  const env = options.env ?? process.env;
  return new ChatClientImpl({ ...options, env, config: configFromEnv(env, overrides) });
}
