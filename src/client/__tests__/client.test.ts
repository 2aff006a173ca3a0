import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createChatClient, createChatClientFromEnv, type ChatClient } from '../client.js';
import { ConfigurationError, MissingCredentialError, TransportError } from '../../errors/categories.js';
import type { Logger } from '../../observability/logging.js';
import { FileTemplateRenderer } from '../../templates/renderer.js';
import { QueueExecutor } from '../../transport/executor.js';
import type { StreamOutcome } from '../../transport/types.js';
import {
  createMockRenderer,
  createMockSpawn,
  mockConfig,
  mockEnv,
  sseEvent,
  sseTextStream,
  TEST_API_KEY_VAR,
} from '../../__mocks__/index.js';

async function collect(stream: AsyncGenerator<string, void, undefined>): Promise<string[]> {
  const chunks: string[] = [];
  for await (const text of stream) {
    chunks.push(text);
  }
  return chunks;
}

function invokeAndTrack(client: ChatClient, promptData: Record<string, unknown> = { query: 'q' }) {
  const chunks: string[] = [];
  let resolveExit: (outcome: StreamOutcome) => void = () => {};
  const exited = new Promise<StreamOutcome>(resolve => {
    resolveExit = resolve;
  });
  const handle = client.invoke(promptData, {
    onChunk: (text) => chunks.push(text),
    onExit: (outcome) => resolveExit(outcome),
  });
  return { chunks, exited, handle };
}

describe('ChatClient', () => {
  let mock: ReturnType<typeof createMockSpawn>;
  let renderer: ReturnType<typeof createMockRenderer>;
  let client: ChatClient;

  beforeEach(() => {
    mock = createMockSpawn();
    renderer = createMockRenderer();
    client = createChatClient({
      config: mockConfig(),
      renderer: renderer.renderer,
      spawn: mock.spawn,
      env: mockEnv(),
    });
  });

  describe('invoke', () => {
    it('relays the streamed text and completes once', async () => {
      const run = invokeAndTrack(client);
      const proc = mock.processes[0];

      proc.writeLines(sseTextStream(['Hel', 'lo', ' world']));
      proc.exit(0);

      expect(await run.exited).toEqual({ status: 'completed', exitCode: 0 });
      expect(run.chunks.join('')).toBe('Hello world');
    });

    it('spawns the configured command with the built request', () => {
      client.invoke({ query: 'q' }, { onChunk: vi.fn(), onExit: vi.fn() });

      expect(mock.spawn).toHaveBeenCalledTimes(1);
      const [command, args] = mock.spawn.mock.calls[0];
      expect(command).toBe('curl');
      expect(args[args.length - 1]).toBe('https://llm.example.test/v1/messages');
      expect(args).toContain('x-api-key: test-secret');
    });

    it('throws before spawning when the API key is missing', () => {
      client = createChatClient({
        config: mockConfig(),
        renderer: renderer.renderer,
        spawn: mock.spawn,
        env: mockEnv(null),
      });
      const onExit = vi.fn();

      expect(() => client.invoke({}, { onChunk: vi.fn(), onExit })).toThrow(MissingCredentialError);
      expect(() => client.invoke({}, { onChunk: vi.fn(), onExit })).toThrow(TEST_API_KEY_VAR);
      expect(mock.spawn).not.toHaveBeenCalled();
      expect(renderer.render).not.toHaveBeenCalled();
      expect(onExit).not.toHaveBeenCalled();
    });

    it('throws an unreadable template before spawning', () => {
      client = createChatClient({
        config: mockConfig({ templates: { directory: '/nonexistent', system: 'system.txt', user: 'user.txt' } }),
        renderer: new FileTemplateRenderer(),
        spawn: mock.spawn,
        env: mockEnv(),
      });
      const onExit = vi.fn();

      expect(() => client.invoke({}, { onChunk: vi.fn(), onExit })).toThrow(ConfigurationError);
      expect(() => client.invoke({}, { onChunk: vi.fn(), onExit })).toThrow(
        'Unable to read prompt template: /nonexistent/system.txt'
      );
      expect(mock.spawn).not.toHaveBeenCalled();
      expect(onExit).not.toHaveBeenCalled();
    });

    it('throws a renderer failure before spawning', () => {
      renderer.render.mockImplementation(() => {
        throw new Error('template syntax error');
      });

      expect(() => client.invoke({}, { onChunk: vi.fn(), onExit: vi.fn() })).toThrow('template syntax error');
      expect(mock.spawn).not.toHaveBeenCalled();
    });

    it('logs the model and token budget', () => {
      const logger: Logger = { trace: vi.fn(), debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
      client = createChatClient({
        config: mockConfig(),
        renderer: renderer.renderer,
        spawn: mock.spawn,
        env: mockEnv(),
        logger,
      });

      client.invoke({}, { onChunk: vi.fn(), onExit: vi.fn() });

      expect(logger.info).toHaveBeenCalledWith('Streaming chat completion', {
        model: 'claude-3-haiku-20240307',
        maxTokens: 4096,
      });
    });

    it('keeps concurrent requests apart', async () => {
      const a = invokeAndTrack(client, { query: 'a' });
      const b = invokeAndTrack(client, { query: 'b' });
      const [procA, procB] = mock.processes;

      procB.writeLines(sseTextStream(['B']));
      procA.writeLines(sseTextStream(['A1', 'A2']));
      procB.exit(0);
      procA.exit(0);
      await Promise.all([a.exited, b.exited]);

      expect(a.chunks).toEqual(['A1', 'A2']);
      expect(b.chunks).toEqual(['B']);
    });

    it('cancels through the client', async () => {
      const run = invokeAndTrack(client);

      client.cancel(run.handle);

      expect(await run.exited).toEqual({ status: 'cancelled' });
      expect(mock.processes[0].killSignals).toEqual(['SIGTERM']);
      expect(run.chunks).toEqual([]);
    });

    it('writes the debug dump through the host executor', () => {
      const executor = new QueueExecutor();
      const write = vi.fn();
      client = createChatClient({
        config: mockConfig({ debug: true }),
        renderer: renderer.renderer,
        spawn: mock.spawn,
        env: mockEnv(),
        executor,
        debugSink: { write },
      });

      client.invoke({ query: 'q' }, { onChunk: vi.fn(), onExit: vi.fn() });

      expect(write).not.toHaveBeenCalled();
      executor.drain();
      expect(write).toHaveBeenCalledTimes(8);
      expect(write).toHaveBeenNthCalledWith(1, 'model: claude-3-haiku-20240307');
    });
  });

  describe('stream', () => {
    it('yields text fragments until the stream completes', async () => {
      const result = collect(client.stream({ query: 'q' }));
      await vi.waitFor(() => expect(mock.processes).toHaveLength(1));

      mock.processes[0].writeLines(sseTextStream(['Hel', 'lo', ' world']));
      mock.processes[0].exit(0);

      expect(await result).toEqual(['Hel', 'lo', ' world']);
    });

    it('throws the transport error of a failed run', async () => {
      const result = collect(client.stream({ query: 'q' }));
      await vi.waitFor(() => expect(mock.processes).toHaveLength(1));

      mock.processes[0].writeStderr('curl: (7) Failed to connect');

      await expect(result).rejects.toThrow(TransportError);
      await expect(result).rejects.toThrow('Transport wrote to stderr: curl: (7) Failed to connect');
    });

    it('throws a missing credential on the first pull without spawning', async () => {
      client = createChatClient({
        config: mockConfig(),
        renderer: renderer.renderer,
        spawn: mock.spawn,
        env: {},
      });

      await expect(collect(client.stream({}))).rejects.toThrow(MissingCredentialError);
      expect(mock.spawn).not.toHaveBeenCalled();
    });

    it('stops when the signal aborts', async () => {
      const controller = new AbortController();
      const received: string[] = [];
      const done = (async () => {
        for await (const text of client.stream({ query: 'q' }, { signal: controller.signal })) {
          received.push(text);
          controller.abort();
        }
      })();
      await vi.waitFor(() => expect(mock.processes).toHaveLength(1));

      mock.processes[0].writeLines(sseTextStream(['first', 'second']));
      await done;

      expect(received).toEqual(['first']);
      expect(mock.processes[0].killSignals).toEqual(['SIGTERM']);
    });

    it('cancels at once for an already aborted signal', async () => {
      const controller = new AbortController();
      controller.abort();

      const chunks = await collect(client.stream({ query: 'q' }, { signal: controller.signal }));

      expect(chunks).toEqual([]);
      expect(mock.processes[0].killSignals).toEqual(['SIGTERM']);
    });

    it('kills the process when the consumer stops early', async () => {
      const done = (async () => {
        for await (const text of client.stream({ query: 'q' })) {
          return text;
        }
        return undefined;
      })();
      await vi.waitFor(() => expect(mock.processes).toHaveLength(1));

      mock.processes[0].writeLines(sseEvent('content_block_delta', { delta: { text: 'only' } }));

      expect(await done).toBe('only');
      expect(mock.processes[0].killSignals).toEqual(['SIGTERM']);
    });
  });

  it('returns a frozen copy of the configuration', () => {
    const config = client.getConfig();

    expect(config.url).toBe('https://llm.example.test/v1/messages');
    expect(Object.isFrozen(config)).toBe(true);
  });
});

describe('createChatClientFromEnv', () => {
  it('takes the endpoint and the API key from the same environment', () => {
    const mock = createMockSpawn();
    const { renderer } = createMockRenderer();
    const client = createChatClientFromEnv({ temperature: 0.2 }, {
      renderer,
      spawn: mock.spawn,
      env: { ANTHROPIC_BASE_URL: 'http://localhost:8080', ANTHROPIC_API_KEY: 'test-secret' },
    });

    client.invoke({}, { onChunk: vi.fn(), onExit: vi.fn() });

    const args = mock.spawn.mock.calls[0][1];
    expect(args[args.length - 1]).toBe('http://localhost:8080/v1/messages');
    expect(args).toContain('x-api-key: test-secret');
    expect(client.getConfig().temperature).toBe(0.2);
  });
});
