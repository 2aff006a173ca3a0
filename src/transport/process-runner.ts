/**
 * Streaming Process Runner
 *
 * Spawns the transport process for one request, splits its stdout into
 * lines, feeds them through a per-run SSE parser and relays text fragments
 * to the host through its executor.
 *
 * @example
 * ```typescript
 * const runner = new StreamingProcessRunner({ executor: new ImmediateExecutor() });
 * const handle = runner.run(request.transport, {
 *   onChunk: (text) => buffer.append(text),
 *   onExit: (outcome) => console.log(outcome.status),
 * });
 * // later
 * runner.cancel(handle);
 * ```
 */

import { spawn } from 'child_process';
import { randomUUID } from 'crypto';
import { createInterface, type Interface } from 'readline';
import { TransportError } from '../errors/categories.js';
import { NoopLogger, logError, logStreamEnd, logStreamStart, type Logger } from '../observability/logging.js';
import { StreamMetrics, type MetricsCollector } from '../observability/metrics.js';
import type { TransportArgs } from '../request/types.js';
import type { StreamEvent } from '../stream/events.js';
import { SSEEventParser } from '../stream/parser.js';
import { ImmediateExecutor, type HostExecutor } from './executor.js';
import type {
  SpawnTransport,
  StreamCallbacks,
  StreamHandle,
  StreamOutcome,
  TransportProcess,
} from './types.js';

/**
 * Launches the transport with stdin closed and both output streams piped
 */
export const spawnTransport: SpawnTransport = (command, args) =>
  spawn(command, [...args], { stdio: ['ignore', 'pipe', 'pipe'] });

export interface StreamingProcessRunnerOptions {
  spawn?: SpawnTransport;
  executor?: HostExecutor;
  logger?: Logger;
  metrics?: MetricsCollector;
}

interface RunContext {
  readonly spawn: SpawnTransport;
  readonly executor: HostExecutor;
  readonly logger: Logger;
  readonly metrics: StreamMetrics;
  /** Forgets a finished run and returns how many are still active */
  release(stream: ProcessStream): number;
}

/**
 * One run of the transport. Owns the process, the parser and the delivery guards.
 */
class ProcessStream implements StreamHandle {
  readonly id = randomUUID();
  private proc: TransportProcess | undefined;
  private lines: Interface | undefined;
  private running = true;
  private cancelled = false;
  private exitDelivered = false;
  private stdoutClosed = false;
  private exitStatus: { code: number | null; signal: NodeJS.Signals | null } | undefined;
  private chunks = 0;
  private readonly startTime = Date.now();

  constructor(
    private readonly transport: TransportArgs,
    private readonly callbacks: StreamCallbacks,
    private readonly context: RunContext
  ) {}

  get pid(): number | undefined {
    return this.proc?.pid;
  }

  get finished(): boolean {
    return !this.running;
  }

  start(): void {
    const { command, args, url } = this.transport;
    logStreamStart(this.context.logger, this.id, command, url);

    let proc: TransportProcess;
    try {
      proc = this.context.spawn(command, args);
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      this.fail(new TransportError(`Failed to spawn ${command}: ${cause?.message ?? String(error)}`, cause));
      return;
    }
    this.proc = proc;

    const parser = new SSEEventParser({
      logger: this.context.logger,
      onEvent: (event) => this.deliverEvent(event),
      onDecodeError: () => this.context.metrics.decodeFailed(),
    });

    if (proc.stdout) {
      const lines = createInterface({ input: proc.stdout, crlfDelay: Infinity });
      this.lines = lines;
      lines.on('line', (line: string) => {
        if (!this.running) return;
        for (const text of parser.feedLine(line)) {
          this.deliverChunk(text);
        }
      });
      lines.once('close', () => {
        this.stdoutClosed = true;
        this.maybeComplete();
      });
    } else {
      this.stdoutClosed = true;
    }

    proc.stderr?.on('data', (chunk: Buffer | string) => {
      const message = chunk.toString().trim();
      if (message.length === 0) return;
      this.fail(new TransportError(`Transport wrote to stderr: ${message}`, undefined, { stderr: message }));
    });

    proc.once('error', (err: Error) => {
      this.fail(new TransportError(`Failed to run ${command}: ${err.message}`, err));
    });

    proc.once('exit', (code: number | null, signal: NodeJS.Signals | null) => {
      this.exitStatus = { code, signal };
      this.maybeComplete();
    });
  }

  cancel(): void {
    if (!this.running) return;
    this.cancelled = true;
    this.kill();
    this.finish({ status: 'cancelled' });
  }

  private maybeComplete(): void {
    if (!this.running || !this.stdoutClosed || !this.exitStatus) return;

    const { code, signal } = this.exitStatus;
    if (code !== null && code !== 0) {
      this.fail(new TransportError(`Transport exited with code ${code}`, undefined, { exitCode: code }));
    } else if (code === null && signal !== null) {
      this.fail(new TransportError(`Transport terminated by signal ${signal}`, undefined, { signal }));
    } else {
      this.finish({ status: 'completed', exitCode: code });
    }
  }

  private fail(error: TransportError): void {
    if (!this.running) return;
    this.context.metrics.transportFailed();
    logError(this.context.logger, error, 'transport', { streamId: this.id, ...error.details });
    this.kill();
    this.finish({ status: 'failed', error });
  }

  private finish(outcome: StreamOutcome): void {
    this.running = false;
    this.lines?.close();

    const durationMs = Date.now() - this.startTime;
    const active = this.context.release(this);
    this.context.metrics.streamFinished(outcome.status, durationMs, active);
    logStreamEnd(this.context.logger, this.id, outcome.status, durationMs, this.chunks);

    this.context.executor.schedule(() => {
      this.exitDelivered = true;
      this.callbacks.onExit(outcome);
    });
  }

  private deliverChunk(text: string): void {
    this.chunks++;
    this.context.metrics.chunkDelivered();
    this.context.executor.schedule(() => {
      if (this.cancelled || this.exitDelivered) return;
      this.callbacks.onChunk(text);
    });
  }

  private deliverEvent(event: StreamEvent): void {
    const onEvent = this.callbacks.onEvent;
    if (!onEvent) return;
    this.context.executor.schedule(() => {
      if (this.cancelled || this.exitDelivered) return;
      onEvent(event);
    });
  }

  private kill(): void {
    if (this.proc && !this.exitStatus) {
      this.proc.kill('SIGTERM');
    }
  }
}

/**
 * Runs transport processes and relays their SSE output. Each run gets its
 * own process and parser, so concurrent runs share no stream state.
 */
export class StreamingProcessRunner {
  private readonly context: RunContext;
  private readonly active = new Set<ProcessStream>();

  constructor(options: StreamingProcessRunnerOptions = {}) {
    const logger = options.logger ?? new NoopLogger();
    this.context = {
      spawn: options.spawn ?? spawnTransport,
      executor: options.executor ?? new ImmediateExecutor(options.logger),
      logger,
      metrics: new StreamMetrics(options.metrics),
      release: (stream) => {
        this.active.delete(stream);
        return this.active.size;
      },
    };
  }

  /**
   * Spawns the transport and starts relaying. Never throws: spawn failures
   * are reported through `onExit`.
   */
  run(transport: TransportArgs, callbacks: StreamCallbacks): StreamHandle {
    const stream = new ProcessStream(transport, callbacks, this.context);
    this.active.add(stream);
    this.context.metrics.streamStarted(this.active.size);
    stream.start();
    return stream;
  }

  cancel(handle: StreamHandle): void {
    handle.cancel();
  }

  /**
   * Number of runs that have not finished yet
   */
  getActiveCount(): number {
    return this.active.size;
  }
}
