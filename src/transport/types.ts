import type { EventEmitter } from 'events';
import type { Readable } from 'stream';
import type { TransportError } from '../errors/categories.js';
import type { StreamEvent } from '../stream/events.js';

/**
 * The parts of a child process the runner relies on. `ChildProcess` satisfies it.
 *
 * Emits `exit(code, signal)` and `error(err)`.
 */
export interface TransportProcess extends EventEmitter {
  readonly pid?: number;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnTransport = (command: string, args: readonly string[]) => TransportProcess;

/**
 * How a stream ended, handed to `onExit`
 */
export type StreamOutcome =
  | { readonly status: 'completed'; readonly exitCode: number | null }
  | { readonly status: 'cancelled' }
  | { readonly status: 'failed'; readonly error: TransportError };

export interface StreamCallbacks {
  onChunk(text: string): void;
  /** Called exactly once per run, after every chunk */
  onExit(outcome: StreamOutcome): void;
  /** Diagnostic events (message_start, message_delta, error, ...) */
  onEvent?(event: StreamEvent): void;
}

export interface StreamHandle {
  readonly id: string;
  /** Undefined when the process could not be spawned */
  readonly pid: number | undefined;
  /** True once the run has ended, whether or not `onExit` has been delivered yet */
  readonly finished: boolean;
  /** Terminates the process and suppresses further callbacks. Idempotent. */
  cancel(): void;
}
