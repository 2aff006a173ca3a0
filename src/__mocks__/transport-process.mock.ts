import { EventEmitter } from 'events';
import { PassThrough } from 'stream';
import { vi } from 'vitest';
import type { TransportProcess } from '../transport/types.js';

/**
 * In-process stand-in for a spawned curl. Tests write lines to its stdout or
 * stderr and decide when it exits.
 */
export class FakeTransportProcess extends EventEmitter implements TransportProcess {
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly killSignals: Array<NodeJS.Signals | number | undefined> = [];
  private exited = false;

  constructor(readonly pid: number | undefined = 4242) {
    super();
  }

  /**
   * Writes each line followed by a newline, as curl -N would.
   * Writes after exit are dropped, like output of a dead process.
   */
  writeLines(lines: readonly string[]): void {
    if (this.stdout.writableEnded) return;
    this.stdout.write(lines.map(line => `${line}\n`).join(''));
  }

  writeRaw(text: string): void {
    if (this.stdout.writableEnded) return;
    this.stdout.write(text);
  }

  writeStderr(text: string): void {
    if (this.stderr.writableEnded) return;
    this.stderr.write(text);
  }

  /**
   * Closes the output streams and reports an exit
   */
  exit(code: number | null = 0, signal: NodeJS.Signals | null = null): void {
    if (this.exited) return;
    this.exited = true;
    this.stdout.end();
    this.stderr.end();
    this.emit('exit', code, signal);
  }

  fail(error: Error): void {
    this.emit('error', error);
  }

  kill(signal?: NodeJS.Signals | number): boolean {
    this.killSignals.push(signal);
    // a real process reports its exit shortly after the signal
    setImmediate(() => this.exit(null, typeof signal === 'string' ? signal : 'SIGTERM'));
    return true;
  }
}

/**
 * A spawn function that hands out FakeTransportProcess instances and records every call
 */
export function createMockSpawn() {
  const processes: FakeTransportProcess[] = [];
  const spawn = vi.fn((_command: string, _args: readonly string[]): FakeTransportProcess => {
    const proc = new FakeTransportProcess(4242 + processes.length);
    processes.push(proc);
    return proc;
  });
  return { spawn, processes };
}

/**
 * The lines of one SSE event: `event:`, `data:` and the blank separator
 */
export function sseEvent(type: string, data: unknown): string[] {
  return [`event: ${type}`, `data: ${JSON.stringify(data)}`, ''];
}

/**
 * A complete provider stream whose text deltas are `texts`
 */
export function sseTextStream(texts: readonly string[]): string[] {
  return [
    ...sseEvent('message_start', {
      type: 'message_start',
      message: { id: 'msg_test', model: 'claude-3-haiku-20240307', usage: { input_tokens: 5, output_tokens: 1 } },
    }),
    ...sseEvent('content_block_start', { type: 'content_block_start', index: 0, content_block: { type: 'text', text: '' } }),
    ...texts.flatMap(text =>
      sseEvent('content_block_delta', { type: 'content_block_delta', index: 0, delta: { type: 'text_delta', text } })
    ),
    ...sseEvent('content_block_stop', { type: 'content_block_stop', index: 0 }),
    ...sseEvent('message_delta', { type: 'message_delta', delta: { stop_reason: 'end_turn' }, usage: { output_tokens: 3 } }),
    ...sseEvent('message_stop', { type: 'message_stop' }),
  ];
}
