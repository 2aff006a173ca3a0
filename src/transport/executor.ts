import { ConsoleLogger, type Logger } from '../observability/logging.js';

/**
 * The host's single execution context. Every callback the client hands back
 * to the host (chunks, completion, diagnostics) goes through `schedule`, and
 * tasks must run in the order they were scheduled.
 */
export interface HostExecutor {
  schedule(task: () => void): void;
}

/**
 * Runs tasks on the Node.js event loop via `setImmediate`, one per turn.
 * A task that throws is logged and does not stop the ones after it. Without
 * a logger, such errors are written to stderr; pass a `NoopLogger` to drop them.
 */
export class ImmediateExecutor implements HostExecutor {
  private readonly logger: Logger;

  constructor(logger: Logger = new ConsoleLogger({ level: 'error' })) {
    this.logger = logger;
  }

  schedule(task: () => void): void {
    setImmediate(() => {
      try {
        task();
      } catch (error) {
        this.logger.error('Host callback threw', {
          errorMessage: error instanceof Error ? error.message : String(error),
        });
      }
    });
  }
}

/**
 * Collects tasks until the host drains them from its own loop
 */
export class QueueExecutor implements HostExecutor {
  private readonly tasks: Array<() => void> = [];

  schedule(task: () => void): void {
    this.tasks.push(task);
  }

  /**
   * Runs queued tasks in FIFO order, including any scheduled while draining.
   * Returns how many ran.
   */
  drain(): number {
    let ran = 0;
    let task = this.tasks.shift();
    while (task) {
      task();
      ran++;
      task = this.tasks.shift();
    }
    return ran;
  }

  get pending(): number {
    return this.tasks.length;
  }
}
