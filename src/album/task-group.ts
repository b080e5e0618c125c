/**
 * Receives any error thrown by a task spawned in a {@link TaskGroup}.
 */
export type TaskErrorHandler = (error: unknown, taskName: string) => void;

export type TaskFn = (signal: AbortSignal) => Promise<void>;

/**
 * Tracks fire-and-forget async tasks so they can be joined on shutdown.
 *
 * `spawn` never blocks the caller. A task's rejection goes to the error
 * handler instead of the spawner. `close` aborts the shared signal and
 * resolves once every task has settled.
 */
export class TaskGroup {
  private readonly running = new Map<Promise<void>, string>();
  private readonly abortController = new AbortController();
  private closed = false;

  constructor(private readonly onError: TaskErrorHandler) {}

  get size(): number {
    return this.running.size;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  spawn(name: string, task: TaskFn): void {
    if (this.closed) {
      throw new Error(`Task group is closed, cannot spawn "${name}"`);
    }

    const { signal } = this.abortController;
    const tracked: Promise<void> = Promise.resolve()
      .then(() => task(signal))
      .catch((error: unknown) => this.reportError(error, name))
      .finally(() => {
        this.running.delete(tracked);
      });
    this.running.set(tracked, name);
  }

  async close(): Promise<void> {
    this.closed = true;
    this.abortController.abort();
    while (this.running.size > 0) {
      await Promise.allSettled(this.running.keys());
    }
  }

  private reportError(error: unknown, name: string): void {
    this.onError(error, name);
  }
}
