import { warn } from "../lib/logger";

type Task = () => void;

/**
 * Single-threaded work queue. Tasks run one at a time, in posting order, on a
 * later macrotask, so nothing posted from an I/O callback runs inside it.
 */
export class SerialQueue {
  private readonly tasks: Task[] = [];
  private waiters: Array<() => void> = [];
  private scheduled = false;

  post(task: Task): void {
    this.tasks.push(task);
    this.schedule();
  }

  get size(): number {
    return this.tasks.length;
  }

  /**
   * Resolves once every task posted so far (and any they post) has run.
   */
  drained(): Promise<void> {
    if (this.tasks.length === 0 && !this.scheduled) return Promise.resolve();
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  private schedule(): void {
    if (this.scheduled) return;
    this.scheduled = true;
    setImmediate(() => this.drain());
  }

  private drain(): void {
    let task = this.tasks.shift();
    while (task) {
      try {
        task();
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        warn(`[queue] task failed: ${message}`);
      }
      task = this.tasks.shift();
    }
    this.scheduled = false;

    const waiters = this.waiters;
    this.waiters = [];
    for (const resolve of waiters) resolve();
  }
}
