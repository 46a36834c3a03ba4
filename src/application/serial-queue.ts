import type { Logger } from 'pino';
import type { ErrorChannel } from './error-channel.js';

interface QueuedTask {
  readonly label: string;
  readonly run: () => void;
}

/**
 * Single-writer work queue.
 *
 * Every mutation of runtime state (ingesting an envelope, a timer firing)
 * goes through `enqueue`. Tasks run one at a time in FIFO order; a task
 * enqueued while another is running waits for it instead of nesting.
 */
export class SerialQueue {
  private readonly tasks: QueuedTask[] = [];
  private draining = false;

  constructor(
    private readonly errors: ErrorChannel,
    private readonly log: Logger,
  ) {}

  /**
   * Runs `run` now if the queue is idle, otherwise after the tasks ahead
   * of it. Returns once the queue is drained, or immediately when called
   * from inside a running task.
   */
  enqueue(label: string, run: () => void): void {
    this.tasks.push({ label, run });
    if (this.draining) return;

    this.draining = true;
    try {
      let task = this.tasks.shift();
      while (task !== undefined) {
        this.runTask(task);
        task = this.tasks.shift();
      }
    } finally {
      this.draining = false;
    }
  }

  get pending(): number {
    return this.tasks.length;
  }

  get isDraining(): boolean {
    return this.draining;
  }

  private runTask(task: QueuedTask): void {
    try {
      task.run();
    } catch (err: unknown) {
      this.log.warn({ err, task: task.label }, 'Queued task failed');
      this.errors.report({ source: 'task', error: err, task: task.label });
    }
  }
}
