/**
 * @fileoverview Single-actor processing queue.
 *
 * Every state mutation on the surface goes through one queue. Transport
 * callbacks and timers only enqueue; tasks run one at a time in arrival
 * order, and a task enqueued while another runs is appended behind it
 * instead of interleaving.
 */

export type QueueTask = () => void;

export class SerialQueue {
  private readonly tasks: QueueTask[] = [];
  private draining = false;

  /**
   * @param onError - Receives any error a task throws; the queue keeps draining
   */
  constructor(private readonly onError: (error: unknown) => void) {}

  /**
   * Add a task. Runs it immediately unless a drain is already in progress.
   */
  enqueue(task: QueueTask): void {
    this.tasks.push(task);
    if (this.draining) return;
    this.drain();
  }

  /** Number of tasks waiting behind the current one */
  get pending(): number {
    return this.tasks.length;
  }

  /** Whether a task is currently running */
  get isDraining(): boolean {
    return this.draining;
  }

  private drain(): void {
    this.draining = true;
    try {
      let task = this.tasks.shift();
      while (task) {
        try {
          task();
        } catch (error) {
          this.onError(error);
        }
        task = this.tasks.shift();
      }
    } finally {
      this.draining = false;
    }
  }
}
