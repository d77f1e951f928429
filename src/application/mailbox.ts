/**
 * Serial task queue.
 *
 * Tasks run one at a time in the order they were posted. Each caller gets a
 * promise for its own task; a task that throws rejects that promise only and
 * the queue moves on to the next task.
 */
export class Mailbox {
  private tail: Promise<void> = Promise.resolve();
  private queued = 0;

  post<T>(task: () => T | Promise<T>): Promise<T> {
    this.queued++;
    const run = this.tail.then(() => task()).finally(() => {
      this.queued--;
    });
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  /** Tasks posted and not yet settled, including the running one. */
  get depth(): number {
    return this.queued;
  }
}
