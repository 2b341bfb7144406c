/**
 * Mutual exclusion for writes onto the shared relay connection.
 * Each task runs alone; a failed task does not poison the tasks queued after it.
 */
export class WriteGate {
  private tail: Promise<void> = Promise.resolve();

  private pending = 0;

  /**
   * Number of writers holding or waiting for the gate.
   */
  get size(): number {
    return this.pending;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending += 1;

    const result = this.tail.then(task).finally(() => {
      this.pending -= 1;
    });

    this.tail = result.then(
      () => undefined,
      () => undefined,
    );

    return result;
  }
}
