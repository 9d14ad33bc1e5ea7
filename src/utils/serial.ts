/**
 * Runs queued tasks one at a time in submission order. A rejected task does not
 * stall the queue; its rejection is delivered to the caller of `run`.
 */
export class SerialQueue {
  private tail: Promise<unknown> = Promise.resolve();
  private pending = 0;

  run<T>(task: () => Promise<T> | T): Promise<T> {
    this.pending += 1;
    const result = this.tail.then(task, task);
    this.tail = result.then(
      () => this.settle(),
      () => this.settle()
    );
    return result;
  }

  get size() {
    return this.pending;
  }

  /** Resolves once every task queued so far has settled. */
  async drain(): Promise<void> {
    await this.tail;
  }

  private settle() {
    this.pending = Math.max(0, this.pending - 1);
  }
}
