/**
 * Runs tasks one at a time in arrival order. A failing task does not block
 * the ones queued behind it.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  get size(): number {
    return this.pending;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending += 1;
    const result = this.tail.then(task);
    const settle = () => {
      this.pending -= 1;
    };
    this.tail = result.then(settle, settle);
    return result;
  }
}
