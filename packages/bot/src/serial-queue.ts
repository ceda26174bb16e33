/**
 * Runs async tasks strictly one after another, in submission order.
 * A failed task does not stop the ones queued behind it.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => {
        this.pending--;
      },
      () => {
        this.pending--;
      },
    );
    return result;
  }

  /** Resolves once everything queued so far has settled. */
  onIdle(): Promise<void> {
    return this.tail;
  }

  get size(): number {
    return this.pending;
  }
}
