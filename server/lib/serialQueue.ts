/**
 * Runs async tasks one at a time in submission order. Used as the single
 * writer in front of each persisted store so concurrent interval workers
 * never interleave a read-modify-write.
 *
 * A rejected task is reported to its own caller only; later tasks still run.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pendingCount = 0;

  get size(): number {
    return this.pendingCount;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    this.pendingCount += 1;
    const result = this.tail.then(task).finally(() => {
      this.pendingCount -= 1;
    });
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
