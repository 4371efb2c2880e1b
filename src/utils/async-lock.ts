/**
 * Promise-chain mutex. Tasks run one at a time in submission order; a
 * rejected task does not poison the chain.
 */
export class AsyncLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  get isLocked(): boolean {
    return this.pending > 0;
  }

  runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => {
        this.pending--;
      },
      () => {
        this.pending--;
      }
    );
    return result;
  }
}
