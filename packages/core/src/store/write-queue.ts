/**
 * Write Queue
 *
 * Runs store writes one at a time in submission order, so concurrent scan
 * tasks never interleave statements on the single connection.
 */

export class WriteQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /**
   * Queue `task`; the returned promise settles with its outcome. A failed
   * task does not stop the ones queued after it.
   */
  enqueue<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;
    const run = this.tail.then(task);
    this.tail = run.then(
      () => this.settle(),
      () => this.settle()
    );
    return run;
  }

  /**
   * Resolve once every task queued so far has settled
   */
  async drain(): Promise<void> {
    await this.tail;
  }

  get size(): number {
    return this.pending;
  }

  private settle(): void {
    this.pending--;
  }
}
