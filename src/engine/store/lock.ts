/**
 * Promise-based mutual exclusion for store operations.
 *
 * @module engine/store/lock
 */

/**
 * FIFO async mutex.
 *
 * Callers are admitted strictly in the order they called `runExclusive`.
 * The lock is released when the callback settles, whether it resolved or
 * rejected. It is not cancellation-aware: a caller that stops waiting does
 * not stop the callback.
 */
export class AsyncLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /**
   * Number of callers holding or waiting for the lock
   */
  get size(): number {
    return this.pending;
  }

  /**
   * Whether some caller currently holds the lock
   */
  get locked(): boolean {
    return this.pending > 0;
  }

  /**
   * Runs `fn` once every earlier caller has finished.
   *
   * @returns Whatever `fn` resolves to; rejections propagate unchanged
   */
  runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    this.pending++;

    const run = this.tail.then(fn);
    // The next caller waits for this one to settle, never for its result.
    this.tail = run.then(
      () => this.release(),
      () => this.release()
    );

    return run;
  }

  private release(): void {
    this.pending--;
  }
}
