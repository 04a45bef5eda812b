/**
 * Exclusive access lock
 *
 * Serializes work on a resource that must never see two operations at once:
 * - FIFO ordering of waiters
 * - Release on every exit path, including thrown errors
 * - Synchronous critical sections: the task runs to completion without
 *   yielding while the lock is held
 *
 * Primary use case: one lock per open document guarding its parsing engine
 */

/**
 * A FIFO mutual-exclusion lock for synchronous critical sections
 *
 * @example
 * ```typescript
 * const lock = new AccessLock();
 *
 * const text = await lock.runExclusive(() => native.renderPageText(0));
 * ```
 */
export class AccessLock {
  private tail: Promise<void> = Promise.resolve();
  private held = false;
  private waiting = 0;

  /**
   * Whether a task is currently running under the lock
   */
  get isLocked(): boolean {
    return this.held;
  }

  /**
   * Number of callers queued behind the current holder
   */
  get pendingCount(): number {
    return this.waiting;
  }

  /**
   * Wait for the lock, run the task, and release the lock
   *
   * The task must be synchronous; a returned promise would escape the
   * critical section before it settles.
   *
   * @param task - Work to run while holding the lock
   * @returns The task's return value
   * @throws Whatever the task throws, after the lock is released
   */
  async runExclusive<T>(task: () => T): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tail = previous.then(() => current);

    this.waiting++;
    await previous;
    this.waiting--;

    this.held = true;
    try {
      return task();
    } finally {
      this.held = false;
      release();
    }
  }
}
