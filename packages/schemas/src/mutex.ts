/**
 * Promise-chain lock. Each caller waits for the previous holder to
 * release before running, so critical sections that span `await`
 * points never interleave.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private held = 0;

  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    let release: () => void;
    const acquired = new Promise<void>((resolve) => { release = resolve; });
    const prev = this.tail;
    this.tail = acquired;
    this.held++;
    await prev;

    try {
      return await fn();
    } finally {
      this.held--;
      release!();
    }
  }

  /** Number of callers holding or waiting for the lock. */
  get pending(): number {
    return this.held;
  }

  /** Resolves once everything queued so far has run. */
  async drain(): Promise<void> {
    await this.tail;
  }
}
