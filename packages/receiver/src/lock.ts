/**
 * FIFO async mutex guarding the receiver's accounting state.
 *
 * The batching engine appends data and seals blocks while holding it, and the
 * range accumulator refuses to touch its buffer unless it is held.
 */
export class AccountingLock {
  private held = false;
  private readonly waiters: Array<() => void> = [];

  isHeld(): boolean {
    return this.held;
  }

  async runExclusive<T>(work: () => T | Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await work();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (!this.held) {
      this.held = true;
      return Promise.resolve();
    }
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  private release(): void {
    const next = this.waiters.shift();
    // ownership passes straight to the next waiter; `held` stays true
    if (next) next();
    else this.held = false;
  }
}
