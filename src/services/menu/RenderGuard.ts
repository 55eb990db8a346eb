/**
 * Outcome of a non-blocking attempt to take the guard
 */
export type GuardResult<T> = { acquired: false } | { acquired: true; value: T };

/**
 * Exclusive, non-reentrant lock over the framebuffer and the panel.
 *
 * The guard stays held until the wrapped work has finished its panel I/O.
 * Waiters are served in arrival order, and a release hands ownership
 * straight to the next waiter so nobody can slip in between.
 */
export class RenderGuard {
  private held = false;
  private readonly waiters: Array<() => void> = [];

  /**
   * Wait for the guard, then run `work` while holding it
   */
  async runExclusive<T>(work: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await work();
    } finally {
      this.release();
    }
  }

  /**
   * Run `work` only if the guard is free right now
   */
  async tryRunExclusive<T>(work: () => Promise<T>): Promise<GuardResult<T>> {
    if (this.held) {
      return { acquired: false };
    }
    this.held = true;
    try {
      return { acquired: true, value: await work() };
    } finally {
      this.release();
    }
  }

  isHeld(): boolean {
    return this.held;
  }

  /**
   * Callers currently waiting in runExclusive
   */
  getWaiterCount(): number {
    return this.waiters.length;
  }

  private acquire(): Promise<void> {
    if (!this.held) {
      this.held = true;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
    } else {
      this.held = false;
    }
  }
}
