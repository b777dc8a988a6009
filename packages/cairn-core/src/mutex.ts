// Async mutual exclusion.

/**
 * A FIFO async lock.
 *
 * Waiters are woken in the order they called {@link Mutex.acquire}; release
 * hands the lock straight to the next waiter.
 */
export class Mutex {
  private locked = false;
  private waiters: Array<() => void> = [];

  /** Wait for the lock. Resolves with the function that releases it. */
  acquire(): Promise<() => void> {
    return new Promise((resolve) => {
      const grant = () => {
        let released = false;
        resolve(() => {
          if (released) return;
          released = true;
          this.release();
        });
      };

      if (!this.locked) {
        this.locked = true;
        grant();
      } else {
        this.waiters.push(grant);
      }
    });
  }

  /** Run `fn` while holding the lock. */
  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(): boolean {
    return this.locked;
  }

  /** Number of callers waiting for the lock. */
  get pending(): number {
    return this.waiters.length;
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
    } else {
      this.locked = false;
    }
  }
}
