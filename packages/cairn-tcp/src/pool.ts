// Bounded set of client slots with a FIFO wait queue.

/**
 * Admits up to `limit` items at once.
 *
 * Items offered while every slot is taken wait in arrival order and are
 * started as slots are released. A waiting item can be withdrawn.
 */
export class ClientPool<T> {
  private readonly waiting: T[] = [];
  private running = 0;

  constructor(
    readonly limit: number,
    private readonly start: (item: T) => void,
  ) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`pool limit must be a positive integer, got ${limit}`);
    }
  }

  get active(): number {
    return this.running;
  }

  get queued(): number {
    return this.waiting.length;
  }

  /** Start `item` now if a slot is free, otherwise queue it. */
  offer(item: T): "started" | "queued" {
    if (this.running < this.limit) {
      this.running++;
      this.start(item);
      return "started";
    }
    this.waiting.push(item);
    return "queued";
  }

  /** Remove a waiting item. False if it was not waiting. */
  withdraw(item: T): boolean {
    const index = this.waiting.indexOf(item);
    if (index < 0) return false;
    this.waiting.splice(index, 1);
    return true;
  }

  /** Give a slot back; the oldest waiting item takes it over. */
  release(): void {
    const next = this.waiting.shift();
    if (next !== undefined) {
      this.start(next);
      return;
    }
    if (this.running > 0) this.running--;
  }

  /** Drop every waiting item and return them. */
  drain(): T[] {
    return this.waiting.splice(0, this.waiting.length);
  }
}
