/**
 * Counting permit pool coupling the work generator to the result consumer.
 *
 * A permit is taken before an item is handed to the worker pool and must only be
 * given back once that item has been written, so buffered payloads stay bounded
 * by `capacity` however slow the writer is.
 */
export class BackpressureGate {
  readonly capacity: number;
  private available: number;
  private readonly waiters: Array<() => void> = [];

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`BackpressureGate capacity must be a positive integer (got ${capacity})`);
    }
    this.capacity = capacity;
    this.available = capacity;
  }

  get inFlight(): number {
    return this.capacity - this.available;
  }

  acquire(): Promise<void> {
    if (this.available > 0) {
      this.available -= 1;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      // hand the permit straight to the next waiter
      next();
      return;
    }
    if (this.available >= this.capacity) {
      throw new Error("BackpressureGate released more permits than were acquired");
    }
    this.available += 1;
  }

  async *admit<T>(items: Iterable<T>): AsyncGenerator<T, void, undefined> {
    for (const item of items) {
      await this.acquire();
      yield item;
    }
  }
}
