/**
 * Unbounded single-consumer channel. Producers push, the consumer iterates with
 * `for await` until the channel is closed or failed.
 */
export class ResultChannel<T> implements AsyncIterable<T> {
  private readonly buffered: T[] = [];
  private waiter?: () => void;
  private closed = false;
  private failure?: { error: unknown };

  get pending(): number {
    return this.buffered.length;
  }

  push(item: T): void {
    if (this.closed) {
      throw new Error("Cannot push to a closed ResultChannel");
    }
    this.buffered.push(item);
    this.wake();
  }

  close(): void {
    this.closed = true;
    this.wake();
  }

  fail(error: unknown): void {
    this.failure = { error };
    this.closed = true;
    this.wake();
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    while (true) {
      if (this.buffered.length > 0) {
        const [item] = this.buffered.splice(0, 1);
        yield item;
        continue;
      }
      if (this.failure) {
        throw this.failure.error;
      }
      if (this.closed) {
        return;
      }
      await new Promise<void>((resolve) => {
        this.waiter = resolve;
      });
    }
  }

  private wake(): void {
    const waiter = this.waiter;
    this.waiter = undefined;
    waiter?.();
  }
}

/**
 * Runs `worker` over `source` on `concurrency` slots and yields results in
 * completion order. The channel closes once every slot has drained the source.
 */
export function mapUnordered<T, R>(
  source: AsyncIterable<T>,
  concurrency: number,
  worker: (item: T) => Promise<R>,
): ResultChannel<R> {
  const channel = new ResultChannel<R>();
  const iterator = source[Symbol.asyncIterator]();
  const slots = new Array(Math.max(1, concurrency)).fill(null).map(async () => {
    while (true) {
      const next = await iterator.next();
      if (next.done) {
        break;
      }
      channel.push(await worker(next.value));
    }
  });

  void Promise.all(slots).then(
    () => channel.close(),
    (error: unknown) => channel.fail(error),
  );
  return channel;
}
