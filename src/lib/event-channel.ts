/**
 * Unbounded single-consumer async queue. Producers `push` and `close`; the
 * caller drains it with `for await`. Pushing never blocks, so a slow consumer
 * cannot stall transfers.
 */
export class EventChannel<T> implements AsyncIterable<T> {
  private buffer: T[] = [];
  private waiting: Array<(result: IteratorResult<T>) => void> = [];
  private closed = false;
  private iterated = false;

  push(value: T): void {
    if (this.closed) return;
    const next = this.waiting.shift();
    if (next) {
      next({ value, done: false });
    } else {
      this.buffer.push(value);
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const resolve of this.waiting.splice(0)) {
      resolve({ value: undefined, done: true });
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    if (this.iterated) {
      throw new Error("EventChannel can only be consumed once");
    }
    this.iterated = true;

    return {
      next: (): Promise<IteratorResult<T>> => {
        const value = this.buffer.shift();
        if (value !== undefined) {
          return Promise.resolve({ value, done: false });
        }
        if (this.closed) {
          return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise((resolve) => this.waiting.push(resolve));
      },
      return: (): Promise<IteratorResult<T>> => {
        this.buffer = [];
        this.close();
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }
}
