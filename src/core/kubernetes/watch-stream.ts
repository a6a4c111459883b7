/**
 * Bridges the callback-based `Watch` API into pull-based async iteration
 */

export class EventQueue<T> {
  private readonly items: T[] = [];
  private waiter: { resolve: (result: IteratorResult<T, undefined>) => void; reject: (error: unknown) => void } | undefined;
  private failure: { error: unknown } | undefined;
  private ended = false;

  push(item: T): void {
    if (this.ended || this.failure) {
      return;
    }
    if (this.waiter) {
      const { resolve } = this.waiter;
      this.waiter = undefined;
      resolve({ value: item, done: false });
      return;
    }
    this.items.push(item);
  }

  fail(error: unknown): void {
    if (this.ended || this.failure) {
      return;
    }
    this.failure = { error };
    if (this.waiter) {
      const { reject } = this.waiter;
      this.waiter = undefined;
      reject(error);
    }
  }

  end(): void {
    if (this.ended) {
      return;
    }
    this.ended = true;
    if (this.waiter) {
      const { resolve } = this.waiter;
      this.waiter = undefined;
      resolve({ value: undefined, done: true });
    }
  }

  /**
   * Next buffered item; buffered items drain before a failure or the end is reported.
   * An aborted signal ends the queue.
   */
  next(signal?: AbortSignal): Promise<IteratorResult<T, undefined>> {
    const item = this.items.shift();
    if (item !== undefined) {
      return Promise.resolve({ value: item, done: false });
    }
    if (this.failure) {
      return Promise.reject(this.failure.error);
    }
    if (this.ended || signal?.aborted) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise((resolve, reject) => {
      const onAbort = (): void => this.end();
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiter = {
        resolve: (result) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(result);
        },
        reject: (error) => {
          signal?.removeEventListener('abort', onAbort);
          reject(error);
        },
      };
    });
  }
}
