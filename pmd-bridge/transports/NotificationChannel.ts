/**
 * Notification Channel
 * Single-consumer async queue between link callbacks and the dispatch loop.
 * Items pushed before close() are still delivered; the sequence then ends.
 */

export class NotificationChannel<T> implements AsyncIterable<T> {
  private buffer: T[] = [];
  private waiters: Array<(result: IteratorResult<T, undefined>) => void> = [];
  private closed = false;
  private consumed = false;

  /**
   * @returns false if the channel is already closed
   */
  push(item: T): boolean {
    if (this.closed) return false;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ done: false, value: item });
    } else {
      this.buffer.push(item);
    }
    return true;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;

    // Waiters only exist while the buffer is empty
    for (const waiter of this.waiters.splice(0)) {
      waiter({ done: true, value: undefined });
    }
  }

  isClosed(): boolean {
    return this.closed;
  }

  size(): number {
    return this.buffer.length;
  }

  private next(): Promise<IteratorResult<T, undefined>> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      return Promise.resolve({ done: false, value });
    }
    if (this.closed) {
      return Promise.resolve({ done: true, value: undefined });
    }
    return new Promise(resolve => this.waiters.push(resolve));
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    if (this.consumed) {
      throw new Error('Notification channel already has a consumer');
    }
    this.consumed = true;

    return {
      next: () => this.next(),
      return: async () => {
        this.close();
        return { done: true, value: undefined };
      },
    };
  }
}
