/**
 * Unbounded multi-producer FIFO with a single awaiting consumer.
 * `recv` resolves undefined once the channel is closed and drained.
 */
export class AsyncChannel<T> {
  private readonly buffer: T[] = [];
  private readonly waiters: Array<(value: T | undefined) => void> = [];
  private closed = false;

  push(value: T): boolean {
    if (this.closed) return false;
    const waiter = this.waiters.shift();
    if (waiter) waiter(value);
    else this.buffer.push(value);
    return true;
  }

  recv(): Promise<T | undefined> {
    if (this.buffer.length > 0) return Promise.resolve(this.buffer.shift());
    if (this.closed) return Promise.resolve(undefined);
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  close() {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) waiter(undefined);
  }

  get isClosed() {
    return this.closed;
  }

  get size() {
    return this.buffer.length;
  }
}
