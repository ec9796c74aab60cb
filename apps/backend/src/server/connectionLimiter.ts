/** Counting semaphore over accepted connections. */
export class ConnectionLimiter {
  private held = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) throw new Error(`invalid connection capacity: ${capacity}`);
  }

  /** Returns a release function, or null when every permit is taken. */
  tryAcquire(): (() => void) | null {
    if (this.held >= this.capacity) return null;
    this.held += 1;
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.held -= 1;
    };
  }

  get available() {
    return this.capacity - this.held;
  }
}
