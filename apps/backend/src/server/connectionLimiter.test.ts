import { describe, it, expect } from 'vitest';
import { ConnectionLimiter } from './connectionLimiter';

describe('ConnectionLimiter', () => {
  it('refuses once every permit is held', () => {
    const limiter = new ConnectionLimiter(2);
    const first = limiter.tryAcquire();
    const second = limiter.tryAcquire();
    expect(first).not.toBeNull();
    expect(second).not.toBeNull();
    expect(limiter.tryAcquire()).toBeNull();

    first?.();
    expect(limiter.available).toBe(1);
    expect(limiter.tryAcquire()).not.toBeNull();
  });

  it('counts a double release once', () => {
    const limiter = new ConnectionLimiter(1);
    const release = limiter.tryAcquire();
    release?.();
    release?.();
    expect(limiter.available).toBe(1);
  });

  it('rejects a capacity below one', () => {
    expect(() => new ConnectionLimiter(0)).toThrow('invalid connection capacity: 0');
  });
});
