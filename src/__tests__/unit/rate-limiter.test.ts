import { describe, it, expect } from 'vitest';
import { FixedWindowCounter } from '../../middleware/rate-limiter.js';

describe('FixedWindowCounter', () => {
  it('should allow maxRequests hits per window', () => {
    const counter = new FixedWindowCounter(10_000, 3);

    expect(counter.hit('a', 1_000)).toBeNull();
    expect(counter.hit('a', 2_000)).toBeNull();
    expect(counter.hit('a', 3_000)).toBeNull();
    expect(counter.hit('a', 4_000)).toBe(7);
  });

  it('should count keys separately', () => {
    const counter = new FixedWindowCounter(10_000, 1);

    expect(counter.hit('a', 0)).toBeNull();
    expect(counter.hit('b', 0)).toBeNull();
    expect(counter.hit('a', 0)).toBe(10);
  });

  it('should wait at least one second', () => {
    const counter = new FixedWindowCounter(10_000, 1);

    counter.hit('a', 0);
    expect(counter.hit('a', 9_999)).toBe(1);
  });

  it('should reset the budget once the window ends', () => {
    const counter = new FixedWindowCounter(10_000, 1);

    counter.hit('a', 0);
    expect(counter.hit('a', 10_000)).toBeNull();
    expect(counter.hit('a', 10_001)).toBe(10);
  });

  it('should drop ended windows', () => {
    const counter = new FixedWindowCounter(10_000, 5);

    counter.hit('a', 0);
    counter.hit('b', 5_000);

    expect(counter.prune(12_000)).toBe(1);
    expect(counter.size).toBe(1);
  });

  it('should prune while counting', () => {
    const counter = new FixedWindowCounter(10_000, 5);

    counter.hit('a', 0);
    counter.hit('b', 1_000);
    counter.hit('c', 20_000);

    expect(counter.size).toBe(1);
  });
});
