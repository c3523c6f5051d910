import { describe, expect, it } from 'vitest';
import { SlidingWindowCounter } from '../src/metrics/slidingWindow.js';

describe('SlidingWindowCounter', () => {
  it('drops samples older than the window on prune', () => {
    const window = new SlidingWindowCounter({ windowMs: 1_000, maxSamples: 10 });
    window.record(0);
    window.record(500);
    window.record(1_500);

    expect(window.prune(2_000)).toBe(2);
    expect(window.values()).toEqual([1_500]);
    expect(window.oldest()).toBe(1_500);
  });

  it('keeps a sample exactly at the window edge', () => {
    const window = new SlidingWindowCounter({ windowMs: 1_000, maxSamples: 10 });
    window.record(1_000);
    expect(window.prune(2_000)).toBe(0);
    expect(window.count()).toBe(1);
  });

  it('evicts the oldest samples beyond the cap', () => {
    const window = new SlidingWindowCounter({ windowMs: 60_000, maxSamples: 3 });
    for (const ts of [1, 2, 3, 4, 5]) {
      window.record(ts);
    }
    expect(window.values()).toEqual([3, 4, 5]);
    expect(window.capacity).toBe(3);
  });

  it('clamps a skewed timestamp forward to stay sorted', () => {
    const window = new SlidingWindowCounter({ windowMs: 60_000, maxSamples: 10 });
    window.record(5_000);
    window.record(4_000);
    expect(window.values()).toEqual([5_000, 5_000]);
  });

  it('validates its options', () => {
    expect(() => new SlidingWindowCounter({ windowMs: 1_000, maxSamples: 0 })).toThrow(
      'maxSamples must be a positive integer'
    );
    expect(() => new SlidingWindowCounter({ windowMs: 0, maxSamples: 5 })).toThrow('windowMs must be positive');
  });
});
