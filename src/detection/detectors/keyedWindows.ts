import { SlidingWindowCounter } from '../../metrics/slidingWindow.js';

const DEFAULT_MAX_KEYS = 10_000;

/** Per-key sliding windows with the least recently touched key evicted first. */
export class KeyedWindows {
  private readonly windows = new Map<string, SlidingWindowCounter>();

  constructor(
    private readonly windowMs: number,
    private readonly maxSamples: number,
    private readonly maxKeys = DEFAULT_MAX_KEYS
  ) {}

  record(key: string, now = Date.now()): number {
    let window = this.windows.get(key);
    if (window) {
      this.windows.delete(key);
    } else {
      window = new SlidingWindowCounter({ windowMs: this.windowMs, maxSamples: this.maxSamples });
    }
    this.windows.set(key, window);
    window.record(now);
    window.prune(now);

    if (this.windows.size > this.maxKeys) {
      const oldest = this.windows.keys().next();
      if (!oldest.done) {
        this.windows.delete(oldest.value);
      }
    }
    return window.count();
  }
}
