export interface SlidingWindowOptions {
  maxSamples: number;
  windowMs: number;
}

/**
 * Bounded, ascending sequence of sample timestamps.
 *
 * Samples are appended at the back and leave from the front, either when the
 * cap is exceeded or when `prune` finds them older than the window. A sample
 * older than the newest retained one is clamped forward so the sequence stays
 * sorted even when callers pass slightly skewed clocks.
 */
export class SlidingWindowCounter {
  private readonly samples: number[] = [];
  private readonly maxSamples: number;
  private readonly windowMs: number;

  constructor(options: SlidingWindowOptions) {
    if (!Number.isInteger(options.maxSamples) || options.maxSamples <= 0) {
      throw new Error('maxSamples must be a positive integer');
    }
    if (!(options.windowMs > 0)) {
      throw new Error('windowMs must be positive');
    }
    this.maxSamples = options.maxSamples;
    this.windowMs = options.windowMs;
  }

  record(now = Date.now()) {
    const last = this.samples[this.samples.length - 1];
    this.samples.push(last !== undefined && now < last ? last : now);
    if (this.samples.length > this.maxSamples) {
      this.samples.splice(0, this.samples.length - this.maxSamples);
    }
  }

  /** Drops samples older than the window; returns how many were removed. */
  prune(now = Date.now()): number {
    const cutoff = now - this.windowMs;
    let index = 0;
    while (index < this.samples.length && this.samples[index] < cutoff) {
      index += 1;
    }
    if (index > 0) {
      this.samples.splice(0, index);
    }
    return index;
  }

  count(): number {
    return this.samples.length;
  }

  oldest(): number | null {
    return this.samples[0] ?? null;
  }

  values(): number[] {
    return [...this.samples];
  }

  get window(): number {
    return this.windowMs;
  }

  get capacity(): number {
    return this.maxSamples;
  }
}
