import loggerModule, { type Logger } from '../logger.js';
import type { Broadcaster } from '../broadcast/broadcaster.js';
import type { SlidingWindowCounter } from '../metrics/slidingWindow.js';
import type { BreakerStatus, MetricsUpdate } from '../types.js';

export interface MetricsBroadcastTaskOptions {
  intervalMs: number;
  requests: SlidingWindowCounter;
  errors: SlidingWindowCounter;
  broadcaster: Broadcaster;
  breakerStatus: () => BreakerStatus;
  now?: () => number;
  logger?: Logger;
}

export class MetricsBroadcastTask {
  private readonly options: MetricsBroadcastTaskOptions;
  private readonly logger: Logger;
  private readonly now: () => number;
  private timer: NodeJS.Timeout | null = null;
  private stopped = false;

  constructor(options: MetricsBroadcastTaskOptions) {
    if (!(options.intervalMs > 0)) {
      throw new Error('intervalMs must be positive');
    }
    this.options = options;
    this.logger = options.logger ?? loggerModule;
    this.now = options.now ?? Date.now;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  start() {
    if (this.timer) {
      return;
    }
    this.stopped = false;
    this.scheduleNext();
  }

  /** Stops the cadence. Deliveries already handed to the broadcaster are not awaited. */
  stop() {
    this.stopped = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  /** Prunes both windows and hands the snapshot to the broadcaster. */
  runOnce(): MetricsUpdate {
    const now = this.now();
    const { requests, errors, broadcaster } = this.options;
    requests.prune(now);
    errors.prune(now);

    const update: MetricsUpdate = {
      requestsPerWindow: requests.count(),
      errorsPerWindow: errors.count(),
      activeObserverCount: broadcaster.observerCount,
      breakerStatus: this.options.breakerStatus(),
      windowMs: requests.window
    };

    void broadcaster.broadcast({ type: 'metrics_update', ...update });
    return update;
  }

  private scheduleNext() {
    if (this.stopped) {
      return;
    }
    this.timer = setTimeout(() => {
      this.timer = null;
      try {
        this.runOnce();
      } catch (error) {
        this.logger.error({ err: error }, 'Metrics broadcast failed');
      }
      this.scheduleNext();
    }, this.options.intervalMs);
    if (typeof this.timer.unref === 'function') {
      this.timer.unref();
    }
  }
}
