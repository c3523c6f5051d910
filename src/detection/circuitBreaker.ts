import loggerModule, { type Logger } from '../logger.js';
import metricsModule, { MetricsRegistry } from '../metrics/index.js';
import type { BreakerStatus } from '../types.js';

export interface CircuitBreakerOptions {
  name: string;
  failureThreshold: number;
  windowMs: number;
  cooldownMs: number;
  timeoutMs?: number;
  now?: () => number;
  logger?: Logger;
  metrics?: MetricsRegistry;
}

export interface CircuitBreakerState {
  isOpen: boolean;
  failureCount: number;
  lastFailureTime: number;
  lastError: string;
}

export type BreakerOutcome<T> =
  | { outcome: 'ok'; value: T }
  | { outcome: 'failed'; error: Error }
  | { outcome: 'skipped'; retryInMs: number };

export class BreakerTimeoutError extends Error {
  constructor(name: string, timeoutMs: number) {
    super(`${name} timed out after ${timeoutMs}ms`);
    this.name = 'BreakerTimeoutError';
  }
}

export function describeBreakerState(state: Pick<CircuitBreakerState, 'isOpen' | 'failureCount'>): BreakerStatus {
  if (state.isOpen) {
    return 'OPEN';
  }
  return state.failureCount > 0 ? 'DEGRADED' : 'CLOSED';
}

export class CircuitBreaker {
  readonly name: string;
  private readonly failureThreshold: number;
  private readonly windowMs: number;
  private readonly cooldownMs: number;
  private readonly timeoutMs: number | null;
  private readonly now: () => number;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private isOpen = false;
  private failureTimes: number[] = [];
  private lastFailureTime = 0;
  private lastError = '';
  private probeInFlight = false;

  constructor(options: CircuitBreakerOptions) {
    if (!Number.isInteger(options.failureThreshold) || options.failureThreshold <= 0) {
      throw new Error('failureThreshold must be a positive integer');
    }
    this.name = options.name;
    this.failureThreshold = options.failureThreshold;
    this.windowMs = options.windowMs;
    this.cooldownMs = options.cooldownMs;
    this.timeoutMs = options.timeoutMs && options.timeoutMs > 0 ? options.timeoutMs : null;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? loggerModule;
    this.metrics = options.metrics ?? metricsModule;
  }

  state(): CircuitBreakerState {
    return {
      isOpen: this.isOpen,
      failureCount: this.failureTimes.length,
      lastFailureTime: this.lastFailureTime,
      lastError: this.lastError
    };
  }

  status(): BreakerStatus {
    return describeBreakerState(this.state());
  }

  /**
   * Runs `fn` unless the circuit is open and cooling down. Never throws: the
   * guarded call's failure is returned as an outcome.
   */
  async execute<T>(fn: (signal: AbortSignal) => Promise<T>): Promise<BreakerOutcome<T>> {
    const admission = this.admit();
    if (admission !== null) {
      this.metrics.recordBreakerSkip();
      return { outcome: 'skipped', retryInMs: admission };
    }

    const probing = this.isOpen;
    if (probing) {
      this.probeInFlight = true;
    }

    try {
      const value = await this.invoke(fn);
      this.onSuccess();
      return { outcome: 'ok', value };
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.onFailure(err);
      return { outcome: 'failed', error: err };
    } finally {
      if (probing) {
        this.probeInFlight = false;
      }
    }
  }

  reset() {
    const previous = this.status();
    this.isOpen = false;
    this.failureTimes = [];
    this.lastError = '';
    this.probeInFlight = false;
    this.transition(previous, 'manual reset');
  }

  // null admits the call; a number is the remaining cool-down.
  private admit(): number | null {
    if (!this.isOpen) {
      return null;
    }
    const remaining = this.lastFailureTime + this.cooldownMs - this.now();
    if (remaining > 0) {
      return remaining;
    }
    return this.probeInFlight ? 0 : null;
  }

  private async invoke<T>(fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const controller = new AbortController();
    const timeoutMs = this.timeoutMs;
    if (timeoutMs === null) {
      return fn(controller.signal);
    }

    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => {
        const error = new BreakerTimeoutError(this.name, timeoutMs);
        controller.abort(error);
        reject(error);
      }, timeoutMs);

      Promise.resolve()
        .then(() => fn(controller.signal))
        .then(
          value => {
            clearTimeout(timer);
            resolve(value);
          },
          (error: unknown) => {
            clearTimeout(timer);
            reject(error);
          }
        );
    });
  }

  private onSuccess() {
    if (!this.isOpen && this.failureTimes.length === 0) {
      return;
    }
    const previous = this.status();
    this.isOpen = false;
    this.failureTimes = [];
    this.transition(previous, 'success');
  }

  private onFailure(error: Error) {
    const previous = this.status();
    const now = this.now();
    this.lastFailureTime = now;
    this.lastError = error.message;

    const cutoff = now - this.windowMs;
    this.failureTimes = this.failureTimes.filter(ts => ts >= cutoff);
    this.failureTimes.push(now);

    if (!this.isOpen && this.failureTimes.length >= this.failureThreshold) {
      this.isOpen = true;
    }

    this.logger.warn(
      {
        err: error,
        detector: this.name,
        failureCount: this.failureTimes.length,
        threshold: this.failureThreshold
      },
      previous === 'OPEN' ? 'Half-open probe failed' : 'Guarded call failed'
    );
    this.transition(previous, error.message);
  }

  private transition(previous: BreakerStatus, reason: string) {
    const next = this.status();
    if (next === previous) {
      return;
    }
    this.metrics.recordBreakerTransition(this.name, previous, next, reason);
    const meta = { detector: this.name, from: previous, to: next, reason };
    if (next === 'OPEN') {
      this.logger.error(meta, 'Circuit breaker opened');
    } else {
      this.logger.info(meta, 'Circuit breaker state changed');
    }
  }
}
