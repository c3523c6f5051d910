import loggerModule, { type Logger } from '../logger.js';
import metricsModule, { MetricsRegistry } from '../metrics/index.js';
import type { OutboundMessage } from '../types.js';

export interface Observer {
  readonly id: string;
  send(payload: string): void | Promise<void>;
  close?(): void;
}

export type BroadcastResult = {
  delivered: number;
  dropped: number;
  skipped: boolean;
};

export interface BroadcasterOptions {
  /** A `send` still pending after this long counts as a failed delivery. */
  deliveryTimeoutMs?: number;
  logger?: Logger;
  metrics?: MetricsRegistry;
}

const SKIPPED: BroadcastResult = { delivered: 0, dropped: 0, skipped: true };
const DEFAULT_DELIVERY_TIMEOUT_MS = 5_000;

export class DeliveryTimeoutError extends Error {
  constructor(observerId: string, timeoutMs: number) {
    super(`Delivery to ${observerId} timed out after ${timeoutMs}ms`);
    this.name = 'DeliveryTimeoutError';
  }
}

export class Broadcaster {
  private readonly observers = new Map<string, Observer>();
  private readonly deliveryTimeoutMs: number;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;

  constructor(options: BroadcasterOptions = {}) {
    this.deliveryTimeoutMs = Math.max(1, options.deliveryTimeoutMs ?? DEFAULT_DELIVERY_TIMEOUT_MS);
    this.logger = options.logger ?? loggerModule;
    this.metrics = options.metrics ?? metricsModule;
  }

  get observerCount(): number {
    return this.observers.size;
  }

  connect(observer: Observer): boolean {
    if (this.observers.has(observer.id)) {
      return false;
    }
    this.observers.set(observer.id, observer);
    this.logger.debug({ observer: observer.id, observers: this.observers.size }, 'Observer connected');
    return true;
  }

  disconnect(id: string): boolean {
    const observer = this.observers.get(id);
    if (!observer) {
      return false;
    }
    this.observers.delete(id);
    this.closeObserver(observer);
    return true;
  }

  /**
   * Delivers `message` to every observer connected when the call starts.
   * Observers whose delivery fails are removed; the others stay. Never rejects.
   */
  async broadcast(message: OutboundMessage): Promise<BroadcastResult> {
    if (this.observers.size === 0) {
      return SKIPPED;
    }

    let payload: string;
    try {
      payload = JSON.stringify(message);
    } catch (error) {
      this.metrics.recordSerializationFailure();
      this.logger.error({ err: error, type: message.type }, 'Failed to serialize broadcast message');
      return SKIPPED;
    }

    const recipients = Array.from(this.observers.values());
    const results = await Promise.allSettled(recipients.map(observer => this.deliver(observer, payload)));

    let delivered = 0;
    let dropped = 0;
    results.forEach((result, index) => {
      const observer = recipients[index];
      if (result.status === 'fulfilled') {
        delivered += 1;
        return;
      }
      dropped += 1;
      this.logger.warn({ err: result.reason, observer: observer.id }, 'Dropping observer after failed delivery');
      // A reconnect under the same id during delivery keeps the new observer.
      if (this.observers.get(observer.id) === observer) {
        this.observers.delete(observer.id);
        this.closeObserver(observer);
      }
    });

    this.metrics.recordBroadcast(message.type, delivered, dropped);
    return { delivered, dropped, skipped: false };
  }

  closeAll() {
    const observers = Array.from(this.observers.values());
    this.observers.clear();
    for (const observer of observers) {
      this.closeObserver(observer);
    }
  }

  private deliver(observer: Observer, payload: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new DeliveryTimeoutError(observer.id, this.deliveryTimeoutMs));
      }, this.deliveryTimeoutMs);
      timer.unref();

      Promise.resolve()
        .then(() => observer.send(payload))
        .then(
          () => {
            clearTimeout(timer);
            resolve();
          },
          (error: unknown) => {
            clearTimeout(timer);
            reject(error);
          }
        );
    });
  }

  private closeObserver(observer: Observer) {
    try {
      observer.close?.();
    } catch (error) {
      this.logger.warn({ err: error, observer: observer.id }, 'Observer close failed');
    }
  }
}
