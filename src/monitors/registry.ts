import loggerModule, { type Logger } from '../logger.js';
import metricsModule, { MetricsRegistry } from '../metrics/index.js';
import { sleep, type TaskHandle, type TaskSupervisor } from '../tasks/supervisor.js';
import type { HealthRecord, MonitorConfig } from '../types.js';

export const MIN_MONITOR_INTERVAL_MS = 30_000;
const DEFAULT_INTERVAL_MS = 300_000;
const DEFAULT_HISTORY_LIMIT = 100;

export class InvalidMonitorTargetError extends Error {
  readonly target: string;

  constructor(target: string) {
    super(`Invalid monitor target "${target}": expected an http(s) URL with a host`);
    this.name = 'InvalidMonitorTargetError';
    this.target = target;
  }
}

export type MonitorTarget = {
  targetId: string;
  url: string;
  expectedKeywords: string[];
};

export interface MonitorBackend {
  check(target: MonitorTarget, signal: AbortSignal): Promise<HealthRecord>;
}

export type MonitorStartOptions = {
  intervalMs?: number;
  expectedKeywords?: string[];
};

export type MonitorStartResult =
  | { status: 'started'; targetId: string; intervalMs: number }
  | { status: 'already_monitoring'; targetId: string };

export type MonitorStopResult = { status: 'stopped'; targetId: string } | { status: 'not_found'; targetId: string };

export type MonitorSummary = {
  targetId: string;
  config: MonitorConfig;
  latest: HealthRecord | null;
};

type MonitorRegistration = {
  targetId: string;
  config: MonitorConfig;
  handle: TaskHandle;
  history: HealthRecord[];
  // Set once cancelled; the entry stays until the loop has returned.
  stopping: Promise<void> | null;
};

export interface MonitorRegistryOptions {
  backend: MonitorBackend;
  supervisor: TaskSupervisor;
  onHealth: (record: HealthRecord) => void | Promise<void>;
  minIntervalMs?: number;
  defaultIntervalMs?: number;
  historyLimit?: number;
  logger?: Logger;
  metrics?: MetricsRegistry;
}

const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;
const LOCAL_HOST_PATTERN = /^(localhost|127\.0\.0\.1|\[::1\])(:\d+)?$/i;
const IPV4_HOST_PATTERN = /^\d{1,3}(\.\d{1,3}){3}(:\d+)?$/;

/**
 * Canonical form of a monitor target. Bare hosts get `http://` when they are
 * local or IPv4 literals (unless on port 443) and `https://` otherwise.
 */
export function normalizeTargetUrl(target: string): string {
  const trimmed = target.trim();
  let candidate = trimmed;
  if (!SCHEME_PATTERN.test(trimmed)) {
    const host = trimmed.split(/[/?#]/, 1)[0] ?? '';
    const local = LOCAL_HOST_PATTERN.test(host) || IPV4_HOST_PATTERN.test(host);
    candidate = `${local && !host.endsWith(':443') ? 'http' : 'https'}://${trimmed}`;
  }

  let url: URL;
  try {
    url = new URL(candidate);
  } catch {
    throw new InvalidMonitorTargetError(target);
  }
  if ((url.protocol !== 'http:' && url.protocol !== 'https:') || !url.hostname) {
    throw new InvalidMonitorTargetError(target);
  }
  return url.href;
}

export class MonitorRegistry {
  private readonly registrations = new Map<string, MonitorRegistration>();
  private readonly backend: MonitorBackend;
  private readonly supervisor: TaskSupervisor;
  private readonly onHealth: MonitorRegistryOptions['onHealth'];
  private readonly minIntervalMs: number;
  private readonly defaultIntervalMs: number;
  private readonly historyLimit: number;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;

  constructor(options: MonitorRegistryOptions) {
    this.backend = options.backend;
    this.supervisor = options.supervisor;
    this.onHealth = options.onHealth;
    this.minIntervalMs = Math.max(1, options.minIntervalMs ?? MIN_MONITOR_INTERVAL_MS);
    this.defaultIntervalMs = Math.max(this.minIntervalMs, options.defaultIntervalMs ?? DEFAULT_INTERVAL_MS);
    this.historyLimit = Math.max(1, Math.floor(options.historyLimit ?? DEFAULT_HISTORY_LIMIT));
    this.logger = options.logger ?? loggerModule;
    this.metrics = options.metrics ?? metricsModule;
  }

  /** Live loops, including ones still winding down after a stop. */
  get size(): number {
    return this.registrations.size;
  }

  start(target: string, options: MonitorStartOptions = {}): MonitorStartResult {
    const targetId = normalizeTargetUrl(target);
    if (this.registrations.has(targetId)) {
      return { status: 'already_monitoring', targetId };
    }

    const requested = options.intervalMs ?? this.defaultIntervalMs;
    const config: MonitorConfig = {
      url: targetId,
      intervalMs: Math.max(this.minIntervalMs, Math.floor(requested)),
      expectedKeywords: (options.expectedKeywords ?? []).filter(keyword => keyword.length > 0)
    };
    const history: HealthRecord[] = [];
    const handle = this.supervisor.spawn(`monitor:${targetId}`, signal =>
      this.runLoop(targetId, config, history, signal)
    );
    this.registrations.set(targetId, { targetId, config, handle, history, stopping: null });
    this.logger.info({ target: targetId, intervalMs: config.intervalMs }, 'Monitoring started');
    return { status: 'started', targetId, intervalMs: config.intervalMs };
  }

  /**
   * Cancels the target's loop and resolves once the loop has returned. Until
   * then the target still counts as monitored, so a restart is refused.
   */
  async stop(target: string): Promise<MonitorStopResult> {
    const targetId = this.resolveTargetId(target);
    const registration = this.registrations.get(targetId);
    if (!registration) {
      return { status: 'not_found', targetId };
    }
    await this.release(registration, `monitor ${targetId} stopped`);
    return { status: 'stopped', targetId };
  }

  async stopAll(): Promise<number> {
    const registrations = Array.from(this.registrations.values());
    await Promise.all(registrations.map(registration => this.release(registration, 'monitors shutting down')));
    return registrations.length;
  }

  list(): MonitorSummary[] {
    const active = Array.from(this.registrations.values()).filter(registration => registration.stopping === null);
    return active.map(registration => ({
      targetId: registration.targetId,
      config: { ...registration.config, expectedKeywords: [...registration.config.expectedKeywords] },
      latest: registration.history[registration.history.length - 1] ?? null
    }));
  }

  history(target: string): HealthRecord[] {
    const registration = this.registrations.get(this.resolveTargetId(target));
    return registration ? [...registration.history] : [];
  }

  private release(registration: MonitorRegistration, reason: string): Promise<void> {
    if (registration.stopping) {
      return registration.stopping;
    }
    const { targetId, handle } = registration;
    handle.cancel(reason);
    registration.stopping = handle.done.then(() => {
      if (this.registrations.get(targetId) === registration) {
        this.registrations.delete(targetId);
      }
      this.logger.info({ target: targetId }, 'Monitoring stopped');
    });
    return registration.stopping;
  }

  private resolveTargetId(target: string): string {
    try {
      return normalizeTargetUrl(target);
    } catch (error) {
      if (error instanceof InvalidMonitorTargetError) {
        return target;
      }
      throw error;
    }
  }

  private async runLoop(targetId: string, config: MonitorConfig, history: HealthRecord[], signal: AbortSignal) {
    const target: MonitorTarget = { targetId, url: config.url, expectedKeywords: config.expectedKeywords };
    while (!signal.aborted) {
      await this.checkOnce(target, history, signal);
      const elapsed = await sleep(config.intervalMs, signal);
      if (!elapsed) {
        return;
      }
    }
  }

  private async checkOnce(target: MonitorTarget, history: HealthRecord[], signal: AbortSignal) {
    let record: HealthRecord;
    try {
      record = await this.backend.check(target, signal);
    } catch (error) {
      if (signal.aborted) {
        return;
      }
      this.metrics.recordMonitorFailure();
      this.logger.warn({ err: error, target: target.targetId }, 'Health check failed');
      return;
    }

    // Stopped while the check was in flight.
    if (signal.aborted) {
      return;
    }

    history.push(record);
    if (history.length > this.historyLimit) {
      history.splice(0, history.length - this.historyLimit);
    }
    this.metrics.recordMonitorCheck(record.status, record.responseTimeMs);

    try {
      await this.onHealth(record);
    } catch (error) {
      this.logger.error({ err: error, target: target.targetId }, 'Health record handler failed');
    }
  }
}
