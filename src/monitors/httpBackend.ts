import { performance } from 'node:perf_hooks';
import type { HealthRecord, HealthStatus } from '../types.js';
import type { MonitorBackend, MonitorTarget } from './registry.js';

export interface HttpHealthBackendOptions {
  timeoutMs: number;
  slowResponseMs: number;
  fetchImpl?: typeof fetch;
  now?: () => number;
}

const SECURITY_HEADERS = [
  'strict-transport-security',
  'content-security-policy',
  'x-content-type-options',
  'x-frame-options'
];

export class HttpHealthBackend implements MonitorBackend {
  private readonly options: HttpHealthBackendOptions;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => number;

  constructor(options: HttpHealthBackendOptions) {
    this.options = options;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.now = options.now ?? Date.now;
  }

  async check(target: MonitorTarget, signal: AbortSignal): Promise<HealthRecord> {
    const controller = new AbortController();
    const onAbort = () => controller.abort(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    const timer = setTimeout(
      () => controller.abort(new Error(`timed out after ${this.options.timeoutMs}ms`)),
      this.options.timeoutMs
    );

    const started = performance.now();
    const base = { targetId: target.targetId, url: target.url, checkedAt: this.now() };
    try {
      const response = await this.fetchImpl(target.url, {
        method: 'GET',
        redirect: 'follow',
        signal: controller.signal
      });
      const body = target.expectedKeywords.length > 0 ? await response.text() : '';
      const responseTimeMs = Math.round(performance.now() - started);

      const errors: string[] = [];
      let status: HealthStatus = 'up';
      if (response.status >= 500) {
        status = 'down';
        errors.push(`HTTP ${response.status}`);
      } else if (response.status >= 400) {
        status = 'degraded';
        errors.push(`HTTP ${response.status}`);
      }
      if (responseTimeMs > this.options.slowResponseMs) {
        status = status === 'up' ? 'degraded' : status;
        errors.push(`slow response (${responseTimeMs}ms)`);
      }
      const missingKeywords = target.expectedKeywords.filter(keyword => !body.includes(keyword));
      if (missingKeywords.length > 0) {
        status = status === 'up' ? 'degraded' : status;
        errors.push(`missing keywords: ${missingKeywords.join(', ')}`);
      }

      return {
        ...base,
        status,
        statusCode: response.status,
        responseTimeMs,
        errors,
        missingSecurityHeaders: SECURITY_HEADERS.filter(header => !response.headers.has(header))
      };
    } catch (error) {
      if (signal.aborted) {
        throw error;
      }
      const reason: unknown = controller.signal.aborted ? controller.signal.reason : error;
      return {
        ...base,
        status: 'down',
        statusCode: null,
        responseTimeMs: Math.round(performance.now() - started),
        errors: [reason instanceof Error ? reason.message : String(reason)],
        missingSecurityHeaders: []
      };
    } finally {
      clearTimeout(timer);
      signal.removeEventListener('abort', onAbort);
    }
  }
}
