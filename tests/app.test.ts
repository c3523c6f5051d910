import { afterEach, describe, expect, it } from 'vitest';
import {
  aggregateHealth,
  registerContextHealthIndicators,
  registerHealthIndicator,
  registerShutdownHook,
  resetAppLifecycle,
  runShutdownHooks
} from '../src/app.js';
import type { SecurityContext } from '../src/context.js';
import { createTestContext } from './helpers/context.js';

const service = { status: 'running', startedAt: 0 };

describe('AppLifecycle', () => {
  const contexts: SecurityContext[] = [];

  function setup() {
    const { context } = createTestContext();
    contexts.push(context);
    registerContextHealthIndicators(context);
    return context;
  }

  afterEach(async () => {
    resetAppLifecycle();
    for (const context of contexts.splice(0)) {
      await context.close();
    }
  });

  it('HealthAggregation reports ok once every indicator is healthy', async () => {
    const context = setup();
    context.start();

    const report = await aggregateHealth({ service, metrics: context.metrics.snapshot() });

    expect(report.status).toBe('ok');
    expect(report.checks.map(check => [check.name, check.status])).toEqual([
      ['circuit-breaker', 'ok'],
      ['monitors', 'ok'],
      ['incident-store', 'ok'],
      ['broadcast', 'ok']
    ]);
  });

  it('HealthAggregation degrades when the breaker is open or the metrics task is idle', async () => {
    const context = setup();
    for (let i = 0; i < 5; i += 1) {
      await context.breaker.execute(() => Promise.reject(new Error('model down')));
    }

    const report = await aggregateHealth({ service, metrics: context.metrics.snapshot() });

    expect(report.status).toBe('degraded');
    expect(report.checks.find(check => check.name === 'circuit-breaker')).toEqual({
      name: 'circuit-breaker',
      status: 'degraded',
      details: { breaker: 'OPEN', failureCount: 5, lastError: 'model down' }
    });
    expect(report.checks.find(check => check.name === 'broadcast')?.status).toBe('degraded');
  });

  it('HealthAggregation reports stopping while shutting down and survives a throwing indicator', async () => {
    registerHealthIndicator('flaky', () => {
      throw new Error('probe crashed');
    });

    const report = await aggregateHealth({ service: { status: 'stopping', startedAt: 0 } });

    expect(report).toEqual({
      status: 'stopping',
      checks: [{ name: 'flaky', status: 'degraded', details: { error: 'probe crashed' } }]
    });
  });

  it('ShutdownHooks run in reverse registration order and collect failures', async () => {
    const order: string[] = [];
    registerShutdownHook('context', () => {
      order.push('context');
    });
    registerShutdownHook('http', async () => {
      order.push('http');
      throw new Error('socket busy');
    });

    const results = await runShutdownHooks({ reason: 'test' });

    expect(order).toEqual(['http', 'context']);
    expect(results.map(result => [result.name, result.status])).toEqual([
      ['http', 'error'],
      ['context', 'ok']
    ]);
    expect(results[0].error?.message).toBe('socket busy');
  });
});
