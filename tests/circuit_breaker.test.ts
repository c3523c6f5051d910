import { describe, expect, it } from 'vitest';
import { BreakerTimeoutError, CircuitBreaker } from '../src/detection/circuitBreaker.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import { ManualClock, createLogger, deferred } from './helpers/fakes.js';

function createBreaker(clock: ManualClock, overrides: { failureThreshold?: number; windowMs?: number; timeoutMs?: number } = {}) {
  const metrics = new MetricsRegistry();
  const logger = createLogger();
  const breaker = new CircuitBreaker({
    name: 'model-anomaly',
    failureThreshold: overrides.failureThreshold ?? 3,
    windowMs: overrides.windowMs ?? 60_000,
    cooldownMs: 60_000,
    timeoutMs: overrides.timeoutMs,
    now: clock.now,
    logger,
    metrics
  });
  return { breaker, metrics, logger };
}

const failing = () => Promise.reject(new Error('model unavailable'));

describe('CircuitBreaker', () => {
  it('BreakerOpensAtThreshold skips guarded calls while cooling down', async () => {
    const clock = new ManualClock(0);
    const { breaker, metrics, logger } = createBreaker(clock);

    for (let i = 0; i < 3; i += 1) {
      const result = await breaker.execute(failing);
      expect(result.outcome).toBe('failed');
    }

    expect(breaker.status()).toBe('OPEN');
    expect(breaker.state()).toMatchObject({ isOpen: true, failureCount: 3, lastError: 'model unavailable' });

    let invoked = false;
    const skipped = await breaker.execute(async () => {
      invoked = true;
      return 'value';
    });
    expect(skipped).toEqual({ outcome: 'skipped', retryInMs: 60_000 });
    expect(invoked).toBe(false);

    const snapshot = metrics.snapshot();
    expect(snapshot.breaker.skipped).toBe(1);
    expect(snapshot.breaker.transitions).toBe(2);
    expect(snapshot.breaker.last).toMatchObject({ from: 'DEGRADED', to: 'OPEN' });
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ detector: 'model-anomaly', from: 'DEGRADED', to: 'OPEN' }),
      'Circuit breaker opened'
    );
  });

  it('BreakerHalfOpenProbe closes the circuit after a successful probe', async () => {
    const clock = new ManualClock(0);
    const { breaker } = createBreaker(clock);
    for (let i = 0; i < 3; i += 1) {
      await breaker.execute(failing);
    }

    clock.advance(60_000);
    const result = await breaker.execute(async () => 'recovered');

    expect(result).toEqual({ outcome: 'ok', value: 'recovered' });
    expect(breaker.status()).toBe('CLOSED');
    expect(breaker.state().failureCount).toBe(0);
  });

  it('BreakerHalfOpenProbe reopens with a fresh cool-down when the probe fails', async () => {
    const clock = new ManualClock(0);
    const { breaker } = createBreaker(clock);
    for (let i = 0; i < 3; i += 1) {
      await breaker.execute(failing);
    }

    clock.advance(60_000);
    const probe = await breaker.execute(failing);
    expect(probe.outcome).toBe('failed');
    expect(breaker.status()).toBe('OPEN');

    const next = await breaker.execute(async () => 'unused');
    expect(next).toEqual({ outcome: 'skipped', retryInMs: 60_000 });
  });

  it('BreakerHalfOpenProbe admits a single probe at a time', async () => {
    const clock = new ManualClock(0);
    const { breaker } = createBreaker(clock);
    for (let i = 0; i < 3; i += 1) {
      await breaker.execute(failing);
    }
    clock.advance(60_000);

    const gate = deferred<string>();
    const probe = breaker.execute(() => gate.promise);
    const concurrent = await breaker.execute(async () => 'second');
    expect(concurrent).toEqual({ outcome: 'skipped', retryInMs: 0 });

    gate.resolve('first');
    await expect(probe).resolves.toEqual({ outcome: 'ok', value: 'first' });
    expect(breaker.status()).toBe('CLOSED');
  });

  it('BreakerWindow forgets failures older than the window', async () => {
    const clock = new ManualClock(0);
    const { breaker } = createBreaker(clock, { windowMs: 1_000 });

    await breaker.execute(failing);
    clock.advance(500);
    await breaker.execute(failing);
    clock.advance(1_500);
    await breaker.execute(failing);

    expect(breaker.state()).toMatchObject({ isOpen: false, failureCount: 1 });
    expect(breaker.status()).toBe('DEGRADED');
  });

  it('BreakerTimeout aborts the guarded call and counts it as a failure', async () => {
    const clock = new ManualClock(0);
    const { breaker } = createBreaker(clock, { timeoutMs: 10 });
    let aborted = false;

    const result = await breaker.execute(
      signal =>
        new Promise<string>(resolve => {
          signal.addEventListener('abort', () => {
            aborted = true;
            resolve('late');
          });
        })
    );

    expect(result.outcome).toBe('failed');
    if (result.outcome === 'failed') {
      expect(result.error).toBeInstanceOf(BreakerTimeoutError);
      expect(result.error.message).toBe('model-anomaly timed out after 10ms');
    }
    expect(aborted).toBe(true);
    expect(breaker.state().failureCount).toBe(1);
  });

  it('BreakerReset closes an open circuit and records the transition', async () => {
    const clock = new ManualClock(0);
    const { breaker, metrics } = createBreaker(clock);
    for (let i = 0; i < 3; i += 1) {
      await breaker.execute(failing);
    }

    breaker.reset();

    expect(breaker.status()).toBe('CLOSED');
    expect(metrics.snapshot().breaker.last).toMatchObject({ from: 'OPEN', to: 'CLOSED', reason: 'manual reset' });
  });

  it('rejects a non-positive failure threshold', () => {
    expect(
      () => new CircuitBreaker({ name: 'x', failureThreshold: 0, windowMs: 1, cooldownMs: 1, logger: createLogger() })
    ).toThrow('failureThreshold must be a positive integer');
  });
});
