import { describe, expect, it, vi } from 'vitest';
import { HttpHealthBackend } from '../src/monitors/httpBackend.js';
import type { MonitorTarget } from '../src/monitors/registry.js';

const target: MonitorTarget = {
  targetId: 'https://shop.test/',
  url: 'https://shop.test/',
  expectedKeywords: []
};

function backend(fetchImpl: typeof fetch, overrides: { timeoutMs?: number; slowResponseMs?: number } = {}) {
  return new HttpHealthBackend({
    timeoutMs: overrides.timeoutMs ?? 15_000,
    slowResponseMs: overrides.slowResponseMs ?? 3_000,
    fetchImpl,
    now: () => 42
  });
}

describe('HttpHealthBackend', () => {
  it('reports a healthy site with its missing security headers', async () => {
    const fetchImpl = vi.fn<typeof fetch>(
      async () =>
        new Response('ok', {
          status: 200,
          headers: { 'X-Frame-Options': 'DENY', 'Content-Security-Policy': "default-src 'self'" }
        })
    );

    const record = await backend(fetchImpl).check(target, new AbortController().signal);

    expect(record).toMatchObject({
      targetId: 'https://shop.test/',
      status: 'up',
      statusCode: 200,
      checkedAt: 42,
      errors: [],
      missingSecurityHeaders: ['strict-transport-security', 'x-content-type-options']
    });
    expect(fetchImpl).toHaveBeenCalledWith(
      'https://shop.test/',
      expect.objectContaining({ method: 'GET', redirect: 'follow' })
    );
  });

  it('maps server errors to down and client errors to degraded', async () => {
    const down = await backend(async () => new Response('', { status: 502 })).check(
      target,
      new AbortController().signal
    );
    expect(down).toMatchObject({ status: 'down', statusCode: 502, errors: ['HTTP 502'] });

    const degraded = await backend(async () => new Response('', { status: 404 })).check(
      target,
      new AbortController().signal
    );
    expect(degraded).toMatchObject({ status: 'degraded', statusCode: 404, errors: ['HTTP 404'] });
  });

  it('flags missing keywords and slow responses as degraded', async () => {
    const record = await backend(async () => new Response('<h1>Welcome</h1>'), { slowResponseMs: -1 }).check(
      { ...target, expectedKeywords: ['Welcome', 'Checkout', 'Cart'] },
      new AbortController().signal
    );

    expect(record.status).toBe('degraded');
    expect(record.errors).toHaveLength(2);
    expect(record.errors[0]).toMatch(/^slow response \(\d+ms\)$/);
    expect(record.errors[1]).toBe('missing keywords: Checkout, Cart');
  });

  it('reports a network failure as down', async () => {
    const record = await backend(async () => {
      throw new TypeError('fetch failed');
    }).check(target, new AbortController().signal);

    expect(record).toMatchObject({ status: 'down', statusCode: null, errors: ['fetch failed'] });
  });

  it('aborts a request that outlives the timeout', async () => {
    const hanging: typeof fetch = (_input, init) =>
      new Promise((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
      });

    const record = await backend(hanging, { timeoutMs: 10 }).check(target, new AbortController().signal);

    expect(record).toMatchObject({ status: 'down', statusCode: null, errors: ['timed out after 10ms'] });
  });

  it('rethrows when the monitor itself is cancelled', async () => {
    const parent = new AbortController();
    const hanging: typeof fetch = (_input, init) =>
      new Promise((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new Error('cancelled by monitor')));
      });

    const pending = backend(hanging).check(target, parent.signal);
    parent.abort(new Error('stop'));

    await expect(pending).rejects.toThrow('cancelled by monitor');
  });
});
