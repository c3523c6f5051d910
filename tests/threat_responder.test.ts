import { afterEach, describe, expect, it, vi } from 'vitest';
import type { SecurityContext } from '../src/context.js';
import type { DetectorStage } from '../src/detection/types.js';
import { SqlInjectionDetector } from '../src/detection/detectors/index.js';
import { WEBSITE_MONITOR_IP } from '../src/services/threatResponder.js';
import type { HealthRecord } from '../src/types.js';
import { TEST_NOW, createTestContext } from './helpers/context.js';

const contexts: SecurityContext[] = [];

function setup(options: Parameters<typeof createTestContext>[0] = {}) {
  const created = createTestContext(options);
  contexts.push(created.context);
  return created;
}

afterEach(async () => {
  for (const context of contexts.splice(0)) {
    await context.close();
  }
});

describe('ThreatResponder', () => {
  it('ResponderScenario detects, blocks and then rate-limits a source', async () => {
    const { context, metrics } = setup();
    const { responder, rateLimiter } = context;

    const first = await responder.submitEvent({
      eventType: 'simulated_sql_injection',
      payload: { query: "' OR 1=1--" },
      sourceIp: '10.0.0.5'
    });
    expect(first).toMatchObject({
      status: 'threat_detected',
      httpStatus: 200,
      details: {
        attackType: 'SQL_INJECTION',
        severity: 'HIGH',
        riskScore: 0.75,
        riskFactors: ['SQL_INJECTION (HIGH)'],
        ip: '10.0.0.5',
        eventType: 'simulated_sql_injection',
        userId: null,
        timestamp: '2024-05-01T12:00:00.000Z',
        city: 'Pending'
      }
    });
    expect(rateLimiter.shouldBlock('10.0.0.5')).toBe(false);

    const second = await responder.submitEvent({
      eventType: 'simulated_card_testing',
      payload: { card_bin: '411111' },
      sourceIp: '10.0.0.5'
    });
    expect(second).toMatchObject({
      status: 'rejected',
      httpStatus: 403,
      reason: 'high_risk',
      details: { attackType: 'CARD_TESTING', severity: 'CRITICAL', riskScore: 1 }
    });
    expect(rateLimiter.shouldBlock('10.0.0.5')).toBe(true);

    const third = await responder.submitEvent({ eventType: 'login', payload: {}, sourceIp: '10.0.0.5' });
    expect(third).toEqual({ status: 'rejected', httpStatus: 429, reason: 'rate_limited', retryAfterMs: 300_000 });

    expect(context.windowCounts()).toEqual({ requestsPerWindow: 3, errorsPerWindow: 2, windowMs: 3_600_000 });
    expect(metrics.snapshot().requests.byOutcome).toEqual({ threat_detected: 1, blocked: 1, rate_limited: 1 });
    expect(metrics.snapshot().rateLimit).toEqual({ blocks: 1, rejected: 1 });
  });

  it('returns no_threat for benign events without recording an incident', async () => {
    const { context, messages } = setup();

    const result = await context.responder.submitEvent({
      eventType: 'page_view',
      payload: { path: '/products' },
      sourceIp: '10.0.0.8'
    });

    expect(result).toEqual({ status: 'no_threat', httpStatus: 200 });
    expect(messages).toEqual([]);
    expect(context.store.list().total).toBe(0);
  });

  it('ResponderEnrichment updates the stored incident with its location', async () => {
    const { context, geolocator, messages } = setup();

    const result = await context.responder.submitEvent({
      eventType: 'comment',
      payload: { body: '<script>alert(1)</script>', email: 'alice@example.test' },
      sourceIp: '203.0.113.7'
    });
    if (result.status !== 'threat_detected') {
      throw new Error(`unexpected status ${result.status}`);
    }
    const incidentId = result.details.incidentId;

    await vi.waitFor(() => {
      expect(context.store.get(incidentId)?.city).toBe('Testville');
    });

    expect(geolocator.locate).toHaveBeenCalledWith('203.0.113.7', expect.any(AbortSignal));
    expect(messages.map(message => (message.type === 'attack_detected' ? message.update ?? false : null))).toEqual([
      false,
      true
    ]);
    const stored = context.store.get(incidentId);
    expect(stored).toMatchObject({ country: 'Testland', lat: 1.5, lon: 2.5, payload: { email: '[MASKED]' } });
    expect(context.store.list().total).toBe(1);
    expect(context.bus.attacks()[0].city).toBe('Testville');
  });

  it('ResponderBreaker keeps detecting after the model stage trips the circuit', async () => {
    const classify = vi.fn(async () => {
      throw new Error('model timeout');
    });
    const model: DetectorStage = { name: 'model-anomaly', expensive: true, classify };
    const { context } = setup({ stages: [new SqlInjectionDetector(), model] });

    for (let i = 0; i < 10; i += 1) {
      await context.responder.submitEvent({ eventType: 'login', payload: {}, sourceIp: `10.0.1.${i}` });
    }
    expect(context.breaker.status()).toBe('OPEN');
    expect(classify).toHaveBeenCalledTimes(5);

    const result = await context.responder.submitEvent({
      eventType: 'search',
      payload: { query: "' OR 1=1--" },
      sourceIp: '10.0.2.1'
    });

    expect(result.status).toBe('threat_detected');
    expect(classify).toHaveBeenCalledTimes(5);
  });

  it('ResponderHealth raises website incidents for unhealthy targets', () => {
    const { context, messages } = setup();
    const record: HealthRecord = {
      targetId: 'https://shop.test/',
      url: 'https://shop.test/',
      status: 'down',
      statusCode: 503,
      responseTimeMs: 30,
      checkedAt: TEST_NOW,
      errors: ['HTTP 503'],
      missingSecurityHeaders: []
    };

    const report = context.responder.handleHealth(record);

    expect(report).toMatchObject({
      attackType: 'WEBSITE_DOWN',
      severity: 'HIGH',
      riskScore: 0.75,
      ip: WEBSITE_MONITOR_IP,
      eventType: 'website_health_check',
      city: 'N/A',
      description: 'https://shop.test/ is down',
      evidence: { statusCode: 503, errors: ['HTTP 503'] }
    });
    expect(messages.map(message => message.type)).toEqual(['website_health', 'attack_detected']);
    expect(context.bus.websiteIncidents()).toHaveLength(1);
    expect(context.bus.attacks()).toHaveLength(0);
    expect(context.store.list({ category: 'website' }).total).toBe(1);

    const degraded = context.responder.handleHealth({ ...record, status: 'degraded', statusCode: 404 });
    expect(degraded).toMatchObject({ attackType: 'WEBSITE_DEGRADED', severity: 'MEDIUM', riskScore: 0.5 });

    expect(context.responder.handleHealth({ ...record, status: 'up', statusCode: 200 })).toBeNull();
    expect(context.bus.websiteIncidents()).toHaveLength(2);
  });

  it('feeds monitor results into the responder', async () => {
    const { context } = setup({ healthStatus: 'down' });

    context.monitors.start('shop.test');

    await vi.waitFor(() => {
      expect(context.bus.websiteIncidents()).toHaveLength(1);
    });
    expect(context.bus.websiteIncidents()[0].description).toBe('https://shop.test/ is down');
  });
});
