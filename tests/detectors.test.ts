import { describe, expect, it, vi } from 'vitest';
import {
  BruteForceDetector,
  CardTestingDetector,
  ModelAnomalyDetector,
  PaymentAnomalyDetector,
  SqlInjectionDetector,
  ThreatIntelDetector,
  XssDetector,
  createDefaultStages
} from '../src/detection/detectors/index.js';
import { parseVerdict } from '../src/detection/detectors/modelAnomaly.js';
import type { SecurityEvent } from '../src/types.js';
import { createTestConfig } from './helpers/fakes.js';

function event(eventType: string, payload: Record<string, unknown> = {}, extra: Partial<SecurityEvent> = {}): SecurityEvent {
  return { eventType, payload, sourceIp: '10.0.0.5', ...extra };
}

describe('SignatureDetectors', () => {
  it('SqlInjection reports the matched pattern labels', () => {
    const detection = new SqlInjectionDetector().classify(event('search', { query: "' OR 1=1--" }));
    expect(detection).toMatchObject({
      attackType: 'SQL_INJECTION',
      severity: 'HIGH',
      evidence: { patterns: ['tautology'], sample: "' OR 1=1--" }
    });
  });

  it('SqlInjection searches nested payload values', () => {
    const detection = new SqlInjectionDetector().classify(
      event('search', { filters: [{ value: '1 UNION SELECT password FROM users' }] })
    );
    expect(detection?.evidence.patterns).toEqual(['union-select']);
  });

  it('SqlInjection ignores ordinary text', () => {
    expect(new SqlInjectionDetector().classify(event('search', { query: "O'Brien's order" }))).toBeNull();
  });

  it('Xss flags script tags and event handlers', () => {
    const detector = new XssDetector();
    expect(detector.classify(event('comment', { body: '<script>alert(1)</script>' }))?.evidence.patterns).toEqual([
      'script-tag'
    ]);
    expect(detector.classify(event('comment', { body: '<img src=x onerror=alert(1)>' }))?.evidence.patterns).toEqual([
      'event-handler'
    ]);
    expect(detector.classify(event('comment', { body: 'hello there' }))).toBeNull();
  });

  it('ThreatIntel marks blocklisted sources CRITICAL', () => {
    const detector = new ThreatIntelDetector([' 203.0.113.9 ', '']);
    expect(detector.size).toBe(1);
    expect(detector.classify(event('login', {}, { sourceIp: '203.0.113.9' }))).toMatchObject({
      attackType: 'KNOWN_MALICIOUS_IP',
      severity: 'CRITICAL'
    });
    expect(detector.classify(event('login'))).toBeNull();
  });
});

describe('BehaviouralDetectors', () => {
  it('BruteForce escalates from HIGH to CRITICAL per user', () => {
    const detector = new BruteForceDetector({ windowMs: 60_000, highThreshold: 3, criticalThreshold: 5, now: () => 0 });
    const attempt = event('login_failed', {}, { userId: 'alice' });
    const severities = Array.from({ length: 5 }, () => detector.classify(attempt)?.severity ?? null);

    expect(severities).toEqual([null, null, 'HIGH', 'HIGH', 'CRITICAL']);
    expect(detector.classify(attempt)?.evidence).toEqual({ key: 'user:alice', attempts: 6 });
    expect(detector.classify(event('login_succeeded', {}, { userId: 'alice' }))).toBeNull();
  });

  it('BruteForce keys anonymous attempts by source IP and forgets old attempts', () => {
    let now = 0;
    const detector = new BruteForceDetector({ windowMs: 1_000, highThreshold: 2, criticalThreshold: 4, now: () => now });
    expect(detector.classify(event('failed_login'))).toBeNull();
    now = 5_000;
    expect(detector.classify(event('failed_login'))).toBeNull();
    expect(detector.classify(event('failed_login'))?.evidence).toEqual({ key: 'ip:10.0.0.5', attempts: 2 });
  });

  it('CardTesting flags repeated payment failures from one source', () => {
    const detector = new CardTestingDetector({ windowMs: 60_000, failureThreshold: 3, now: () => 0 });
    const failure = event('payment_failure', { reason: 'card_declined' });

    expect(detector.classify(failure)).toBeNull();
    expect(detector.classify(failure)).toBeNull();
    expect(detector.classify(failure)).toMatchObject({
      attackType: 'CARD_TESTING',
      severity: 'CRITICAL',
      evidence: { failures: 3, threshold: 3, reason: 'card_declined' }
    });
    expect(detector.classify({ ...failure, sourceIp: '10.0.0.9' })).toBeNull();
  });

  it('CardTesting honours thresholds above the default window size', () => {
    const detector = new CardTestingDetector({ windowMs: 60_000, failureThreshold: 25, now: () => 0 });
    const failure = event('payment_failure', { reason: 'card_declined' });

    for (let i = 0; i < 24; i += 1) {
      expect(detector.classify(failure)).toBeNull();
    }
    expect(detector.classify(failure)).toMatchObject({
      severity: 'CRITICAL',
      evidence: { failures: 25, threshold: 25 }
    });
  });

  it('CardTesting treats a reported card testing event as CRITICAL', () => {
    const detector = new CardTestingDetector({ windowMs: 60_000, failureThreshold: 3 });
    expect(detector.classify(event('simulated_card_testing', { card_bin: '411111' }))).toMatchObject({
      severity: 'CRITICAL',
      evidence: { cardBin: '411111' }
    });
  });

  it('PaymentAnomaly flags amounts above the threshold', () => {
    const detector = new PaymentAnomalyDetector(1_000);
    expect(detector.classify(event('payment_attempt', { amount: '1850.00', currency: 'USD' }))).toMatchObject({
      attackType: 'PAYMENT_ANOMALY',
      severity: 'MEDIUM',
      evidence: { amount: 1850, currency: 'USD' }
    });
    expect(detector.classify(event('payment_attempt', { amount: 1_000 }))).toBeNull();
    expect(detector.classify(event('payment_attempt', { amount: 'n/a' }))).toBeNull();
    expect(detector.classify(event('refund', { amount: 5_000 }))).toBeNull();
  });
});

describe('ModelAnomalyDetector', () => {
  it('stays inert without an endpoint', async () => {
    const fetchImpl = vi.fn<typeof fetch>();
    const detector = new ModelAnomalyDetector({ endpoint: '  ', fetchImpl });
    expect(detector.enabled).toBe(false);
    await expect(detector.classify(event('login'))).resolves.toBeNull();
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('turns a positive verdict into a detection', async () => {
    const reply = JSON.stringify({
      response: 'Verdict: {"anomaly": true, "attack_type": "credential stuffing", "severity": "HIGH", "reason": "burst"}'
    });
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response(reply, { status: 200 }));
    const detector = new ModelAnomalyDetector({ endpoint: 'http://model.test/', model: 'test-model', fetchImpl });

    const detection = await detector.classify(event('login'));

    expect(detection).toEqual({
      attackType: 'CREDENTIAL_STUFFING',
      severity: 'HIGH',
      description: 'burst',
      evidence: { model: 'test-model' }
    });
    expect(fetchImpl).toHaveBeenCalledWith('http://model.test/api/generate', expect.objectContaining({ method: 'POST' }));
  });

  it('returns null for a negative verdict and throws on an error status', async () => {
    const negative = new ModelAnomalyDetector({
      endpoint: 'http://model.test',
      fetchImpl: async () => new Response(JSON.stringify({ response: '{"anomaly": false}' }))
    });
    await expect(negative.classify(event('login'))).resolves.toBeNull();

    const failing = new ModelAnomalyDetector({
      endpoint: 'http://model.test',
      fetchImpl: async () => new Response('overloaded', { status: 503 })
    });
    await expect(failing.classify(event('login'))).rejects.toThrow('model endpoint returned 503');
  });

  it('parseVerdict rejects replies without a JSON object', () => {
    expect(() => parseVerdict('no idea')).toThrow('model reply contained no JSON object');
    expect(parseVerdict('{"anomaly": true}')).toEqual({ anomaly: true });
  });
});

describe('createDefaultStages', () => {
  it('orders the configured stages with the model stage last', () => {
    const stages = createDefaultStages(createTestConfig().detection);
    expect(stages.map(stage => stage.name)).toEqual([
      'threat-intel',
      'sql-injection',
      'xss',
      'brute-force',
      'card-testing',
      'payment-anomaly',
      'model-anomaly'
    ]);
    expect(stages.filter(stage => stage.expensive).map(stage => stage.name)).toEqual(['model-anomaly']);
  });
});
