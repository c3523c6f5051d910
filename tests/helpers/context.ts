import { vi } from 'vitest';
import { SecurityContext, type SecurityContextOptions } from '../../src/context.js';
import { MetricsRegistry } from '../../src/metrics/index.js';
import type { MonitorTarget } from '../../src/monitors/registry.js';
import type { GeoLocation, HealthRecord, HealthStatus, OutboundMessage } from '../../src/types.js';
import { ManualClock, createLogger, createTestConfig } from './fakes.js';

export const TEST_NOW = Date.parse('2024-05-01T12:00:00.000Z');

export function createTestContext(
  options: Partial<Omit<SecurityContextOptions, 'config'>> & { healthStatus?: HealthStatus } = {}
) {
  const { healthStatus = 'up', ...overrides } = options;
  const clock = new ManualClock(TEST_NOW);
  const logger = createLogger();
  const metrics = new MetricsRegistry();
  const geolocator = {
    locate: vi.fn(
      async (_ip: string, _signal?: AbortSignal): Promise<GeoLocation> => ({
        city: 'Testville',
        country: 'Testland',
        lat: 1.5,
        lon: 2.5
      })
    )
  };
  const monitorBackend = {
    check: vi.fn(
      async (target: MonitorTarget, _signal: AbortSignal): Promise<HealthRecord> => ({
        targetId: target.targetId,
        url: target.url,
        status: healthStatus,
        statusCode: healthStatus === 'down' ? 503 : 200,
        responseTimeMs: 20,
        checkedAt: clock.current,
        errors: healthStatus === 'up' ? [] : ['HTTP 503'],
        missingSecurityHeaders: []
      })
    )
  };

  const context = new SecurityContext({
    config: createTestConfig(),
    geolocator,
    monitorBackend,
    simulationDelayMs: 0,
    now: clock.now,
    logger,
    metrics,
    ...overrides
  });
  const messages: OutboundMessage[] = [];
  context.bus.onMessage(message => {
    messages.push(message);
  });

  return { context, clock, logger, metrics, geolocator, monitorBackend, messages };
}
