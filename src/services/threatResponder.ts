import { randomUUID } from 'node:crypto';
import type { DetectorPipeline } from '../detection/pipeline.js';
import { DEFAULT_RISK_OPTIONS, scoreDetections, selectPrimaryDetection, type RiskScoringOptions } from '../detection/riskScore.js';
import type { EventBus } from '../eventBus.js';
import loggerModule, { type Logger } from '../logger.js';
import metricsModule, { MetricsRegistry } from '../metrics/index.js';
import type { SlidingWindowCounter } from '../metrics/slidingWindow.js';
import type { AdaptiveRateLimiter } from '../response/rateLimiter.js';
import type { TaskSupervisor } from '../tasks/supervisor.js';
import type { Detection, GeoLocation, HealthRecord, IncidentReport, SecurityEvent } from '../types.js';
import type { Geolocator } from './geolocation.js';

export const WEBSITE_MONITOR_IP = 'WEBSITE_MONITOR';

const PENDING_LOCATION: GeoLocation = { city: 'Pending', country: 'Pending', lat: 0, lon: 0 };

export type EventInput = {
  eventType: string;
  userId?: string;
  payload?: Record<string, unknown>;
  sourceIp: string;
  headers?: Record<string, string>;
  sessionId?: string;
  userAgent?: string;
};

export type SubmitResult =
  | { status: 'no_threat'; httpStatus: 200 }
  | { status: 'threat_detected'; httpStatus: 200; details: IncidentReport }
  | { status: 'rejected'; httpStatus: 403; reason: 'high_risk'; details: IncidentReport }
  | { status: 'rejected'; httpStatus: 429; reason: 'rate_limited'; retryAfterMs: number };

export interface ThreatResponderOptions {
  pipeline: DetectorPipeline;
  rateLimiter: AdaptiveRateLimiter;
  bus: EventBus;
  geolocator: Geolocator;
  supervisor: TaskSupervisor;
  requests: SlidingWindowCounter;
  errors: SlidingWindowCounter;
  risk?: RiskScoringOptions;
  now?: () => number;
  createId?: () => string;
  logger?: Logger;
  metrics?: MetricsRegistry;
}

export function freezeEvent(input: EventInput): SecurityEvent {
  return Object.freeze({
    eventType: input.eventType,
    userId: input.userId,
    payload: Object.freeze({ ...(input.payload ?? {}) }),
    sourceIp: input.sourceIp,
    headers: input.headers ? Object.freeze({ ...input.headers }) : undefined,
    sessionId: input.sessionId,
    userAgent: input.userAgent
  });
}

export class ThreatResponder {
  private readonly options: ThreatResponderOptions;
  private readonly risk: RiskScoringOptions;
  private readonly now: () => number;
  private readonly createId: () => string;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;

  constructor(options: ThreatResponderOptions) {
    this.options = options;
    this.risk = options.risk ?? DEFAULT_RISK_OPTIONS;
    this.now = options.now ?? Date.now;
    this.createId = options.createId ?? randomUUID;
    this.logger = options.logger ?? loggerModule;
    this.metrics = options.metrics ?? metricsModule;
  }

  async submitEvent(input: EventInput): Promise<SubmitResult> {
    const { rateLimiter, pipeline } = this.options;
    const event = freezeEvent(input);
    this.options.requests.record(this.now());

    if (rateLimiter.shouldBlock(event.sourceIp, this.now())) {
      this.metrics.recordRateLimitRejection();
      this.metrics.recordRequest('rate_limited');
      return {
        status: 'rejected',
        httpStatus: 429,
        reason: 'rate_limited',
        retryAfterMs: rateLimiter.remainingMs(event.sourceIp, this.now())
      };
    }

    const detections = await pipeline.evaluate(event);
    if (detections.length === 0) {
      this.metrics.recordRequest('no_threat');
      this.logger.debug({ eventType: event.eventType, ip: event.sourceIp }, 'No threat detected');
      return { status: 'no_threat', httpStatus: 200 };
    }

    this.options.errors.record(this.now());
    const report = this.buildReport(event, detections);
    this.options.bus.publishIncident(report);
    this.scheduleEnrichment(report);

    if (rateLimiter.recordHighRisk(event.sourceIp, { score: report.riskScore, severity: report.severity }, this.now())) {
      this.metrics.recordRateLimitBlock();
      this.metrics.recordRequest('blocked');
      this.logger.warn(
        { ip: event.sourceIp, severity: report.severity, riskScore: report.riskScore, attackType: report.attackType },
        'Source IP rate-limited after high-risk event'
      );
      return { status: 'rejected', httpStatus: 403, reason: 'high_risk', details: report };
    }

    this.metrics.recordRequest('threat_detected');
    return { status: 'threat_detected', httpStatus: 200, details: report };
  }

  /**
   * Forwards a monitor result to observers and raises a website incident when
   * the target is down or degraded.
   */
  handleHealth(record: HealthRecord): IncidentReport | null {
    const { bus } = this.options;
    bus.publishStatus({ type: 'website_health', ...record });
    if (record.status === 'up') {
      return null;
    }

    const detection: Detection =
      record.status === 'down'
        ? {
            attackType: 'WEBSITE_DOWN',
            severity: 'HIGH',
            description: `${record.url} is down`,
            evidence: { statusCode: record.statusCode, errors: record.errors }
          }
        : {
            attackType: 'WEBSITE_DEGRADED',
            severity: 'MEDIUM',
            description: `${record.url} is degraded`,
            evidence: { statusCode: record.statusCode, errors: record.errors, responseTimeMs: record.responseTimeMs }
          };

    const event = freezeEvent({
      eventType: 'website_health_check',
      payload: { url: record.url, status: record.status },
      sourceIp: WEBSITE_MONITOR_IP
    });
    const report = this.buildReport(event, [detection], { city: 'N/A', country: 'N/A', lat: 0, lon: 0 });
    bus.publishIncident(report, 'website');
    return report;
  }

  private buildReport(
    event: SecurityEvent,
    detections: Detection[],
    location: GeoLocation = PENDING_LOCATION
  ): IncidentReport {
    const risk = scoreDetections(event, detections, this.risk);
    const primary = selectPrimaryDetection(detections, this.risk.severityWeights);
    return {
      incidentId: this.createId(),
      attackType: primary.attackType,
      description: primary.description,
      evidence: primary.evidence,
      severity: risk.severity,
      riskScore: risk.score,
      riskFactors: risk.factors,
      timestamp: new Date(this.now()).toISOString(),
      ip: event.sourceIp,
      eventType: event.eventType,
      userId: event.userId ?? null,
      payload: { ...event.payload },
      ...location
    };
  }

  private scheduleEnrichment(report: IncidentReport) {
    const { supervisor, geolocator, bus } = this.options;
    supervisor.spawn(`geolocate:${report.incidentId}`, async signal => {
      const location = await geolocator.locate(report.ip, signal);
      if (signal.aborted) {
        return;
      }
      bus.publishUpdate({ ...report, ...location });
    });
  }
}
