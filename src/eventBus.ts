import { EventEmitter } from 'node:events';
import loggerModule, { type Logger } from './logger.js';
import metricsModule, { type MetricsRegistry } from './metrics/index.js';
import type { IncidentCategory } from './store.js';
import type { IncidentReport, OutboundMessage } from './types.js';

const MESSAGE_CHANNEL = 'message';

export const ATTACK_HISTORY_LIMIT = 1000;
export const WEBSITE_HISTORY_LIMIT = 500;

export interface LogSink {
  persist(report: IncidentReport, category: IncidentCategory): unknown;
}

export type StatusMessage = Exclude<OutboundMessage, { type: 'attack_detected' }>;

interface EventBusDependencies {
  sink: LogSink;
  logger?: Logger;
  metrics?: MetricsRegistry;
  attackHistoryLimit?: number;
  websiteHistoryLimit?: number;
}

/**
 * Hub between the responder and the outside world. Every published incident
 * is persisted, kept in a bounded history and re-emitted as a `message`
 * envelope for observers.
 */
export class EventBus extends EventEmitter {
  private readonly sink: LogSink;
  private readonly log: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly attackHistory: IncidentReport[] = [];
  private readonly websiteHistory: IncidentReport[] = [];
  private readonly attackHistoryLimit: number;
  private readonly websiteHistoryLimit: number;

  constructor(dependencies: EventBusDependencies) {
    super();
    this.sink = dependencies.sink;
    this.log = dependencies.logger ?? loggerModule;
    this.metrics = dependencies.metrics ?? metricsModule;
    this.attackHistoryLimit = dependencies.attackHistoryLimit ?? ATTACK_HISTORY_LIMIT;
    this.websiteHistoryLimit = dependencies.websiteHistoryLimit ?? WEBSITE_HISTORY_LIMIT;
  }

  publishIncident(report: IncidentReport, category: IncidentCategory = 'attack') {
    const history = category === 'website' ? this.websiteHistory : this.attackHistory;
    const limit = category === 'website' ? this.websiteHistoryLimit : this.attackHistoryLimit;
    history.push(report);
    if (history.length > limit) {
      history.splice(0, history.length - limit);
    }

    this.persist(report, category);
    this.metrics.recordIncident(report);
    this.log.warn(
      {
        incidentId: report.incidentId,
        attackType: report.attackType,
        severity: report.severity,
        ip: report.ip,
        riskScore: report.riskScore
      },
      report.description
    );
    this.emitMessage({ type: 'attack_detected', ...report });
  }

  /** Re-publishes an enriched incident under its original id. */
  publishUpdate(report: IncidentReport) {
    const index = this.attackHistory.findIndex(entry => entry.incidentId === report.incidentId);
    if (index >= 0) {
      this.attackHistory[index] = report;
    }
    this.persist(report, 'attack');
    this.metrics.recordIncidentUpdate();
    this.log.debug({ incidentId: report.incidentId, city: report.city, country: report.country }, 'Incident enriched');
    this.emitMessage({ type: 'attack_detected', ...report, update: true });
  }

  publishStatus(message: StatusMessage) {
    this.emitMessage(message);
  }

  attacks(): IncidentReport[] {
    return [...this.attackHistory];
  }

  websiteIncidents(): IncidentReport[] {
    return [...this.websiteHistory];
  }

  onMessage(listener: (message: OutboundMessage) => void): () => void {
    this.on(MESSAGE_CHANNEL, listener);
    return () => {
      this.off(MESSAGE_CHANNEL, listener);
    };
  }

  private emitMessage(message: OutboundMessage) {
    this.emit(MESSAGE_CHANNEL, message);
  }

  private persist(report: IncidentReport, category: IncidentCategory) {
    try {
      const result = this.sink.persist(report, category);
      if (result instanceof Promise) {
        void result.catch((error: unknown) => this.onPersistFailure(report, error));
      }
    } catch (error) {
      this.onPersistFailure(report, error);
    }
  }

  private onPersistFailure(report: IncidentReport, error: unknown) {
    this.metrics.recordPersistFailure();
    this.log.error({ err: error, incidentId: report.incidentId }, 'Failed to persist incident');
  }
}
