import { Broadcaster } from './broadcast/broadcaster.js';
import type { ThreatwatchConfig } from './config/index.js';
import { CircuitBreaker } from './detection/circuitBreaker.js';
import { createDefaultStages, ThreatIntelDetector } from './detection/detectors/index.js';
import { DetectorPipeline } from './detection/pipeline.js';
import type { RiskScoringOptions } from './detection/riskScore.js';
import type { DetectorStage } from './detection/types.js';
import { EventBus } from './eventBus.js';
import loggerModule, { type Logger } from './logger.js';
import metricsModule, { MetricsRegistry } from './metrics/index.js';
import { SlidingWindowCounter } from './metrics/slidingWindow.js';
import { HttpHealthBackend } from './monitors/httpBackend.js';
import { MonitorRegistry, type MonitorBackend } from './monitors/registry.js';
import { AdaptiveRateLimiter } from './response/rateLimiter.js';
import { buildAnalytics, type AnalyticsSummary } from './services/analytics.js';
import { HttpGeolocator, type Geolocator } from './services/geolocation.js';
import { AttackSimulation } from './services/simulation.js';
import { ThreatResponder } from './services/threatResponder.js';
import { IncidentStore } from './store.js';
import { MetricsBroadcastTask } from './tasks/metricsBroadcast.js';
import { TaskSupervisor } from './tasks/supervisor.js';

export interface SecurityContextOptions {
  config: ThreatwatchConfig;
  store?: IncidentStore;
  geolocator?: Geolocator;
  monitorBackend?: MonitorBackend;
  stages?: DetectorStage[];
  fetchImpl?: typeof fetch;
  simulationDelayMs?: number;
  now?: () => number;
  logger?: Logger;
  metrics?: MetricsRegistry;
}

/**
 * Owns every piece of shared state for one process: windows, rate-limit table,
 * breaker, observers, monitors and background tasks.
 */
export class SecurityContext {
  readonly config: ThreatwatchConfig;
  readonly store: IncidentStore;
  readonly bus: EventBus;
  readonly broadcaster: Broadcaster;
  readonly breaker: CircuitBreaker;
  readonly pipeline: DetectorPipeline;
  readonly rateLimiter: AdaptiveRateLimiter;
  readonly requests: SlidingWindowCounter;
  readonly errors: SlidingWindowCounter;
  readonly supervisor: TaskSupervisor;
  readonly monitors: MonitorRegistry;
  readonly responder: ThreatResponder;
  readonly simulation: AttackSimulation;
  readonly metricsTask: MetricsBroadcastTask;
  readonly metrics: MetricsRegistry;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly threatIntelSize: number;
  private readonly detachBus: () => void;
  private closed = false;

  constructor(options: SecurityContextOptions) {
    const { config } = options;
    const detection = config.detection;
    this.config = config;
    this.logger = options.logger ?? loggerModule;
    this.metrics = options.metrics ?? metricsModule;
    this.now = options.now ?? Date.now;
    const shared = { logger: this.logger, metrics: this.metrics };

    this.store =
      options.store ?? new IncidentStore({ path: config.database.path, privacy: config.privacy, logger: this.logger });
    this.supervisor = new TaskSupervisor({ logger: this.logger });
    this.broadcaster = new Broadcaster(shared);
    this.bus = new EventBus({ sink: this.store, ...shared });
    this.detachBus = this.bus.onMessage(message => {
      void this.broadcaster.broadcast(message);
    });

    this.breaker = new CircuitBreaker({ name: 'model-anomaly', ...detection.circuitBreaker, now: this.now, ...shared });
    const stages = options.stages ?? createDefaultStages(detection, { now: this.now, fetchImpl: options.fetchImpl });
    this.threatIntelSize = stages.reduce(
      (total, stage) => total + (stage instanceof ThreatIntelDetector ? stage.size : 0),
      0
    );
    this.pipeline = new DetectorPipeline({ stages, breaker: this.breaker, ...shared });
    this.rateLimiter = new AdaptiveRateLimiter({ ...detection.rateLimit, now: this.now });

    const windowOptions = { windowMs: config.metrics.windowMs, maxSamples: config.metrics.maxSamples };
    this.requests = new SlidingWindowCounter(windowOptions);
    this.errors = new SlidingWindowCounter(windowOptions);

    const risk: RiskScoringOptions = { severityWeights: detection.severityWeights, ...detection.risk };
    this.responder = new ThreatResponder({
      pipeline: this.pipeline,
      rateLimiter: this.rateLimiter,
      bus: this.bus,
      geolocator:
        options.geolocator ??
        new HttpGeolocator({ endpoint: config.geolocation?.endpoint, fetchImpl: options.fetchImpl, logger: this.logger }),
      supervisor: this.supervisor,
      requests: this.requests,
      errors: this.errors,
      risk,
      now: this.now,
      ...shared
    });

    this.monitors = new MonitorRegistry({
      backend:
        options.monitorBackend ??
        new HttpHealthBackend({
          timeoutMs: config.monitors.requestTimeoutMs,
          slowResponseMs: config.monitors.slowResponseMs,
          fetchImpl: options.fetchImpl,
          now: this.now
        }),
      supervisor: this.supervisor,
      onHealth: record => {
        this.responder.handleHealth(record);
      },
      minIntervalMs: config.monitors.minIntervalMs,
      defaultIntervalMs: config.monitors.defaultIntervalMs,
      historyLimit: config.monitors.historyLimit,
      ...shared
    });

    this.simulation = new AttackSimulation({
      responder: this.responder,
      bus: this.bus,
      supervisor: this.supervisor,
      delayMs: options.simulationDelayMs,
      logger: this.logger
    });

    this.metricsTask = new MetricsBroadcastTask({
      intervalMs: config.metrics.intervalMs,
      requests: this.requests,
      errors: this.errors,
      broadcaster: this.broadcaster,
      breakerStatus: () => this.breaker.status(),
      now: this.now,
      logger: this.logger
    });
  }

  start() {
    this.metricsTask.start();
  }

  analytics(): AnalyticsSummary {
    return buildAnalytics({
      attacks: this.bus.attacks(),
      websiteIncidents: this.bus.websiteIncidents(),
      threatIntelSize: this.threatIntelSize,
      activeRateLimits: this.rateLimiter.activeBlockCount(this.now()),
      now: this.now()
    });
  }

  windowCounts() {
    const now = this.now();
    this.requests.prune(now);
    this.errors.prune(now);
    return {
      requestsPerWindow: this.requests.count(),
      errorsPerWindow: this.errors.count(),
      windowMs: this.requests.window
    };
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.metricsTask.stop();
    const monitors = await this.monitors.stopAll();
    await this.supervisor.shutdown();
    this.detachBus();
    this.broadcaster.closeAll();
    this.store.close();
    this.logger.info({ monitors }, 'Security context closed');
  }
}
