import type { BreakerStatus, IncidentReport } from '../types.js';

type CounterMap = Record<string, number>;

type LatencyState = {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
};

type LatencyStats = {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
  averageMs: number;
};

type HistogramSnapshot = Record<string, number>;

type DetectorMetricState = {
  runs: number;
  detections: number;
  errors: number;
  lastError: string | null;
  lastErrorAt: number | null;
};

type DetectorSnapshot = {
  runs: number;
  detections: number;
  errors: number;
  lastError: string | null;
  lastErrorAt: string | null;
};

type BreakerTransitionRecord = {
  from: BreakerStatus;
  to: BreakerStatus;
  reason: string;
  at: number;
};

export type MetricsSnapshot = {
  createdAt: string;
  requests: {
    total: number;
    byOutcome: CounterMap;
  };
  incidents: {
    total: number;
    byAttackType: CounterMap;
    bySeverity: CounterMap;
    updates: number;
    persistFailures: number;
  };
  detectors: Record<string, DetectorSnapshot>;
  breaker: {
    transitions: number;
    byTarget: CounterMap;
    skipped: number;
    last: { from: BreakerStatus; to: BreakerStatus; reason: string; at: string } | null;
  };
  broadcast: {
    messages: number;
    delivered: number;
    dropped: number;
    serializationFailures: number;
    byType: CounterMap;
  };
  monitors: {
    checks: number;
    failures: number;
    byStatus: CounterMap;
  };
  rateLimit: {
    blocks: number;
    rejected: number;
  };
  logs: {
    byLevel: CounterMap;
    byDetector: Record<string, CounterMap>;
  };
  latencies: Record<string, LatencyStats>;
  histograms: Record<string, HistogramSnapshot>;
};

type HistogramConfig = {
  buckets: number[];
};

const DEFAULT_HISTOGRAM: HistogramConfig = {
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000]
};

export type PrometheusOptions = {
  prefix?: string;
};

export class MetricsRegistry {
  private requestsTotal = 0;
  private readonly requestsByOutcome = new Map<string, number>();
  private incidentsTotal = 0;
  private incidentUpdates = 0;
  private persistFailures = 0;
  private readonly incidentsByAttackType = new Map<string, number>();
  private readonly incidentsBySeverity = new Map<string, number>();
  private readonly detectors = new Map<string, DetectorMetricState>();
  private breakerTransitions = 0;
  private breakerSkipped = 0;
  private readonly breakerByTarget = new Map<string, number>();
  private lastBreakerTransition: BreakerTransitionRecord | null = null;
  private broadcastMessages = 0;
  private broadcastDelivered = 0;
  private broadcastDropped = 0;
  private serializationFailures = 0;
  private readonly broadcastByType = new Map<string, number>();
  private monitorChecks = 0;
  private monitorFailures = 0;
  private readonly monitorByStatus = new Map<string, number>();
  private rateLimitBlocks = 0;
  private rateLimitRejected = 0;
  private readonly logLevels = new Map<string, number>();
  private readonly logLevelsByDetector = new Map<string, Map<string, number>>();
  private readonly latencies = new Map<string, LatencyState>();
  private readonly histograms = new Map<string, Map<string, number>>();

  reset() {
    this.requestsTotal = 0;
    this.requestsByOutcome.clear();
    this.incidentsTotal = 0;
    this.incidentUpdates = 0;
    this.persistFailures = 0;
    this.incidentsByAttackType.clear();
    this.incidentsBySeverity.clear();
    this.detectors.clear();
    this.breakerTransitions = 0;
    this.breakerSkipped = 0;
    this.breakerByTarget.clear();
    this.lastBreakerTransition = null;
    this.broadcastMessages = 0;
    this.broadcastDelivered = 0;
    this.broadcastDropped = 0;
    this.serializationFailures = 0;
    this.broadcastByType.clear();
    this.monitorChecks = 0;
    this.monitorFailures = 0;
    this.monitorByStatus.clear();
    this.rateLimitBlocks = 0;
    this.rateLimitRejected = 0;
    this.logLevels.clear();
    this.logLevelsByDetector.clear();
    this.latencies.clear();
    this.histograms.clear();
  }

  recordRequest(outcome: string) {
    this.requestsTotal += 1;
    increment(this.requestsByOutcome, outcome);
  }

  recordIncident(report: Pick<IncidentReport, 'attackType' | 'severity'>) {
    this.incidentsTotal += 1;
    increment(this.incidentsByAttackType, report.attackType);
    increment(this.incidentsBySeverity, report.severity);
  }

  recordIncidentUpdate() {
    this.incidentUpdates += 1;
  }

  recordPersistFailure() {
    this.persistFailures += 1;
  }

  recordDetectorRun(detector: string, detected: boolean, durationMs: number) {
    const state = getDetectorState(this.detectors, detector);
    state.runs += 1;
    if (detected) {
      state.detections += 1;
    }
    this.observeLatency(`detector.${detector}.latency`, durationMs);
    this.observeHistogram(`detector.${detector}.latency`, durationMs);
  }

  recordDetectorError(detector: string, message: string) {
    const state = getDetectorState(this.detectors, detector);
    state.errors += 1;
    state.lastError = message;
    state.lastErrorAt = Date.now();
  }

  recordBreakerTransition(target: string, from: BreakerStatus, to: BreakerStatus, reason: string) {
    this.breakerTransitions += 1;
    increment(this.breakerByTarget, `${target}:${to}`);
    this.lastBreakerTransition = { from, to, reason, at: Date.now() };
  }

  recordBreakerSkip() {
    this.breakerSkipped += 1;
  }

  recordBroadcast(type: string, delivered: number, dropped: number) {
    this.broadcastMessages += 1;
    this.broadcastDelivered += delivered;
    this.broadcastDropped += dropped;
    increment(this.broadcastByType, type);
  }

  recordSerializationFailure() {
    this.serializationFailures += 1;
  }

  recordMonitorCheck(status: string, durationMs: number) {
    this.monitorChecks += 1;
    increment(this.monitorByStatus, status);
    this.observeLatency('monitor.check.latency', durationMs);
  }

  recordMonitorFailure() {
    this.monitorFailures += 1;
  }

  recordRateLimitBlock() {
    this.rateLimitBlocks += 1;
  }

  recordRateLimitRejection() {
    this.rateLimitRejected += 1;
  }

  incrementLogLevel(level: string, context?: { detector?: string }) {
    const normalized = level.toLowerCase();
    increment(this.logLevels, normalized);
    const detector = context?.detector;
    if (detector) {
      let byLevel = this.logLevelsByDetector.get(detector);
      if (!byLevel) {
        byLevel = new Map();
        this.logLevelsByDetector.set(detector, byLevel);
      }
      increment(byLevel, normalized);
    }
  }

  observeLatency(metric: string, durationMs: number) {
    const state = this.latencies.get(metric) ?? {
      count: 0,
      totalMs: 0,
      minMs: Number.POSITIVE_INFINITY,
      maxMs: 0
    };
    state.count += 1;
    state.totalMs += durationMs;
    state.minMs = Math.min(state.minMs, durationMs);
    state.maxMs = Math.max(state.maxMs, durationMs);
    this.latencies.set(metric, state);
  }

  observeHistogram(metric: string, value: number, config: HistogramConfig = DEFAULT_HISTOGRAM) {
    let histogram = this.histograms.get(metric);
    if (!histogram) {
      histogram = new Map();
      this.histograms.set(metric, histogram);
    }
    increment(histogram, resolveBucket(value, config.buckets));
  }

  snapshot(): MetricsSnapshot {
    const lastTransition = this.lastBreakerTransition;
    return {
      createdAt: new Date().toISOString(),
      requests: {
        total: this.requestsTotal,
        byOutcome: mapFrom(this.requestsByOutcome)
      },
      incidents: {
        total: this.incidentsTotal,
        byAttackType: mapFrom(this.incidentsByAttackType),
        bySeverity: mapFrom(this.incidentsBySeverity),
        updates: this.incidentUpdates,
        persistFailures: this.persistFailures
      },
      detectors: mapFromDetectors(this.detectors),
      breaker: {
        transitions: this.breakerTransitions,
        byTarget: mapFrom(this.breakerByTarget),
        skipped: this.breakerSkipped,
        last: lastTransition
          ? {
              from: lastTransition.from,
              to: lastTransition.to,
              reason: lastTransition.reason,
              at: new Date(lastTransition.at).toISOString()
            }
          : null
      },
      broadcast: {
        messages: this.broadcastMessages,
        delivered: this.broadcastDelivered,
        dropped: this.broadcastDropped,
        serializationFailures: this.serializationFailures,
        byType: mapFrom(this.broadcastByType)
      },
      monitors: {
        checks: this.monitorChecks,
        failures: this.monitorFailures,
        byStatus: mapFrom(this.monitorByStatus)
      },
      rateLimit: {
        blocks: this.rateLimitBlocks,
        rejected: this.rateLimitRejected
      },
      logs: {
        byLevel: mapFrom(this.logLevels),
        byDetector: Object.fromEntries(
          Array.from(this.logLevelsByDetector.entries()).map(([detector, levels]) => [detector, mapFrom(levels)])
        )
      },
      latencies: mapFromLatencies(this.latencies),
      histograms: Object.fromEntries(
        Array.from(this.histograms.entries()).map(([metric, buckets]) => [metric, mapFrom(buckets)])
      )
    };
  }

  exportForPrometheus(options: PrometheusOptions = {}): string {
    const prefix = sanitizePrometheusMetricName(options.prefix ?? 'threatwatch');
    const lines: string[] = [];

    const counter = (name: string, help: string, samples: Array<[Record<string, string>, number]>) => {
      const metric = `${prefix}_${name}`;
      lines.push(`# HELP ${metric} ${help}`);
      lines.push(`# TYPE ${metric} counter`);
      for (const [labels, value] of samples) {
        lines.push(`${metric}${formatPrometheusLabels(labels)} ${value}`);
      }
    };

    counter('requests_total', 'Submitted events by outcome', [
      [{}, this.requestsTotal],
      ...Array.from(this.requestsByOutcome.entries()).map(
        ([outcome, value]): [Record<string, string>, number] => [{ outcome }, value]
      )
    ]);
    counter(
      'incidents_total',
      'Incidents by attack type',
      Array.from(this.incidentsByAttackType.entries()).map(
        ([attackType, value]): [Record<string, string>, number] => [{ attack_type: attackType }, value]
      )
    );
    counter(
      'detector_errors_total',
      'Detector stage failures',
      Array.from(this.detectors.entries()).map(
        ([detector, state]): [Record<string, string>, number] => [{ detector }, state.errors]
      )
    );
    counter('breaker_transitions_total', 'Circuit breaker transitions', [[{}, this.breakerTransitions]]);
    counter('broadcast_dropped_total', 'Observers dropped after failed delivery', [[{}, this.broadcastDropped]]);
    counter('rate_limit_blocks_total', 'Source IPs blocked after high-risk events', [[{}, this.rateLimitBlocks]]);
    counter(
      'monitor_checks_total',
      'Endpoint health checks by status',
      Array.from(this.monitorByStatus.entries()).map(
        ([status, value]): [Record<string, string>, number] => [{ status }, value]
      )
    );

    return `${lines.join('\n')}\n`;
  }
}

function increment(map: Map<string, number>, key: string, amount = 1) {
  map.set(key, (map.get(key) ?? 0) + amount);
}

function getDetectorState(map: Map<string, DetectorMetricState>, detector: string): DetectorMetricState {
  let state = map.get(detector);
  if (!state) {
    state = { runs: 0, detections: 0, errors: 0, lastError: null, lastErrorAt: null };
    map.set(detector, state);
  }
  return state;
}

function resolveBucket(value: number, buckets: number[]): string {
  let lower = 0;
  for (const upper of buckets) {
    if (value < upper) {
      return `${lower}-${upper}`;
    }
    lower = upper;
  }
  return `${lower}+`;
}

function mapFrom(source: Map<string, number>): CounterMap {
  return Object.fromEntries(source.entries());
}

function mapFromDetectors(source: Map<string, DetectorMetricState>): Record<string, DetectorSnapshot> {
  return Object.fromEntries(
    Array.from(source.entries()).map(([detector, state]) => [
      detector,
      {
        runs: state.runs,
        detections: state.detections,
        errors: state.errors,
        lastError: state.lastError,
        lastErrorAt: state.lastErrorAt === null ? null : new Date(state.lastErrorAt).toISOString()
      }
    ])
  );
}

function mapFromLatencies(source: Map<string, LatencyState>): Record<string, LatencyStats> {
  return Object.fromEntries(
    Array.from(source.entries()).map(([metric, state]) => [
      metric,
      {
        count: state.count,
        totalMs: state.totalMs,
        minMs: state.count > 0 ? state.minMs : 0,
        maxMs: state.maxMs,
        averageMs: state.count > 0 ? state.totalMs / state.count : 0
      }
    ])
  );
}

function sanitizePrometheusMetricName(name: string): string {
  const sanitized = name.replace(/[^a-zA-Z0-9_:]/g, '_');
  return /^[a-zA-Z_:]/.test(sanitized) ? sanitized : `_${sanitized}`;
}

function escapePrometheusLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\n/g, '\\n').replace(/"/g, '\\"');
}

function formatPrometheusLabels(labels: Record<string, string>): string {
  const entries = Object.entries(labels);
  if (entries.length === 0) {
    return '';
  }
  const formatted = entries
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([key, value]) => `${key}="${escapePrometheusLabelValue(value)}"`)
    .join(',');
  return `{${formatted}}`;
}

const metrics = new MetricsRegistry();

export default metrics;
