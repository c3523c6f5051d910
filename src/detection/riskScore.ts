import type { Detection, RiskScore, SecurityEvent, Severity } from '../types.js';

export type SeverityWeights = Record<Severity, number>;

export interface RiskScoringOptions {
  severityWeights: SeverityWeights;
  additionalWeightFactor: number;
  criticalUpgradeScore: number;
}

export const DEFAULT_SEVERITY_WEIGHTS: SeverityWeights = {
  LOW: 0.25,
  MEDIUM: 0.5,
  HIGH: 0.75,
  CRITICAL: 1
};

export const DEFAULT_RISK_OPTIONS: RiskScoringOptions = {
  severityWeights: DEFAULT_SEVERITY_WEIGHTS,
  additionalWeightFactor: 0.1,
  criticalUpgradeScore: 0.95
};

export class EmptyDetectionsError extends Error {
  constructor() {
    super('A risk score needs at least one detection');
    this.name = 'EmptyDetectionsError';
  }
}

/** Highest-weighted detection; the earliest one wins a tie. */
export function selectPrimaryDetection(
  detections: readonly Detection[],
  weights: SeverityWeights = DEFAULT_SEVERITY_WEIGHTS
): Detection {
  const [first, ...rest] = detections;
  if (!first) {
    throw new EmptyDetectionsError();
  }
  let primary = first;
  for (const candidate of rest) {
    if (weights[candidate.severity] > weights[primary.severity]) {
      primary = candidate;
    }
  }
  return primary;
}

export function scoreDetections(
  _event: SecurityEvent,
  detections: readonly Detection[],
  options: RiskScoringOptions = DEFAULT_RISK_OPTIONS
): RiskScore {
  const weights = options.severityWeights;
  const primary = selectPrimaryDetection(detections, weights);
  const maxWeight = weights[primary.severity];
  const totalWeight = detections.reduce((sum, detection) => sum + weights[detection.severity], 0);

  const raw = maxWeight + options.additionalWeightFactor * (totalWeight - maxWeight);
  const score = Math.round(Math.min(1, Math.max(0, raw)) * 10_000) / 10_000;

  const factors = detections.map(detection => `${detection.attackType} (${detection.severity})`);
  if (detections.length > 1) {
    factors.push(`multiple detections (${detections.length})`);
  }

  let severity = primary.severity;
  if (severity !== 'CRITICAL' && score >= options.criticalUpgradeScore) {
    severity = 'CRITICAL';
    factors.push('escalated to CRITICAL by combined score');
  }

  return { score, severity, factors };
}
