import type { DetectionConfig } from '../../config/index.js';
import type { DetectorStage } from '../types.js';
import { BruteForceDetector } from './bruteForce.js';
import { CardTestingDetector } from './cardTesting.js';
import { ModelAnomalyDetector } from './modelAnomaly.js';
import { PaymentAnomalyDetector } from './paymentAnomaly.js';
import { SqlInjectionDetector } from './sqlInjection.js';
import { ThreatIntelDetector } from './threatIntel.js';
import { XssDetector } from './xss.js';

export { BruteForceDetector } from './bruteForce.js';
export { CardTestingDetector } from './cardTesting.js';
export { ModelAnomalyDetector } from './modelAnomaly.js';
export { PaymentAnomalyDetector } from './paymentAnomaly.js';
export { SqlInjectionDetector } from './sqlInjection.js';
export { ThreatIntelDetector } from './threatIntel.js';
export { XssDetector } from './xss.js';

export interface DefaultStageDeps {
  now?: () => number;
  fetchImpl?: typeof fetch;
}

// Ordered cheapest first; threat intel leads so known-bad sources exit early.
export function createDefaultStages(config: DetectionConfig, deps: DefaultStageDeps = {}): DetectorStage[] {
  const stages: DetectorStage[] = [
    new ThreatIntelDetector(config.threatIntel?.blockedIps ?? []),
    new SqlInjectionDetector(),
    new XssDetector()
  ];

  if (config.bruteForce) {
    stages.push(new BruteForceDetector({ ...config.bruteForce, now: deps.now }));
  }
  if (config.cardTesting) {
    stages.push(new CardTestingDetector({ ...config.cardTesting, now: deps.now }));
  }
  if (config.payment) {
    stages.push(new PaymentAnomalyDetector(config.payment.amountThreshold));
  }

  stages.push(
    new ModelAnomalyDetector({
      endpoint: config.model?.endpoint,
      model: config.model?.model,
      fetchImpl: deps.fetchImpl
    })
  );
  return stages;
}
