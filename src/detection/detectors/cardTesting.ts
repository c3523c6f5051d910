import type { Detection, SecurityEvent } from '../../types.js';
import type { DetectorStage } from '../types.js';
import { KeyedWindows } from './keyedWindows.js';

export interface CardTestingOptions {
  windowMs: number;
  failureThreshold: number;
  now?: () => number;
}

const PAYMENT_FAILURE = 'payment_failure';
const SIMULATED_CARD_TESTING = 'simulated_card_testing';

export class CardTestingDetector implements DetectorStage {
  readonly name = 'card-testing';
  private readonly failures: KeyedWindows;
  private readonly failureThreshold: number;
  private readonly now: () => number;

  constructor(options: CardTestingOptions) {
    this.failureThreshold = options.failureThreshold;
    this.failures = new KeyedWindows(options.windowMs, Math.max(20, options.failureThreshold));
    this.now = options.now ?? Date.now;
  }

  classify(event: SecurityEvent): Detection | null {
    if (event.eventType === SIMULATED_CARD_TESTING) {
      return {
        attackType: 'CARD_TESTING',
        severity: 'CRITICAL',
        description: 'Card testing activity reported by the client',
        evidence: { cardBin: event.payload.card_bin ?? null }
      };
    }

    if (event.eventType !== PAYMENT_FAILURE) {
      return null;
    }

    const count = this.failures.record(event.sourceIp, this.now());
    if (count < this.failureThreshold) {
      return null;
    }
    return {
      attackType: 'CARD_TESTING',
      severity: 'CRITICAL',
      description: `${count} payment failures from one source in a short window`,
      evidence: { failures: count, threshold: this.failureThreshold, reason: event.payload.reason ?? null }
    };
  }
}
