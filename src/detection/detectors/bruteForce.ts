import type { Detection, SecurityEvent } from '../../types.js';
import type { DetectorStage } from '../types.js';
import { KeyedWindows } from './keyedWindows.js';

export interface BruteForceOptions {
  windowMs: number;
  highThreshold: number;
  criticalThreshold: number;
  now?: () => number;
}

const FAILED_LOGIN_EVENTS = new Set(['login_failed', 'login_failure', 'failed_login']);

export class BruteForceDetector implements DetectorStage {
  readonly name = 'brute-force';
  private readonly attempts: KeyedWindows;
  private readonly options: BruteForceOptions;
  private readonly now: () => number;

  constructor(options: BruteForceOptions) {
    this.options = options;
    this.attempts = new KeyedWindows(options.windowMs, Math.max(20, options.criticalThreshold));
    this.now = options.now ?? Date.now;
  }

  classify(event: SecurityEvent): Detection | null {
    if (!FAILED_LOGIN_EVENTS.has(event.eventType)) {
      return null;
    }

    const key = event.userId ? `user:${event.userId}` : `ip:${event.sourceIp}`;
    const attempts = this.attempts.record(key, this.now());
    if (attempts < this.options.highThreshold) {
      return null;
    }

    const critical = attempts >= this.options.criticalThreshold;
    return {
      attackType: 'BRUTE_FORCE',
      severity: critical ? 'CRITICAL' : 'HIGH',
      description: `${attempts} failed logins for ${key} within ${Math.round(this.options.windowMs / 1000)}s`,
      evidence: { key, attempts }
    };
  }
}
