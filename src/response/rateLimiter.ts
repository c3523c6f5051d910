import type { RiskScore } from '../types.js';

export interface AdaptiveRateLimiterOptions {
  durationMs: number;
  scoreThreshold: number;
  now?: () => number;
}

/**
 * Blocks source IPs after a high-risk event. Entries expire lazily: a stale
 * expiry simply stops matching and is dropped the next time it is read.
 */
export class AdaptiveRateLimiter {
  private readonly blocked = new Map<string, number>();
  private readonly durationMs: number;
  private readonly scoreThreshold: number;
  private readonly now: () => number;

  constructor(options: AdaptiveRateLimiterOptions) {
    if (!(options.durationMs > 0)) {
      throw new Error('durationMs must be positive');
    }
    this.durationMs = options.durationMs;
    this.scoreThreshold = options.scoreThreshold;
    this.now = options.now ?? Date.now;
  }

  isHighRisk(risk: Pick<RiskScore, 'score' | 'severity'>): boolean {
    return risk.severity === 'CRITICAL' || risk.score >= this.scoreThreshold;
  }

  shouldBlock(ip: string, now = this.now()): boolean {
    const expiry = this.blocked.get(ip);
    return expiry !== undefined && now < expiry;
  }

  /** Milliseconds until the block on `ip` lifts; 0 when it is not blocked. */
  remainingMs(ip: string, now = this.now()): number {
    const expiry = this.blocked.get(ip);
    if (expiry === undefined) {
      return 0;
    }
    if (now >= expiry) {
      this.blocked.delete(ip);
      return 0;
    }
    return expiry - now;
  }

  recordHighRisk(ip: string, risk: Pick<RiskScore, 'score' | 'severity'>, now = this.now()): boolean {
    if (!this.isHighRisk(risk)) {
      return false;
    }
    this.blocked.set(ip, now + this.durationMs);
    return true;
  }

  activeBlockCount(now = this.now()): number {
    let active = 0;
    for (const [ip, expiry] of this.blocked) {
      if (now < expiry) {
        active += 1;
      } else {
        this.blocked.delete(ip);
      }
    }
    return active;
  }
}
