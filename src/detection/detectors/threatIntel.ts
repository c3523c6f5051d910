import type { Detection, SecurityEvent } from '../../types.js';
import type { DetectorStage } from '../types.js';

export class ThreatIntelDetector implements DetectorStage {
  readonly name = 'threat-intel';
  private readonly blocked: Set<string>;

  constructor(blockedIps: Iterable<string> = []) {
    this.blocked = new Set(Array.from(blockedIps, ip => ip.trim()).filter(ip => ip.length > 0));
  }

  get size(): number {
    return this.blocked.size;
  }

  classify(event: SecurityEvent): Detection | null {
    if (!this.blocked.has(event.sourceIp)) {
      return null;
    }
    return {
      attackType: 'KNOWN_MALICIOUS_IP',
      severity: 'CRITICAL',
      description: 'Source IP is on the threat intelligence blocklist',
      evidence: { ip: event.sourceIp }
    };
  }
}
