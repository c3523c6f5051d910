import type { IncidentReport } from '../types.js';
import { WEBSITE_MONITOR_IP } from './threatResponder.js';

const HOUR_MS = 60 * 60 * 1000;
const TOP_IP_LIMIT = 5;

export type AnalyticsSummary = {
  attackTypeCounts: Record<string, number>;
  websiteIncidentCounts: Record<string, number>;
  totalThreatEvents: number;
  totalWebsiteIncidents: number;
  threatIntelligenceIpCount: number;
  rateLimitedIpCount: number;
  topAttackingIpsLastHour: Array<{ ip: string; count: number }>;
};

export type AnalyticsInput = {
  attacks: readonly IncidentReport[];
  websiteIncidents: readonly IncidentReport[];
  threatIntelSize: number;
  activeRateLimits: number;
  now?: number;
};

function countBy(items: readonly IncidentReport[], key: (item: IncidentReport) => string): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const item of items) {
    const value = key(item);
    counts[value] = (counts[value] ?? 0) + 1;
  }
  return counts;
}

export function buildAnalytics(input: AnalyticsInput): AnalyticsSummary {
  const now = input.now ?? Date.now();
  const hourAgo = now - HOUR_MS;

  const recentByIp = new Map<string, number>();
  for (const attack of input.attacks) {
    const at = Date.parse(attack.timestamp);
    if (!Number.isFinite(at) || at <= hourAgo || attack.ip === WEBSITE_MONITOR_IP) {
      continue;
    }
    recentByIp.set(attack.ip, (recentByIp.get(attack.ip) ?? 0) + 1);
  }

  const topAttackingIpsLastHour = Array.from(recentByIp, ([ip, count]) => ({ ip, count }))
    .sort((a, b) => b.count - a.count || a.ip.localeCompare(b.ip))
    .slice(0, TOP_IP_LIMIT);

  return {
    attackTypeCounts: countBy(input.attacks, attack => attack.attackType),
    websiteIncidentCounts: countBy(input.websiteIncidents, incident => incident.attackType.replace(/^WEBSITE_/, '')),
    totalThreatEvents: input.attacks.length,
    totalWebsiteIncidents: input.websiteIncidents.length,
    threatIntelligenceIpCount: input.threatIntelSize,
    rateLimitedIpCount: input.activeRateLimits,
    topAttackingIpsLastHour
  };
}
