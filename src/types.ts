export type Severity = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

export const SEVERITIES: readonly Severity[] = ['LOW', 'MEDIUM', 'HIGH', 'CRITICAL'];

export interface SecurityEvent {
  readonly eventType: string;
  readonly userId?: string;
  readonly payload: Readonly<Record<string, unknown>>;
  readonly sourceIp: string;
  readonly headers?: Readonly<Record<string, string>>;
  readonly sessionId?: string;
  readonly userAgent?: string;
}

export interface Detection {
  attackType: string;
  severity: Severity;
  description: string;
  evidence: Record<string, unknown>;
}

export interface RiskScore {
  score: number;
  severity: Severity;
  factors: string[];
}

export interface GeoLocation {
  city: string;
  country: string;
  lat: number;
  lon: number;
}

export interface IncidentReport extends Detection, GeoLocation {
  incidentId: string;
  timestamp: string;
  ip: string;
  riskScore: number;
  riskFactors: string[];
  eventType: string;
  userId: string | null;
  payload: Record<string, unknown>;
  update?: boolean;
}

export type HealthStatus = 'up' | 'degraded' | 'down';

export interface HealthRecord {
  targetId: string;
  url: string;
  status: HealthStatus;
  statusCode: number | null;
  responseTimeMs: number;
  checkedAt: number;
  errors: string[];
  missingSecurityHeaders: string[];
}

export interface MonitorConfig {
  url: string;
  intervalMs: number;
  expectedKeywords: string[];
}

export type BreakerStatus = 'CLOSED' | 'DEGRADED' | 'OPEN';

export interface MetricsUpdate {
  requestsPerWindow: number;
  errorsPerWindow: number;
  activeObserverCount: number;
  breakerStatus: BreakerStatus;
  windowMs: number;
}

export type SimulationStatus = 'running' | 'completed' | 'failed';

export type OutboundMessage =
  | ({ type: 'attack_detected' } & IncidentReport)
  | ({ type: 'metrics_update' } & MetricsUpdate)
  | { type: 'simulation_status'; status: SimulationStatus; message: string }
  | ({ type: 'website_health' } & HealthRecord);
