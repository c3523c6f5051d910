import Database from 'better-sqlite3';
import { createHash } from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import type { PrivacyConfig } from './config/index.js';
import loggerModule, { type Logger } from './logger.js';
import { SEVERITIES, type IncidentReport, type Severity } from './types.js';
import { maskPii } from './utils/pii.js';

export type IncidentCategory = 'attack' | 'website';

export type StoredIncident = IncidentReport & {
  id: number;
  category: IncidentCategory;
  integrityHash: string;
};

export type ListIncidentsOptions = {
  limit?: number;
  offset?: number;
  category?: IncidentCategory;
};

export type PaginatedIncidents = {
  items: StoredIncident[];
  total: number;
};

export interface IncidentStoreOptions {
  path: string;
  privacy: PrivacyConfig;
  logger?: Logger;
}

type IncidentRow = {
  id: number;
  incident_id: string;
  category: string;
  timestamp: string;
  ip: string;
  attack_type: string;
  severity: string;
  description: string;
  risk_score: number;
  risk_factors: string;
  event_type: string;
  user_id: string | null;
  city: string;
  country: string;
  lat: number;
  lon: number;
  payload: string;
  evidence: string;
  integrity_hash: string;
};

type IncidentInsert = Omit<IncidentRow, 'id'> & { ts: number };

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS incidents (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    incident_id TEXT NOT NULL UNIQUE,
    category TEXT NOT NULL,
    ts INTEGER NOT NULL,
    timestamp TEXT NOT NULL,
    ip TEXT NOT NULL,
    attack_type TEXT NOT NULL,
    severity TEXT NOT NULL,
    description TEXT NOT NULL,
    risk_score REAL NOT NULL,
    risk_factors TEXT NOT NULL,
    event_type TEXT NOT NULL,
    user_id TEXT,
    city TEXT NOT NULL,
    country TEXT NOT NULL,
    lat REAL NOT NULL,
    lon REAL NOT NULL,
    payload TEXT NOT NULL,
    evidence TEXT NOT NULL,
    integrity_hash TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_incidents_ts ON incidents (ts);
  CREATE INDEX IF NOT EXISTS idx_incidents_category ON incidents (category, ts);
`;

const UPSERT_SQL = `
  INSERT INTO incidents (
    incident_id, category, ts, timestamp, ip, attack_type, severity, description, risk_score,
    risk_factors, event_type, user_id, city, country, lat, lon, payload, evidence, integrity_hash
  ) VALUES (
    @incident_id, @category, @ts, @timestamp, @ip, @attack_type, @severity, @description, @risk_score,
    @risk_factors, @event_type, @user_id, @city, @country, @lat, @lon, @payload, @evidence, @integrity_hash
  )
  ON CONFLICT(incident_id) DO UPDATE SET
    city = excluded.city,
    country = excluded.country,
    lat = excluded.lat,
    lon = excluded.lon,
    integrity_hash = excluded.integrity_hash
`;

const CORRUPT_CODES = new Set(['SQLITE_NOTADB', 'SQLITE_CORRUPT']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseObject(raw: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(raw);
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

function parseStringList(raw: string): string[] {
  try {
    const parsed: unknown = JSON.parse(raw);
    return Array.isArray(parsed) ? parsed.filter((item): item is string => typeof item === 'string') : [];
  } catch {
    return [];
  }
}

function toSeverity(value: string): Severity {
  return SEVERITIES.find(severity => severity === value) ?? 'LOW';
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (isRecord(value)) {
    return Object.fromEntries(
      Object.keys(value)
        .sort()
        .map(key => [key, sortKeys(value[key])])
    );
  }
  return value;
}

/** SHA-256 over the key-sorted JSON form of an entry. */
export function computeIntegrityHash(entry: Record<string, unknown>): string {
  return createHash('sha256').update(JSON.stringify(sortKeys(entry))).digest('hex');
}

function isCorruptionError(error: unknown): boolean {
  return (
    error instanceof Error && 'code' in error && typeof error.code === 'string' && CORRUPT_CODES.has(error.code)
  );
}

/** SQLite attack log. Payloads are PII-masked before they are written. */
export class IncidentStore {
  private readonly db: Database.Database;
  private readonly filePath: string;
  private readonly privacy: PrivacyConfig;
  private readonly logger: Logger;

  constructor(options: IncidentStoreOptions) {
    this.filePath = options.path;
    this.privacy = options.privacy;
    this.logger = options.logger ?? loggerModule;
    this.db = this.open();
  }

  persist(report: IncidentReport, category: IncidentCategory = 'attack'): StoredIncident {
    const payload = maskPii(report.payload, this.privacy);
    const evidence = maskPii(report.evidence, this.privacy);
    const masked: IncidentReport = { ...report, payload, evidence };
    delete masked.update;
    const integrityHash = computeIntegrityHash({ ...masked, category });

    const row: IncidentInsert = {
      incident_id: report.incidentId,
      category,
      ts: Date.parse(report.timestamp) || Date.now(),
      timestamp: report.timestamp,
      ip: report.ip,
      attack_type: report.attackType,
      severity: report.severity,
      description: report.description,
      risk_score: report.riskScore,
      risk_factors: JSON.stringify(report.riskFactors),
      event_type: report.eventType,
      user_id: report.userId,
      city: report.city,
      country: report.country,
      lat: report.lat,
      lon: report.lon,
      payload: JSON.stringify(payload),
      evidence: JSON.stringify(evidence),
      integrity_hash: integrityHash
    };
    this.db.prepare<IncidentInsert>(UPSERT_SQL).run(row);

    const stored = this.db
      .prepare<[string], IncidentRow>('SELECT * FROM incidents WHERE incident_id = ?')
      .get(report.incidentId);
    if (!stored) {
      throw new Error(`Incident ${report.incidentId} was not written`);
    }
    return mapRow(stored);
  }

  list(options: ListIncidentsOptions = {}): PaginatedIncidents {
    const limit = clampInteger(options.limit, 1, 500, 100);
    const offset = clampInteger(options.offset, 0, Number.MAX_SAFE_INTEGER, 0);
    const category = options.category;
    if (!category) {
      const rows = this.db
        .prepare<[number, number], IncidentRow>('SELECT * FROM incidents ORDER BY ts DESC, id DESC LIMIT ? OFFSET ?')
        .all(limit, offset);
      const totalRow = this.db.prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM incidents').get();
      return { items: rows.map(mapRow), total: totalRow?.total ?? 0 };
    }

    const rows = this.db
      .prepare<[string, number, number], IncidentRow>(
        'SELECT * FROM incidents WHERE category = ? ORDER BY ts DESC, id DESC LIMIT ? OFFSET ?'
      )
      .all(category, limit, offset);
    const totalRow = this.db
      .prepare<[string], { total: number }>('SELECT COUNT(*) AS total FROM incidents WHERE category = ?')
      .get(category);
    return { items: rows.map(mapRow), total: totalRow?.total ?? 0 };
  }

  get(incidentId: string): StoredIncident | null {
    const row = this.db
      .prepare<[string], IncidentRow>('SELECT * FROM incidents WHERE incident_id = ?')
      .get(incidentId);
    return row ? mapRow(row) : null;
  }

  close() {
    if (this.db.open) {
      this.db.close();
    }
  }

  private open(): Database.Database {
    const inMemory = this.filePath === ':memory:';
    if (!inMemory) {
      fs.mkdirSync(path.dirname(path.resolve(this.filePath)), { recursive: true });
    }

    let db: Database.Database | null = null;
    try {
      db = new Database(this.filePath);
      db.exec(SCHEMA);
      return db;
    } catch (error) {
      db?.close();
      if (inMemory || !isCorruptionError(error)) {
        throw error;
      }
      const aside = `${this.filePath}.corrupt-${Date.now()}`;
      fs.renameSync(this.filePath, aside);
      this.logger.warn({ err: error, path: this.filePath, movedTo: aside }, 'Incident database unreadable, starting fresh');
      const fresh = new Database(this.filePath);
      fresh.exec(SCHEMA);
      return fresh;
    }
  }
}

function clampInteger(value: number | undefined, min: number, max: number, fallback: number): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return fallback;
  }
  return Math.min(max, Math.max(min, Math.floor(value)));
}

function mapRow(row: IncidentRow): StoredIncident {
  return {
    id: row.id,
    incidentId: row.incident_id,
    category: row.category === 'website' ? 'website' : 'attack',
    timestamp: row.timestamp,
    ip: row.ip,
    attackType: row.attack_type,
    severity: toSeverity(row.severity),
    description: row.description,
    evidence: parseObject(row.evidence),
    riskScore: row.risk_score,
    riskFactors: parseStringList(row.risk_factors),
    eventType: row.event_type,
    userId: row.user_id,
    city: row.city,
    country: row.country,
    lat: row.lat,
    lon: row.lon,
    payload: parseObject(row.payload),
    integrityHash: row.integrity_hash
  };
}
