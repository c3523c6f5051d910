import fs from 'node:fs';
import path from 'node:path';
import config from 'config';
import type { Severity } from '../types.js';

export type AppConfig = {
  name: string;
};

export type LoggingConfig = {
  level: string;
};

export type DatabaseConfig = {
  path: string;
};

export type ServerConfig = {
  port: number;
  host: string;
  staticDir?: string;
};

export type RiskConfig = {
  additionalWeightFactor: number;
  criticalUpgradeScore: number;
};

export type RateLimitConfig = {
  durationMs: number;
  scoreThreshold: number;
};

export type CircuitBreakerConfig = {
  failureThreshold: number;
  windowMs: number;
  cooldownMs: number;
  timeoutMs: number;
};

export type ModelDetectorConfig = {
  endpoint?: string;
  model?: string;
};

export type ThreatIntelConfig = {
  blockedIps: string[];
};

export type BruteForceConfig = {
  windowMs: number;
  highThreshold: number;
  criticalThreshold: number;
};

export type CardTestingConfig = {
  windowMs: number;
  failureThreshold: number;
};

export type PaymentConfig = {
  amountThreshold: number;
};

export type DetectionConfig = {
  severityWeights: Record<Severity, number>;
  risk: RiskConfig;
  rateLimit: RateLimitConfig;
  circuitBreaker: CircuitBreakerConfig;
  model?: ModelDetectorConfig;
  threatIntel?: ThreatIntelConfig;
  bruteForce?: BruteForceConfig;
  cardTesting?: CardTestingConfig;
  payment?: PaymentConfig;
};

export type MetricsWindowConfig = {
  intervalMs: number;
  windowMs: number;
  maxSamples: number;
};

export type MonitorsConfig = {
  minIntervalMs: number;
  defaultIntervalMs: number;
  historyLimit: number;
  requestTimeoutMs: number;
  slowResponseMs: number;
};

export type GeolocationConfig = {
  endpoint?: string;
};

export type PrivacyConfig = {
  piiFields: string[];
  paymentFields: string[];
};

export type ThreatwatchConfig = {
  app: AppConfig;
  logging: LoggingConfig;
  database: DatabaseConfig;
  server: ServerConfig;
  detection: DetectionConfig;
  metrics: MetricsWindowConfig;
  monitors: MonitorsConfig;
  geolocation?: GeolocationConfig;
  privacy: PrivacyConfig;
};

export class ConfigValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(issues.join('; '));
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}

type JsonType = 'object' | 'number' | 'string' | 'boolean' | 'array';

type JsonSchema = {
  type: JsonType;
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean;
  items?: JsonSchema;
  minimum?: number;
  maximum?: number;
};

const positiveNumber: JsonSchema = { type: 'number', minimum: 1 };
const ratio: JsonSchema = { type: 'number', minimum: 0, maximum: 1 };
const stringList: JsonSchema = { type: 'array', items: { type: 'string' } };

const threatwatchConfigSchema: JsonSchema = {
  type: 'object',
  required: ['app', 'logging', 'database', 'server', 'detection', 'metrics', 'monitors', 'privacy'],
  additionalProperties: true,
  properties: {
    app: {
      type: 'object',
      required: ['name'],
      additionalProperties: false,
      properties: { name: { type: 'string' } }
    },
    logging: {
      type: 'object',
      required: ['level'],
      additionalProperties: false,
      properties: { level: { type: 'string' } }
    },
    database: {
      type: 'object',
      required: ['path'],
      additionalProperties: false,
      properties: { path: { type: 'string' } }
    },
    server: {
      type: 'object',
      required: ['port', 'host'],
      additionalProperties: false,
      properties: {
        port: { type: 'number', minimum: 0, maximum: 65535 },
        host: { type: 'string' },
        staticDir: { type: 'string' }
      }
    },
    detection: {
      type: 'object',
      required: ['severityWeights', 'risk', 'rateLimit', 'circuitBreaker'],
      additionalProperties: false,
      properties: {
        severityWeights: {
          type: 'object',
          required: ['LOW', 'MEDIUM', 'HIGH', 'CRITICAL'],
          additionalProperties: false,
          properties: { LOW: ratio, MEDIUM: ratio, HIGH: ratio, CRITICAL: ratio }
        },
        risk: {
          type: 'object',
          required: ['additionalWeightFactor', 'criticalUpgradeScore'],
          additionalProperties: false,
          properties: { additionalWeightFactor: ratio, criticalUpgradeScore: ratio }
        },
        rateLimit: {
          type: 'object',
          required: ['durationMs', 'scoreThreshold'],
          additionalProperties: false,
          properties: { durationMs: positiveNumber, scoreThreshold: ratio }
        },
        circuitBreaker: {
          type: 'object',
          required: ['failureThreshold', 'windowMs', 'cooldownMs', 'timeoutMs'],
          additionalProperties: false,
          properties: {
            failureThreshold: positiveNumber,
            windowMs: positiveNumber,
            cooldownMs: positiveNumber,
            timeoutMs: positiveNumber
          }
        },
        model: {
          type: 'object',
          additionalProperties: false,
          properties: { endpoint: { type: 'string' }, model: { type: 'string' } }
        },
        threatIntel: {
          type: 'object',
          required: ['blockedIps'],
          additionalProperties: false,
          properties: { blockedIps: stringList }
        },
        bruteForce: {
          type: 'object',
          required: ['windowMs', 'highThreshold', 'criticalThreshold'],
          additionalProperties: false,
          properties: {
            windowMs: positiveNumber,
            highThreshold: positiveNumber,
            criticalThreshold: positiveNumber
          }
        },
        cardTesting: {
          type: 'object',
          required: ['windowMs', 'failureThreshold'],
          additionalProperties: false,
          properties: { windowMs: positiveNumber, failureThreshold: positiveNumber }
        },
        payment: {
          type: 'object',
          required: ['amountThreshold'],
          additionalProperties: false,
          properties: { amountThreshold: { type: 'number', minimum: 0 } }
        }
      }
    },
    metrics: {
      type: 'object',
      required: ['intervalMs', 'windowMs', 'maxSamples'],
      additionalProperties: false,
      properties: {
        intervalMs: positiveNumber,
        windowMs: positiveNumber,
        maxSamples: positiveNumber
      }
    },
    monitors: {
      type: 'object',
      required: ['minIntervalMs', 'defaultIntervalMs', 'historyLimit', 'requestTimeoutMs', 'slowResponseMs'],
      additionalProperties: false,
      properties: {
        minIntervalMs: { type: 'number', minimum: 30_000 },
        defaultIntervalMs: positiveNumber,
        historyLimit: positiveNumber,
        requestTimeoutMs: positiveNumber,
        slowResponseMs: positiveNumber
      }
    },
    geolocation: {
      type: 'object',
      additionalProperties: false,
      properties: { endpoint: { type: 'string' } }
    },
    privacy: {
      type: 'object',
      required: ['piiFields', 'paymentFields'],
      additionalProperties: false,
      properties: { piiFields: stringList, paymentFields: stringList }
    }
  }
};

function validateAgainstSchema(schema: JsonSchema, value: unknown, pathLabel: string): string[] {
  switch (schema.type) {
    case 'object': {
      if (typeof value !== 'object' || value === null || Array.isArray(value)) {
        return [`${pathLabel} must be an object`];
      }
      const record = new Map(Object.entries(value));
      const errors: string[] = [];
      for (const key of schema.required ?? []) {
        if (!record.has(key)) {
          errors.push(`${pathLabel}.${key} is required`);
        }
      }
      const known = schema.properties ?? {};
      if (schema.additionalProperties === false) {
        for (const key of record.keys()) {
          if (!(key in known)) {
            errors.push(`${pathLabel}.${key} is not allowed`);
          }
        }
      }
      for (const [key, child] of Object.entries(known)) {
        if (record.has(key)) {
          errors.push(...validateAgainstSchema(child, record.get(key), `${pathLabel}.${key}`));
        }
      }
      return errors;
    }
    case 'array': {
      if (!Array.isArray(value)) {
        return [`${pathLabel} must be an array`];
      }
      const items = schema.items;
      if (!items) {
        return [];
      }
      return value.flatMap((item, index) => validateAgainstSchema(items, item, `${pathLabel}[${index}]`));
    }
    case 'number': {
      if (typeof value !== 'number' || Number.isNaN(value)) {
        return [`${pathLabel} must be a number`];
      }
      const errors: string[] = [];
      if (typeof schema.minimum === 'number' && value < schema.minimum) {
        errors.push(`${pathLabel} must be >= ${schema.minimum}`);
      }
      if (typeof schema.maximum === 'number' && value > schema.maximum) {
        errors.push(`${pathLabel} must be <= ${schema.maximum}`);
      }
      return errors;
    }
    case 'string':
      return typeof value === 'string' ? [] : [`${pathLabel} must be a string`];
    case 'boolean':
      return typeof value === 'boolean' ? [] : [`${pathLabel} must be a boolean`];
    default:
      return [];
  }
}

function validateLogicalConfig(candidate: ThreatwatchConfig): string[] {
  const messages: string[] = [];
  const weights = candidate.detection.severityWeights;
  if (!(weights.LOW < weights.MEDIUM && weights.MEDIUM < weights.HIGH && weights.HIGH < weights.CRITICAL)) {
    messages.push('config.detection.severityWeights must increase from LOW to CRITICAL');
  }

  const counts: Array<[string, number | undefined]> = [
    ['detection.circuitBreaker.failureThreshold', candidate.detection.circuitBreaker.failureThreshold],
    ['detection.bruteForce.highThreshold', candidate.detection.bruteForce?.highThreshold],
    ['detection.bruteForce.criticalThreshold', candidate.detection.bruteForce?.criticalThreshold],
    ['detection.cardTesting.failureThreshold', candidate.detection.cardTesting?.failureThreshold],
    ['metrics.maxSamples', candidate.metrics.maxSamples],
    ['monitors.historyLimit', candidate.monitors.historyLimit]
  ];
  for (const [key, value] of counts) {
    if (value !== undefined && !Number.isInteger(value)) {
      messages.push(`config.${key} must be an integer`);
    }
  }

  const bruteForce = candidate.detection.bruteForce;
  if (bruteForce && bruteForce.criticalThreshold < bruteForce.highThreshold) {
    messages.push('config.detection.bruteForce.criticalThreshold must be >= highThreshold');
  }

  const monitors = candidate.monitors;
  if (monitors.defaultIntervalMs < monitors.minIntervalMs) {
    messages.push('config.monitors.defaultIntervalMs must be >= minIntervalMs');
  }

  if (candidate.metrics.windowMs < candidate.metrics.intervalMs) {
    messages.push('config.metrics.windowMs must be >= intervalMs');
  }

  return messages;
}

function assertSchema(candidate: unknown): asserts candidate is ThreatwatchConfig {
  const errors = validateAgainstSchema(threatwatchConfigSchema, candidate, 'config');
  if (errors.length > 0) {
    throw new ConfigValidationError(errors);
  }
}

export function validateConfig(candidate: unknown): asserts candidate is ThreatwatchConfig {
  assertSchema(candidate);
  const logical = validateLogicalConfig(candidate);
  if (logical.length > 0) {
    throw new ConfigValidationError(logical);
  }
}

export function parseConfig(contents: string): ThreatwatchConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse configuration: ${message}`);
  }

  validateConfig(parsed);
  return parsed;
}

export function loadConfigFromFile(filePath: string): ThreatwatchConfig {
  const contents = fs.readFileSync(path.resolve(filePath), 'utf-8');
  return parseConfig(contents);
}

/** Validated view of the `config` package's merged configuration (default.json + NODE_ENV overlay). */
export function loadConfig(): ThreatwatchConfig {
  const loaded: unknown = config.util.toObject(config);
  validateConfig(loaded);
  return loaded;
}
