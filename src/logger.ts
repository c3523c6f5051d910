import pino from 'pino';
import config from 'config';
import metrics from './metrics/index.js';

const level = config.has('logging.level') ? config.get<string>('logging.level') : 'info';
const name = config.has('app.name') ? config.get<string>('app.name') : 'threatwatch';

const AVAILABLE_LOG_LEVELS = new Set(
  [...Object.keys(pino.levels.values), 'silent'].map(value => value.toLowerCase())
);

function extractDetector(args: unknown[]): string | undefined {
  for (const value of args) {
    if (value && typeof value === 'object' && 'detector' in value) {
      const detector = value.detector;
      if (typeof detector === 'string' && detector.length > 0) {
        return detector;
      }
    }
  }
  return undefined;
}

const logger = pino({
  name,
  level,
  hooks: {
    logMethod(inputArgs, method, logLevel) {
      const resolvedLevel = pino.levels.labels[logLevel] ?? String(logLevel);
      metrics.incrementLogLevel(resolvedLevel, { detector: extractDetector(inputArgs) });
      return method.apply(this, inputArgs);
    }
  }
});

type LogCall = (objOrMessage: object | string, message?: string) => void;

export interface Logger {
  debug: LogCall;
  info: LogCall;
  warn: LogCall;
  error: LogCall;
}

function normalizeLevel(value: string) {
  return value.trim().toLowerCase();
}

export function getLogLevel(): string {
  return logger.level;
}

export function getAvailableLogLevels(): string[] {
  return Array.from(AVAILABLE_LOG_LEVELS).sort();
}

export function setLogLevel(nextLevel: string): string {
  const normalized = normalizeLevel(nextLevel);
  if (!AVAILABLE_LOG_LEVELS.has(normalized)) {
    const available = getAvailableLogLevels().join(', ');
    throw new Error(`Unknown log level "${nextLevel}" (available: ${available})`);
  }

  const previous = logger.level;
  if (previous === normalized) {
    return previous;
  }

  logger.level = normalized;
  logger.info({ level: logger.level, previous }, 'Log level updated');
  return logger.level;
}

export default logger;
