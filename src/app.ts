import { fileURLToPath } from 'node:url';
import { loadConfig } from './config/index.js';
import { SecurityContext } from './context.js';
import logger from './logger.js';
import metrics, { type MetricsSnapshot } from './metrics/index.js';
import { startHttpServer, type HealthReport, type HttpServerRuntime } from './server/http.js';

type HealthStatus = 'ok' | 'starting' | 'stopping' | 'degraded';

export type HealthIndicatorContext = {
  service: {
    status: string;
    startedAt: number | null;
  };
  metrics?: MetricsSnapshot;
  metricsCreatedAt?: string;
};

export type HealthIndicatorResult = {
  status: HealthStatus;
  details?: Record<string, unknown>;
};

export type HealthIndicator = (context: HealthIndicatorContext) =>
  | HealthIndicatorResult
  | Promise<HealthIndicatorResult>;

export type ShutdownHookContext = {
  reason: string;
  signal?: NodeJS.Signals;
};

export type ShutdownHook = (context: ShutdownHookContext) => void | Promise<void>;

type RegisteredIndicator = {
  name: string;
  indicator: HealthIndicator;
};

type RegisteredHook = {
  name: string;
  hook: ShutdownHook;
};

const healthIndicators: RegisteredIndicator[] = [];
const shutdownHooks: RegisteredHook[] = [];

export function registerHealthIndicator(name: string, indicator: HealthIndicator) {
  const existingIndex = healthIndicators.findIndex(entry => entry.name === name);
  const entry: RegisteredIndicator = { name, indicator };
  if (existingIndex >= 0) {
    healthIndicators[existingIndex] = entry;
  } else {
    healthIndicators.push(entry);
  }

  return () => {
    const index = healthIndicators.findIndex(item => item.name === name);
    if (index >= 0) {
      healthIndicators.splice(index, 1);
    }
  };
}

export async function collectHealthChecks(context: HealthIndicatorContext) {
  const results: Array<{ name: string; status: HealthStatus; details?: Record<string, unknown> }> = [];
  const metricsSnapshot = context.metrics ?? metrics.snapshot();
  const metricsCapturedAt = metricsSnapshot.createdAt;
  const enrichedContext: HealthIndicatorContext = {
    ...context,
    metrics: metricsSnapshot,
    metricsCreatedAt: metricsCapturedAt
  };
  for (const entry of healthIndicators) {
    try {
      const result = await entry.indicator(enrichedContext);
      results.push({ name: entry.name, status: result.status, details: result.details });
    } catch (error) {
      results.push({
        name: entry.name,
        status: 'degraded',
        details: {
          error: error instanceof Error ? error.message : String(error)
        }
      });
    }
  }
  return results;
}

export function registerShutdownHook(name: string, hook: ShutdownHook) {
  const existingIndex = shutdownHooks.findIndex(entry => entry.name === name);
  const entry: RegisteredHook = { name, hook };
  if (existingIndex >= 0) {
    shutdownHooks[existingIndex] = entry;
  } else {
    shutdownHooks.push(entry);
  }

  return () => {
    const index = shutdownHooks.findIndex(item => item.name === name);
    if (index >= 0) {
      shutdownHooks.splice(index, 1);
    }
  };
}

export async function runShutdownHooks(context: ShutdownHookContext) {
  const results: Array<{ name: string; status: 'ok' | 'error'; error?: Error }> = [];
  const hooks = [...shutdownHooks].reverse();
  for (const entry of hooks) {
    try {
      await entry.hook(context);
      results.push({ name: entry.name, status: 'ok' });
    } catch (error) {
      results.push({
        name: entry.name,
        status: 'error',
        error: error instanceof Error ? error : new Error(String(error))
      });
    }
  }
  return results;
}

export function resetAppLifecycle() {
  healthIndicators.splice(0, healthIndicators.length);
  shutdownHooks.splice(0, shutdownHooks.length);
}

export function registerContextHealthIndicators(context: SecurityContext) {
  const unregister = [
    registerHealthIndicator('circuit-breaker', () => {
      const status = context.breaker.status();
      const state = context.breaker.state();
      return {
        status: status === 'OPEN' ? 'degraded' : 'ok',
        details: { breaker: status, failureCount: state.failureCount, lastError: state.lastError || null }
      };
    }),
    registerHealthIndicator('monitors', () => {
      const monitors = context.monitors.list();
      const down = monitors.filter(monitor => monitor.latest?.status === 'down').map(monitor => monitor.targetId);
      return { status: 'ok', details: { monitored: monitors.length, down } };
    }),
    registerHealthIndicator('incident-store', ({ metrics: snapshot }) => {
      const persistFailures = snapshot?.incidents.persistFailures ?? 0;
      return { status: persistFailures > 0 ? 'degraded' : 'ok', details: { persistFailures } };
    }),
    registerHealthIndicator('broadcast', () => ({
      status: context.metricsTask.running ? 'ok' : 'degraded',
      details: { observers: context.broadcaster.observerCount, metricsTask: context.metricsTask.running }
    }))
  ];
  return () => {
    for (const remove of unregister) {
      remove();
    }
  };
}

export async function aggregateHealth(context: HealthIndicatorContext): Promise<HealthReport> {
  const checks = await collectHealthChecks(context);
  const status: HealthReport['status'] =
    context.service.status === 'stopping'
      ? 'stopping'
      : checks.every(check => check.status === 'ok')
        ? 'ok'
        : 'degraded';
  return { status, checks };
}

export type RunningApp = {
  context: SecurityContext;
  http: HttpServerRuntime;
  stop: (context: ShutdownHookContext) => Promise<void>;
};

export async function bootstrap(): Promise<RunningApp> {
  const config = loadConfig();
  logger.info({ name: config.app.name }, 'Bootstrap starting');

  const service: HealthIndicatorContext['service'] = { status: 'starting', startedAt: null };
  const context = new SecurityContext({ config });
  context.start();
  registerContextHealthIndicators(context);

  const http = await startHttpServer({
    context,
    port: config.server.port,
    host: config.server.host,
    staticDir: config.server.staticDir,
    health: () => aggregateHealth({ service })
  });

  registerShutdownHook('context', () => context.close());
  registerShutdownHook('http', () => http.close());

  service.status = 'running';
  service.startedAt = Date.now();
  logger.info({ port: http.port }, 'Bootstrap completed');

  let stopping: Promise<void> | null = null;
  const stop = (shutdown: ShutdownHookContext) => {
    if (!stopping) {
      service.status = 'stopping';
      stopping = runShutdownHooks(shutdown).then(results => {
        for (const result of results) {
          if (result.status === 'error') {
            logger.error({ err: result.error, hook: result.name }, 'Shutdown hook failed');
          }
        }
        logger.info({ reason: shutdown.reason }, 'Shutdown complete');
      });
    }
    return stopping;
  };

  return { context, http, stop };
}

if (process.argv[1] && fileURLToPath(import.meta.url) === process.argv[1]) {
  bootstrap()
    .then(app => {
      for (const signal of ['SIGINT', 'SIGTERM'] as const) {
        process.once(signal, () => {
          void app.stop({ reason: 'signal', signal });
        });
      }
    })
    .catch((error: unknown) => {
      logger.error({ err: error }, 'Bootstrap failed');
      process.exitCode = 1;
    });
}
