import type { IncomingMessage, ServerResponse } from 'node:http';
import { z } from 'zod';
import type { SecurityContext } from '../../context.js';
import loggerModule, { getAvailableLogLevels, getLogLevel, setLogLevel, type Logger } from '../../logger.js';
import { formatIssues, readJsonBody, respondAsync, sendJson, type Handler } from './shared.js';

const logLevelBodySchema = z.object({ level: z.string().trim().min(1) });

export interface MetricsRouterOptions {
  context: SecurityContext;
  logger?: Logger;
}

/** Metrics, Prometheus export and the operator controls that sit beside them. */
export class MetricsRouter {
  private readonly context: SecurityContext;
  private readonly logger: Logger;
  private readonly handlers: Handler[];

  constructor(options: MetricsRouterOptions) {
    this.context = options.context;
    this.logger = options.logger ?? loggerModule;
    this.handlers = [
      (req, res, url) => this.handleSnapshot(req, res, url),
      (req, res, url) => this.handlePrometheus(req, res, url),
      (req, res, url) => this.handleLogLevel(req, res, url),
      (req, res, url) => this.handleBreakerReset(req, res, url)
    ];
  }

  handle(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    return this.handlers.some(handler => handler(req, res, url));
  }

  private handleSnapshot(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'GET' || url.pathname !== '/api/metrics') {
      return false;
    }
    const { breaker, broadcaster, metrics } = this.context;
    sendJson(res, 200, {
      metrics: metrics.snapshot(),
      window: this.context.windowCounts(),
      breaker: { status: breaker.status(), ...breaker.state() },
      observers: broadcaster.observerCount
    });
    return true;
  }

  private handlePrometheus(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'GET' || url.pathname !== '/metrics') {
      return false;
    }
    res.writeHead(200, { 'Content-Type': 'text/plain; version=0.0.4; charset=utf-8' });
    res.end(this.context.metrics.exportForPrometheus({ prefix: this.context.config.app.name }));
    return true;
  }

  private handleLogLevel(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (url.pathname !== '/api/log-level') {
      return false;
    }
    if (req.method === 'GET') {
      sendJson(res, 200, { level: getLogLevel(), available: getAvailableLogLevels() });
      return true;
    }
    if (req.method !== 'PUT') {
      return false;
    }

    return respondAsync(
      res,
      async () => {
        const parsed = logLevelBodySchema.safeParse(await readJsonBody(req));
        if (!parsed.success) {
          sendJson(res, 400, { error: 'Invalid log level request', issues: formatIssues(parsed.error) });
          return;
        }
        try {
          const level = setLogLevel(parsed.data.level);
          sendJson(res, 200, { level });
        } catch (error) {
          sendJson(res, 400, { error: error instanceof Error ? error.message : String(error) });
        }
      },
      error => this.logger.error({ err: error }, 'Failed to update log level')
    );
  }

  private handleBreakerReset(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'POST' || url.pathname !== '/api/breaker/reset') {
      return false;
    }
    this.context.breaker.reset();
    sendJson(res, 200, { status: this.context.breaker.status() });
    return true;
  }
}
