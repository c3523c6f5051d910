import type { IncomingMessage, ServerResponse } from 'node:http';
import { z } from 'zod';
import loggerModule, { type Logger } from '../../logger.js';
import { InvalidMonitorTargetError, type MonitorRegistry } from '../../monitors/registry.js';
import { formatIssues, readJsonBody, respondAsync, sendJson, type Handler } from './shared.js';

const TARGET_PATH = /^\/api\/monitors\/([^/]+)$/;

export const monitorBodySchema = z.object({
  url: z.string().trim().min(1).max(2048),
  // Seconds, as the dashboard sends it; clamped to the registry minimum.
  check_interval: z.number().positive().optional(),
  expected_keywords: z.array(z.string().min(1)).max(20).default([])
});

export interface MonitorsRouterOptions {
  monitors: MonitorRegistry;
  logger?: Logger;
}

export class MonitorsRouter {
  private readonly monitors: MonitorRegistry;
  private readonly logger: Logger;
  private readonly handlers: Handler[];

  constructor(options: MonitorsRouterOptions) {
    this.monitors = options.monitors;
    this.logger = options.logger ?? loggerModule;
    this.handlers = [
      (req, res, url) => this.handleStart(req, res, url),
      (req, res, url) => this.handleList(req, res, url),
      (req, res, url) => this.handleHistory(req, res, url),
      (req, res, url) => this.handleStop(req, res, url)
    ];
  }

  handle(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    return this.handlers.some(handler => handler(req, res, url));
  }

  private handleStart(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'POST' || url.pathname !== '/api/monitors') {
      return false;
    }

    return respondAsync(
      res,
      async () => {
        const parsed = monitorBodySchema.safeParse(await readJsonBody(req));
        if (!parsed.success) {
          sendJson(res, 400, { error: 'Invalid monitor request', issues: formatIssues(parsed.error) });
          return;
        }
        const { url: target, check_interval: seconds, expected_keywords: expectedKeywords } = parsed.data;
        try {
          const result = this.monitors.start(target, {
            intervalMs: seconds === undefined ? undefined : seconds * 1000,
            expectedKeywords
          });
          sendJson(res, 200, result);
        } catch (error) {
          if (error instanceof InvalidMonitorTargetError) {
            sendJson(res, 400, { error: error.message });
            return;
          }
          throw error;
        }
      },
      error => this.logger.error({ err: error }, 'Failed to start monitor')
    );
  }

  private handleList(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'GET' || url.pathname !== '/api/monitors') {
      return false;
    }
    sendJson(res, 200, { monitors: this.monitors.list() });
    return true;
  }

  private handleHistory(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'GET') {
      return false;
    }
    const target = matchTarget(url);
    if (target === null) {
      return false;
    }
    sendJson(res, 200, { targetId: target, history: this.monitors.history(target) });
    return true;
  }

  private handleStop(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'DELETE') {
      return false;
    }
    const target = matchTarget(url);
    if (target === null) {
      return false;
    }

    return respondAsync(
      res,
      async () => {
        const result = await this.monitors.stop(target);
        sendJson(res, result.status === 'stopped' ? 200 : 404, result);
      },
      error => this.logger.error({ err: error, target }, 'Failed to stop monitor')
    );
  }
}

function matchTarget(url: URL): string | null {
  const match = TARGET_PATH.exec(url.pathname);
  if (!match?.[1]) {
    return null;
  }
  try {
    return decodeURIComponent(match[1]);
  } catch {
    return null;
  }
}
