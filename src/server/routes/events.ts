import { randomUUID } from 'node:crypto';
import type { IncomingMessage, ServerResponse } from 'node:http';
import { z } from 'zod';
import type { Observer } from '../../broadcast/broadcaster.js';
import type { SecurityContext } from '../../context.js';
import loggerModule, { type Logger } from '../../logger.js';
import type { EventInput, SubmitResult } from '../../services/threatResponder.js';
import type { IncidentCategory } from '../../store.js';
import {
  formatIssues,
  parseIntegerParam,
  readJsonBody,
  respondAsync,
  sendJson,
  type Handler
} from './shared.js';

const EVENT_PATHS = new Set(['/api/events', '/log_event']);
const HEARTBEAT_MS = 15_000;

const optionalString = (max: number) =>
  z
    .string()
    .max(max)
    .nullish()
    .transform(value => value ?? undefined);

export const eventBodySchema = z.object({
  event_type: z.string().trim().min(1).max(128),
  user_id: optionalString(256),
  data: z.record(z.unknown()).default({}),
  source_ip: z
    .string()
    .trim()
    .max(64)
    .nullish()
    .transform(value => (value ? value : undefined)),
  user_agent: optionalString(512),
  session_id: optionalString(256),
  headers: z
    .record(z.string())
    .nullish()
    .transform(value => value ?? undefined)
});

export type EventBody = z.infer<typeof eventBodySchema>;

export interface EventsRouterOptions {
  context: SecurityContext;
  logger?: Logger;
}

/** Resolves the client address: explicit body field, then X-Forwarded-For, then the socket. */
export function resolveClientIp(body: Pick<EventBody, 'source_ip'>, req: IncomingMessage): string {
  if (body.source_ip) {
    return body.source_ip;
  }
  const forwarded = req.headers['x-forwarded-for'];
  const header = Array.isArray(forwarded) ? forwarded[0] : forwarded;
  const first = header?.split(',')[0]?.trim();
  if (first) {
    return first;
  }
  return req.socket.remoteAddress ?? 'unknown';
}

function toEventInput(body: EventBody, sourceIp: string): EventInput {
  return {
    eventType: body.event_type,
    userId: body.user_id,
    payload: body.data,
    sourceIp,
    headers: body.headers,
    sessionId: body.session_id,
    userAgent: body.user_agent
  };
}

function sendSubmitResult(res: ServerResponse, result: SubmitResult) {
  switch (result.status) {
    case 'no_threat':
      sendJson(res, 200, { status: 'no_threat' });
      return;
    case 'threat_detected':
      sendJson(res, 200, { status: 'threat_detected', details: result.details });
      return;
    case 'rejected':
      if (result.httpStatus === 429) {
        sendJson(
          res,
          429,
          { status: 'rejected', reason: result.reason, retryAfterMs: result.retryAfterMs },
          { 'Retry-After': String(Math.max(1, Math.ceil(result.retryAfterMs / 1000))) }
        );
        return;
      }
      sendJson(res, 403, {
        status: 'rejected',
        reason: result.reason,
        message: 'Access denied due to high-risk activity.',
        details: result.details
      });
  }
}

function parseCategory(value: string | null): IncidentCategory | undefined {
  return value === 'attack' || value === 'website' ? value : undefined;
}

export class EventsRouter {
  private readonly context: SecurityContext;
  private readonly logger: Logger;
  private readonly handlers: Handler[];
  private readonly heartbeats = new Map<string, NodeJS.Timeout>();

  constructor(options: EventsRouterOptions) {
    this.context = options.context;
    this.logger = options.logger ?? loggerModule;
    this.handlers = [
      (req, res, url) => this.handleSubmit(req, res, url),
      (req, res, url) => this.handleStream(req, res, url),
      (req, res, url) => this.handleAttackLog(req, res, url),
      (req, res, url) => this.handleAnalytics(req, res, url),
      (req, res, url) => this.handleSimulation(req, res, url)
    ];
  }

  handle(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    return this.handlers.some(handler => handler(req, res, url));
  }

  close() {
    for (const [id, heartbeat] of this.heartbeats) {
      clearInterval(heartbeat);
      this.context.broadcaster.disconnect(id);
    }
    this.heartbeats.clear();
  }

  private handleSubmit(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'POST' || !EVENT_PATHS.has(url.pathname)) {
      return false;
    }

    return respondAsync(
      res,
      async () => {
        const parsed = eventBodySchema.safeParse(await readJsonBody(req));
        if (!parsed.success) {
          sendJson(res, 400, { error: 'Invalid event', issues: formatIssues(parsed.error) });
          return;
        }
        const sourceIp = resolveClientIp(parsed.data, req);
        const result = await this.context.responder.submitEvent(toEventInput(parsed.data, sourceIp));
        sendSubmitResult(res, result);
      },
      error => this.logger.error({ err: error, path: url.pathname }, 'Event submission failed')
    );
  }

  private handleStream(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'GET' || url.pathname !== '/api/events/stream') {
      return false;
    }

    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive'
    });
    res.write(': connected\n\n');

    const id = randomUUID();
    const observer: Observer = {
      id,
      send: payload => {
        if (res.writableEnded || res.destroyed) {
          throw new Error('stream closed');
        }
        res.write(`data: ${payload}\n\n`);
      },
      close: () => {
        if (!res.writableEnded) {
          res.end();
        }
      }
    };
    this.context.broadcaster.connect(observer);

    const heartbeat = setInterval(() => {
      if (res.writableEnded || res.destroyed) {
        cleanup();
        return;
      }
      res.write(`: heartbeat ${Date.now()}\n\n`);
    }, HEARTBEAT_MS);
    heartbeat.unref();
    this.heartbeats.set(id, heartbeat);

    let cleanedUp = false;
    const cleanup = () => {
      if (cleanedUp) {
        return;
      }
      cleanedUp = true;
      clearInterval(heartbeat);
      this.heartbeats.delete(id);
      this.context.broadcaster.disconnect(id);
    };

    req.on('close', cleanup);
    res.on('close', cleanup);
    res.on('error', cleanup);
    return true;
  }

  private handleAttackLog(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'GET' || url.pathname !== '/api/attack_log') {
      return false;
    }
    const page = this.context.store.list({
      limit: parseIntegerParam(url.searchParams, 'limit'),
      offset: parseIntegerParam(url.searchParams, 'offset'),
      category: parseCategory(url.searchParams.get('category'))
    });
    sendJson(res, 200, page);
    return true;
  }

  private handleAnalytics(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'GET' || url.pathname !== '/api/analytics') {
      return false;
    }
    sendJson(res, 200, this.context.analytics());
    return true;
  }

  private handleSimulation(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'POST' || url.pathname !== '/api/simulation') {
      return false;
    }
    const result = this.context.simulation.start();
    if (result.status === 'already_running') {
      sendJson(res, 409, { status: 'already_running', message: 'A simulation is already running' });
      return true;
    }
    sendJson(res, 202, { status: 'scheduled', message: 'Attack simulation scheduled' });
    return true;
  }
}
