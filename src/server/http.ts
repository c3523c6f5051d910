import http, { IncomingMessage, ServerResponse } from 'node:http';
import fs from 'node:fs';
import path from 'node:path';
import { URL } from 'node:url';
import type { SecurityContext } from '../context.js';
import loggerModule, { type Logger } from '../logger.js';
import { EventsRouter } from './routes/events.js';
import { MetricsRouter } from './routes/metrics.js';
import { MonitorsRouter } from './routes/monitors.js';
import { sendJson } from './routes/shared.js';

export type HealthReport = {
  status: 'ok' | 'degraded' | 'starting' | 'stopping';
  checks: Array<{ name: string; status: string; details?: Record<string, unknown> }>;
};

export interface HttpServerOptions {
  context: SecurityContext;
  port?: number;
  host?: string;
  staticDir?: string;
  health?: () => Promise<HealthReport>;
  logger?: Logger;
}

export interface HttpServerRuntime {
  server: http.Server;
  port: number;
  close: () => Promise<void>;
}

async function defaultHealth(): Promise<HealthReport> {
  return { status: 'ok', checks: [] };
}

export async function startHttpServer(options: HttpServerOptions): Promise<HttpServerRuntime> {
  const port = options.port ?? 8000;
  const host = options.host ?? '0.0.0.0';
  const staticDir = options.staticDir ?? path.resolve(process.cwd(), 'public');
  const logger = options.logger ?? loggerModule;
  const health = options.health ?? defaultHealth;

  const eventsRouter = new EventsRouter({ context: options.context, logger });
  const routers = [
    eventsRouter,
    new MonitorsRouter({ monitors: options.context.monitors, logger }),
    new MetricsRouter({ context: options.context, logger })
  ];

  const server = http.createServer((req, res) => {
    try {
      const url = new URL(req.url ?? '/', 'http://localhost');

      if (req.method === 'GET' && url.pathname === '/health') {
        health()
          .then(report => sendJson(res, report.status === 'ok' ? 200 : 503, report))
          .catch((error: unknown) => {
            logger.error({ err: error }, 'Health check failed');
            sendJson(res, 500, { error: 'Internal server error' });
          });
        return;
      }

      if (routers.some(router => router.handle(req, res, url))) {
        return;
      }

      if (serveStatic(req, res, url, staticDir, logger)) {
        return;
      }

      sendJson(res, 404, { error: 'Not found' });
    } catch (error) {
      logger.error({ err: error }, 'HTTP request failed');
      sendJson(res, 500, { error: 'Internal server error' });
    }
  });

  server.on('close', () => {
    eventsRouter.close();
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve();
    });
  });

  const address = server.address();
  const actualPort = typeof address === 'object' && address ? address.port : port;

  logger.info({ port: actualPort, host }, 'HTTP server listening');

  return {
    server,
    port: actualPort,
    close: () =>
      new Promise<void>((resolve, reject) => {
        eventsRouter.close();
        server.closeAllConnections();
        server.close(error => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
      })
  };
}

function serveStatic(
  req: IncomingMessage,
  res: ServerResponse,
  url: URL,
  directory: string,
  logger: Logger
): boolean {
  if (req.method !== 'GET' && req.method !== 'HEAD') {
    return false;
  }

  let pathname: string;
  try {
    pathname = decodeURIComponent(url.pathname);
  } catch {
    return false;
  }
  if (pathname === '/' || pathname === '') {
    pathname = '/index.html';
  } else if (pathname.endsWith('/')) {
    pathname = `${pathname}index.html`;
  }

  const normalized = path.normalize(pathname).replace(/^[/\\]+/, '');
  const root = path.resolve(directory);
  const candidatePath = path.resolve(root, normalized);
  const rootWithSep = root.endsWith(path.sep) ? root : `${root}${path.sep}`;
  if (candidatePath !== root && !candidatePath.startsWith(rootWithSep)) {
    return false;
  }

  let stats: fs.Stats;
  try {
    stats = fs.statSync(candidatePath);
  } catch {
    return false;
  }

  let resolvedPath = candidatePath;
  if (stats.isDirectory()) {
    resolvedPath = path.join(candidatePath, 'index.html');
    try {
      stats = fs.statSync(resolvedPath);
    } catch {
      return false;
    }
  }

  if (!stats.isFile()) {
    return false;
  }

  const contentType = getContentType(resolvedPath);
  res.writeHead(200, { 'Content-Type': contentType });

  if (req.method === 'HEAD') {
    res.end();
    return true;
  }

  const stream = fs.createReadStream(resolvedPath);
  stream.on('error', error => {
    logger.error({ err: error }, 'Failed to read static asset');
    if (!res.headersSent) {
      res.statusCode = 500;
    }
    res.end('Internal Server Error');
  });

  stream.pipe(res);
  return true;
}

function getContentType(filePath: string): string {
  const ext = path.extname(filePath).toLowerCase();
  switch (ext) {
    case '.html':
      return 'text/html; charset=utf-8';
    case '.js':
      return 'application/javascript; charset=utf-8';
    case '.css':
      return 'text/css; charset=utf-8';
    case '.json':
      return 'application/json; charset=utf-8';
    case '.png':
      return 'image/png';
    case '.jpg':
    case '.jpeg':
      return 'image/jpeg';
    case '.gif':
      return 'image/gif';
    case '.svg':
      return 'image/svg+xml';
    default:
      return 'application/octet-stream';
  }
}
