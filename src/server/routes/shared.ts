import type { IncomingMessage, ServerResponse } from 'node:http';
import type { ZodError } from 'zod';

export type Handler = (req: IncomingMessage, res: ServerResponse, url: URL) => boolean;

const MAX_BODY_BYTES = 1024 * 1024;

export class RequestBodyError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode = 400) {
    super(message);
    this.name = 'RequestBodyError';
    this.statusCode = statusCode;
  }
}

export function readJsonBody(req: IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;

    req.on('data', (chunk: Buffer | string) => {
      const buffer = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
      size += buffer.length;
      if (size > MAX_BODY_BYTES) {
        reject(new RequestBodyError('Request body too large', 413));
        req.destroy();
        return;
      }
      chunks.push(buffer);
    });

    req.on('end', () => {
      const raw = Buffer.concat(chunks).toString('utf8');
      if (!raw) {
        resolve({});
        return;
      }
      try {
        resolve(JSON.parse(raw));
      } catch {
        reject(new RequestBodyError('Malformed JSON body'));
      }
    });

    req.on('error', reject);
  });
}

export function sendJson(res: ServerResponse, status: number, payload: unknown, headers: Record<string, string> = {}) {
  if (!res.headersSent) {
    res.writeHead(status, { 'Content-Type': 'application/json', ...headers });
  }
  res.end(JSON.stringify(payload));
}

export function formatIssues(error: ZodError): string[] {
  return error.issues.map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message));
}

/** Runs an async handler body, mapping body errors to 4xx and anything else to 500. */
export function respondAsync(
  res: ServerResponse,
  work: () => Promise<void>,
  onError: (error: unknown) => void
): true {
  void work().catch((error: unknown) => {
    if (error instanceof RequestBodyError) {
      sendJson(res, error.statusCode, { error: error.message });
      return;
    }
    onError(error);
    sendJson(res, 500, { error: 'Internal server error' });
  });
  return true;
}

export function parseIntegerParam(params: URLSearchParams, name: string): number | undefined {
  const raw = params.get(name);
  if (raw === null || raw.trim() === '') {
    return undefined;
  }
  const value = Number.parseInt(raw, 10);
  return Number.isFinite(value) ? value : undefined;
}
