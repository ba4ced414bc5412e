import http from 'node:http';
import type { AppConfig } from '../api/_lib/config.js';
import { describeError } from '../api/_lib/errors.js';
import type { VercelRequest, VercelResponse } from '@vercel/node';

const securityHeaders: Record<string, string> = {
  'X-Content-Type-Options': 'nosniff',
  'Referrer-Policy': 'strict-origin-when-cross-origin',
  'X-Frame-Options': 'DENY',
  'Content-Security-Policy': "default-src 'none'; frame-ancestors 'none'"
};

type ApiHandler = (req: VercelRequest, res: VercelResponse) => Promise<unknown> | unknown;

let cachedRoutes: Record<string, ApiHandler> | null = null;

export async function getApiRoutes(): Promise<Record<string, ApiHandler>> {
  if (cachedRoutes) return cachedRoutes;

  const [generateHandler, resultHandler, optionsHandler] = await Promise.all([
    import('../api/generate.js'),
    import('../api/result.js'),
    import('../api/options.js')
  ]);

  cachedRoutes = {
    '/api/generate': generateHandler.default,
    '/api/result': resultHandler.default,
    '/api/options': optionsHandler.default
  };

  return cachedRoutes;
}

export class BodyTooLargeError extends Error {
  constructor() {
    super('Request body too large.');
    this.name = 'BodyTooLargeError';
  }
}

async function readRequestBody(
  req: http.IncomingMessage,
  maxBodyBytes: number
): Promise<string | undefined> {
  const chunks: Buffer[] = [];
  let total = 0;
  // read to the end even past the limit; only the first maxBodyBytes are kept
  for await (const chunk of req) {
    const buffer = Buffer.from(chunk);
    total += buffer.byteLength;
    if (total <= maxBodyBytes) {
      chunks.push(buffer);
    }
  }
  if (total > maxBodyBytes) {
    throw new BodyTooLargeError();
  }
  if (!chunks.length) return undefined;
  return Buffer.concat(chunks).toString('utf8');
}

function sendJson(res: http.ServerResponse, status: number, payload: unknown) {
  res.writeHead(status, { 'Content-Type': 'application/json', ...securityHeaders });
  res.end(JSON.stringify(payload));
}

function parseRequestBody(method: string | undefined, contentType: string, raw: string | undefined): unknown {
  if (!raw || method === 'GET' || method === 'HEAD') return undefined;
  if (!contentType.includes('application/json')) return raw;
  try {
    return JSON.parse(raw);
  } catch {
    // handlers answer malformed JSON themselves
    return raw;
  }
}

export function toHandlerRequest(req: http.IncomingMessage, url: URL, rawBody: string | undefined): VercelRequest {
  const query: Record<string, string> = {};
  url.searchParams.forEach((value, key) => {
    query[key] = value;
  });
  const cookies: Record<string, string> = {};

  return Object.assign(req, {
    query,
    cookies,
    body: parseRequestBody(req.method, req.headers['content-type'] ?? '', rawBody)
  });
}

export function toHandlerResponse(res: http.ServerResponse): VercelResponse {
  const response: VercelResponse = Object.assign(res, {
    status(code: number) {
      res.statusCode = code;
      return response;
    },
    json(payload: unknown) {
      sendJson(res, res.statusCode, payload);
      return response;
    },
    send(payload: unknown) {
      sendJson(res, res.statusCode, payload);
      return response;
    },
    redirect(statusOrUrl: string | number, url?: string) {
      const location = typeof statusOrUrl === 'string' ? statusOrUrl : url ?? '/';
      res.writeHead(typeof statusOrUrl === 'number' ? statusOrUrl : 307, { ...securityHeaders, Location: location });
      res.end();
      return response;
    }
  });
  return response;
}

async function handleApi(req: http.IncomingMessage, res: http.ServerResponse, maxBodyBytes: number) {
  const url = new URL(req.url || '/', `http://${req.headers.host || 'localhost'}`);
  const routes = await getApiRoutes();
  const handler = routes[url.pathname];
  if (!handler) {
    sendJson(res, 404, { error: { code: 'not_found', message: 'Not found.' } });
    return;
  }

  let bodyString: string | undefined;
  try {
    bodyString = await readRequestBody(req, maxBodyBytes);
  } catch (error) {
    if (error instanceof BodyTooLargeError) {
      sendJson(res, 413, { error: { code: 'payload_too_large', message: error.message } });
      return;
    }
    throw error;
  }

  await handler(toHandlerRequest(req, url, bodyString), toHandlerResponse(res));

  if (!res.writableEnded) {
    sendJson(res, res.statusCode, {});
  }
}

export function createServer(appConfig: Pick<AppConfig, 'maxUploadBytes'>) {
  // base64 inflates the upload by a third, plus room for the other JSON fields
  const maxBodyBytes = Math.ceil((appConfig.maxUploadBytes * 4) / 3) + 64 * 1024;

  return http.createServer(async (req, res) => {
    const urlPath = new URL(req.url || '/', `http://${req.headers.host || 'localhost'}`).pathname;
    if (!urlPath.startsWith('/api/')) {
      sendJson(res, 404, { error: { code: 'not_found', message: 'Not found.' } });
      return;
    }
    try {
      await handleApi(req, res, maxBodyBytes);
    } catch (error) {
      console.error('Unhandled API error:', describeError(error));
      if (!res.headersSent) {
        sendJson(res, 500, { error: { code: 'internal_error', message: 'Processing failed. Please retry.' } });
      }
    }
  });
}
