import * as http from 'node:http';

import type { RouteDefinition } from './routes/index.js';
import { apiLogger } from './logger.js';
import type { ApiRequest, ApiResponse } from './types.js';

const logger = apiLogger.child('server');

const MAX_BODY_BYTES = 1024 * 1024;

export class RequestError extends Error {
  code: string;
  status: number;
  constructor(status: number, code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.status = status;
    this.name = 'RequestError';
  }
}

export interface RouteMatch {
  route: RouteDefinition;
  params: Record<string, string>;
}

const decodeSegment = (segment: string): string => {
  try {
    return decodeURIComponent(segment);
  } catch (err: unknown) {
    throw new RequestError(400, 'INVALID_REQUEST', `Malformed path segment: ${segment}`, { cause: err });
  }
};

/**
 * First route whose method and path pattern match; `:name` segments become
 * params. Throws a 400 `RequestError` when a param segment is not valid
 * percent-encoding.
 */
export function matchRoute(routes: readonly RouteDefinition[], method: string, pathname: string): RouteMatch | null {
  const parts = pathname.split('/').filter(Boolean);

  for (const route of routes) {
    if (route.method !== method.toUpperCase()) continue;
    const pattern = route.path.split('/').filter(Boolean);
    if (pattern.length !== parts.length) continue;

    const params: Record<string, string> = {};
    const matched = pattern.every((segment, i) => {
      if (segment.startsWith(':')) {
        params[segment.slice(1)] = decodeSegment(parts[i]);
        return true;
      }
      return segment === parts[i];
    });
    if (matched) return { route, params };
  }
  return null;
}

/** The parts of `http.IncomingMessage` the listener reads */
export interface IncomingRequest extends AsyncIterable<unknown> {
  method?: string;
  url?: string;
  headers: http.IncomingHttpHeaders;
}

/** The parts of `http.ServerResponse` the listener writes */
export interface OutgoingResponse {
  statusCode: number;
  readonly headersSent: boolean;
  setHeader(name: string, value: string): unknown;
  end(chunk: string): unknown;
}

const flattenHeaders = (headers: http.IncomingHttpHeaders): Record<string, string | undefined> =>
  Object.fromEntries(Object.entries(headers).map(([k, v]) => [k, Array.isArray(v) ? v.join(', ') : v]));

async function readBody(req: IncomingRequest): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buf.length;
    if (size > MAX_BODY_BYTES) throw new RequestError(413, 'PAYLOAD_TOO_LARGE', 'Request body too large');
    chunks.push(buf);
  }
  const text = Buffer.concat(chunks).toString('utf-8').trim();
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    throw new RequestError(400, 'INVALID_REQUEST', 'Request body is not valid JSON');
  }
}

function adaptResponse(res: OutgoingResponse): ApiResponse {
  const adapted: ApiResponse = {
    status(code) {
      res.statusCode = code;
      return adapted;
    },
    json(data) {
      res.setHeader('Content-Type', 'application/json');
      res.end(JSON.stringify(data));
    },
  };
  return adapted;
}

/** Node request listener dispatching to route definitions */
export function createRequestListener(
  routes: readonly RouteDefinition[],
): (req: IncomingRequest, res: OutgoingResponse) => void {
  return (req, res) => {
    const method = req.method ?? 'GET';
    const url = new URL(req.url ?? '/', 'http://localhost');
    const response = adaptResponse(res);

    const dispatch = async () => {
      const match = matchRoute(routes, method, url.pathname);
      if (!match) {
        response.status(404).json({ error: { code: 'NOT_FOUND', message: `No route for ${method} ${url.pathname}` } });
        return;
      }

      const apiRequest: ApiRequest = {
        method,
        path: url.pathname,
        headers: flattenHeaders(req.headers),
        query: Object.fromEntries(url.searchParams),
        params: match.params,
        body: method === 'GET' ? undefined : await readBody(req),
      };
      await match.route.handler(apiRequest, response);
    };

    // route handlers render their own errors; this only sees routing, body and transport failures
    dispatch().catch((err: unknown) => {
      const known = err instanceof RequestError ? err : new RequestError(500, 'internal_error', 'Internal server error');
      logger.warn(known.message, { path: url.pathname, status: known.status, cause: err instanceof Error ? err.message : String(err) });
      if (!res.headersSent) response.status(known.status).json({ error: { code: known.code, message: known.message } });
    });
  };
}

export interface ServeOptions {
  port?: number;
  host?: string;
}

/** Listen on `host:port` and resolve once the server is accepting connections */
export function startServer(routes: readonly RouteDefinition[], { port = 3000, host = '127.0.0.1' }: ServeOptions = {}): Promise<http.Server> {
  return new Promise((resolve, reject) => {
    const server = http.createServer(createRequestListener(routes));
    server.once('error', (err) => reject(new Error(`Failed to start server: ${err.message}`)));
    server.listen(port, host, () => {
      const address = server.address();
      const bound = address !== null && typeof address === 'object' ? address.port : port;
      logger.info('API listening', { host, port: bound });
      resolve(server);
    });
  });
}
