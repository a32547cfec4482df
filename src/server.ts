/**
 * Datasafe HTTP server
 *
 * Endpoints:
 *   GET   /heartbeat  liveness, answers "alive"
 *   GET   /api        index of all storage paths
 *   POST  /api/<loi>  allocate a new LOI below the prefix of <loi>
 *   PUT   /api/<loi>  upload the first content (ZIP body) of a LOI
 *   PATCH /api/<loi>  replace the content of a LOI
 *   GET   /api/<loi>  download the content of a LOI as ZIP
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import type { Backend } from './backend.js';
import {
  AlreadyExistsError,
  InvalidLoiError,
  LoiNotFoundError,
  MissingContentError,
  MissingLoiError,
  NotEmptyError,
  isDatasafeError,
  type DatasafeError,
} from './errors.js';
import { createChildLogger } from './logger.js';

const API_PREFIX = '/api/';
const LOI_METHODS = 'GET, POST, PUT, PATCH';
/** Methods left for a LOI that already has content. */
const OCCUPIED_METHODS = 'GET, PATCH';

export interface HttpServerOptions {
  port: number;
  backend: Backend;
  host?: string;
}

export interface DatasafeHttpServer {
  /** Start listening; resolves with the bound port. */
  listen(): Promise<number>;
  close(): Promise<void>;
  server: Server;
}

function readBody(req: IncomingMessage): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => resolve(Buffer.concat(chunks)));
    req.on('error', reject);
  });
}

function json(res: ServerResponse, status: number, data: unknown, headers: Record<string, string> = {}): void {
  const body = JSON.stringify(data);
  res.writeHead(status, { 'Content-Type': 'application/json', ...headers });
  res.end(body);
}

function text(res: ServerResponse, status: number, body: string): void {
  res.writeHead(status, { 'Content-Type': 'text/plain; charset=utf-8' });
  res.end(body);
}

/**
 * Status code of a deliberate failure, depending on the method that hit it.
 */
export function errorStatus(method: string, error: DatasafeError): number {
  if (error instanceof InvalidLoiError || error instanceof MissingLoiError) return 404;
  if (error instanceof LoiNotFoundError) return method === 'GET' ? 404 : 400;
  if (error instanceof NotEmptyError || error instanceof AlreadyExistsError) return 405;
  if (error instanceof MissingContentError && method === 'GET') return 204;
  return 400;
}

function loiFromPath(pathname: string): string {
  try {
    return decodeURIComponent(pathname.slice(API_PREFIX.length));
  } catch {
    throw new InvalidLoiError('LOI is not properly URL-encoded.', { path: pathname });
  }
}

export function createHttpServer(opts: HttpServerOptions): DatasafeHttpServer {
  const { port, backend, host } = opts;
  const log = createChildLogger({ component: 'http' });

  const server = createServer((req, res) => {
    handle(req, res).catch((err: unknown) => {
      log.error({ err, method: req.method, url: req.url }, 'Request failed');
      if (!res.headersSent) json(res, 500, { error: 'Internal server error' });
      else res.end();
    });
  });

  async function handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const method = req.method || 'GET';
    const { pathname } = new URL(req.url || '/', 'http://localhost');

    if (pathname === '/heartbeat' && method === 'GET') {
      return text(res, 200, 'alive');
    }
    if ((pathname === '/api' || pathname === API_PREFIX) && method === 'GET') {
      return json(res, 200, { paths: await backend.index() });
    }
    if (!pathname.startsWith(API_PREFIX)) {
      return json(res, 404, { error: 'Not found' });
    }

    try {
      const loi = loiFromPath(pathname);
      switch (method) {
        case 'POST':
          return text(res, 201, await backend.create(loi));
        case 'PUT':
          return json(res, 200, await backend.upload(loi, await readBody(req)));
        case 'PATCH':
          return json(res, 200, await backend.update(loi, await readBody(req)));
        case 'GET':
          return await handleDownload(res, loi);
        default:
          return json(res, 405, { error: `Method ${method} not allowed` }, { Allow: LOI_METHODS });
      }
    } catch (err) {
      if (!isDatasafeError(err)) throw err;
      return sendError(res, method, err);
    }
  }

  async function handleDownload(res: ServerResponse, loi: string): Promise<void> {
    const data = await backend.download(loi);
    res.writeHead(200, {
      'Content-Type': 'application/zip',
      'Content-Length': data.length,
    });
    res.end(data);
  }

  function sendError(res: ServerResponse, method: string, err: DatasafeError): void {
    const status = errorStatus(method, err);
    log.info({ method, status, code: err.code }, err.message);
    if (status === 204) {
      res.writeHead(204);
      res.end();
      return;
    }
    const headers: Record<string, string> =
      status === 405 ? { Allow: err instanceof NotEmptyError ? OCCUPIED_METHODS : LOI_METHODS } : {};
    json(res, status, { error: err.message, code: err.code }, headers);
  }

  return {
    listen: () =>
      new Promise<number>((resolve, reject) => {
        server.once('error', reject);
        server.listen(port, host, () => {
          server.off('error', reject);
          const address = server.address();
          const bound = address !== null && typeof address === 'object' ? address.port : port;
          log.info({ port: bound, root: backend.storage.rootDirectory }, 'Datasafe server listening');
          resolve(bound);
        });
      }),
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close(err => (err ? reject(err) : resolve()));
      }),
    server,
  };
}
