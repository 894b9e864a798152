/**
 * HTTP API over one container document.
 *
 * Endpoints:
 *   GET    /health          server health (no auth)
 *   GET    /entries         list entries (?type=image/*&pattern=*.png)
 *   GET    /entries/<path>  raw bytes of one entry
 *   PUT    /entries/<path>  add an entry (?overwrite=1)
 *   DELETE /entries/<path>  remove an entry
 *   GET    /metadata        container metadata
 *   PATCH  /metadata        merge a JSON object into the metadata
 *
 * Auth: Bearer token in Authorization header.
 */

import { createServer, IncomingMessage, ServerResponse } from 'node:http';
import { decodeEntry } from './codec.js';
import {
  ContainerError,
  DecodeError,
  DuplicatePathError,
  InvalidOptionsError,
  InvalidPathError,
  LimitExceededError,
  NotFoundError,
  StructureConflictError,
} from './errors.js';
import { DEFAULT_MEDIA_TYPE } from './media-types.js';
import {
  excludeEntries,
  importFile,
  listEntries,
  readMetadata,
  updateMetadata,
  type ContainerHandle,
} from './operations.js';
import { MetadataPatchSchema, parseOptions } from './options.js';

export const PROTOCOL = 'svgpack/1.0';

export interface ContainerServerOptions {
  /** 0 picks a free port */
  port: number;
  host?: string;
  handle: ContainerHandle;
  token: string;
  /** Largest accepted PUT body */
  maxFileSize?: number;
  compress?: boolean;
}

function checkAuth(req: IncomingMessage, token: string): boolean {
  const auth = req.headers.authorization;
  if (!auth) return false;
  const [scheme, value] = auth.split(' ', 2);
  return scheme === 'Bearer' && value === token;
}

function readBody(req: IncomingMessage, limit?: number): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on('data', (chunk: Buffer) => {
      size += chunk.length;
      if (limit !== undefined && size > limit) {
        // Drain the rest so the 413 can still be sent
        req.removeAllListeners('data');
        req.resume();
        reject(new LimitExceededError('maxFileSize', limit, size));
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => resolve(Buffer.concat(chunks)));
    req.on('error', reject);
  });
}

function json(res: ServerResponse, status: number, data: unknown): void {
  const body = JSON.stringify(data);
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(body);
}

/**
 * HTTP status for an error thrown by the operation layer.
 */
export function statusFor(err: unknown): number {
  if (err instanceof NotFoundError) return 404;
  if (err instanceof DuplicatePathError || err instanceof StructureConflictError) return 409;
  if (err instanceof LimitExceededError) return 413;
  if (err instanceof DecodeError) return 422;
  if (err instanceof ContainerError) return 400;
  return 500;
}

function entryPath(pathname: string): string {
  const raw = pathname.slice('/entries/'.length);
  try {
    return raw.split('/').map(decodeURIComponent).join('/');
  } catch {
    throw new InvalidPathError(raw, 'malformed percent-encoding');
  }
}

function isFlag(value: string | null): boolean {
  return value === '1' || value === 'true';
}

export function createContainerServer(opts: ContainerServerOptions) {
  const { port, host, handle, token, maxFileSize, compress } = opts;

  const server = createServer((req, res) => {
    route(req, res).catch((err: unknown) => {
      const status = statusFor(err);
      const message = err instanceof Error ? err.message : String(err);
      if (status >= 500) console.error(`svgpack server error: ${message}`);
      if (res.headersSent) {
        res.destroy();
        return;
      }
      json(res, status, { error: message, code: err instanceof ContainerError ? err.code : 'INTERNAL' });
    });
  });

  async function route(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url || '/', 'http://localhost');
    const method = req.method || 'GET';

    // Health check needs no auth
    if (url.pathname === '/health' && method === 'GET') {
      return json(res, 200, { ok: true, protocol: PROTOCOL });
    }

    if (!checkAuth(req, token)) {
      return json(res, 401, { error: 'Unauthorized', code: 'UNAUTHORIZED' });
    }

    if (url.pathname === '/entries' && method === 'GET') {
      const type = url.searchParams.get('type') ?? undefined;
      const pattern = url.searchParams.get('pattern') ?? undefined;
      return json(res, 200, { entries: await listEntries(handle, { mediaType: type, pattern }) });
    }
    if (url.pathname.startsWith('/entries/')) {
      const path = entryPath(url.pathname);
      if (method === 'GET') return handleGetEntry(res, path);
      if (method === 'PUT') return handlePutEntry(req, res, path, isFlag(url.searchParams.get('overwrite')));
      if (method === 'DELETE') {
        return json(res, 200, await excludeEntries(handle, [path]));
      }
    }
    if (url.pathname === '/metadata' && method === 'GET') {
      return json(res, 200, { metadata: await readMetadata(handle) });
    }
    if (url.pathname === '/metadata' && method === 'PATCH') {
      return handlePatchMetadata(req, res);
    }

    json(res, 404, { error: 'Not found', code: 'NOT_FOUND' });
  }

  async function handleGetEntry(res: ServerResponse, path: string): Promise<void> {
    const { container } = await handle.read();
    const entry = container.requireEntry(path);
    const data = decodeEntry(entry);
    res.writeHead(200, {
      'Content-Type': entry.mediaType,
      'Content-Length': data.length,
      'X-Svgpack-Checksum': entry.checksum,
    });
    res.end(data);
  }

  async function handlePutEntry(req: IncomingMessage, res: ServerResponse, path: string, overwrite: boolean): Promise<void> {
    const data = await readBody(req, maxFileSize);
    const declared = req.headers['content-type']?.split(';', 1)[0].trim();
    const info = await importFile(
      handle,
      { path, data, mediaType: declared && declared !== DEFAULT_MEDIA_TYPE ? declared : undefined },
      { overwrite, compress, maxFileSize },
    );
    json(res, 201, { entry: info });
  }

  async function handlePatchMetadata(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const body = await readBody(req, 1024 * 1024);
    let parsed: unknown;
    try {
      parsed = JSON.parse(body.toString('utf8'));
    } catch {
      throw new InvalidOptionsError('metadata', ['body is not valid JSON']);
    }
    const patch = parseOptions(MetadataPatchSchema, parsed, 'metadata');
    json(res, 200, await updateMetadata(handle, patch));
  }

  return {
    /** Resolves with the bound port */
    listen: () => new Promise<number>((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, host, () => {
        const address = server.address();
        const bound = address !== null && typeof address === 'object' ? address.port : port;
        console.log(`svgpack server listening on port ${bound}`);
        console.log(`  Container: ${handle.describe()}`);
        resolve(bound);
      });
    }),
    close: () => new Promise<void>((resolve) => {
      server.close(() => resolve());
    }),
    server,
  };
}
