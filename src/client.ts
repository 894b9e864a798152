/**
 * Client for the svgpack HTTP API.
 */

import { z } from 'zod';
import type { Metadata } from './container.js';
import { JsonValueSchema } from './document.js';
import type { EntryInfo, MetadataResult } from './operations.js';

export interface ContainerClientOptions {
  baseUrl: string;
  token: string;
}

/** Non-2xx response from the server. */
export class RemoteError extends Error {
  readonly status: number;
  readonly code: string;

  constructor(message: string, status: number, code: string) {
    super(message);
    this.name = 'RemoteError';
    this.status = status;
    this.code = code;
  }
}

const EntryInfoSchema = z.object({
  path: z.string(),
  size: z.number(),
  mediaType: z.string(),
  encoding: z.string(),
  encodedSize: z.number(),
  checksum: z.string(),
  addedAt: z.string(),
});

const HealthSchema = z.object({ ok: z.boolean(), protocol: z.string() });
const ListSchema = z.object({ entries: z.array(EntryInfoSchema) });
const PutSchema = z.object({ entry: EntryInfoSchema });
const RemoveSchema = z.object({ removed: z.array(z.string()), filesCount: z.number() });
const MetadataSchema = z.object({ metadata: z.record(JsonValueSchema) });
const MetadataResultSchema = z.object({ metadata: z.record(JsonValueSchema), changedKeys: z.array(z.string()) });
const ErrorSchema = z.object({ error: z.string(), code: z.string().optional() });

interface RequestOptions {
  method?: string;
  headers?: Record<string, string>;
  body?: string | Uint8Array;
}

function encodePath(path: string): string {
  return path.split('/').map(encodeURIComponent).join('/');
}

export class ContainerClient {
  private baseUrl: string;
  private token: string;

  constructor(opts: ContainerClientOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/$/, '');
    this.token = opts.token;
  }

  private async request(path: string, opts?: RequestOptions): Promise<Response> {
    const res = await fetch(`${this.baseUrl}${path}`, {
      ...opts,
      headers: {
        Authorization: `Bearer ${this.token}`,
        ...opts?.headers,
      },
    });
    if (!res.ok) {
      const body = ErrorSchema.safeParse(await res.json().catch(() => null));
      const message = body.success ? body.data.error : `Request failed: ${res.status}`;
      throw new RemoteError(message, res.status, body.success ? body.data.code ?? 'UNKNOWN' : 'UNKNOWN');
    }
    return res;
  }

  private async requestJson<S extends z.ZodTypeAny>(schema: S, path: string, opts?: RequestOptions): Promise<z.output<S>> {
    const res = await this.request(path, opts);
    return schema.parse(await res.json());
  }

  /** Check if the server is alive */
  async health(): Promise<{ ok: boolean; protocol: string }> {
    const res = await fetch(`${this.baseUrl}/health`);
    return HealthSchema.parse(await res.json());
  }

  async list(filter: { mediaType?: string; pattern?: string } = {}): Promise<EntryInfo[]> {
    const params = new URLSearchParams();
    if (filter.mediaType) params.set('type', filter.mediaType);
    if (filter.pattern) params.set('pattern', filter.pattern);
    const query = params.toString() ? `?${params}` : '';
    const { entries } = await this.requestJson(ListSchema, `/entries${query}`);
    return entries;
  }

  /** Raw bytes of one entry */
  async get(path: string): Promise<Buffer> {
    const res = await this.request(`/entries/${encodePath(path)}`);
    return Buffer.from(await res.arrayBuffer());
  }

  async put(path: string, data: Buffer, opts: { mediaType?: string; overwrite?: boolean } = {}): Promise<EntryInfo> {
    const { entry } = await this.requestJson(PutSchema, `/entries/${encodePath(path)}${opts.overwrite ? '?overwrite=1' : ''}`, {
      method: 'PUT',
      headers: { 'Content-Type': opts.mediaType ?? 'application/octet-stream' },
      body: data,
    });
    return entry;
  }

  async remove(path: string): Promise<string[]> {
    const { removed } = await this.requestJson(RemoveSchema, `/entries/${encodePath(path)}`, { method: 'DELETE' });
    return removed;
  }

  async metadata(): Promise<Metadata> {
    const { metadata } = await this.requestJson(MetadataSchema, '/metadata');
    return metadata;
  }

  async updateMetadata(patch: Metadata): Promise<MetadataResult> {
    return this.requestJson(MetadataResultSchema, '/metadata', {
      method: 'PATCH',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(patch),
    });
  }
}
