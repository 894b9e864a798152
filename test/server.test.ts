import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import { createContainerServer, statusFor } from '../src/server.js';
import { ContainerClient, RemoteError } from '../src/client.js';
import { openContainer } from '../src/operations.js';
import { MemoryDocumentStore } from '../src/store.js';
import { DecodeError, DuplicatePathError, InvalidPathError, NotFoundError } from '../src/errors.js';

describe('svgpack server + client', () => {
  const TOKEN = 'test-secret';
  const store = new MemoryDocumentStore();
  const handle = openContainer(store, { clock: () => new Date('2026-01-02T03:04:05.000Z') });
  let server: ReturnType<typeof createContainerServer>;
  let baseUrl: string;
  let client: ContainerClient;

  before(async () => {
    server = createContainerServer({ port: 0, host: '127.0.0.1', handle, token: TOKEN, maxFileSize: 64 });
    const port = await server.listen();
    baseUrl = `http://127.0.0.1:${port}`;
    client = new ContainerClient({ baseUrl, token: TOKEN });
  });

  after(async () => {
    await server.close();
  });

  it('should respond to health check without auth', async () => {
    assert.deepStrictEqual(await client.health(), { ok: true, protocol: 'svgpack/1.0' });
  });

  it('should reject unauthenticated requests', async () => {
    const res = await fetch(`${baseUrl}/entries`);
    assert.strictEqual(res.status, 401);
    assert.deepStrictEqual(await res.json(), { error: 'Unauthorized', code: 'UNAUTHORIZED' });

    const wrong = new ContainerClient({ baseUrl, token: 'wrong-token' });
    await assert.rejects(wrong.list(), (err: unknown) => err instanceof RemoteError && err.status === 401);
  });

  it('should store, list and return an entry', async () => {
    const entry = await client.put('docs/a b.txt', Buffer.from('hello'), { mediaType: 'text/plain' });
    assert.strictEqual(entry.path, 'docs/a b.txt');
    assert.strictEqual(entry.size, 5);
    assert.strictEqual(entry.mediaType, 'text/plain');
    assert.strictEqual(entry.addedAt, '2026-01-02T03:04:05.000Z');

    assert.deepStrictEqual(await client.get('docs/a b.txt'), Buffer.from('hello'));
    assert.deepStrictEqual((await client.list({ pattern: '*.txt' })).map(e => e.path), ['docs/a b.txt']);
    assert.deepStrictEqual(await client.list({ mediaType: 'image/*' }), []);
    assert.ok(store.text().includes('path="docs/a b.txt"'));
  });

  it('should send the checksum and media type with raw bytes', async () => {
    await client.put('logo.png', Buffer.from([1, 2, 3]));
    const res = await fetch(`${baseUrl}/entries/logo.png`, { headers: { Authorization: `Bearer ${TOKEN}` } });
    assert.strictEqual(res.status, 200);
    assert.strictEqual(res.headers.get('content-type'), 'image/png');
    assert.strictEqual(
      res.headers.get('x-svgpack-checksum'),
      '039058c6f2c0cb492c533b0a4d14ef77cc0f78abccced5287d84a1a2011cfb81',
    );
  });

  it('should refuse a duplicate unless overwriting', async () => {
    await client.put('dup.txt', Buffer.from('one'));
    await assert.rejects(
      client.put('dup.txt', Buffer.from('two')),
      (err: unknown) => err instanceof RemoteError && err.status === 409 && err.code === 'DUPLICATE_PATH',
    );
    await client.put('dup.txt', Buffer.from('two'), { overwrite: true });
    assert.deepStrictEqual(await client.get('dup.txt'), Buffer.from('two'));
  });

  it('should refuse a body over the size limit', async () => {
    await assert.rejects(
      client.put('big.bin', Buffer.alloc(100)),
      (err: unknown) => err instanceof RemoteError && err.status === 413 && err.code === 'LIMIT_EXCEEDED',
    );
  });

  it('should report missing entries', async () => {
    await assert.rejects(
      client.get('nope.txt'),
      (err: unknown) => err instanceof RemoteError && err.status === 404 && err.message === 'Entry not found: nope.txt',
    );
    await assert.rejects(client.remove('nope.txt'), (err: unknown) => err instanceof RemoteError && err.status === 404);
  });

  it('should remove an entry', async () => {
    await client.put('gone.txt', Buffer.from('bye'));
    assert.deepStrictEqual(await client.remove('gone.txt'), ['gone.txt']);
    assert.ok(!(await client.list()).some(e => e.path === 'gone.txt'));
  });

  it('should read and patch metadata', async () => {
    const result = await client.updateMetadata({ title: 'Remote' });
    assert.deepStrictEqual(result.changedKeys, ['title']);
    const metadata = await client.metadata();
    assert.strictEqual(metadata.title, 'Remote');
    assert.strictEqual(metadata.generator, 'svgpack');
  });

  it('should reject a metadata body that is not JSON', async () => {
    const res = await fetch(`${baseUrl}/metadata`, {
      method: 'PATCH',
      headers: { Authorization: `Bearer ${TOKEN}` },
      body: '{ nope',
    });
    assert.strictEqual(res.status, 400);
    assert.deepStrictEqual(await res.json(), {
      error: 'Invalid metadata: body is not valid JSON',
      code: 'INVALID_OPTIONS',
    });
  });

  it('should 404 unknown routes', async () => {
    const res = await fetch(`${baseUrl}/archive`, { headers: { Authorization: `Bearer ${TOKEN}` } });
    assert.strictEqual(res.status, 404);
    await res.body?.cancel();
  });

  it('should map errors to statuses', () => {
    assert.strictEqual(statusFor(new NotFoundError('x')), 404);
    assert.strictEqual(statusFor(new DuplicatePathError('x')), 409);
    assert.strictEqual(statusFor(new DecodeError('bad', 'x')), 422);
    assert.strictEqual(statusFor(new InvalidPathError('', 'empty path')), 400);
    assert.strictEqual(statusFor(new Error('boom')), 500);
  });
});
