import { describe, it } from 'node:test';
import assert from 'node:assert';
import { createEntry, decode, decodeEntry, encode } from '../src/codec.js';
import { sha256 } from '../src/checksum.js';
import { DecodeError } from '../src/errors.js';

describe('codec', () => {
  it('should store XML-safe text as-is', () => {
    const result = encode(Buffer.from('hello <world> & co'), { mediaType: 'text/plain' });
    assert.strictEqual(result.encoding, 'utf8-text');
    assert.strictEqual(result.payload, 'hello <world> & co');
  });

  it('should infer the media type from the path', () => {
    assert.strictEqual(encode(Buffer.from('{}'), { path: 'conf/app.json' }).mediaType, 'application/json');
    assert.strictEqual(encode(Buffer.from([1]), { path: 'blob' }).mediaType, 'application/octet-stream');
  });

  it('should base64 binary content', () => {
    const result = encode(Buffer.from([0x00, 0x01, 0x02, 0xff]), { path: 'x.bin' });
    assert.strictEqual(result.encoding, 'base64');
    assert.strictEqual(result.payload, 'AAEC/w==');
  });

  it('should fall back to base64 for text types that are not valid UTF-8', () => {
    const result = encode(Buffer.from([0xff, 0xfe]), { mediaType: 'text/plain' });
    assert.strictEqual(result.encoding, 'base64');
    assert.strictEqual(result.payload, '//4=');
  });

  it('should fall back to base64 for text with characters XML cannot carry', () => {
    const result = encode(Buffer.from('a\u0001b'), { mediaType: 'text/plain' });
    assert.strictEqual(result.encoding, 'base64');
  });

  it('should deflate binary content when asked', () => {
    const raw = Buffer.alloc(4096, 0x41);
    const result = encode(raw, { path: 'a.bin', compress: true });
    assert.strictEqual(result.encoding, 'base64+deflate');
    assert.ok(result.payload.length < raw.length);
    assert.deepStrictEqual(decode(result.payload, result.encoding), raw);
  });

  it('should keep text uncompressed even with compress', () => {
    const result = encode(Buffer.from('# Title\n'), { path: 'README.md', compress: true });
    assert.strictEqual(result.encoding, 'utf8-text');
  });

  it('should round-trip arbitrary bytes under every policy', () => {
    const samples = [
      Buffer.alloc(0),
      Buffer.from('plain text\r\nwith CRLF'),
      Buffer.from([0, 1, 2, 3, 250, 251, 252, 253, 254, 255]),
      Buffer.from('ünïcödé ✓', 'utf8'),
    ];
    for (const raw of samples) {
      for (const mediaType of ['text/plain', 'application/octet-stream']) {
        for (const compress of [false, true]) {
          const { payload, encoding } = encode(raw, { mediaType, compress });
          assert.deepStrictEqual(decode(payload, encoding), raw);
        }
      }
    }
  });

  it('should produce identical payloads when encoding twice', () => {
    const raw = Buffer.from([9, 8, 7, 6, 5]);
    const a = createEntry('a.bin', raw, { compress: true });
    const b = createEntry('a.bin', raw, { compress: true });
    assert.strictEqual(a.payload, b.payload);
    assert.strictEqual(a.checksum, b.checksum);
  });

  it('should ignore whitespace inside base64 payloads', () => {
    assert.deepStrictEqual(decode('AAEC\n  /w==\n', 'base64'), Buffer.from([0x00, 0x01, 0x02, 0xff]));
  });

  it('should reject base64 with a bad length', () => {
    assert.throws(() => decode('AAE', 'base64'), DecodeError);
  });

  it('should reject base64 outside the alphabet', () => {
    assert.throws(() => decode('AA*=', 'base64'), /outside the alphabet/);
  });

  it('should reject unknown encodings', () => {
    assert.throws(() => decode('abc', 'rot13'), /unknown encoding "rot13"/);
  });

  it('should reject a corrupt deflate stream', () => {
    const payload = Buffer.from('not deflate').toString('base64');
    assert.throws(() => decode(payload, 'base64+deflate'), /deflate stream is corrupt/);
  });

  it('should fill every entry field', () => {
    const now = new Date('2026-01-02T03:04:05.000Z');
    const entry = createEntry('docs/a.txt', Buffer.from('abc'), { now });
    assert.deepStrictEqual(entry, {
      path: 'docs/a.txt',
      payload: 'abc',
      encoding: 'utf8-text',
      mediaType: 'text/plain',
      checksum: sha256('abc'),
      rawSize: 3,
      encodedSize: 3,
      addedAt: '2026-01-02T03:04:05.000Z',
    });
  });

  it('should verify checksum and size on decode', () => {
    const entry = createEntry('a.bin', Buffer.from([1, 2, 3]));
    assert.deepStrictEqual(decodeEntry(entry), Buffer.from([1, 2, 3]));

    assert.throws(
      () => decodeEntry({ ...entry, checksum: sha256('other') }),
      (err: unknown) => err instanceof DecodeError && err.path === 'a.bin' && /checksum mismatch/.test(err.message),
    );
    assert.throws(() => decodeEntry({ ...entry, rawSize: 4 }), /decoded 3 bytes, expected 4/);
  });

  it('should name the entry when its payload is corrupt', () => {
    const entry = createEntry('logo.png', Buffer.from([1, 2, 3, 4, 5, 6]));
    assert.throws(() => decodeEntry({ ...entry, payload: entry.payload.slice(1) }), /^DecodeError: logo\.png: /);
  });
});
