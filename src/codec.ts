/**
 * Entry codec: turns file bytes into text that can live inside an XML
 * element, and back.
 *
 *   utf8-text       textual media types that are valid UTF-8 and XML-safe
 *   base64          everything else
 *   base64+deflate  base64 of zlib-deflated bytes, when compression is asked for
 */

import { TextDecoder } from 'node:util';
import { deflateSync, inflateSync } from 'node:zlib';
import { sha256 } from './checksum.js';
import { DecodeError } from './errors.js';
import { DEFAULT_MEDIA_TYPE, inferMediaType, isTextMediaType } from './media-types.js';
import { XML_ILLEGAL } from './xml.js';

export const ENCODINGS = ['utf8-text', 'base64', 'base64+deflate'] as const;
export type Encoding = (typeof ENCODINGS)[number];

/**
 * One embedded file.
 */
export interface Entry {
  /** Logical path inside the container */
  path: string;
  /** Encoded content, as stored in the host document */
  payload: string;
  /** One of ENCODINGS for entries written here; read back as found */
  encoding: string;
  mediaType: string;
  /** SHA-256 hex digest of the raw bytes */
  checksum: string;
  /** Byte length before encoding */
  rawSize: number;
  /** Character length of the payload */
  encodedSize: number;
  /** UTC ISO timestamp of insertion */
  addedAt: string;
}

export interface EncodeOptions {
  /** Declared media type; inferred from `path` when absent */
  mediaType?: string;
  path?: string;
  compress?: boolean;
}

export interface EncodedPayload {
  payload: string;
  encoding: Encoding;
  mediaType: string;
}

const DEFLATE_LEVEL = 9;

const BASE64_BODY = /^[A-Za-z0-9+/]*={0,2}$/;

function asXmlSafeText(raw: Buffer): string | null {
  let text: string;
  try {
    text = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(raw);
  } catch {
    return null;
  }
  if (XML_ILLEGAL.test(text)) return null;
  return text;
}

/**
 * Encode raw bytes. Same bytes and options always give the same payload.
 */
export function encode(raw: Buffer, opts: EncodeOptions = {}): EncodedPayload {
  const mediaType = opts.mediaType ?? (opts.path ? inferMediaType(opts.path) : DEFAULT_MEDIA_TYPE);

  if (isTextMediaType(mediaType)) {
    const text = asXmlSafeText(raw);
    if (text !== null) return { payload: text, encoding: 'utf8-text', mediaType };
  }

  if (opts.compress) {
    const deflated = deflateSync(raw, { level: DEFLATE_LEVEL });
    return { payload: deflated.toString('base64'), encoding: 'base64+deflate', mediaType };
  }

  return { payload: raw.toString('base64'), encoding: 'base64', mediaType };
}

function decodeBase64(payload: string): Buffer {
  const compact = payload.replace(/\s+/g, '');
  if (compact.length % 4 !== 0) {
    throw new DecodeError(`base64 payload length ${compact.length} is not a multiple of 4`);
  }
  if (!BASE64_BODY.test(compact)) {
    throw new DecodeError('base64 payload contains characters outside the alphabet');
  }
  return Buffer.from(compact, 'base64');
}

/**
 * Decode a payload back to raw bytes.
 */
export function decode(payload: string, encoding: string): Buffer {
  switch (encoding) {
    case 'utf8-text':
      return Buffer.from(payload, 'utf8');
    case 'base64':
      return decodeBase64(payload);
    case 'base64+deflate': {
      const deflated = decodeBase64(payload);
      try {
        return inflateSync(deflated);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new DecodeError(`deflate stream is corrupt: ${message}`);
      }
    }
    default:
      throw new DecodeError(`unknown encoding "${encoding}"`);
  }
}

/**
 * Decode an entry and verify its size and checksum.
 */
export function decodeEntry(entry: Entry): Buffer {
  let raw: Buffer;
  try {
    raw = decode(entry.payload, entry.encoding);
  } catch (err) {
    if (err instanceof DecodeError) throw new DecodeError(err.message, entry.path);
    throw err;
  }
  if (raw.length !== entry.rawSize) {
    throw new DecodeError(`decoded ${raw.length} bytes, expected ${entry.rawSize}`, entry.path);
  }
  const hash = sha256(raw);
  if (hash !== entry.checksum) {
    throw new DecodeError(`checksum mismatch: expected ${entry.checksum}, got ${hash}`, entry.path);
  }
  return raw;
}

/**
 * Build a complete entry from raw bytes.
 */
export function createEntry(
  path: string,
  raw: Buffer,
  opts: { mediaType?: string; compress?: boolean; now?: Date } = {},
): Entry {
  const { payload, encoding, mediaType } = encode(raw, { path, mediaType: opts.mediaType, compress: opts.compress });
  return {
    path,
    payload,
    encoding,
    mediaType,
    checksum: sha256(raw),
    rawSize: raw.length,
    encodedSize: payload.length,
    addedAt: (opts.now ?? new Date()).toISOString(),
  };
}
