import { z } from 'zod';
import extensionTable from '../data/media-types.json' with { type: 'json' };

export const DEFAULT_MEDIA_TYPE = 'application/octet-stream';

/** Lower-case extension → media type */
const MEDIA_TYPES = z.record(z.string()).parse(extensionTable);

/**
 * Infer a media type from a path's extension.
 */
export function inferMediaType(path: string): string {
  const name = path.slice(path.lastIndexOf('/') + 1);
  const dot = name.lastIndexOf('.');
  if (dot <= 0) return DEFAULT_MEDIA_TYPE;
  return MEDIA_TYPES[name.slice(dot + 1).toLowerCase()] ?? DEFAULT_MEDIA_TYPE;
}

const TEXT_APPLICATION_TYPES = new Set([
  'application/json',
  'application/xml',
  'application/yaml',
  'application/toml',
  'application/javascript',
  'application/x-sh',
]);

/**
 * Whether a media type declares textual content.
 */
export function isTextMediaType(mediaType: string): boolean {
  const base = mediaType.split(';', 1)[0].trim().toLowerCase();
  return (
    base.startsWith('text/') ||
    TEXT_APPLICATION_TYPES.has(base) ||
    base.endsWith('+json') ||
    base.endsWith('+xml')
  );
}

/**
 * Match a media type against a filter such as `image/png` or `image/*`.
 */
export function matchesMediaType(mediaType: string, filter: string): boolean {
  const type = mediaType.toLowerCase();
  const f = filter.toLowerCase();
  if (f.endsWith('/*')) return type.startsWith(f.slice(0, -1));
  return type === f;
}
