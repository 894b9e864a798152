import { createHash } from 'node:crypto';
import { readFile } from 'node:fs/promises';

/**
 * Compute SHA-256 hex digest of a file.
 */
export async function sha256File(filePath: string): Promise<string> {
  const data = await readFile(filePath);
  return sha256(data);
}

/**
 * Compute SHA-256 hex digest of a buffer.
 */
export function sha256(data: Buffer | string): string {
  return createHash('sha256').update(data).digest('hex');
}

/**
 * Digest of a whole entry set, independent of insertion order.
 * Sorts by path, hashes `path:checksum` lines.
 */
export function containerChecksum(entries: Iterable<{ path: string; checksum: string }>): string {
  const sorted = [...entries].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  const lines = sorted.map(e => `${e.path}:${e.checksum}`).join('\n');
  return sha256(lines);
}
