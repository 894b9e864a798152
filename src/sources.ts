import { readFile, readdir, stat } from 'node:fs/promises';
import { basename, join, relative, resolve, sep } from 'node:path';
import { promisify } from 'node:util';
import { gunzip } from 'node:zlib';
import { unzipSync } from 'fflate';
import { matchesPattern } from './logical-path.js';
import type { SourceInfo } from './structure.js';
import { extract } from './tar.js';

const gunzipAsync = promisify(gunzip);

/**
 * A file offered for import.
 */
export interface ImportSource {
  /** Path relative to its source (`/` or `\` separated) */
  path: string;
  data: Buffer;
  /** Declared media type; inferred from the path when absent */
  mediaType?: string;
  source?: SourceInfo;
}

/**
 * Names never picked up from a directory walk.
 */
export const EXCLUDE = new Set([
  '.git',
  '.svn',
  '.hg',
  'node_modules',
  '__pycache__',
  '.venv',
  '.DS_Store',
  'Thumbs.db',
  '.idea',
  '.vscode',
]);

export interface WalkOptions {
  /** Extra names or globs (`*.log`, `build/**`) to skip */
  exclude?: string[];
}

function isExcluded(relPath: string, name: string, patterns: string[]): boolean {
  if (EXCLUDE.has(name)) return true;
  return patterns.some(p => p === name || matchesPattern(relPath, p));
}

async function walkDir(root: string, dirPath: string, patterns: string[]): Promise<string[]> {
  const results: string[] = [];
  let entries;
  try {
    entries = await readdir(dirPath, { withFileTypes: true });
  } catch (err) {
    if (dirPath === root) throw err;
    console.warn(`Warning: skipping unreadable directory ${dirPath}`);
    return results;
  }
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  for (const entry of entries) {
    const full = join(dirPath, entry.name);
    const rel = relative(root, full).split(sep).join('/');
    if (isExcluded(rel, entry.name, patterns)) continue;
    if (entry.isDirectory()) {
      results.push(...(await walkDir(root, full, patterns)));
    } else if (entry.isFile()) {
      results.push(rel);
    }
  }
  return results;
}

/**
 * A single file, placed under its own name.
 */
export async function readFileSource(filePath: string): Promise<ImportSource> {
  const full = resolve(filePath);
  return {
    path: basename(full),
    data: await readFile(full),
    source: { label: basename(full), kind: 'file' },
  };
}

/**
 * Every file under a directory, with paths relative to it. Sorted by path
 * so imports are reproducible.
 */
export async function readDirectorySource(dirPath: string, opts: WalkOptions = {}): Promise<ImportSource[]> {
  const root = resolve(dirPath);
  const source: SourceInfo = { label: basename(root), kind: 'directory' };
  const files = await walkDir(root, root, opts.exclude ?? []);
  const sources: ImportSource[] = [];
  for (const rel of files) {
    sources.push({ path: rel, data: await readFile(join(root, ...rel.split('/'))), source });
  }
  return sources;
}

/** gzip magic bytes */
function isGzip(data: Buffer): boolean {
  return data.length >= 2 && data[0] === 0x1f && data[1] === 0x8b;
}

/**
 * Regular files from a `.tar` or `.tar.gz` archive.
 */
export async function readTarSource(archivePath: string, opts: WalkOptions = {}): Promise<ImportSource[]> {
  const full = resolve(archivePath);
  const raw = await readFile(full);
  const tarball = isGzip(raw) ? await gunzipAsync(raw) : raw;
  const source: SourceInfo = { label: basename(full), kind: 'archive' };
  const patterns = opts.exclude ?? [];
  return extract(tarball)
    .filter(e => e.type === 'file')
    .filter(e => !e.name.split('/').some(segment => EXCLUDE.has(segment)))
    .filter(e => !patterns.some(p => matchesPattern(e.name, p)))
    .map(e => ({ path: e.name, data: e.data, source }));
}

export function isTarArchive(path: string): boolean {
  return /\.(tar|tar\.gz|tgz)$/i.test(path);
}

/**
 * Regular files from a `.zip` archive, in archive order.
 */
export async function readZipSource(archivePath: string, opts: WalkOptions = {}): Promise<ImportSource[]> {
  const full = resolve(archivePath);
  const members = unzipSync(await readFile(full));
  const source: SourceInfo = { label: basename(full), kind: 'archive' };
  const patterns = opts.exclude ?? [];
  return Object.entries(members)
    // directory members end in `/` and carry no data
    .filter(([name]) => !name.endsWith('/'))
    .filter(([name]) => !name.split('/').some(segment => EXCLUDE.has(segment)))
    .filter(([name]) => !patterns.some(p => matchesPattern(name, p)))
    .map(([name, data]) => ({ path: name, data: Buffer.from(data.buffer, data.byteOffset, data.byteLength), source }));
}

export function isZipArchive(path: string): boolean {
  return /\.zip$/i.test(path);
}

export interface ResolveOptions extends WalkOptions {
  /** Unpack `.tar`, `.tar.gz` and `.zip` arguments instead of embedding them as files */
  unpackArchives?: boolean;
}

/**
 * Expand CLI-style path arguments into import sources.
 */
export async function resolveSources(paths: string[], opts: ResolveOptions = {}): Promise<ImportSource[]> {
  const sources: ImportSource[] = [];
  for (const p of paths) {
    const s = await stat(p);
    if (s.isDirectory()) {
      sources.push(...(await readDirectorySource(p, opts)));
    } else if (opts.unpackArchives && isTarArchive(p)) {
      sources.push(...(await readTarSource(p, opts)));
    } else if (opts.unpackArchives && isZipArchive(p)) {
      sources.push(...(await readZipSource(p, opts)));
    } else {
      sources.push(await readFileSource(p));
    }
  }
  return sources;
}
