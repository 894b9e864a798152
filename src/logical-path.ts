import { InvalidPathError } from './errors.js';
import { XML_ILLEGAL } from './xml.js';

/**
 * Validate a logical entry path and return it unchanged.
 * Relative, `/`-separated, no empty, `.` or `..` segments.
 */
export function assertLogicalPath(path: string): string {
  if (path.length === 0) throw new InvalidPathError(path, 'empty path');
  if (path.startsWith('/')) throw new InvalidPathError(path, 'must be relative');
  if (path.includes('\\')) throw new InvalidPathError(path, 'backslash is not a separator');
  if (path.includes('\0')) throw new InvalidPathError(path, 'contains NUL');
  if (XML_ILLEGAL.test(path)) throw new InvalidPathError(path, 'contains a character XML cannot carry');
  for (const segment of path.split('/')) {
    if (segment === '') throw new InvalidPathError(path, 'empty segment');
    if (segment === '.' || segment === '..') throw new InvalidPathError(path, `"${segment}" segment`);
  }
  return path;
}

/**
 * Turn a filesystem-relative or archive member name into a logical path.
 * Converts backslashes, strips leading `./` and `/`. Still rejects `..`.
 */
export function toLogicalPath(name: string): string {
  const cleaned = name
    .replace(/\\/g, '/')
    .split('/')
    .filter(s => s !== '' && s !== '.')
    .join('/');
  return assertLogicalPath(cleaned);
}

export function basename(path: string): string {
  return path.slice(path.lastIndexOf('/') + 1);
}

/** Strip the last extension (and a `.tar` before `.gz`). */
export function stripExtension(name: string): string {
  const withoutGz = name.replace(/\.tar\.gz$|\.tgz$/i, '');
  if (withoutGz !== name) return withoutGz;
  const dot = name.lastIndexOf('.');
  return dot > 0 ? name.slice(0, dot) : name;
}

/**
 * Compile a glob to a RegExp. `**` spans segments, `*` and `?` stay
 * within one. A pattern without `/` matches against the basename.
 */
export function globToRegExp(pattern: string): RegExp {
  let re = '';
  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern[i];
    if (ch === '*') {
      if (pattern[i + 1] === '*') {
        // `**/` matches zero or more directories
        if (pattern[i + 2] === '/') {
          re += '(?:.*/)?';
          i += 2;
        } else {
          re += '.*';
          i += 1;
        }
      } else {
        re += '[^/]*';
      }
    } else if (ch === '?') {
      re += '[^/]';
    } else {
      re += ch.replace(/[.+^${}()|[\]\\]/g, '\\$&');
    }
  }
  return new RegExp(`^${re}$`);
}

export function matchesPattern(path: string, pattern: string): boolean {
  const subject = pattern.includes('/') ? path : basename(path);
  return globToRegExp(pattern).test(subject);
}
