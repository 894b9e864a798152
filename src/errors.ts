/**
 * Typed container errors.
 *
 * Each subclass carries a fixed `code` so the operation layer, CLI and
 * server can dispatch with instanceof instead of matching messages.
 */

export class ContainerError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(message: string, opts: { code: string; details?: Record<string, unknown> }) {
    super(message);
    this.name = this.constructor.name;
    this.code = opts.code;
    this.details = opts.details;
  }
}

/** Host document is not well-formed markup, or its container region is malformed. */
export class InvalidHostFormatError extends ContainerError {
  readonly line?: number;
  readonly column?: number;

  constructor(message: string, position?: { line: number; column: number }) {
    super(position ? `${message} (line ${position.line}, column ${position.column})` : message, {
      code: 'INVALID_HOST_FORMAT',
      details: position,
    });
    this.line = position?.line;
    this.column = position?.column;
  }
}

export class DuplicatePathError extends ContainerError {
  readonly path: string;

  constructor(path: string) {
    super(`Entry already exists: ${path}`, { code: 'DUPLICATE_PATH', details: { path } });
    this.path = path;
  }
}

export class NotFoundError extends ContainerError {
  readonly paths: string[];

  constructor(paths: string | string[]) {
    const list = Array.isArray(paths) ? paths : [paths];
    super(`Entry not found: ${list.join(', ')}`, { code: 'NOT_FOUND', details: { paths: list } });
    this.paths = list;
  }
}

export class DecodeError extends ContainerError {
  readonly path?: string;

  constructor(message: string, path?: string) {
    super(path ? `${path}: ${message}` : message, { code: 'DECODE_FAILED', details: path ? { path } : undefined });
    this.path = path;
  }
}

export class StructureConflictError extends ContainerError {
  readonly paths: string[];

  constructor(message: string, paths: string[] = []) {
    super(paths.length > 0 ? `${message}: ${paths.join(', ')}` : message, {
      code: 'STRUCTURE_CONFLICT',
      details: { paths },
    });
    this.paths = paths;
  }
}

export class LimitExceededError extends ContainerError {
  readonly limit: 'maxFileSize' | 'maxTotalSize';
  readonly max: number;
  readonly actual: number;

  constructor(limit: 'maxFileSize' | 'maxTotalSize', max: number, actual: number, path?: string) {
    const subject = path ? `${path} is` : 'Import batch is';
    super(`${subject} ${actual} bytes, over the ${limit} limit of ${max} bytes`, {
      code: 'LIMIT_EXCEEDED',
      details: { limit, max, actual, path },
    });
    this.limit = limit;
    this.max = max;
    this.actual = actual;
  }
}

export class InvalidPathError extends ContainerError {
  readonly path: string;

  constructor(path: string, reason: string) {
    super(`Invalid logical path ${JSON.stringify(path)}: ${reason}`, { code: 'INVALID_PATH', details: { path } });
    this.path = path;
  }
}

export class InvalidOptionsError extends ContainerError {
  readonly issues: string[];

  constructor(subject: string, issues: string[]) {
    super(`Invalid ${subject}: ${issues.join('; ')}`, { code: 'INVALID_OPTIONS', details: { issues } });
    this.issues = issues;
  }
}

/** Short message for result records and CLI output. */
export function describeError(err: unknown): { error: string; reason: string } {
  if (err instanceof Error) return { error: err.name, reason: err.message };
  return { error: 'Error', reason: String(err) };
}
