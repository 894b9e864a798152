/**
 * User-facing verbs over a container stored in a host document.
 *
 * Every call goes through a ContainerHandle: parse, mutate, serialize and
 * save inside the handle's lock. Nothing is saved when a call throws.
 * Batch calls (importFiles, exportEntries) report per-item outcomes;
 * single-item calls throw.
 */

import { z } from 'zod';
import { ChangelogTracker } from './changelog.js';
import { sha256, containerChecksum } from './checksum.js';
import { decodeEntry, type Entry } from './codec.js';
import type { Container, Metadata } from './container.js';
import { BLANK_HOST, parseDocument, serializeDocument, type ParsedDocument } from './document.js';
import { DuplicatePathError, LimitExceededError, NotFoundError, describeError } from './errors.js';
import { assertLogicalPath, matchesPattern, toLogicalPath } from './logical-path.js';
import { matchesMediaType } from './media-types.js';
import {
  ExportOptionsSchema,
  ExportSelectorSchema,
  ImportOptionsSchema,
  ListFilterSchema,
  MetadataPatchSchema,
  TrackedOptionsSchema,
  parseOptions,
  type ExportOptions,
  type ExportSelector,
  type ImportOptions,
  type ListFilter,
  type TrackedOptions,
} from './options.js';
import type { ExportSink } from './sinks.js';
import type { ImportSource } from './sources.js';
import { FileDocumentStore, type DocumentStore } from './store.js';
import { buildTree, checkMerge, placePath, type SourceInfo } from './structure.js';

/**
 * Serializes async tasks. Each task starts after the previous one settles.
 */
export class Mutex {
  private tail: Promise<unknown> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.catch(() => undefined);
    return result;
  }
}

interface Commit<T> {
  value: T;
  /** Serialize and save the container */
  write: boolean;
}

/**
 * Explicit handle on one host document.
 */
export class ContainerHandle {
  readonly store: DocumentStore;
  private readonly mutex = new Mutex();
  private readonly clock?: () => Date;

  constructor(store: DocumentStore, opts: { clock?: () => Date } = {}) {
    this.store = store;
    this.clock = opts.clock;
  }

  describe(): string {
    return this.store.describe();
  }

  /** Parse the current document without writing. */
  read(): Promise<ParsedDocument> {
    return this.mutex.run(() => this.load());
  }

  /**
   * Read-modify-write cycle. The document is saved only when the callback
   * returns `write: true`; a thrown error leaves it untouched.
   */
  mutate<T>(fn: (container: Container) => Commit<T> | Promise<Commit<T>>): Promise<T> {
    return this.mutex.run(async () => {
      const { container, fragments } = await this.load();
      const commit = await fn(container);
      if (commit.write) {
        await this.store.save(serializeDocument(container, fragments));
      }
      return commit.value;
    });
  }

  private async load(): Promise<ParsedDocument> {
    const bytes = await this.store.load();
    return parseDocument(bytes ?? BLANK_HOST, { clock: this.clock });
  }
}

/**
 * Open a host document by path (created on first write) or through a store.
 */
export function openContainer(target: string | DocumentStore, opts: { clock?: () => Date } = {}): ContainerHandle {
  return new ContainerHandle(typeof target === 'string' ? new FileDocumentStore(target) : target, opts);
}

export interface EntryInfo {
  path: string;
  /** Raw byte size */
  size: number;
  mediaType: string;
  encoding: string;
  encodedSize: number;
  checksum: string;
  addedAt: string;
}

function toInfo(entry: Entry): EntryInfo {
  return {
    path: entry.path,
    size: entry.rawSize,
    mediaType: entry.mediaType,
    encoding: entry.encoding,
    encodedSize: entry.encodedSize,
    checksum: entry.checksum,
    addedAt: entry.addedAt,
  };
}

// --- import ---

export type ImportStatus = 'added' | 'skipped-duplicate' | 'overwritten' | 'failed';

export interface ImportOutcome {
  /** Path as given by the source */
  source: string;
  /** Logical path in the container; '' when none could be derived */
  path: string;
  status: ImportStatus;
  error?: string;
  reason?: string;
}

export interface ImportResult {
  outcomes: ImportOutcome[];
  added: number;
  overwritten: number;
  skipped: number;
  failed: number;
  /** Stopped early by the abort signal; committed files were kept */
  cancelled: boolean;
  /** Stopped by the first failure under continueOnError: false; nothing was written */
  aborted: boolean;
  filesCount: number;
}

type ImportOptionsParsed = z.output<typeof ImportOptionsSchema>;

type Planned =
  | { item: ImportSource; ok: true; relPath: string; target: string }
  | { item: ImportSource; ok: false; failure: unknown };

function checkLimits(sources: ImportSource[], maxFileSize?: number, maxTotalSize?: number): void {
  let total = 0;
  for (const s of sources) {
    if (maxFileSize !== undefined && s.data.length > maxFileSize) {
      throw new LimitExceededError('maxFileSize', maxFileSize, s.data.length, s.path);
    }
    total += s.data.length;
  }
  if (maxTotalSize !== undefined && total > maxTotalSize) {
    throw new LimitExceededError('maxTotalSize', maxTotalSize, total);
  }
}

function plan(sources: ImportSource[], strategy: ImportOptionsParsed['strategy']): Planned[] {
  return sources.map((item): Planned => {
    try {
      const relPath = toLogicalPath(item.path);
      return { item, ok: true, relPath, target: assertLogicalPath(placePath(relPath, strategy, item.source)) };
    } catch (err) {
      return { item, ok: false, failure: err };
    }
  });
}

function sourceKey(source?: SourceInfo): string {
  return source ? `${source.kind}:${source.label}` : '';
}

/**
 * With structure preservation on, check each source's files as one tree
 * merge. A conflict fails every file of that source.
 */
function checkMerges(container: Container, planned: Planned[], opts: ImportOptionsParsed): Planned[] {
  const existing = container.structure;
  if (!existing) return planned;

  const groups = new Map<string, Array<Extract<Planned, { ok: true }>>>();
  for (const p of planned) {
    if (!p.ok) continue;
    if (!opts.overwrite && container.hasEntry(p.target)) continue;
    const key = sourceKey(p.item.source);
    const group = groups.get(key) ?? [];
    group.push(p);
    groups.set(key, group);
  }

  const failures = new Map<string, unknown>();
  for (const [key, group] of groups) {
    try {
      const imported = buildTree(group.map(p => ({ path: p.relPath })));
      checkMerge(existing, imported, opts.strategy, { source: group[0].item.source, overwrite: opts.overwrite });
    } catch (err) {
      failures.set(key, err);
    }
  }
  if (failures.size === 0) return planned;

  return planned.map((p): Planned => {
    const failure = failures.get(sourceKey(p.item.source));
    return p.ok && failure !== undefined ? { item: p.item, ok: false, failure } : p;
  });
}

function commitOne(container: Container, p: Planned, opts: ImportOptionsParsed): ImportOutcome {
  if (!p.ok) {
    return { source: p.item.path, path: '', status: 'failed', ...describeError(p.failure) };
  }
  const outcome = { source: p.item.path, path: p.target };
  const existing = container.getEntry(p.target);
  if (existing && !opts.overwrite) {
    return { ...outcome, status: 'skipped-duplicate', ...describeError(new DuplicatePathError(p.target)) };
  }
  if (existing && existing.checksum === sha256(p.item.data)) {
    return { ...outcome, status: 'skipped-duplicate', error: 'DuplicatePathError', reason: 'Identical content already stored' };
  }
  try {
    container.addEntry(p.target, p.item.data, {
      mediaType: p.item.mediaType,
      overwrite: opts.overwrite,
      compress: opts.compress,
    });
  } catch (err) {
    return { ...outcome, status: 'failed', ...describeError(err) };
  }
  return { ...outcome, status: existing ? 'overwritten' : 'added' };
}

function countOutcomes(outcomes: ImportOutcome[], status: ImportStatus): number {
  return outcomes.filter(o => o.status === status).length;
}

/**
 * Import many files in one transaction.
 *
 * Size limits are checked before the document is read. Per-file problems
 * become outcome records; a structure conflict under preservation fails
 * every file from the same source.
 */
export async function importFiles(
  handle: ContainerHandle,
  sources: ImportSource[],
  options?: ImportOptions,
): Promise<ImportResult> {
  const opts = parseOptions(ImportOptionsSchema, options, 'import options');
  checkLimits(sources, opts.maxFileSize, opts.maxTotalSize);

  const { result, before, after } = await handle.mutate(container => {
    const before = container.snapshot();
    const initialCount = container.size;
    const wasPreserving = container.preserveStructure;
    if (opts.preserveStructure !== undefined) container.setPreserveStructure(opts.preserveStructure);

    const planned = checkMerges(container, plan(sources, opts.strategy), opts);
    const outcomes: ImportOutcome[] = [];
    let cancelled = false;
    let aborted = false;
    for (const p of planned) {
      if (opts.signal?.aborted) {
        cancelled = true;
        break;
      }
      const outcome = commitOne(container, p, opts);
      outcomes.push(outcome);
      if (outcome.status === 'failed' && !opts.continueOnError) {
        aborted = true;
        break;
      }
    }

    const result: ImportResult = {
      outcomes,
      added: countOutcomes(outcomes, 'added'),
      overwritten: countOutcomes(outcomes, 'overwritten'),
      skipped: countOutcomes(outcomes, 'skipped-duplicate'),
      failed: countOutcomes(outcomes, 'failed'),
      cancelled,
      aborted,
      filesCount: aborted ? initialCount : container.size,
    };
    const changed = result.added + result.overwritten > 0 || container.preserveStructure !== wasPreserving;
    return { value: { result, before, after: container.snapshot() }, write: !aborted && changed };
  });

  if (!result.aborted) {
    opts.tracker?.record('import', { before, after, detail: `${sources.length} source ${sources.length === 1 ? 'file' : 'files'}` });
  }
  return result;
}

/**
 * Import one file. Errors propagate unchanged.
 */
export async function importFile(
  handle: ContainerHandle,
  source: ImportSource,
  options?: Omit<ImportOptions, 'continueOnError' | 'signal' | 'maxTotalSize'>,
): Promise<EntryInfo> {
  const opts = parseOptions(ImportOptionsSchema, options, 'import options');
  checkLimits([source], opts.maxFileSize);

  const { entry, before, after } = await handle.mutate(container => {
    const before = container.snapshot();
    if (opts.preserveStructure !== undefined) container.setPreserveStructure(opts.preserveStructure);
    const target = assertLogicalPath(placePath(toLogicalPath(source.path), opts.strategy, source.source));
    const entry = container.addEntry(target, source.data, {
      mediaType: source.mediaType,
      overwrite: opts.overwrite,
      compress: opts.compress,
    });
    return { value: { entry, before, after: container.snapshot() }, write: true };
  });

  opts.tracker?.record('import', { before, after, detail: '1 source file' });
  return toInfo(entry);
}

// --- export ---

export interface ExportOutcome {
  path: string;
  status: 'exported' | 'failed';
  /** Raw byte size written */
  size?: number;
  error?: string;
  reason?: string;
}

export interface ExportResult {
  outcomes: ExportOutcome[];
  exported: number;
  failed: number;
  /** Entries removed from the container (removeFromContainer) */
  removed: string[];
}

function selectEntries(
  container: Container,
  selector: z.output<typeof ExportSelectorSchema>,
): { entries: Entry[]; missing: string[] } {
  let entries = [...container.entries.values()];
  let missing: string[] = [];
  if (selector.names) {
    const names = new Set(selector.names);
    missing = [...names].filter(n => !container.hasEntry(n));
    entries = entries.filter(e => names.has(e.path));
  }
  const { pattern, mediaType } = selector;
  if (pattern) entries = entries.filter(e => matchesPattern(e.path, pattern));
  if (mediaType) entries = entries.filter(e => matchesMediaType(e.mediaType, mediaType));
  return { entries, missing };
}

/**
 * Decode selected entries into a sink. An empty selector selects every
 * entry. With removeFromContainer, only entries the sink stored are removed.
 */
export async function exportEntries(
  handle: ContainerHandle,
  selector: ExportSelector,
  sink: ExportSink,
  options?: ExportOptions,
): Promise<ExportResult> {
  const sel = parseOptions(ExportSelectorSchema, selector, 'export selector');
  const opts = parseOptions(ExportOptionsSchema, options, 'export options');

  const { result, before, after } = await handle.mutate(async container => {
    const before = container.snapshot();
    const { entries, missing } = selectEntries(container, sel);
    let outcomes: ExportOutcome[] = [];
    const fail = (path: string, err: unknown): void => {
      if (opts.strict) throw err;
      outcomes.push({ path, status: 'failed', ...describeError(err) });
    };

    for (const path of missing) fail(path, new NotFoundError(path));
    for (const entry of entries) {
      let data: Buffer;
      try {
        data = decodeEntry(entry);
        await sink.write(entry.path, data);
      } catch (err) {
        fail(entry.path, err);
        continue;
      }
      outcomes.push({ path: entry.path, status: 'exported', size: data.length });
    }

    if (sink.close) {
      try {
        await sink.close();
      } catch (err) {
        if (opts.strict) throw err;
        const failure = describeError(err);
        outcomes = outcomes.map((o): ExportOutcome => (o.status === 'exported' ? { path: o.path, status: 'failed', ...failure } : o));
      }
    }

    const exported = outcomes.filter(o => o.status === 'exported').map(o => o.path);
    const removed = opts.removeFromContainer && exported.length > 0 ? exported : [];
    if (removed.length > 0) container.removeEntries(removed);

    const result: ExportResult = {
      outcomes,
      exported: exported.length,
      failed: outcomes.length - exported.length,
      removed,
    };
    return { value: { result, before, after: container.snapshot() }, write: removed.length > 0 };
  });

  opts.tracker?.record('export', {
    before,
    after,
    detail: `exported ${result.exported} files`,
    paths: result.outcomes.filter(o => o.status === 'exported').map(o => o.path),
  });
  return result;
}

/**
 * Decoded bytes of one entry. Errors propagate unchanged.
 */
export async function exportEntry(handle: ContainerHandle, path: string): Promise<Buffer> {
  const { container } = await handle.read();
  return decodeEntry(container.requireEntry(path));
}

// --- list / exclude / rename ---

/**
 * Entries in stored order, optionally filtered. Never writes.
 */
export async function listEntries(handle: ContainerHandle, filter?: ListFilter): Promise<EntryInfo[]> {
  const { mediaType, pattern } = parseOptions(ListFilterSchema, filter, 'list filter');
  const { container } = await handle.read();
  return [...container.entries.values()]
    .filter(e => !mediaType || matchesMediaType(e.mediaType, mediaType))
    .filter(e => !pattern || matchesPattern(e.path, pattern))
    .map(toInfo);
}

export interface ExcludeResult {
  removed: string[];
  filesCount: number;
}

/**
 * Remove entries by path. Any missing path fails the whole call with
 * NotFoundError and nothing is written.
 */
export async function excludeEntries(
  handle: ContainerHandle,
  paths: string[],
  options?: TrackedOptions,
): Promise<ExcludeResult> {
  const opts = parseOptions(TrackedOptionsSchema, options, 'exclude options');

  const { result, before, after } = await handle.mutate(container => {
    const before = container.snapshot();
    const removed = paths.length > 0 ? container.removeEntries(paths).map(e => e.path) : [];
    const result: ExcludeResult = { removed, filesCount: container.size };
    return { value: { result, before, after: container.snapshot() }, write: removed.length > 0 };
  });

  opts.tracker?.record('exclude', { before, after });
  return result;
}

/**
 * Rename one entry, keeping its position. Errors propagate unchanged.
 */
export async function renameEntry(handle: ContainerHandle, oldPath: string, newPath: string): Promise<EntryInfo> {
  return handle.mutate(container => ({ value: toInfo(container.renameEntry(oldPath, newPath)), write: true }));
}

// --- metadata ---

export interface MetadataResult {
  metadata: Metadata;
  /** Keys whose value changed, last_modified aside */
  changedKeys: string[];
}

function changedKeys(before: Readonly<Metadata>, after: Readonly<Metadata>): string[] {
  const keys = new Set([...Object.keys(before), ...Object.keys(after)]);
  keys.delete('last_modified');
  return [...keys].filter(k => JSON.stringify(before[k]) !== JSON.stringify(after[k])).sort();
}

async function metadataChange(
  handle: ContainerHandle,
  options: TrackedOptions | undefined,
  describe: (changed: string[]) => string,
  apply: (container: Container) => void,
): Promise<MetadataResult> {
  const opts = parseOptions(TrackedOptionsSchema, options, 'metadata options');

  const { result, snapshot } = await handle.mutate(container => {
    const prior = { ...container.metadata };
    apply(container);
    const metadata = { ...container.metadata };
    const result: MetadataResult = { metadata, changedKeys: changedKeys(prior, metadata) };
    return { value: { result, snapshot: container.snapshot() }, write: true };
  });

  opts.tracker?.record('metadata-update', { before: snapshot, after: snapshot, detail: describe(result.changedKeys) });
  return result;
}

/**
 * Merge keys into the metadata. Generator, version, files_count and
 * last_modified are always recomputed.
 */
export function updateMetadata(handle: ContainerHandle, patch: Metadata, options?: TrackedOptions): Promise<MetadataResult> {
  const values = parseOptions(MetadataPatchSchema, patch, 'metadata');
  return metadataChange(
    handle,
    options,
    changed => (changed.length > 0 ? `set ${changed.join(', ')}` : 'metadata unchanged'),
    container => container.updateMetadata(values),
  );
}

export function removeMetadata(handle: ContainerHandle, keys: string[], options?: TrackedOptions): Promise<MetadataResult> {
  return metadataChange(
    handle,
    options,
    changed => (changed.length > 0 ? `removed ${changed.join(', ')}` : 'metadata unchanged'),
    container => {
      container.removeMetadata(keys);
    },
  );
}

/** Keep only title, description and creator. */
export function cleanMetadata(handle: ContainerHandle, options?: TrackedOptions): Promise<MetadataResult> {
  return metadataChange(handle, options, () => 'cleaned metadata', container => container.cleanMetadata());
}

export function clearMetadata(handle: ContainerHandle, options?: TrackedOptions): Promise<MetadataResult> {
  return metadataChange(handle, options, () => 'cleared metadata', container => container.clearMetadata());
}

export async function readMetadata(handle: ContainerHandle): Promise<Metadata> {
  const { container } = await handle.read();
  return { ...container.metadata };
}

// --- changelog / verify ---

/**
 * Write a tracker's log into the container.
 */
export async function persistChangelog(handle: ContainerHandle, tracker: ChangelogTracker): Promise<number> {
  return handle.mutate(container => {
    tracker.persist(container);
    return { value: container.changelog.length, write: true };
  });
}

/**
 * Tracker resumed from the log stored in the container.
 */
export async function loadChangelog(handle: ContainerHandle, opts: { clock?: () => Date } = {}): Promise<ChangelogTracker> {
  const { container } = await handle.read();
  return ChangelogTracker.fromContainer(container, opts);
}

export interface VerifyReport {
  ok: boolean;
  /** Digest over every entry's path and checksum */
  checksum: string;
  filesCount: number;
  entries: Array<{ path: string; ok: boolean; error?: string; reason?: string }>;
}

/**
 * Decode every entry and check its size and checksum.
 */
export async function verifyContainer(handle: ContainerHandle): Promise<VerifyReport> {
  const { container } = await handle.read();
  const entries: VerifyReport['entries'] = [];
  for (const entry of container.entries.values()) {
    try {
      decodeEntry(entry);
      entries.push({ path: entry.path, ok: true });
    } catch (err) {
      entries.push({ path: entry.path, ok: false, ...describeError(err) });
    }
  }
  return {
    ok: entries.every(e => e.ok),
    checksum: containerChecksum(container.entries.values()),
    filesCount: container.size,
    entries,
  };
}
