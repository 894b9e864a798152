import { createEntry, type Entry } from './codec.js';
import { DuplicatePathError, NotFoundError, StructureConflictError } from './errors.js';
import { assertLogicalPath } from './logical-path.js';
import { buildTree, type DirectoryTreeNode } from './structure.js';
import type { ChangelogEntry } from './changelog.js';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };
export type Metadata = Record<string, JsonValue>;

export const GENERATOR = 'svgpack';
export const FORMAT_VERSION = '1.0';

/** Keys the container computes itself; caller-supplied values are overridden. */
export const PROTECTED_METADATA_KEYS = ['generator', 'version', 'files_count', 'last_modified'] as const;

/** Keys kept by cleanMetadata. */
export const ESSENTIAL_METADATA_KEYS = ['title', 'description', 'creator'] as const;

const PROTECTED = new Set<string>(PROTECTED_METADATA_KEYS);

export interface ContainerOptions {
  metadata?: Metadata;
  preserveStructure?: boolean;
  changelog?: ChangelogEntry[];
  /** Source of timestamps for addedAt / last_modified */
  clock?: () => Date;
}

export interface AddEntryOptions {
  mediaType?: string;
  overwrite?: boolean;
  compress?: boolean;
}

/**
 * In-memory container: ordered entries plus metadata.
 *
 * Every mutation validates before touching state, then applies the entry
 * change and recomputes `files_count` / `last_modified` together.
 */
export class Container {
  private readonly _entries = new Map<string, Entry>();
  private _metadata: Metadata;
  private _preserveStructure: boolean;
  private readonly clock: () => Date;
  /** Persisted changelog, written by ChangelogTracker.persist */
  changelog: ChangelogEntry[];

  constructor(opts: ContainerOptions = {}) {
    this.clock = opts.clock ?? (() => new Date());
    this._preserveStructure = opts.preserveStructure ?? false;
    this.changelog = opts.changelog ? [...opts.changelog] : [];
    if (opts.metadata) {
      this._metadata = { ...opts.metadata };
    } else {
      this._metadata = {};
      this.touch();
    }
  }

  /**
   * Rebuild a container from stored state without recomputing metadata.
   */
  static restore(state: {
    entries: Entry[];
    metadata: Metadata;
    preserveStructure: boolean;
    changelog?: ChangelogEntry[];
    clock?: () => Date;
  }): Container {
    const container = new Container({
      metadata: state.metadata,
      preserveStructure: state.preserveStructure,
      changelog: state.changelog,
      clock: state.clock,
    });
    for (const entry of state.entries) {
      assertLogicalPath(entry.path);
      if (container._entries.has(entry.path)) throw new DuplicatePathError(entry.path);
      container._entries.set(entry.path, entry);
    }
    return container;
  }

  get entries(): ReadonlyMap<string, Entry> {
    return this._entries;
  }

  get size(): number {
    return this._entries.size;
  }

  get metadata(): Readonly<Metadata> {
    return this._metadata;
  }

  get preserveStructure(): boolean {
    return this._preserveStructure;
  }

  /** Directory tree derived from the entry paths, when structure is preserved. */
  get structure(): DirectoryTreeNode | undefined {
    if (!this._preserveStructure) return undefined;
    return buildTree(
      [...this._entries.values()].map(e => ({ path: e.path, size: e.rawSize, mediaType: e.mediaType })),
    );
  }

  /**
   * Turn structure preservation on or off. Turning it on fails if the
   * current paths cannot form a tree.
   */
  setPreserveStructure(on: boolean): void {
    if (on && !this._preserveStructure) {
      buildTree([...this._entries.keys()].map(path => ({ path })));
    }
    this._preserveStructure = on;
  }

  hasEntry(path: string): boolean {
    return this._entries.has(path);
  }

  getEntry(path: string): Entry | undefined {
    return this._entries.get(path);
  }

  requireEntry(path: string): Entry {
    const entry = this._entries.get(path);
    if (!entry) throw new NotFoundError(path);
    return entry;
  }

  paths(): string[] {
    return [...this._entries.keys()];
  }

  /**
   * Encode and add a file. Replaces an existing entry only with `overwrite`.
   */
  addEntry(path: string, raw: Buffer, opts: AddEntryOptions = {}): Entry {
    const entry = createEntry(assertLogicalPath(path), raw, {
      mediaType: opts.mediaType,
      compress: opts.compress,
      now: this.clock(),
    });
    return this.putEntry(entry, { overwrite: opts.overwrite });
  }

  /**
   * Insert an already-encoded entry.
   */
  putEntry(entry: Entry, opts: { overwrite?: boolean } = {}): Entry {
    assertLogicalPath(entry.path);
    if (this._entries.has(entry.path)) {
      if (!opts.overwrite) throw new DuplicatePathError(entry.path);
    } else {
      this.assertFitsTree(entry.path);
    }
    this._entries.set(entry.path, entry);
    this.touch();
    return entry;
  }

  removeEntry(path: string): Entry {
    const entry = this.requireEntry(path);
    this._entries.delete(path);
    this.touch();
    return entry;
  }

  /**
   * Remove several entries at once. Any missing path aborts the whole call.
   */
  removeEntries(paths: string[]): Entry[] {
    const missing = paths.filter(p => !this._entries.has(p));
    if (missing.length > 0) throw new NotFoundError(missing);
    const removed: Entry[] = [];
    for (const path of new Set(paths)) {
      const entry = this._entries.get(path);
      if (entry) removed.push(entry);
      this._entries.delete(path);
    }
    this.touch();
    return removed;
  }

  /**
   * Rename an entry in place, keeping its position.
   */
  renameEntry(oldPath: string, newPath: string): Entry {
    const entry = this.requireEntry(oldPath);
    assertLogicalPath(newPath);
    if (oldPath === newPath) return entry;
    if (this._entries.has(newPath)) throw new DuplicatePathError(newPath);
    this.assertFitsTree(newPath, oldPath);

    const renamed: Entry = { ...entry, path: newPath };
    const ordered = [...this._entries.values()].map(e => (e.path === oldPath ? renamed : e));
    this._entries.clear();
    for (const e of ordered) this._entries.set(e.path, e);
    this.touch();
    return renamed;
  }

  /**
   * Merge caller metadata. Protected keys are recomputed afterwards.
   */
  updateMetadata(patch: Metadata): void {
    this._metadata = { ...this._metadata, ...patch };
    this.touch();
  }

  /** Delete keys; returns the ones removed. Protected keys are left alone. */
  removeMetadata(keys: string[]): string[] {
    const next = { ...this._metadata };
    const removed: string[] = [];
    for (const key of keys) {
      if (key in next && !PROTECTED.has(key)) {
        delete next[key];
        removed.push(key);
      }
    }
    this._metadata = next;
    this.touch();
    return removed;
  }

  /** Reduce metadata to the essential keys. */
  cleanMetadata(): void {
    const next: Metadata = {};
    for (const key of ESSENTIAL_METADATA_KEYS) {
      const value = this._metadata[key];
      if (value !== undefined) next[key] = value;
    }
    this._metadata = next;
    this.touch();
  }

  /** Drop all caller metadata. */
  clearMetadata(): void {
    this._metadata = {};
    this.touch();
  }

  /**
   * path → identity of each entry, for before/after diffs.
   */
  snapshot(): Map<string, string> {
    const snap = new Map<string, string>();
    for (const entry of this._entries.values()) snap.set(entry.path, `${entry.checksum}@${entry.addedAt}`);
    return snap;
  }

  private assertFitsTree(path: string, ignore?: string): void {
    if (!this._preserveStructure) return;
    const clashes: string[] = [];
    for (const existing of this._entries.keys()) {
      if (existing === ignore) continue;
      if (existing.startsWith(`${path}/`) || path.startsWith(`${existing}/`)) clashes.push(existing);
    }
    if (clashes.length > 0) {
      throw new StructureConflictError(`${path} collides with the directory tree`, clashes);
    }
  }

  private touch(): void {
    this._metadata.generator = GENERATOR;
    this._metadata.version = FORMAT_VERSION;
    this._metadata.files_count = this._entries.size;
    this._metadata.last_modified = this.clock().toISOString();
  }
}
