/**
 * Append-only record of operations on one container, derived from
 * before/after entry snapshots.
 */

import { z } from 'zod';
import { escapeAttribute, escapeText } from './xml.js';
import type { Container } from './container.js';

export const CHANGELOG_OPERATIONS = ['import', 'export', 'exclude', 'metadata-update'] as const;
export type ChangelogOperation = (typeof CHANGELOG_OPERATIONS)[number];

export const CHANGELOG_FORMATS = ['markdown', 'json', 'xml'] as const;
export type ChangelogFormat = (typeof CHANGELOG_FORMATS)[number];

export interface ChangelogEntry {
  timestamp: string;
  operation: ChangelogOperation;
  /** Sorted, unique */
  affectedPaths: string[];
  summary: string;
}

export const ChangelogEntrySchema = z
  .object({
    timestamp: z.string(),
    operation: z.enum(CHANGELOG_OPERATIONS),
    affectedPaths: z.array(z.string()),
    summary: z.string(),
  })
  .strict();

export interface SnapshotDiff {
  added: string[];
  removed: string[];
  /** Present before and after with a different identity (overwrite) */
  replaced: string[];
}

/**
 * Compare two `Container.snapshot()` maps. A replaced entry counts as a
 * removal plus an addition.
 */
export function diffSnapshots(before: ReadonlyMap<string, string>, after: ReadonlyMap<string, string>): SnapshotDiff {
  const added: string[] = [];
  const removed: string[] = [];
  const replaced: string[] = [];
  for (const [path, id] of after) {
    const prior = before.get(path);
    if (prior === undefined) {
      added.push(path);
    } else if (prior !== id) {
      added.push(path);
      removed.push(path);
      replaced.push(path);
    }
  }
  for (const path of before.keys()) {
    if (!after.has(path)) removed.push(path);
  }
  return { added, removed, replaced };
}

function describeDiff(diff: SnapshotDiff): string {
  const replaced = new Set(diff.replaced);
  const parts: string[] = [];
  const added = diff.added.filter(p => !replaced.has(p)).length;
  const removed = diff.removed.filter(p => !replaced.has(p)).length;
  if (added > 0) parts.push(`${added} added`);
  if (replaced.size > 0) parts.push(`${replaced.size} replaced`);
  if (removed > 0) parts.push(`${removed} removed`);
  return parts.join(', ');
}

export interface RecordInput {
  before: ReadonlyMap<string, string>;
  after: ReadonlyMap<string, string>;
  /** Operation-specific description, e.g. "exported 3 files" */
  detail?: string;
  /** Paths touched without changing the entry set (export, metadata) */
  paths?: string[];
}

export class ChangelogTracker {
  private tracking = false;
  private readonly log: ChangelogEntry[];
  private readonly clock: () => Date;

  constructor(opts: { entries?: ChangelogEntry[]; clock?: () => Date } = {}) {
    this.log = opts.entries ? [...opts.entries] : [];
    this.clock = opts.clock ?? (() => new Date());
  }

  /** Resume from a log previously persisted into a container. */
  static fromContainer(container: Container, opts: { clock?: () => Date } = {}): ChangelogTracker {
    return new ChangelogTracker({ entries: container.changelog, clock: opts.clock });
  }

  get isTracking(): boolean {
    return this.tracking;
  }

  get entries(): ChangelogEntry[] {
    return this.log.map(e => ({ ...e, affectedPaths: [...e.affectedPaths] }));
  }

  startTracking(): void {
    this.tracking = true;
  }

  stopTracking(): void {
    this.tracking = false;
  }

  /**
   * Append one entry. No-op (returns null) while not tracking.
   */
  record(operation: ChangelogOperation, input: RecordInput): ChangelogEntry | null {
    if (!this.tracking) return null;
    const diff = diffSnapshots(input.before, input.after);
    const affected = new Set([...diff.added, ...diff.removed, ...(input.paths ?? [])]);
    const diffText = describeDiff(diff);
    const summary = [input.detail, diffText].filter(Boolean).join('; ') || 'no entry changes';
    const entry: ChangelogEntry = {
      timestamp: this.clock().toISOString(),
      operation,
      affectedPaths: [...affected].sort(),
      summary,
    };
    this.log.push(entry);
    return { ...entry, affectedPaths: [...entry.affectedPaths] };
  }

  /** Store the log in the container so the next write persists it. */
  persist(container: Container): void {
    container.changelog = this.entries;
  }

  generate(format: ChangelogFormat): string {
    switch (format) {
      case 'markdown':
        return renderMarkdown(this.log);
      case 'json':
        return JSON.stringify({ entries: this.log }, null, 2);
      case 'xml':
        return renderXml(this.log);
    }
  }
}

function renderMarkdown(log: ChangelogEntry[]): string {
  const lines = ['# Changelog', ''];
  if (log.length === 0) {
    lines.push('_No operations recorded._', '');
    return lines.join('\n');
  }
  log.forEach((entry, i) => {
    lines.push(`## ${i + 1}. ${entry.operation}`, '');
    lines.push(`- Time: ${entry.timestamp}`);
    lines.push(`- Summary: ${entry.summary}`);
    if (entry.affectedPaths.length > 0) {
      lines.push('- Paths:');
      for (const path of entry.affectedPaths) lines.push(`  - \`${path}\``);
    }
    lines.push('');
  });
  return lines.join('\n');
}

function renderXml(log: ChangelogEntry[]): string {
  const lines = ['<?xml version="1.0" encoding="UTF-8"?>', '<changelog>'];
  for (const entry of log) {
    lines.push(`  <operation kind="${escapeAttribute(entry.operation)}" timestamp="${escapeAttribute(entry.timestamp)}">`);
    lines.push(`    <summary>${escapeText(entry.summary)}</summary>`);
    for (const path of entry.affectedPaths) lines.push(`    <path>${escapeText(path)}</path>`);
    lines.push('  </operation>');
  }
  lines.push('</changelog>', '');
  return lines.join('\n');
}
