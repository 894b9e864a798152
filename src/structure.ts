/**
 * Structure mapper: the directory-tree view of a container's flat path set.
 *
 * The flat entry map is the single source of truth; trees are derived from it
 * on demand and checked against it when read back from a document.
 */

import { z } from 'zod';
import { StructureConflictError } from './errors.js';
import { basename, stripExtension } from './logical-path.js';

export type TreeNodeKind = 'file' | 'directory';

export interface DirectoryTreeNode {
  name: string;
  kind: TreeNodeKind;
  /** Directories only, sorted: directories first, then files, each by name */
  children?: DirectoryTreeNode[];
  /** Files only */
  size?: number;
  mediaType?: string;
}

export const DirectoryTreeNodeSchema: z.ZodType<DirectoryTreeNode> = z.lazy(() =>
  z
    .object({
      name: z.string(),
      kind: z.enum(['file', 'directory']),
      children: z.array(DirectoryTreeNodeSchema).optional(),
      size: z.number().int().nonnegative().optional(),
      mediaType: z.string().optional(),
    })
    .strict(),
);

export const MERGE_STRATEGIES = ['preserve', 'flat', 'nested', 'by-source'] as const;
export type MergeStrategy = (typeof MERGE_STRATEGIES)[number];

/** Where an imported file came from. */
export interface SourceInfo {
  label: string;
  kind: 'file' | 'directory' | 'archive';
}

export interface TreeLeaf {
  path: string;
  size?: number;
  mediaType?: string;
}

interface MutableDir {
  name: string;
  dirs: Map<string, MutableDir>;
  files: Map<string, TreeLeaf>;
}

function byName(a: { name: string }, b: { name: string }): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

function freeze(dir: MutableDir): DirectoryTreeNode {
  const dirs = [...dir.dirs.values()].map(freeze).sort(byName);
  const files = [...dir.files.entries()]
    .map(([name, leaf]): DirectoryTreeNode => {
      const node: DirectoryTreeNode = { name, kind: 'file' };
      if (leaf.size !== undefined) node.size = leaf.size;
      if (leaf.mediaType !== undefined) node.mediaType = leaf.mediaType;
      return node;
    })
    .sort(byName);
  return { name: dir.name, kind: 'directory', children: [...dirs, ...files] };
}

/**
 * Group logical paths by `/` segments into a tree rooted at a nameless directory.
 * A path that is both a file and a directory prefix is a conflict.
 */
export function buildTree(leaves: Iterable<TreeLeaf>): DirectoryTreeNode {
  const root: MutableDir = { name: '', dirs: new Map(), files: new Map() };
  const conflicts: string[] = [];

  for (const leaf of leaves) {
    const segments = leaf.path.split('/');
    let dir = root;
    let prefix = '';
    let blocked = false;
    for (const segment of segments.slice(0, -1)) {
      prefix = prefix ? `${prefix}/${segment}` : segment;
      if (dir.files.has(segment)) {
        conflicts.push(prefix);
        blocked = true;
        break;
      }
      let next = dir.dirs.get(segment);
      if (!next) {
        next = { name: segment, dirs: new Map(), files: new Map() };
        dir.dirs.set(segment, next);
      }
      dir = next;
    }
    if (blocked) continue;

    const name = segments[segments.length - 1];
    if (dir.dirs.has(name) || dir.files.has(name)) {
      conflicts.push(leaf.path);
      continue;
    }
    dir.files.set(name, leaf);
  }

  if (conflicts.length > 0) {
    throw new StructureConflictError('Paths collide in the directory tree', conflicts);
  }
  return freeze(root);
}

function collectLeaves(node: DirectoryTreeNode, prefix: string, out: TreeLeaf[]): void {
  const path = prefix ? `${prefix}/${node.name}` : node.name;
  if (node.kind === 'file') {
    out.push({ path, size: node.size, mediaType: node.mediaType });
    return;
  }
  for (const child of node.children ?? []) collectLeaves(child, path, out);
}

/**
 * File leaves of a tree, paths relative to `node`.
 */
export function treeLeaves(node: DirectoryTreeNode): TreeLeaf[] {
  const out: TreeLeaf[] = [];
  if (node.kind === 'file') {
    collectLeaves(node, '', out);
  } else {
    for (const child of node.children ?? []) collectLeaves(child, '', out);
  }
  return out;
}

/**
 * Inverse of buildTree: the set of file paths under `node`.
 */
export function flattenTree(node: DirectoryTreeNode): Set<string> {
  return new Set(treeLeaves(node).map(l => l.path));
}

export function countFiles(node: DirectoryTreeNode): number {
  if (node.kind === 'file') return 1;
  let n = 0;
  for (const child of node.children ?? []) n += countFiles(child);
  return n;
}

function checkShape(node: DirectoryTreeNode, path: string, problems: string[]): void {
  if (node.kind === 'file') {
    if (node.children !== undefined) problems.push(`${path || '/'} is a file with children`);
    return;
  }
  const seen = new Set<string>();
  for (const child of node.children ?? []) {
    const childPath = path ? `${path}/${child.name}` : child.name;
    if (child.name === '' || child.name.includes('/')) problems.push(`${childPath} has an invalid name`);
    if (seen.has(child.name)) problems.push(`${childPath} appears twice`);
    seen.add(child.name);
    checkShape(child, childPath, problems);
  }
}

/**
 * Check a tree is well-shaped and describes exactly `paths`.
 */
export function validateTree(tree: DirectoryTreeNode, paths: Iterable<string>): void {
  const problems: string[] = [];
  if (tree.kind !== 'directory') problems.push('root is not a directory');
  checkShape(tree, '', problems);
  if (problems.length > 0) throw new StructureConflictError('Malformed directory tree', problems);

  const described = flattenTree(tree);
  const actual = new Set(paths);
  const missing = [...actual].filter(p => !described.has(p));
  const extra = [...described].filter(p => !actual.has(p));
  if (missing.length > 0 || extra.length > 0) {
    throw new StructureConflictError(
      'Directory tree does not match entries',
      [...missing.map(p => `missing ${p}`), ...extra.map(p => `extra ${p}`)],
    );
  }
}

/** Top-level segment a source is placed under. */
export function sourceSegment(source: SourceInfo): string {
  const name = basename(source.label.replace(/\\/g, '/').replace(/\/+$/, '')) || 'source';
  return source.kind === 'archive' ? stripExtension(name) : name;
}

/**
 * Target logical path of an imported file.
 *
 *   preserve   relative path as given
 *   flat       basename only
 *   nested     directory/archive sources under a segment named after them
 *   by-source  every source under its own segment
 */
export function placePath(relPath: string, strategy: MergeStrategy, source?: SourceInfo): string {
  switch (strategy) {
    case 'preserve':
      return relPath;
    case 'flat':
      return basename(relPath);
    case 'nested':
      return source && source.kind !== 'file' ? `${sourceSegment(source)}/${relPath}` : relPath;
    case 'by-source':
      return source ? `${sourceSegment(source)}/${relPath}` : relPath;
  }
}

type MergeOptions = { source?: SourceInfo; overwrite?: boolean };

function ancestors(path: string): string[] {
  const segments = path.split('/');
  return segments.slice(1).map((_, i) => segments.slice(0, i + 1).join('/'));
}

function placeMerge(
  existing: DirectoryTreeNode | undefined,
  imported: DirectoryTreeNode,
  strategy: MergeStrategy,
  opts: MergeOptions,
): Map<string, TreeLeaf> {
  const merged = new Map<string, TreeLeaf>();
  for (const leaf of existing ? treeLeaves(existing) : []) merged.set(leaf.path, leaf);

  const placed = new Map<string, TreeLeaf>();
  const collisions: string[] = [];
  for (const leaf of treeLeaves(imported)) {
    const target = placePath(leaf.path, strategy, opts.source);
    if (placed.has(target)) {
      collisions.push(target);
      continue;
    }
    placed.set(target, { ...leaf, path: target });
  }
  if (collisions.length > 0) {
    throw new StructureConflictError(`Imported files collide under the ${strategy} strategy`, collisions);
  }

  const shadowed = [...placed.keys()].filter(p => merged.has(p));
  if (shadowed.length > 0 && !opts.overwrite) {
    throw new StructureConflictError(`Merge would shadow existing files under the ${strategy} strategy`, shadowed);
  }

  for (const [path, leaf] of placed) merged.set(path, leaf);
  const clashes = [...merged.keys()].filter(path => ancestors(path).some(dir => merged.has(dir)));
  if (clashes.length > 0) {
    throw new StructureConflictError('Paths collide in the directory tree', clashes);
  }
  return merged;
}

/**
 * Combine an existing tree with an imported one under `strategy`.
 * Throws StructureConflictError instead of letting one file shadow another.
 */
export function mergeArchive(
  existing: DirectoryTreeNode | undefined,
  imported: DirectoryTreeNode,
  strategy: MergeStrategy,
  opts: MergeOptions = {},
): DirectoryTreeNode {
  return buildTree(placeMerge(existing, imported, strategy, opts).values());
}

/** Same checks as mergeArchive, without building the merged tree. */
export function checkMerge(
  existing: DirectoryTreeNode | undefined,
  imported: DirectoryTreeNode,
  strategy: MergeStrategy,
  opts: MergeOptions = {},
): void {
  placeMerge(existing, imported, strategy, opts);
}
