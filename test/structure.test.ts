import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  buildTree,
  checkMerge,
  countFiles,
  flattenTree,
  mergeArchive,
  placePath,
  validateTree,
  type DirectoryTreeNode,
} from '../src/structure.js';
import { StructureConflictError } from '../src/errors.js';

function tree(...paths: string[]): DirectoryTreeNode {
  return buildTree(paths.map(path => ({ path })));
}

describe('structure', () => {
  it('should group paths into sorted directories', () => {
    const root = buildTree([
      { path: 'b.txt' },
      { path: 'a/x.txt', size: 3, mediaType: 'text/plain' },
      { path: 'a/b/y.txt' },
      { path: 'c.txt' },
    ]);
    assert.deepStrictEqual(root, {
      name: '',
      kind: 'directory',
      children: [
        {
          name: 'a',
          kind: 'directory',
          children: [
            { name: 'b', kind: 'directory', children: [{ name: 'y.txt', kind: 'file' }] },
            { name: 'x.txt', kind: 'file', size: 3, mediaType: 'text/plain' },
          ],
        },
        { name: 'b.txt', kind: 'file' },
        { name: 'c.txt', kind: 'file' },
      ],
    });
  });

  it('should flatten back to the same path set', () => {
    const paths = ['README.md', 'data.json', 'src/main.py', 'src/lib/util.py'];
    assert.deepStrictEqual(flattenTree(tree(...paths)), new Set(paths));
    assert.strictEqual(countFiles(tree(...paths)), 4);
  });

  it('should give an empty root for no paths', () => {
    assert.deepStrictEqual(tree(), { name: '', kind: 'directory', children: [] });
  });

  it('should reject a path that is both a file and a directory', () => {
    assert.throws(() => tree('a', 'a/b'), (err: unknown) => {
      assert.ok(err instanceof StructureConflictError);
      assert.deepStrictEqual(err.paths, ['a']);
      return true;
    });
    assert.throws(() => tree('a/b', 'a'), /Paths collide in the directory tree: a/);
  });

  it('should accept a tree that matches the entries', () => {
    validateTree(tree('x/y.txt', 'z.txt'), ['z.txt', 'x/y.txt']);
  });

  it('should report a tree that does not match the entries', () => {
    assert.throws(
      () => validateTree(tree('x/y.txt'), ['x/y.txt', 'z.txt']),
      /Directory tree does not match entries: missing z\.txt/,
    );
    assert.throws(() => validateTree(tree('x/y.txt', 'q.txt'), ['x/y.txt']), /extra q\.txt/);
  });

  it('should report a malformed tree', () => {
    const bad: DirectoryTreeNode = {
      name: '',
      kind: 'directory',
      children: [
        { name: 'a', kind: 'file' },
        { name: 'a', kind: 'file' },
      ],
    };
    assert.throws(() => validateTree(bad, ['a']), /Malformed directory tree: a appears twice/);
  });

  describe('placePath', () => {
    const dir = { label: '/home/u/photos', kind: 'directory' } as const;
    const archive = { label: 'bundle.tar.gz', kind: 'archive' } as const;
    const file = { label: 'notes.txt', kind: 'file' } as const;

    it('should keep relative paths under preserve', () => {
      assert.strictEqual(placePath('a/b.png', 'preserve', dir), 'a/b.png');
    });

    it('should drop folders under flat', () => {
      assert.strictEqual(placePath('a/b.png', 'flat', dir), 'b.png');
    });

    it('should nest directory and archive sources under their name', () => {
      assert.strictEqual(placePath('a/b.png', 'nested', dir), 'photos/a/b.png');
      assert.strictEqual(placePath('x.txt', 'nested', archive), 'bundle/x.txt');
      assert.strictEqual(placePath('notes.txt', 'nested', file), 'notes.txt');
    });

    it('should give every source a segment under by-source', () => {
      assert.strictEqual(placePath('x.txt', 'by-source', archive), 'bundle/x.txt');
      assert.strictEqual(placePath('notes.txt', 'by-source', file), 'notes.txt/notes.txt');
      assert.strictEqual(placePath('x.txt', 'by-source'), 'x.txt');
    });
  });

  describe('mergeArchive', () => {
    it('should insert an archive as a new top-level segment under nested', () => {
      const merged = mergeArchive(tree('x.txt'), tree('a.txt', 'd/b.txt'), 'nested', {
        source: { label: 'pack.tar', kind: 'archive' },
      });
      assert.deepStrictEqual(flattenTree(merged), new Set(['x.txt', 'pack/a.txt', 'pack/d/b.txt']));
    });

    it('should fail when flattened files collide with each other', () => {
      assert.throws(
        () => mergeArchive(undefined, tree('a/readme.md', 'b/readme.md'), 'flat'),
        /Imported files collide under the flat strategy: readme\.md/,
      );
    });

    it('should fail instead of shadowing an existing file', () => {
      assert.throws(
        () => mergeArchive(tree('readme.md'), tree('docs/readme.md'), 'flat'),
        /Merge would shadow existing files under the flat strategy: readme\.md/,
      );
    });

    it('should replace an existing file with overwrite', () => {
      const merged = mergeArchive(tree('readme.md', 'a.txt'), tree('docs/readme.md'), 'flat', { overwrite: true });
      assert.deepStrictEqual(flattenTree(merged), new Set(['a.txt', 'readme.md']));
    });

    it('should fail when an imported file lands on an existing directory', () => {
      assert.throws(() => mergeArchive(tree('docs/a.txt'), tree('docs'), 'preserve'), StructureConflictError);
    });

    it('should check a merge without building it', () => {
      checkMerge(tree('x.txt'), tree('a.txt'), 'preserve');
      assert.throws(
        () => checkMerge(tree('docs/a.txt'), tree('docs'), 'preserve'),
        /Paths collide in the directory tree: docs/,
      );
      assert.throws(
        () => checkMerge(tree('readme.md'), tree('docs/readme.md'), 'flat'),
        /Merge would shadow existing files under the flat strategy: readme\.md/,
      );
    });
  });
});
