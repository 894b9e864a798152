import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { gunzipSync, gzipSync } from 'node:zlib';
import { strToU8, zipSync } from 'fflate';
import { readDirectorySource, readTarSource, readZipSource, resolveSources } from '../src/sources.js';
import { DirectorySink, MemorySink, TarSink } from '../src/sinks.js';
import { extract, pack } from '../src/tar.js';
import { exportEntries, importFiles, listEntries, openContainer } from '../src/operations.js';
import { MemoryDocumentStore } from '../src/store.js';

describe('sources and sinks', () => {
  let tmp: string;
  let project: string;

  before(async () => {
    tmp = await mkdtemp(join(tmpdir(), 'svgpack-io-test-'));
    project = join(tmp, 'project');
    await mkdir(join(project, 'src'), { recursive: true });
    await mkdir(join(project, 'node_modules', 'dep'), { recursive: true });
    await writeFile(join(project, 'README.md'), '# Project');
    await writeFile(join(project, 'data.json'), '{}');
    await writeFile(join(project, 'src', 'main.py'), 'print(1)');
    await writeFile(join(project, 'src', 'main.pyc'), 'junk');
    await writeFile(join(project, 'node_modules', 'dep', 'index.js'), '');
  });

  after(async () => {
    await rm(tmp, { recursive: true, force: true });
  });

  it('should walk a directory in sorted order, skipping excluded names', async () => {
    const sources = await readDirectorySource(project, { exclude: ['*.pyc'] });
    assert.deepStrictEqual(sources.map(s => s.path), ['README.md', 'data.json', 'src/main.py']);
    assert.deepStrictEqual(sources[0].source, { label: 'project', kind: 'directory' });
    assert.deepStrictEqual(sources[2].data, Buffer.from('print(1)'));
  });

  it('should read regular files from a gzipped tarball', async () => {
    const archivePath = join(tmp, 'bundle.tar.gz');
    const tarball = pack([
      { name: 'a.txt', data: Buffer.from('a') },
      { name: '.git/HEAD', data: Buffer.from('ref') },
      { name: 'logs/run.log', data: Buffer.from('log') },
    ]);
    await writeFile(archivePath, gzipSync(tarball));

    const sources = await readTarSource(archivePath, { exclude: ['*.log'] });
    assert.deepStrictEqual(sources.map(s => s.path), ['a.txt']);
    assert.deepStrictEqual(sources[0].source, { label: 'bundle.tar.gz', kind: 'archive' });
  });

  it('should read regular files from a zip archive', async () => {
    const archivePath = join(tmp, 'assets.zip');
    await writeFile(archivePath, zipSync({
      'a.txt': strToU8('a'),
      'docs/': new Uint8Array(0),
      'docs/b.md': strToU8('# b'),
      '.git/HEAD': strToU8('ref'),
      'run.log': strToU8('log'),
    }));

    const sources = await readZipSource(archivePath, { exclude: ['*.log'] });
    assert.deepStrictEqual(sources.map(s => s.path), ['a.txt', 'docs/b.md']);
    assert.deepStrictEqual(sources[1].data, Buffer.from('# b'));
    assert.deepStrictEqual(sources[0].source, { label: 'assets.zip', kind: 'archive' });
  });

  it('should unpack a zip into the container and export it back', async () => {
    const archivePath = join(tmp, 'site.zip');
    await writeFile(archivePath, zipSync({
      'index.html': strToU8('<p>hi</p>'),
      'img/dot.bin': new Uint8Array([0, 255, 7]),
    }));

    const handle = openContainer(new MemoryDocumentStore());
    const sources = await resolveSources([archivePath], { unpackArchives: true });
    await importFiles(handle, sources, { strategy: 'nested' });
    assert.deepStrictEqual(
      (await listEntries(handle)).map(e => e.path),
      ['site/index.html', 'site/img/dot.bin'],
    );

    const sink = new MemorySink();
    await exportEntries(handle, {}, sink);
    assert.deepStrictEqual(sink.files.get('site/img/dot.bin'), Buffer.from([0, 255, 7]));
    assert.deepStrictEqual(sink.files.get('site/index.html'), Buffer.from('<p>hi</p>'));
  });

  it('should embed archives as files unless unpacking', async () => {
    const archivePath = join(tmp, 'plain.tar');
    await writeFile(archivePath, pack([{ name: 'inner.txt', data: Buffer.from('i') }]));

    const asFile = await resolveSources([archivePath]);
    assert.deepStrictEqual(asFile.map(s => s.path), ['plain.tar']);

    const unpacked = await resolveSources([archivePath, join(project, 'data.json')], { unpackArchives: true });
    assert.deepStrictEqual(unpacked.map(s => s.path), ['inner.txt', 'data.json']);
  });

  it('should write entries under a directory and refuse to clobber', async () => {
    const out = join(tmp, 'out');
    const sink = new DirectorySink(out);
    await sink.write('docs/a.txt', Buffer.from('a'));
    assert.strictEqual(await readFile(join(out, 'docs', 'a.txt'), 'utf8'), 'a');

    await sink.write('docs/a.txt', Buffer.from('a'));
    await assert.rejects(sink.write('docs/a.txt', Buffer.from('b')), /File exists/);
    await new DirectorySink(out, { overwrite: true }).write('docs/a.txt', Buffer.from('b'));
    assert.strictEqual(await readFile(join(out, 'docs', 'a.txt'), 'utf8'), 'b');
  });

  it('should refuse paths that leave the sink root', async () => {
    const sink = new DirectorySink(join(tmp, 'jail'));
    await assert.rejects(sink.write('../escape.txt', Buffer.from('x')), /Refusing to write outside/);
  });

  it('should export a container to a tarball and import it back', async () => {
    const handle = openContainer(new MemoryDocumentStore());
    await importFiles(handle, await readDirectorySource(project, { exclude: ['*.pyc'] }));

    const archivePath = join(tmp, 'export', 'out.tar.gz');
    const result = await exportEntries(handle, {}, new TarSink(archivePath));
    assert.strictEqual(result.exported, 3);

    const members = extract(gunzipSync(await readFile(archivePath)));
    assert.deepStrictEqual(members.map(m => m.name), ['README.md', 'data.json', 'src/main.py']);

    const copy = openContainer(new MemoryDocumentStore());
    await importFiles(copy, await readTarSource(archivePath), { strategy: 'nested' });
    assert.deepStrictEqual(
      (await listEntries(copy)).map(e => e.path),
      ['out/README.md', 'out/data.json', 'out/src/main.py'],
    );
  });

  it('should collect exports in memory', async () => {
    const sink = new MemorySink();
    await sink.write('a', Buffer.from('1'));
    assert.deepStrictEqual([...sink.files.entries()], [['a', Buffer.from('1')]]);
  });
});
