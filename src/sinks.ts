import { createWriteStream } from 'node:fs';
import { mkdir, stat, writeFile } from 'node:fs/promises';
import { dirname, isAbsolute, relative, resolve, sep } from 'node:path';
import { createGzip } from 'node:zlib';
import { sha256, sha256File } from './checksum.js';
import { pack } from './tar.js';

/**
 * Destination for exported entries.
 */
export interface ExportSink {
  write(path: string, data: Buffer): Promise<void>;
  /** Called once after the last write; entries count as stored only after it */
  close?(): Promise<void>;
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Writes entries as files under a root directory.
 */
export class DirectorySink implements ExportSink {
  readonly root: string;
  private readonly overwrite: boolean;

  constructor(root: string, opts: { overwrite?: boolean } = {}) {
    this.root = resolve(root);
    this.overwrite = opts.overwrite ?? false;
  }

  async write(path: string, data: Buffer): Promise<void> {
    const target = resolve(this.root, ...path.split('/'));
    const rel = relative(this.root, target);
    if (rel === '' || rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
      throw new Error(`Refusing to write outside ${this.root}: ${path}`);
    }
    if (!this.overwrite && (await exists(target))) {
      // Same bytes already there is not a conflict
      if ((await sha256File(target)) === sha256(data)) return;
      throw new Error(`File exists: ${target}`);
    }
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, data);
  }
}

/**
 * Collects entries and writes one `.tar.gz` (or plain `.tar`) on close.
 */
export class TarSink implements ExportSink {
  readonly outputPath: string;
  private readonly gzip: boolean;
  private readonly files: Array<{ name: string; data: Buffer }> = [];

  constructor(outputPath: string, opts: { gzip?: boolean } = {}) {
    this.outputPath = resolve(outputPath);
    this.gzip = opts.gzip ?? !/\.tar$/i.test(outputPath);
  }

  async write(path: string, data: Buffer): Promise<void> {
    this.files.push({ name: path, data });
  }

  async close(): Promise<void> {
    const tarball = pack(this.files);
    await mkdir(dirname(this.outputPath), { recursive: true });
    if (!this.gzip) {
      await writeFile(this.outputPath, tarball);
      return;
    }
    await new Promise<void>((resolvePromise, reject) => {
      const gzip = createGzip({ level: 9 });
      const out = createWriteStream(this.outputPath);
      out.on('finish', resolvePromise);
      out.on('error', reject);
      gzip.on('error', reject);
      gzip.end(tarball);
      gzip.pipe(out);
    });
  }
}

/**
 * Keeps exported entries in memory.
 */
export class MemorySink implements ExportSink {
  readonly files = new Map<string, Buffer>();

  async write(path: string, data: Buffer): Promise<void> {
    this.files.set(path, Buffer.from(data));
  }
}
