import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';

/**
 * Where a host document lives.
 */
export interface DocumentStore {
  /** Current bytes, or null if the document does not exist yet */
  load(): Promise<Buffer | null>;
  /** Replace the document in one step */
  save(bytes: Buffer): Promise<void>;
  describe(): string;
}

function isErrno(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

/**
 * Host document on disk. Saves go to a temporary sibling that is renamed
 * over the target, so readers never see a partial write.
 */
export class FileDocumentStore implements DocumentStore {
  readonly path: string;

  constructor(path: string) {
    this.path = resolve(path);
  }

  async load(): Promise<Buffer | null> {
    try {
      return await readFile(this.path);
    } catch (err) {
      if (isErrno(err) && err.code === 'ENOENT') return null;
      throw err;
    }
  }

  async save(bytes: Buffer): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    const tmpPath = `${this.path}.${process.pid}.${Date.now()}.tmp`;
    try {
      await writeFile(tmpPath, bytes);
      await rename(tmpPath, this.path);
    } catch (err) {
      await rm(tmpPath, { force: true });
      throw err;
    }
  }

  describe(): string {
    return this.path;
  }
}

/**
 * Host document in memory.
 */
export class MemoryDocumentStore implements DocumentStore {
  private bytes: Buffer | null;
  /** Number of successful saves */
  saves = 0;

  constructor(initial?: Buffer | string) {
    this.bytes = initial === undefined ? null : Buffer.from(initial);
  }

  async load(): Promise<Buffer | null> {
    return this.bytes ? Buffer.from(this.bytes) : null;
  }

  async save(bytes: Buffer): Promise<void> {
    this.bytes = Buffer.from(bytes);
    this.saves++;
  }

  /** Current content as text ('' when never saved) */
  text(): string {
    return this.bytes ? this.bytes.toString('utf8') : '';
  }

  describe(): string {
    return 'memory';
  }
}
