/**
 * Minimal tar pack/extract with no dependencies.
 * POSIX ustar: regular files and directories, names up to 255 bytes via
 * the prefix field.
 */

const BLOCK = 512;
const NAME_LEN = 100;
const PREFIX_LEN = 155;

export type TarEntryType = 'file' | 'directory' | 'other';

export interface TarEntry {
  name: string;
  type: TarEntryType;
  data: Buffer;
  /** Seconds since the epoch */
  mtime: number;
}

function padOctal(n: number, len: number): string {
  return n.toString(8).padStart(len - 1, '0') + '\0';
}

function headerChecksum(header: Buffer): number {
  let sum = 0;
  for (let i = 0; i < BLOCK; i++) {
    // Treat checksum field (148-155) as spaces
    sum += (i >= 148 && i < 156) ? 32 : header[i];
  }
  return sum;
}

function readString(header: Buffer, start: number, len: number): string {
  const field = header.subarray(start, start + len);
  const end = field.indexOf(0);
  return field.subarray(0, end === -1 ? len : end).toString('utf8');
}

function readOctal(header: Buffer, start: number, len: number): number {
  return parseInt(readString(header, start, len).trim() || '0', 8);
}

/**
 * Split a long name into ustar prefix + name at a `/`.
 */
function splitName(name: string): { prefix: string; name: string } {
  if (Buffer.byteLength(name) <= NAME_LEN) return { prefix: '', name };
  for (let i = name.indexOf('/'); i !== -1; i = name.indexOf('/', i + 1)) {
    const prefix = name.slice(0, i);
    const rest = name.slice(i + 1);
    if (Buffer.byteLength(prefix) <= PREFIX_LEN && Buffer.byteLength(rest) <= NAME_LEN) {
      return { prefix, name: rest };
    }
  }
  throw new Error(`Name too long for tar: ${name}`);
}

/**
 * Pack regular files into a tar buffer (no compression).
 */
export function pack(entries: Array<{ name: string; data: Buffer }>, opts: { mtime?: Date } = {}): Buffer {
  const blocks: Buffer[] = [];
  const mtime = Math.floor((opts.mtime ?? new Date()).getTime() / 1000);

  for (const entry of entries) {
    const header = Buffer.alloc(BLOCK, 0);
    const { prefix, name } = splitName(entry.name);

    // name (0, 100)
    header.write(name, 0, NAME_LEN, 'utf8');
    // mode (100, 8)
    header.write(padOctal(0o644, 8), 100, 8, 'utf8');
    // uid (108, 8)
    header.write(padOctal(0, 8), 108, 8, 'utf8');
    // gid (116, 8)
    header.write(padOctal(0, 8), 116, 8, 'utf8');
    // size (124, 12)
    header.write(padOctal(entry.data.length, 12), 124, 12, 'utf8');
    // mtime (136, 12)
    header.write(padOctal(mtime, 12), 136, 12, 'utf8');
    // typeflag (156, 1): '0' = regular file
    header.write('0', 156, 1, 'utf8');
    // magic (257, 6)
    header.write('ustar\0', 257, 6, 'utf8');
    // version (263, 2)
    header.write('00', 263, 2, 'utf8');
    // prefix (345, 155)
    header.write(prefix, 345, PREFIX_LEN, 'utf8');

    // Compute checksum
    header.write(padOctal(headerChecksum(header), 7), 148, 7, 'utf8');
    header[155] = 0x20; // trailing space

    blocks.push(header);
    blocks.push(entry.data);
    const remainder = entry.data.length % BLOCK;
    if (remainder > 0) {
      blocks.push(Buffer.alloc(BLOCK - remainder, 0));
    }
  }

  // Two zero blocks = end of archive
  blocks.push(Buffer.alloc(BLOCK * 2, 0));

  return Buffer.concat(blocks);
}

function entryType(flag: string): TarEntryType {
  if (flag === '0' || flag === '' || flag === '7') return 'file';
  if (flag === '5') return 'directory';
  return 'other';
}

/**
 * Extract entries from a tar buffer (no decompression).
 * Throws on a corrupt header or truncated data.
 */
export function extract(tar: Buffer): TarEntry[] {
  const entries: TarEntry[] = [];
  let offset = 0;

  while (offset + BLOCK <= tar.length) {
    const header = tar.subarray(offset, offset + BLOCK);
    if (header.every(b => b === 0)) break;

    const stored = readOctal(header, 148, 8);
    if (stored !== headerChecksum(header)) {
      throw new Error(`Corrupt tar header at offset ${offset}`);
    }

    const size = readOctal(header, 124, 12);
    const magic = readString(header, 257, 6);
    const prefix = magic === 'ustar' ? readString(header, 345, PREFIX_LEN) : '';
    const base = readString(header, 0, NAME_LEN);
    const name = (prefix ? `${prefix}/${base}` : base).replace(/\/+$/, '');

    offset += BLOCK;
    if (offset + size > tar.length) {
      throw new Error(`Truncated tar entry: ${name}`);
    }
    entries.push({
      name,
      type: entryType(readString(header, 156, 1)),
      data: Buffer.from(tar.subarray(offset, offset + size)),
      mtime: readOctal(header, 136, 12),
    });

    offset += size;
    const remainder = size % BLOCK;
    if (remainder > 0) offset += BLOCK - remainder;
  }

  return entries;
}
