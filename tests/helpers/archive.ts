import { zipSync, type Zippable } from 'fflate';

const EOCD_SIGNATURE = 0x06054b50;
const EOCD_SIZE = 22;

export interface ArchiveFile {
  name: string;
  size: number;
}

/**
 * Build a stored (uncompressed) ZIP in memory. Names must not look like
 * integers, or object key order would reorder them.
 */
export function buildArchive(files: ArchiveFile[]): Uint8Array {
  const zippable: Zippable = {};
  files.forEach(({ name, size }, index) => {
    zippable[name] = [new Uint8Array(size).fill(0x61 + (index % 26)), { level: 0 }];
  });
  return zipSync(zippable, { level: 0 });
}

export function numberedFiles(count: number, size: number, prefix = 'assets/file-'): ArchiveFile[] {
  return Array.from({ length: count }, (_, i) => ({
    name: `${prefix}${String(i).padStart(4, '0')}.bin`,
    size,
  }));
}

/**
 * Offset of the first central directory record, read from the trailing
 * end-of-central-directory record (archives built here carry no comment).
 */
export function centralDirectoryOffset(zip: Uint8Array): number {
  const view = new DataView(zip.buffer, zip.byteOffset, zip.byteLength);
  const eocd = zip.byteLength - EOCD_SIZE;
  if (view.getUint32(eocd, true) !== EOCD_SIGNATURE) {
    throw new Error('Archive does not end with an end-of-central-directory record');
  }
  return view.getUint32(eocd + 16, true);
}
