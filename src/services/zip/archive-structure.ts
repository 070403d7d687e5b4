import { EntryNotFoundError } from '@/errors';
import type { ArchiveEntry } from '@/types/zip';
import { createLogger } from '@/utils/logger';

const log = createLogger('structure');

/**
 * Decoded name -> size mapping for one inspection session.
 * Built once after the central directory is located; read-only afterwards.
 */
export class ArchiveStructure {
  private readonly sizes = new Map<string, number>();
  private readonly ordered: readonly ArchiveEntry[];
  readonly totalSize: number;
  /** ISO timestamp when built */
  readonly cachedAt: string;

  constructor(entries: Iterable<ArchiveEntry>) {
    const ordered: ArchiveEntry[] = [];
    let total = 0;

    for (const entry of entries) {
      if (this.sizes.has(entry.name)) {
        log.warn(`Duplicate entry name ignored: ${entry.name}`);
        continue;
      }
      this.sizes.set(entry.name, entry.size);
      ordered.push(Object.freeze({ name: entry.name, size: entry.size }));
      total += entry.size;
    }

    this.ordered = Object.freeze(ordered);
    this.totalSize = total;
    this.cachedAt = new Date().toISOString();
  }

  get count(): number {
    return this.ordered.length;
  }

  /** Entries in central directory order */
  entries(): readonly ArchiveEntry[] {
    return this.ordered;
  }

  names(): string[] {
    return this.ordered.map((entry) => entry.name);
  }

  has(name: string): boolean {
    return this.sizes.has(name);
  }

  sizeOf(name: string): number {
    const size = this.sizes.get(name);
    if (size === undefined) {
      throw new EntryNotFoundError(name);
    }
    return size;
  }
}
