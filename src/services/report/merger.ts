import { CleanupError, MergeError, toError } from '@/errors';
import type { CombinedReportRow, ReportFormat, ReportShard } from '@/types/report';
import type { ReportStorage } from '@/types/storage';
import type { ArchiveEntry } from '@/types/zip';
import { createLogger } from '@/utils/logger';
import { compareShardRanges, escapeEntryName, parseShardFileName, unescapeEntryName } from './shard-naming';

const log = createLogger('report');

export const COMBINED_REPORT_HEADER = ['S.No', 'File Name', 'Size (bytes)'] as const;

const SHARD_LINE_PATTERN = /^(.*): (\d+) bytes$/;
const CSV_SPECIAL = /[",\r\n]/;

export interface MergeOptions {
  /** Defaults to combined_report.txt / combined_report.csv */
  fileName?: string;
}

export interface MergeResult {
  path: string;
  rowCount: number;
  shardCount: number;
  /** Shard lines that did not look like `name: size bytes` */
  skippedLines: number;
}

export interface CleanupResult {
  deleted: string[];
  failures: CleanupError[];
}

export function defaultCombinedFileName(format: ReportFormat): string {
  return format === 'csv' ? 'combined_report.csv' : 'combined_report.txt';
}

export function parseShardLine(line: string): ArchiveEntry | null {
  const match = SHARD_LINE_PATTERN.exec(line);
  if (!match) {
    return null;
  }
  return { name: unescapeEntryName(match[1]), size: Number(match[2]) };
}

export function escapeCsvField(value: string): string {
  return CSV_SPECIAL.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function formatCombinedRow(fields: readonly (string | number)[], format: ReportFormat): string {
  if (format === 'csv') {
    return `${fields.map((field) => escapeCsvField(String(field))).join(',')}\r\n`;
  }
  return `${fields.map((field) => escapeEntryName(String(field))).join('\t')}\n`;
}

/**
 * Shard files of the given format, ordered by the boundaries in their names
 * (numerically, so report_2000-3000 follows report_100-1000).
 */
export async function discoverShards(storage: ReportStorage, format: ReportFormat): Promise<ReportShard[]> {
  const files = await storage.list();
  const shards: ReportShard[] = [];

  for (const file of files) {
    const range = parseShardFileName(file, format);
    if (range) {
      shards.push({ range, file, path: storage.pathOf(file) });
    }
  }

  return shards.sort((a, b) => compareShardRanges(a.range, b.range));
}

/**
 * Check that the shards tile the entry list from index 0 with no gap or overlap.
 */
export function assertContiguousShards(shards: readonly ReportShard[]): void {
  let expectedStart = 0;
  for (const { range, file } of shards) {
    if (range.start !== expectedStart) {
      const problem = range.start < expectedStart ? 'overlaps' : 'leaves a gap before';
      throw new MergeError(`Report shard ${file} ${problem} entry ${expectedStart}; remove stale shards and retry`);
    }
    expectedStart = range.end;
  }
}

/**
 * Combine every shard into one numbered report.
 * Shards must cover the entry list exactly once (see `assertContiguousShards`).
 * On failure the shard files are left in place for manual recovery.
 */
export async function mergeShards(
  storage: ReportStorage,
  format: ReportFormat,
  options: MergeOptions = {}
): Promise<MergeResult> {
  const fileName = options.fileName ?? defaultCombinedFileName(format);

  let shards: ReportShard[];
  try {
    shards = await discoverShards(storage, format);
  } catch (error) {
    throw new MergeError(`Failed to list report shards in ${storage.root}`, { cause: error });
  }
  if (shards.length === 0) {
    log.warn(`No ${format} report shards found in ${storage.root}`);
  }
  assertContiguousShards(shards);

  const rows: CombinedReportRow[] = [];
  let skippedLines = 0;

  for (const shard of shards) {
    let content: string;
    try {
      content = await storage.read(shard.file);
    } catch (error) {
      throw new MergeError(`Failed to read report shard ${shard.file}`, { cause: error });
    }

    for (const line of content.split(/\r?\n/)) {
      if (line === '') continue;
      const entry = parseShardLine(line);
      if (!entry) {
        skippedLines++;
        continue;
      }
      rows.push({ serial: rows.length + 1, name: entry.name, size: entry.size });
    }
  }

  if (skippedLines > 0) {
    log.warn(`Skipped ${skippedLines} malformed line(s) while combining reports`);
  }

  const body =
    formatCombinedRow(COMBINED_REPORT_HEADER, format) +
    rows.map((row) => formatCombinedRow([row.serial, row.name, row.size], format)).join('');

  let path: string;
  try {
    path = await storage.write(fileName, body);
  } catch (error) {
    throw new MergeError(`Failed to write combined report ${fileName}`, { cause: error });
  }

  log.info(`Combined ${format.toUpperCase()} report saved to: ${path}`);
  return { path, rowCount: rows.length, shardCount: shards.length, skippedLines };
}

/**
 * Delete every shard file of the given format. Failures are reported, never thrown.
 */
export async function cleanupShards(storage: ReportStorage, format: ReportFormat): Promise<CleanupResult> {
  const result: CleanupResult = { deleted: [], failures: [] };

  let shards: ReportShard[];
  try {
    shards = await discoverShards(storage, format);
  } catch (error) {
    const failure = new CleanupError(storage.root, { cause: error });
    log.error(`Error during cleanup: ${toError(error).message}`);
    result.failures.push(failure);
    return result;
  }

  for (const shard of shards) {
    try {
      await storage.delete(shard.file);
      result.deleted.push(shard.file);
    } catch (error) {
      log.error(`Error during cleanup of ${shard.file}: ${toError(error).message}`);
      result.failures.push(new CleanupError(shard.file, { cause: error }));
    }
  }

  log.info(`Cleaned up ${result.deleted.length} individual ${format} reports in ${storage.root}.`);
  return result;
}
