import type { RangeTransport } from '@/adapters/http/fetch-transport';
import type { RangeProgress } from '@/adapters/http/range-fetcher';
import { generateReport, type ReportResult } from '@/services/report/pipeline';
import { buildFolderTree, listFolder, type FolderItem } from '@/services/zip/folder-tree';
import { inspect, type InspectionSession } from '@/services/zip/inspector';
import { DEFAULT_REPORT_DIR } from '@/utils/config';
import { isPathSafe, normalizeFolderPath } from '@/utils/zip-utils';
import type { CliOptions } from './parser';

export interface CommandDependencies {
  transport?: RangeTransport;
  /** Output sink for user-facing lines */
  write?: (line: string) => void;
  onProgress?: RangeProgress;
  leadingBytes?: number;
  /** Maximum shard writes in flight */
  concurrency?: number;
}

export function formatFolderItem(item: FolderItem, index: number): string {
  return item.kind === 'folder'
    ? `[${index + 1}] ${item.name}/`
    : `[${index + 1}] ${item.name} (${item.size} bytes)`;
}

export function formatFolderListing(session: InspectionSession, path: string): string[] {
  if (!isPathSafe(path)) {
    throw new Error(`Invalid folder path: ${path}`);
  }
  const folder = normalizeFolderPath(path);
  const items = listFolder(buildFolderTree(session.structure.entries()), folder);

  return [`Current Folder: /${folder}`, ...items.map(formatFolderItem)];
}

export function formatReportSummary(result: ReportResult): string[] {
  const lines = [`Reports saved to directory: ${result.outputDir} (${result.shards.length} shards)`];
  if (result.combined) {
    lines.push(`Combined report: ${result.combined.path} (${result.combined.rowCount} rows)`);
  }
  if (result.cleanup) {
    lines.push(`Deleted ${result.cleanup.deleted.length} shard file(s)`);
    for (const failure of result.cleanup.failures) {
      lines.push(`Cleanup warning: ${failure.message}`);
    }
  }
  return lines;
}

export interface ProgressStream {
  isTTY?: boolean;
  write(chunk: string): boolean;
}

/**
 * Progress printer for interactive terminals: one rewritten line per range.
 */
export function createProgressPrinter(stream: ProgressStream): RangeProgress | undefined {
  if (!stream.isTTY) {
    return undefined;
  }
  return (range, received, total) => {
    const percent = total > 0 ? Math.min(100, Math.floor((received / total) * 100)) : 100;
    stream.write(`\rDownloading ${range.start}-${range.end}: ${percent}% (${received}/${total} bytes)`);
    if (received >= total) {
      stream.write('\n');
    }
  };
}

/**
 * Inspect the archive, then print a folder listing or write the requested report.
 */
export async function runInspection(
  options: CliOptions,
  deps: CommandDependencies = {}
): Promise<InspectionSession> {
  const write = deps.write ?? ((line: string) => console.log(line));

  const session = await inspect(options.url, {
    transport: deps.transport,
    step: options.step,
    maxAttempts: options.maxAttempts,
    leadingBytes: deps.leadingBytes,
    onProgress: deps.onProgress,
  });

  write(`Archive: ${session.location}`);
  write(`Size: ${session.contentLength} bytes`);
  write(`Entries: ${session.structure.count} (${session.structure.totalSize} bytes uncompressed)`);

  if (options.report) {
    const result = await generateReport(session.structure.entries(), {
      format: options.report,
      outputDir: options.output ?? DEFAULT_REPORT_DIR,
      combine: options.combine,
      shardSize: options.shardSize,
      concurrency: deps.concurrency,
    });
    formatReportSummary(result).forEach(write);
  }

  if (options.tree !== undefined || !options.report) {
    formatFolderListing(session, options.tree ?? '').forEach(write);
  }

  return session;
}
