import { FilesystemReportStorage } from '@/adapters/storage/filesystem';
import type { ReportFormat, ReportShard } from '@/types/report';
import type { ReportStorage } from '@/types/storage';
import type { ArchiveEntry } from '@/types/zip';
import { withDirectoryLock } from '@/utils/directory-lock';
import { createLogger } from '@/utils/logger';
import { cleanupShards, mergeShards, type CleanupResult, type MergeResult } from './merger';
import { shardAndWrite } from './sharder';

const log = createLogger('report');

export interface GenerateReportOptions {
  format: ReportFormat;
  outputDir: string;
  /** Merge the shards into one report and delete them afterwards */
  combine?: boolean;
  shardSize?: number;
  concurrency?: number;
  combinedFileName?: string;
  /** Defaults to the filesystem under `outputDir` */
  storage?: ReportStorage;
}

export interface ReportResult {
  outputDir: string;
  shards: ReportShard[];
  combined?: MergeResult;
  cleanup?: CleanupResult;
}

/**
 * Shard the entries into report files and, when asked, merge and clean up.
 * Only one cycle runs per output directory at a time.
 */
export async function generateReport(
  entries: readonly ArchiveEntry[],
  options: GenerateReportOptions
): Promise<ReportResult> {
  const storage = options.storage ?? new FilesystemReportStorage(options.outputDir);

  return withDirectoryLock(storage.root, async () => {
    // Only this run's shards may be in the directory when merging
    const stale = await cleanupShards(storage, options.format);
    if (stale.deleted.length > 0) {
      log.info(`Removed ${stale.deleted.length} stale ${options.format} shard(s) from ${storage.root}`);
    }

    const shards = await shardAndWrite(entries, {
      storage,
      format: options.format,
      shardSize: options.shardSize,
      concurrency: options.concurrency,
    });

    if (!options.combine) {
      return { outputDir: storage.root, shards };
    }

    const combined = await mergeShards(storage, options.format, { fileName: options.combinedFileName });
    const cleanup = await cleanupShards(storage, options.format);
    return { outputDir: storage.root, shards, combined, cleanup };
  });
}
