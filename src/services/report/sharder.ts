import { ShardWriteError, type ShardFailure, type ShardRange } from '@/errors';
import type { ReportFormat, ReportShard } from '@/types/report';
import type { ReportStorage } from '@/types/storage';
import type { ArchiveEntry } from '@/types/zip';
import { DEFAULT_SHARD_SIZE } from '@/utils/config';
import { createLogger } from '@/utils/logger';
import { settleAll } from '@/utils/parallel';
import { escapeEntryName, shardFileName } from './shard-naming';

const log = createLogger('report');

export interface ShardOptions {
  storage: ReportStorage;
  format: ReportFormat;
  shardSize?: number;
  /** Maximum shard writes in flight */
  concurrency?: number;
}

/**
 * Consecutive `[start, end)` ranges of `shardSize` covering `count` entries.
 */
export function planShards(count: number, shardSize: number = DEFAULT_SHARD_SIZE): ShardRange[] {
  if (!Number.isSafeInteger(shardSize) || shardSize < 1) {
    throw new RangeError(`shardSize must be a positive integer, got ${shardSize}`);
  }

  const ranges: ShardRange[] = [];
  for (let start = 0; start < count; start += shardSize) {
    ranges.push({ start, end: Math.min(start + shardSize, count) });
  }
  return ranges;
}

export function formatShardLine(entry: ArchiveEntry): string {
  return `${escapeEntryName(entry.name)}: ${entry.size} bytes\n`;
}

/**
 * Write the entry list as independent shard files, in parallel.
 *
 * Every shard write settles before this returns. Failed shards are collected
 * into one `ShardWriteError`; the others are still written.
 */
export async function shardAndWrite(
  entries: readonly ArchiveEntry[],
  options: ShardOptions
): Promise<ReportShard[]> {
  const { storage, format } = options;
  const ranges = planShards(entries.length, options.shardSize);

  await storage.ensure();

  const outcomes = await settleAll(
    ranges,
    async (range): Promise<ReportShard> => {
      const file = shardFileName(range, format);
      const content = entries.slice(range.start, range.end).map(formatShardLine).join('');
      const path = await storage.write(file, content);
      return { range, file, path };
    },
    options.concurrency
  );

  const shards: ReportShard[] = [];
  const failures: ShardFailure[] = [];
  for (const outcome of outcomes) {
    if (outcome.success) {
      shards.push(outcome.result);
    } else {
      failures.push({ range: ranges[outcome.index], error: outcome.error });
    }
  }

  if (failures.length > 0) {
    for (const { range, error } of failures) {
      log.error(`Shard ${range.start}-${range.end} failed: ${error.message}`);
    }
    throw new ShardWriteError(failures);
  }

  log.info(`Reports saved to directory: ${storage.root} (${shards.length} shards)`);
  return shards;
}
