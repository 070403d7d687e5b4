import type { ShardRange } from '@/errors';
import type { ReportFormat } from '@/types/report';

const SHARD_PATTERN = /^report_(\d+)-(\d+)\.(text|csv)$/;

/**
 * `report_{start}-{end}.{format}`, with `end` exclusive
 */
export function shardFileName(range: ShardRange, format: ReportFormat): string {
  return `report_${range.start}-${range.end}.${format}`;
}

/**
 * Recover the boundaries encoded in a shard file name.
 * Returns null for files that are not shards of the given format.
 */
export function parseShardFileName(file: string, format: ReportFormat): ShardRange | null {
  const match = SHARD_PATTERN.exec(file);
  if (!match || match[3] !== format) {
    return null;
  }

  const start = Number(match[1]);
  const end = Number(match[2]);
  if (!Number.isSafeInteger(start) || !Number.isSafeInteger(end) || end < start) {
    return null;
  }
  return { start, end };
}

const NAME_ESCAPES: Record<string, string> = { '\\': '\\\\', '\n': '\\n', '\r': '\\r' };
const NAME_UNESCAPES: Record<string, string> = { '\\': '\\', n: '\n', r: '\r' };

/**
 * Keep an entry name on one shard line: backslash, LF and CR become `\\`, `\n`, `\r`.
 */
export function escapeEntryName(name: string): string {
  return name.replace(/[\\\n\r]/g, (char) => NAME_ESCAPES[char] ?? char);
}

export function unescapeEntryName(escaped: string): string {
  return escaped.replace(/\\([\\nr])/g, (sequence, char: string) => NAME_UNESCAPES[char] ?? sequence);
}

export function compareShardRanges(a: ShardRange, b: ShardRange): number {
  return a.start - b.start || a.end - b.end;
}
