import type { ShardRange } from '@/errors';

export type ReportFormat = 'text' | 'csv';

export const REPORT_FORMATS: readonly ReportFormat[] = ['text', 'csv'];

export function isReportFormat(value: unknown): value is ReportFormat {
  return value === 'text' || value === 'csv';
}

/**
 * One shard file written by the sharder and consumed by the merger.
 */
export interface ReportShard {
  range: ShardRange;
  /** File name within the output directory */
  file: string;
  /** Full path of the shard file */
  path: string;
}

/**
 * Row of the combined report
 */
export interface CombinedReportRow {
  /** 1-based, contiguous across the whole report */
  serial: number;
  name: string;
  size: number;
}
