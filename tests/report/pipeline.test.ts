import { readdir, readFile } from 'fs/promises';
import path from 'path';
import { describe, it, expect } from 'vitest';
import { FilesystemReportStorage } from '@/adapters/storage/filesystem';
import { MergeError } from '@/errors';
import { mergeShards } from '@/services/report/merger';
import { generateReport } from '@/services/report/pipeline';
import type { ArchiveEntry } from '@/types/zip';
import { useTempDir } from '../helpers/tmp';

function entries(count: number): ArchiveEntry[] {
  return Array.from({ length: count }, (_, i) => ({ name: `file-${i}.txt`, size: i }));
}

describe('generateReport', () => {
  const tempDir = useTempDir();

  it('leaves the shards in place without combine', async () => {
    const outputDir = path.join(await tempDir(), 'reports');

    const result = await generateReport(entries(25), { format: 'csv', outputDir, shardSize: 10 });

    expect(result.outputDir).toBe(outputDir);
    expect(result.combined).toBeUndefined();
    expect(result.cleanup).toBeUndefined();
    expect((await readdir(outputDir)).sort()).toEqual(['report_0-10.csv', 'report_10-20.csv', 'report_20-25.csv']);
  });

  it('merges, numbers every entry once and removes the shards', async () => {
    const outputDir = await tempDir();

    const result = await generateReport(entries(2500), {
      format: 'csv',
      outputDir,
      combine: true,
      shardSize: 1000,
      concurrency: 3
    });

    expect(result.shards).toHaveLength(3);
    expect(result.combined?.rowCount).toBe(2500);
    expect(result.cleanup?.deleted).toEqual(['report_0-1000.csv', 'report_1000-2000.csv', 'report_2000-2500.csv']);
    expect(await readdir(outputDir)).toEqual(['combined_report.csv']);

    const lines = (await readFile(path.join(outputDir, 'combined_report.csv'), 'utf-8')).split('\r\n');
    expect(lines[0]).toBe('S.No,File Name,Size (bytes)');
    expect(lines[1]).toBe('1,file-0.txt,0');
    expect(lines[1001]).toBe('1001,file-1000.txt,1000');
    expect(lines[2500]).toBe('2500,file-2499.txt,2499');
    expect(lines[2501]).toBe('');
  });

  it('replaces shards left by an earlier run before merging', async () => {
    const outputDir = await tempDir();
    const previous = Array.from({ length: 30 }, (_, i) => ({ name: `old-${i}.txt`, size: 1 }));

    await generateReport(previous, { format: 'text', outputDir, shardSize: 10 });
    const result = await generateReport(entries(25), { format: 'text', outputDir, shardSize: 10, combine: true });

    expect(result.combined?.rowCount).toBe(25);
    expect(result.combined?.shardCount).toBe(3);
    expect(await readdir(outputDir)).toEqual(['combined_report.txt']);

    const report = await readFile(path.join(outputDir, 'combined_report.txt'), 'utf-8');
    expect(report).not.toContain('old-');
    expect(report.split('\n')[25]).toBe('25\tfile-24.txt\t24');
  });

  it('refuses to merge overlapping or gapped shards and keeps them', async () => {
    const overlapping = new FilesystemReportStorage(await tempDir());
    await overlapping.write('report_0-10.text', 'a.txt: 1 bytes\n');
    await overlapping.write('report_5-15.text', 'b.txt: 2 bytes\n');

    await expect(mergeShards(overlapping, 'text')).rejects.toThrow(
      new MergeError('Report shard report_5-15.text overlaps entry 10; remove stale shards and retry')
    );
    expect((await readdir(overlapping.root)).sort()).toEqual(['report_0-10.text', 'report_5-15.text']);

    const gapped = new FilesystemReportStorage(await tempDir());
    await gapped.write('report_10-20.csv', 'a.txt: 1 bytes\n');

    await expect(mergeShards(gapped, 'csv')).rejects.toThrow(
      'Report shard report_10-20.csv leaves a gap before entry 0; remove stale shards and retry'
    );
    expect(await readdir(gapped.root)).toEqual(['report_10-20.csv']);
  });

  it('keeps names with line breaks intact through shard and merge', async () => {
    const csvDir = await tempDir();
    const tricky = [
      { name: 'a\nb.txt', size: 3 },
      { name: 'c.txt', size: 4 },
      { name: 'dir\\cr\r.txt', size: 5 }
    ];

    const csv = await generateReport(tricky, { format: 'csv', outputDir: csvDir, combine: true });

    expect(csv.combined?.rowCount).toBe(3);
    expect(csv.combined?.skippedLines).toBe(0);
    expect(await readFile(path.join(csvDir, 'combined_report.csv'), 'utf-8')).toBe(
      'S.No,File Name,Size (bytes)\r\n1,"a\nb.txt",3\r\n2,c.txt,4\r\n3,"dir\\cr\r.txt",5\r\n'
    );

    const textDir = await tempDir();
    await generateReport(tricky, { format: 'text', outputDir: textDir, combine: true });

    expect(await readFile(path.join(textDir, 'combined_report.txt'), 'utf-8')).toBe(
      'S.No\tFile Name\tSize (bytes)\n1\ta\\nb.txt\t3\n2\tc.txt\t4\n3\tdir\\\\cr\\r.txt\t5\n'
    );
  });

  it('runs overlapping requests on one directory one after the other', async () => {
    const outputDir = await tempDir();

    const [first, second] = await Promise.all([
      generateReport(entries(5), { format: 'text', outputDir, combine: true, combinedFileName: 'first.txt' }),
      generateReport(entries(3), { format: 'text', outputDir, combine: true, combinedFileName: 'second.txt' })
    ]);

    expect(first.combined?.rowCount).toBe(5);
    expect(second.combined?.rowCount).toBe(3);
    expect((await readdir(outputDir)).sort()).toEqual(['first.txt', 'second.txt']);
  });
});
