import { readdir, readFile } from 'fs/promises';
import path from 'path';
import { describe, it, expect, vi } from 'vitest';
import { FilesystemReportStorage } from '@/adapters/storage/filesystem';
import { CleanupError, MergeError } from '@/errors';
import {
  cleanupShards,
  discoverShards,
  escapeCsvField,
  formatCombinedRow,
  mergeShards,
  parseShardLine
} from '@/services/report/merger';
import { faultyStorage } from '../helpers/storage';
import { useTempDir } from '../helpers/tmp';

describe('Report merger', () => {
  const tempDir = useTempDir();

  async function storageWith(files: Record<string, string>): Promise<FilesystemReportStorage> {
    const storage = new FilesystemReportStorage(await tempDir());
    for (const [name, content] of Object.entries(files)) {
      await storage.write(name, content);
    }
    return storage;
  }

  describe('parseShardLine', () => {
    it('splits name and size', () => {
      expect(parseShardLine('docs/guide.md: 12 bytes')).toEqual({ name: 'docs/guide.md', size: 12 });
    });

    it('keeps colons inside names', () => {
      expect(parseShardLine('notes: draft.txt: 3 bytes')).toEqual({ name: 'notes: draft.txt', size: 3 });
    });

    it('rejects lines that do not match', () => {
      expect(parseShardLine('garbage')).toBeNull();
      expect(parseShardLine('a.txt: many bytes')).toBeNull();
      expect(parseShardLine('a.txt: -1 bytes')).toBeNull();
    });
  });

  describe('CSV fields', () => {
    it('quotes fields with separators, quotes or line breaks', () => {
      expect(escapeCsvField('plain.txt')).toBe('plain.txt');
      expect(escapeCsvField('a,b')).toBe('"a,b"');
      expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
      expect(escapeCsvField('two\nlines')).toBe('"two\nlines"');
    });

    it('formats rows per report format', () => {
      expect(formatCombinedRow([1, 'a,b.txt', 5], 'csv')).toBe('1,"a,b.txt",5\r\n');
      expect(formatCombinedRow([1, 'a,b.txt', 5], 'text')).toBe('1\ta,b.txt\t5\n');
    });
  });

  it('discovers shards in numeric order regardless of creation order', async () => {
    const storage = await storageWith({
      'report_100-110.text': '',
      'report_20-30.text': '',
      'combined_report.txt': '',
      'report_0-20.csv': '',
      'report_0-20.text': ''
    });

    const shards = await discoverShards(storage, 'text');

    expect(shards.map((shard) => shard.file)).toEqual(['report_0-20.text', 'report_20-30.text', 'report_100-110.text']);
    expect(shards[0]?.path).toBe(path.join(storage.root, 'report_0-20.text'));
  });

  it('renumbers rows contiguously across shards', async () => {
    const storage = await storageWith({
      'report_2-4.text': 'c.txt: 30 bytes\nd.txt: 40 bytes\n',
      'report_0-2.text': 'a.txt: 10 bytes\nb.txt: 20 bytes\n'
    });

    const result = await mergeShards(storage, 'text');

    expect(result).toEqual({
      path: path.join(storage.root, 'combined_report.txt'),
      rowCount: 4,
      shardCount: 2,
      skippedLines: 0
    });
    expect(await readFile(result.path, 'utf-8')).toBe(
      'S.No\tFile Name\tSize (bytes)\n1\ta.txt\t10\n2\tb.txt\t20\n3\tc.txt\t30\n4\td.txt\t40\n'
    );
  });

  it('writes quoted CSV rows', async () => {
    const storage = await storageWith({
      'report_0-2.csv': 'dir/with,comma.txt: 5 bytes\nquote"d.txt: 7 bytes\n'
    });

    const result = await mergeShards(storage, 'csv');

    expect(path.basename(result.path)).toBe('combined_report.csv');
    expect(await readFile(result.path, 'utf-8')).toBe(
      'S.No,File Name,Size (bytes)\r\n1,"dir/with,comma.txt",5\r\n2,"quote""d.txt",7\r\n'
    );
  });

  it('skips malformed lines and keeps numbering contiguous', async () => {
    const storage = await storageWith({
      'report_0-3.text': 'a.txt: 1 bytes\nthis is not a report line\nb.txt: 2 bytes\n'
    });
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const result = await mergeShards(storage, 'text', { fileName: 'all.txt' });

    expect(result.rowCount).toBe(2);
    expect(result.skippedLines).toBe(1);
    expect(await readFile(path.join(storage.root, 'all.txt'), 'utf-8')).toBe(
      'S.No\tFile Name\tSize (bytes)\n1\ta.txt\t1\n2\tb.txt\t2\n'
    );
    warnSpy.mockRestore();
  });

  it('writes a header-only report when there are no shards', async () => {
    const storage = await storageWith({});

    const result = await mergeShards(storage, 'csv');

    expect(result.rowCount).toBe(0);
    expect(result.shardCount).toBe(0);
    expect(await readFile(result.path, 'utf-8')).toBe('S.No,File Name,Size (bytes)\r\n');
  });

  it('fails with MergeError and leaves shards in place when a shard cannot be read', async () => {
    const inner = await storageWith({ 'report_0-1.text': 'a.txt: 1 bytes\n' });
    const storage = faultyStorage(inner, { read: () => true });

    const error = await mergeShards(storage, 'text').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(MergeError);
    expect(error instanceof Error && error.message).toBe('Failed to read report shard report_0-1.text');
    expect(await readdir(inner.root)).toEqual(['report_0-1.text']);
  });

  it('fails with MergeError when the combined report cannot be written', async () => {
    const inner = await storageWith({ 'report_0-1.csv': 'a.txt: 1 bytes\n' });
    const storage = faultyStorage(inner, { write: (name) => name === 'combined_report.csv' });

    await expect(mergeShards(storage, 'csv')).rejects.toThrow('Failed to write combined report combined_report.csv');
    expect(await readdir(inner.root)).toEqual(['report_0-1.csv']);
  });

  describe('cleanupShards', () => {
    it('deletes shard files of the format only', async () => {
      const storage = await storageWith({
        'report_0-1.csv': '',
        'report_1-2.csv': '',
        'report_0-1.text': '',
        'combined_report.csv': ''
      });

      const result = await cleanupShards(storage, 'csv');

      expect(result).toEqual({ deleted: ['report_0-1.csv', 'report_1-2.csv'], failures: [] });
      expect((await readdir(storage.root)).sort()).toEqual(['combined_report.csv', 'report_0-1.text']);
    });

    it('reports failed deletions without throwing', async () => {
      const inner = await storageWith({ 'report_0-1.text': '', 'report_1-2.text': '' });
      const storage = faultyStorage(inner, { delete: (name) => name === 'report_0-1.text' });
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

      const result = await cleanupShards(storage, 'text');

      expect(result.deleted).toEqual(['report_1-2.text']);
      expect(result.failures).toHaveLength(1);
      expect(result.failures[0]).toBeInstanceOf(CleanupError);
      expect(result.failures[0]?.file).toBe('report_0-1.text');
      expect(result.failures[0]?.message).toBe('Failed to delete report shard report_0-1.text');
      expect(await readdir(inner.root)).toEqual(['report_0-1.text']);
      errorSpy.mockRestore();
    });
  });
});
