import { promises as fs } from 'fs';
import path from 'path';
import type { ReportStorage } from '@/types/storage';

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

// Filesystem storage for report files
export class FilesystemReportStorage implements ReportStorage {
  constructor(readonly root: string) {}

  pathOf(name: string): string {
    return path.join(this.root, name);
  }

  async ensure(): Promise<void> {
    await fs.mkdir(this.root, { recursive: true });
  }

  async write(name: string, content: string): Promise<string> {
    const filePath = this.pathOf(name);
    await fs.writeFile(filePath, content, 'utf-8');
    return filePath;
  }

  async read(name: string): Promise<string> {
    return fs.readFile(this.pathOf(name), 'utf-8');
  }

  async list(): Promise<string[]> {
    try {
      const entries = await fs.readdir(this.root, { withFileTypes: true });
      return entries.filter((entry) => entry.isFile()).map((entry) => entry.name);
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }
  }

  async delete(name: string): Promise<void> {
    try {
      await fs.unlink(this.pathOf(name));
    } catch (error) {
      if (!isNotFound(error)) throw error;
    }
  }
}
