import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { afterEach } from 'vitest';

/**
 * Fresh temporary directory per test, removed afterwards.
 */
export function useTempDir(prefix = 'zip-reports-'): () => Promise<string> {
  const created: string[] = [];

  afterEach(async () => {
    await Promise.all(created.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
  });

  return async () => {
    const dir = await mkdtemp(path.join(tmpdir(), prefix));
    created.push(dir);
    return dir;
  };
}
