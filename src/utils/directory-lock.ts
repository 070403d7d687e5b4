import path from 'path';

const tails = new Map<string, Promise<void>>();

/**
 * Run `task` once every earlier task on the same directory has settled.
 * Keeps shard/merge cycles over one output directory strictly sequential.
 */
export async function withDirectoryLock<T>(directory: string, task: () => Promise<T>): Promise<T> {
  const key = path.resolve(directory);
  const previous = tails.get(key) ?? Promise.resolve();

  const run = previous.then(() => task());
  const tail = run.then(
    () => undefined,
    () => undefined
  );
  tails.set(key, tail);

  try {
    return await run;
  } finally {
    if (tails.get(key) === tail) {
      tails.delete(key);
    }
  }
}
