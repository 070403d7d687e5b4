import { describe, it, expect } from 'vitest';
import { withDirectoryLock } from '@/utils/directory-lock';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('withDirectoryLock', () => {
  it('runs tasks on the same directory one at a time, in call order', async () => {
    const events: string[] = [];
    const task = (name: string, ms: number) => async () => {
      events.push(`${name}:start`);
      await delay(ms);
      events.push(`${name}:end`);
      return name;
    };

    const results = await Promise.all([
      withDirectoryLock('/tmp/lock-test', task('a', 20)),
      withDirectoryLock('/tmp/lock-test/', task('b', 1)),
      withDirectoryLock('/tmp/../tmp/lock-test', task('c', 1))
    ]);

    expect(results).toEqual(['a', 'b', 'c']);
    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
  });

  it('does not block other directories', async () => {
    const events: string[] = [];

    await Promise.all([
      withDirectoryLock('/tmp/lock-one', async () => {
        events.push('one:start');
        await delay(20);
        events.push('one:end');
      }),
      withDirectoryLock('/tmp/lock-two', async () => {
        events.push('two:start');
        events.push('two:end');
      })
    ]);

    expect(events.indexOf('two:end')).toBeLessThan(events.indexOf('one:end'));
  });

  it('releases the lock after a failure', async () => {
    const failed = withDirectoryLock('/tmp/lock-fail', async () => {
      throw new Error('shard write failed');
    });
    const next = withDirectoryLock('/tmp/lock-fail', async () => 'ran');

    await expect(failed).rejects.toThrow('shard write failed');
    await expect(next).resolves.toBe('ran');
  });
});
