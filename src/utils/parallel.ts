import pLimit from 'p-limit';
import { getDefaultConcurrency } from '@/utils/config';

export type SettledTask<R> =
  | { success: true; index: number; result: R }
  | { success: false; index: number; error: Error };

/**
 * Run one task per item on a bounded pool and wait for every task to settle.
 * Results keep the order of `items`; a failed task never stops its siblings.
 */
export async function settleAll<T, R>(
  items: readonly T[],
  fn: (item: T, index: number) => Promise<R>,
  concurrency: number = getDefaultConcurrency()
): Promise<SettledTask<R>[]> {
  if (!Number.isSafeInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
  }

  const limit = pLimit(concurrency);
  const settled = await Promise.allSettled(items.map((item, index) => limit(() => fn(item, index))));

  return settled.map((outcome, index): SettledTask<R> =>
    outcome.status === 'fulfilled'
      ? { success: true, index, result: outcome.value }
      : {
          success: false,
          index,
          error: outcome.reason instanceof Error ? outcome.reason : new Error(String(outcome.reason)),
        }
  );
}
