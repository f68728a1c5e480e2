import pLimit from 'p-limit';

/** True once a task has failed; queued tasks check it before doing work. */
export type Stopped = () => boolean;

/**
 * Runs `task` over `items` with at most `concurrency` in flight. The first
 * failure stops every task that has not started yet, and the returned promise
 * rejects with it only after the tasks already running have settled, so no
 * work outlives the failure.
 */
export async function runBounded<T>(
  items: readonly T[],
  concurrency: number,
  task: (item: T, stopped: Stopped) => Promise<void>
): Promise<void> {
  const limit = pLimit(Math.max(1, concurrency));
  const failures: unknown[] = [];
  const stopped: Stopped = () => failures.length > 0;

  await Promise.all(
    items.map((item) =>
      limit(async () => {
        if (stopped()) {
          return;
        }
        try {
          await task(item, stopped);
        } catch (error) {
          failures.push(error);
        }
      })
    )
  );

  if (failures.length > 0) {
    throw failures[0];
  }
}
