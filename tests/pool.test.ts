import { describe, expect, it } from 'vitest';
import { runBounded } from '../node/pool';

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('runBounded', () => {
  it('runs every item without exceeding the concurrency', async () => {
    let active = 0;
    let peak = 0;
    const seen: number[] = [];

    await runBounded([1, 2, 3, 4, 5], 2, async (item) => {
      active++;
      peak = Math.max(peak, active);
      await sleep(5);
      seen.push(item);
      active--;
    });

    expect(peak).toBe(2);
    expect([...seen].sort()).toEqual([1, 2, 3, 4, 5]);
  });

  it('stops queued work after the first failure', async () => {
    const started: number[] = [];
    const finished: number[] = [];
    const failure = new Error('disk full');

    const run = runBounded([1, 2, 3, 4, 5, 6], 2, async (item, stopped) => {
      started.push(item);
      if (item === 1) {
        await Promise.resolve();
        throw failure;
      }
      await sleep(20);
      expect(stopped()).toBe(true);
      finished.push(item);
    });

    await expect(run).rejects.toBe(failure);
    expect(started).toEqual([1, 2]);
    expect(finished).toEqual([2]);
  });

  it('accepts an empty list', async () => {
    await expect(runBounded([], 4, async () => undefined)).resolves.toBeUndefined();
  });
});
