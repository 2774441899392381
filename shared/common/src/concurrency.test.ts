import { describe, expect, it } from 'vitest';
import { runWithConcurrency } from './concurrency.js';

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 1));

describe('runWithConcurrency', () => {
  it('processes every item exactly once', async () => {
    const seen: number[] = [];
    await runWithConcurrency([1, 2, 3, 4, 5], 2, async (item) => {
      await tick();
      seen.push(item);
    });
    expect([...seen].sort()).toEqual([1, 2, 3, 4, 5]);
  });

  it('never exceeds the concurrency limit', async () => {
    let active = 0;
    let peak = 0;
    await runWithConcurrency(Array.from({ length: 10 }, (_, i) => i), 3, async () => {
      active += 1;
      peak = Math.max(peak, active);
      await tick();
      active -= 1;
    });
    expect(peak).toBe(3);
  });

  it('passes the item position to the worker', async () => {
    const positions: Array<[string, number]> = [];
    await runWithConcurrency(['a', 'b', 'c'], 1, async (item, index) => {
      positions.push([item, index]);
    });
    expect(positions).toEqual([
      ['a', 0],
      ['b', 1],
      ['c', 2],
    ]);
  });

  it('treats a limit below one as sequential', async () => {
    const order: number[] = [];
    await runWithConcurrency([1, 2, 3], 0, async (item) => {
      order.push(item);
    });
    expect(order).toEqual([1, 2, 3]);
  });

  it('rejects with the first worker error and stops starting new items', async () => {
    const started: number[] = [];
    await expect(
      runWithConcurrency([1, 2, 3, 4], 1, async (item) => {
        started.push(item);
        if (item === 2) throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    expect(started).toEqual([1, 2]);
  });

  it('waits for running workers before rejecting', async () => {
    let slowFinished = false;
    let finishedBeforeReject: boolean | undefined;

    const run = runWithConcurrency([0, 1], 2, async (item) => {
      if (item === 0) {
        await new Promise<void>((resolve) => setTimeout(resolve, 30));
        slowFinished = true;
        return;
      }
      throw new Error('fast failure');
    }).catch((error: unknown) => {
      finishedBeforeReject = slowFinished;
      throw error;
    });

    await expect(run).rejects.toThrow('fast failure');
    expect(finishedBeforeReject).toBe(true);
  });

  it('keeps the first error when several workers fail', async () => {
    await expect(
      runWithConcurrency([10, 1], 2, async (delay) => {
        await new Promise<void>((resolve) => setTimeout(resolve, delay));
        throw new Error(`failed after ${delay}`);
      }),
    ).rejects.toThrow('failed after 1');
  });

  it('resolves immediately for an empty list', async () => {
    await expect(runWithConcurrency([], 4, async () => undefined)).resolves.toBeUndefined();
  });
});
