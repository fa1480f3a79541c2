import { describe, expect, it } from 'vitest';
import { WorkerPool } from '../pool';
import { delay } from './fake-transport';

describe('WorkerPool', () => {
  it('never runs more than `concurrency` items at once', async () => {
    const pool = new WorkerPool({ concurrency: 3 });
    let active = 0;
    let peak = 0;

    const { results, skipped } = await pool.run([1, 2, 3, 4, 5, 6, 7, 8], async (n) => {
      active++;
      peak = Math.max(peak, active);
      await delay(5);
      active--;
      return n * 10;
    });

    expect(peak).toBe(3);
    expect([...results].sort((a, b) => a - b)).toEqual([10, 20, 30, 40, 50, 60, 70, 80]);
    expect(skipped).toEqual([]);
  });

  it('collects results in completion order', async () => {
    const pool = new WorkerPool({ concurrency: 3 });
    const order: string[] = [];

    const { results } = await pool.run(
      [
        { name: 'slow', ms: 60 },
        { name: 'fast', ms: 1 },
        { name: 'medium', ms: 25 },
      ],
      async (item) => {
        await delay(item.ms);
        return item.name;
      },
      (name) => order.push(name)
    );

    expect(results).toEqual(['fast', 'medium', 'slow']);
    expect(order).toEqual(['fast', 'medium', 'slow']);
  });

  it('processes every item exactly once', async () => {
    const pool = new WorkerPool({ concurrency: 4 });
    const seen: number[] = [];
    const items = Array.from({ length: 25 }, (_, i) => i);

    await pool.run(items, async (n) => {
      seen.push(n);
      await delay(n % 3);
      return n;
    });

    expect([...seen].sort((a, b) => a - b)).toEqual(items);
  });

  it('uses at least one worker', async () => {
    const pool = new WorkerPool({ concurrency: 0 });
    const { results } = await pool.run(['a', 'b'], async (s) => s.toUpperCase());
    expect(results).toEqual(['A', 'B']);
  });

  it('stops dequeuing once aborted and returns the rest as skipped', async () => {
    const controller = new AbortController();
    const pool = new WorkerPool({ concurrency: 1, signal: controller.signal });

    const { results, skipped } = await pool.run(
      ['a', 'b', 'c', 'd'],
      async (item) => item,
      (item) => {
        if (item === 'b') controller.abort();
      }
    );

    expect(results).toEqual(['a', 'b']);
    expect(skipped).toEqual(['c', 'd']);
  });

  it('handles an empty queue', async () => {
    const pool = new WorkerPool({ concurrency: 2 });
    expect(await pool.run([], async (n: number) => n)).toEqual({ results: [], skipped: [] });
  });
});
