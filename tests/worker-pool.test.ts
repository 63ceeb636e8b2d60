/**
 * Tests for the bounded worker pool.
 */

import { describe, it, expect } from 'vitest';
import { mapWithConcurrency, Semaphore } from '../src/updater/worker-pool.js';

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('mapWithConcurrency', () => {
  it('should keep results in submission order', async () => {
    const finished: number[] = [];
    const results = await mapWithConcurrency([30, 5, 15], 3, async (delay, index) => {
      await sleep(delay);
      finished.push(index);
      return `task-${index}`;
    });

    expect(results).toEqual(['task-0', 'task-1', 'task-2']);
    expect(finished).toEqual([1, 2, 0]);
  });

  it('should never run more tasks than the concurrency limit', async () => {
    let active = 0;
    let peak = 0;

    await mapWithConcurrency([1, 2, 3, 4, 5, 6], 2, async () => {
      active++;
      peak = Math.max(peak, active);
      await sleep(5);
      active--;
    });

    expect(peak).toBe(2);
  });

  it('should treat a non-positive limit as one', async () => {
    let active = 0;
    let peak = 0;

    await mapWithConcurrency([1, 2, 3], 0, async () => {
      active++;
      peak = Math.max(peak, active);
      await sleep(1);
      active--;
    });

    expect(peak).toBe(1);
  });

  it('should run every task before rejecting with a task error', async () => {
    const ran: number[] = [];
    const run = mapWithConcurrency([0, 1, 2], 1, async (item) => {
      ran.push(item);
      if (item === 0) throw new Error('first failed');
      return item;
    });

    await expect(run).rejects.toThrow('first failed');
    expect(ran).toEqual([0, 1, 2]);
  });

  it('should return an empty list for no items', async () => {
    expect(await mapWithConcurrency([], 4, async () => 1)).toEqual([]);
  });
});

describe('Semaphore', () => {
  it('should hand permits to waiters in FIFO order', async () => {
    const semaphore = new Semaphore(1);
    const order: string[] = [];

    await semaphore.acquire();
    const a = semaphore.acquire().then(() => order.push('a'));
    const b = semaphore.acquire().then(() => order.push('b'));

    semaphore.release();
    await a;
    semaphore.release();
    await b;

    expect(order).toEqual(['a', 'b']);
  });
});
