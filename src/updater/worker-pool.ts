/**
 * Bounded worker pool for independent async tasks.
 *
 * At most `concurrency` tasks run at once. Results land in a slot array
 * indexed by submission order, so result `i` always belongs to item `i`
 * whatever order the tasks finish in.
 */

/**
 * Counting semaphore; waiters are released in FIFO order.
 */
export class Semaphore {
  private permits: number;
  private readonly waiting: Array<() => void> = [];

  constructor(permits: number) {
    this.permits = permits;
  }

  async acquire(): Promise<void> {
    if (this.permits > 0) {
      this.permits--;
      return;
    }
    return new Promise<void>((resolve) => {
      this.waiting.push(resolve);
    });
  }

  release(): void {
    const next = this.waiting.shift();
    if (next) {
      // Hand the permit straight to the next waiter
      next();
    } else {
      this.permits++;
    }
  }
}

/**
 * Run `task` over every item with bounded concurrency.
 *
 * Rejects with the first task error once every task has settled; callers that
 * need failure isolation should make `task` total.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  task: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const semaphore = new Semaphore(Math.max(1, Math.floor(concurrency)));

  const slots = items.map(async (item, index) => {
    await semaphore.acquire();
    try {
      return await task(item, index);
    } finally {
      semaphore.release();
    }
  });

  const settled = await Promise.allSettled(slots);
  const results: R[] = [];
  for (const slot of settled) {
    if (slot.status === 'rejected') throw slot.reason;
    results.push(slot.value);
  }
  return results;
}
