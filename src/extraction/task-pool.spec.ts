import { runWithConcurrency } from './task-pool';

describe('runWithConcurrency', () => {
  it('should keep the order of the items', async () => {
    const results = await runWithConcurrency([30, 10, 20], 3, async (ms) => {
      await new Promise((resolve) => setTimeout(resolve, ms));
      return ms * 2;
    });
    expect(results).toEqual([60, 20, 40]);
  });

  it('should never exceed the concurrency limit', async () => {
    let running = 0;
    let peak = 0;

    await runWithConcurrency([1, 2, 3, 4, 5], 2, async () => {
      running++;
      peak = Math.max(peak, running);
      await new Promise((resolve) => setTimeout(resolve, 5));
      running--;
    });

    expect(peak).toBe(2);
  });

  it('should run sequentially with a limit of 1', async () => {
    const order: string[] = [];

    await runWithConcurrency(['a', 'b'], 1, async (item) => {
      order.push(`start ${item}`);
      await Promise.resolve();
      order.push(`end ${item}`);
    });

    expect(order).toEqual(['start a', 'end a', 'start b', 'end b']);
  });

  it('should pass item indexes', async () => {
    const results = await runWithConcurrency(['a', 'b'], 2, async (item, i) =>
      `${i}:${item}`,
    );
    expect(results).toEqual(['0:a', '1:b']);
  });

  it('should handle an empty list', async () => {
    await expect(
      runWithConcurrency([], 4, async () => 1),
    ).resolves.toEqual([]);
  });
});
