import { describe, it, expect } from 'vitest';
import { MAX_POOL_CONCURRENCY, runPool } from '../pool.js';
import { sleep } from '../../shared/utils.js';

function tracker() {
  let active = 0;
  let peak = 0;
  return {
    async run<T>(fn: () => Promise<T>): Promise<T> {
      active++;
      peak = Math.max(peak, active);
      try {
        return await fn();
      } finally {
        active--;
      }
    },
    get peak() {
      return peak;
    },
  };
}

describe('runPool', () => {
  it('keeps results in input order', async () => {
    const delays = [30, 5, 20, 1, 10];
    const results = await runPool(delays, 3, async (ms, i) => {
      await sleep(ms);
      return `item-${i}`;
    });
    expect(results).toEqual(['item-0', 'item-1', 'item-2', 'item-3', 'item-4']);
  });

  it('never exceeds the concurrency limit', async () => {
    const t = tracker();
    await runPool(Array.from({ length: 10 }, (_, i) => i), 3, (i) => t.run(() => sleep(i % 3)));
    expect(t.peak).toBe(3);
  });

  it('clamps the limit to the pool maximum', async () => {
    const t = tracker();
    await runPool(Array.from({ length: 20 }, (_, i) => i), 50, () => t.run(() => sleep(5)));
    expect(t.peak).toBe(MAX_POOL_CONCURRENCY);
  });

  it('handles an empty input', async () => {
    expect(await runPool([], 4, async () => 1)).toEqual([]);
  });
});
