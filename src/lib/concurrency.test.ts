import { describe, expect, it } from 'vitest';
import { mapWithConcurrency } from './concurrency';

const sleep = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

describe('mapWithConcurrency', () => {
  it('keeps input order and caps work in flight', async () => {
    let active = 0;
    let peak = 0;

    const results = await mapWithConcurrency([5, 1, 3, 2, 4], 2, async delay => {
      active++;
      peak = Math.max(peak, active);
      await sleep(delay);
      active--;
      return delay * 10;
    });

    expect(results).toEqual([50, 10, 30, 20, 40]);
    expect(peak).toBe(2);
  });

  it('handles an empty list', async () => {
    await expect(mapWithConcurrency([], 3, async () => 1)).resolves.toEqual([]);
  });

  it('runs one at a time for a limit below one', async () => {
    let peak = 0;
    let active = 0;
    await mapWithConcurrency([1, 2, 3], 0, async item => {
      active++;
      peak = Math.max(peak, active);
      await sleep(1);
      active--;
      return item;
    });
    expect(peak).toBe(1);
  });
});
