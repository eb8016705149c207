import { describe, it, expect } from 'vitest';
import { settleInGroups } from '../../../src/utils/concurrency.js';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('settleInGroups', () => {
  it('should align results with input order, not completion order', async () => {
    const results = await settleInGroups([30, 10, 20], 3, async (ms, index) => {
      await delay(ms);
      return `${index}:${ms}`;
    });

    expect(results).toEqual([
      { status: 'fulfilled', value: '0:30' },
      { status: 'fulfilled', value: '1:10' },
      { status: 'fulfilled', value: '2:20' },
    ]);
  });

  it('should never run more than maxConcurrent at once', async () => {
    let active = 0;
    let peak = 0;

    await settleInGroups([1, 2, 3, 4, 5], 2, async () => {
      active++;
      peak = Math.max(peak, active);
      await delay(5);
      active--;
    });

    expect(peak).toBe(2);
  });

  it('should keep going after a rejection', async () => {
    const results = await settleInGroups(['a', 'b'], 1, async (item) => {
      if (item === 'a') {
        throw new Error('unreadable');
      }
      return item;
    });

    expect(results[0]?.status).toBe('rejected');
    expect(results[1]).toEqual({ status: 'fulfilled', value: 'b' });
  });

  it('should treat a concurrency below one as one', async () => {
    const seen: number[] = [];
    await settleInGroups([1, 2], 0, async (item) => {
      seen.push(item);
    });
    expect(seen).toEqual([1, 2]);
  });
});
