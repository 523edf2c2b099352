import { describe, it, expect } from 'vitest';
import { generateId, processInBatches } from './index.js';

describe('generateId', () => {
  it('returns lowercase hex of the requested length', () => {
    expect(generateId(16)).toMatch(/^[0-9a-f]{16}$/);
    expect(generateId(7)).toMatch(/^[0-9a-f]{7}$/);
  });
});

describe('processInBatches', () => {
  it('keeps input order and passes the overall index', async () => {
    const results = await processInBatches(['a', 'b', 'c'], async (item, index) => `${item}${index}`, 2);
    expect(results).toEqual(['a0', 'b1', 'c2']);
  });

  it('never runs more than batchSize at once', async () => {
    let running = 0;
    let peak = 0;
    await processInBatches(
      [1, 2, 3, 4, 5],
      async () => {
        running++;
        peak = Math.max(peak, running);
        await Promise.resolve();
        running--;
      },
      2,
    );
    expect(peak).toBe(2);
  });

  it('treats a batch size below one as one', async () => {
    expect(await processInBatches([1, 2], async (n) => n * 2, 0)).toEqual([2, 4]);
  });
});
