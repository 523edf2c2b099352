import { randomBytes } from 'node:crypto';

/**
 * Random lowercase hex identifier of `length` characters.
 */
export function generateId(length: number): string {
  return randomBytes(Math.ceil(length / 2)).toString('hex').slice(0, length);
}

/**
 * Run `processor` over `items`, at most `batchSize` at a time.
 *
 * @returns Results in the same order as `items`
 */
export async function processInBatches<T, R>(
  items: readonly T[],
  processor: (item: T, index: number) => Promise<R>,
  batchSize: number,
): Promise<R[]> {
  const results: R[] = [];
  const size = Math.max(1, batchSize);

  for (let i = 0; i < items.length; i += size) {
    const batch = items.slice(i, i + size);
    const batchResults = await Promise.all(
      batch.map((item, batchIndex) => processor(item, i + batchIndex)),
    );
    results.push(...batchResults);
  }

  return results;
}
