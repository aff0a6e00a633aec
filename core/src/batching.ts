/**
 * Split a request into contiguous batches no larger than the link's limit.
 *
 * Input order is preserved, the last batch may be shorter, and no batch is
 * empty. An empty input yields no batches.
 */
export function splitIntoBatches<T>(items: readonly T[], maxBatch: number): T[][] {
  if (!Number.isInteger(maxBatch) || maxBatch < 1) {
    throw new RangeError(`batching:splitIntoBatches - maxBatch must be a positive integer, got ${maxBatch}`);
  }
  const batches: T[][] = [];
  for (let start = 0; start < items.length; start += maxBatch) {
    batches.push(items.slice(start, start + maxBatch));
  }
  return batches;
}
