import { ConfigurationError } from '../lib/errors.js';
import type { Batch, Topic } from './types.js';

/**
 * Split topics into consecutive batches of `batchSize`; the last batch holds
 * the remainder. Concatenating the batches gives back the input order.
 */
export function partitionTopics(topics: readonly Topic[], batchSize: number): Batch[] {
  if (!Number.isInteger(batchSize) || batchSize <= 0) {
    throw new ConfigurationError(`Batch size must be a positive integer, got ${batchSize}`, {
      batch_size: batchSize,
    });
  }

  const batches: Batch[] = [];
  for (let start = 0; start < topics.length; start += batchSize) {
    batches.push({
      index: batches.length + 1,
      topics: topics.slice(start, start + batchSize),
    });
  }
  return batches;
}
