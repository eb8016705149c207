/**
 * Batcher - slices a sequence into fixed-size printable windows
 *
 * Two duplex scopes, which give different physical page orders:
 *   global    - split the whole sequence once, chunk fronts ++ backs
 *   per_batch - chunk the reading-order sequence, split each window
 *
 * @module sequencing/batcher
 */

import type { Batch, PageSequence } from '../../models/page.js';
import type { DuplexScope } from '../../models/run.js';
import { combineDuplex, sequenceDuplex, type DuplexOptions } from './duplex-sequencer.js';
import { InvalidConfigurationError } from './errors.js';

export const DEFAULT_BATCH_SIZE = 20;

export function validateBatchSize(batchSize: number, duplexScope?: DuplexScope): void {
  if (!Number.isInteger(batchSize) || batchSize <= 0) {
    throw new InvalidConfigurationError(`batch_size must be a positive integer, got ${batchSize}`, {
      stage: 'batch',
      batchSize,
    });
  }
  if (duplexScope === 'per_batch' && batchSize % 2 !== 0) {
    throw new InvalidConfigurationError(
      `batch_size must be even when duplex_scope is per_batch, got ${batchSize}`,
      { stage: 'batch', batchSize, duplexScope }
    );
  }
}

/**
 * Contiguous windows of at most batchSize pages; the last may be shorter.
 * Every input page lands in exactly one batch.
 *
 * @throws InvalidConfigurationError for a non-positive or fractional size
 */
export function chunkSequence(sequence: PageSequence, batchSize: number): Batch[] {
  validateBatchSize(batchSize);
  const batches: Batch[] = [];
  for (let start = 0; start < sequence.length; start += batchSize) {
    batches.push({ index: batches.length + 1, pages: sequence.slice(start, start + batchSize) });
  }
  return batches;
}

export interface BatchPlanOptions {
  batchSize: number;
  duplexScope: DuplexScope;
  duplex?: DuplexOptions;
}

export interface BatchPlan {
  batches: Batch[];
  frontsCount: number;
  backsCount: number;
}

/**
 * Apply the duplex sequencer and chunk, in the order the scope dictates
 */
export function planBatches(global: PageSequence, options: BatchPlanOptions): BatchPlan {
  validateBatchSize(options.batchSize, options.duplexScope);

  if (options.duplexScope === 'global') {
    const split = sequenceDuplex(global, options.duplex);
    return {
      batches: chunkSequence(combineDuplex(split), options.batchSize),
      frontsCount: split.fronts.length,
      backsCount: split.backs.length,
    };
  }

  let frontsCount = 0;
  let backsCount = 0;
  const batches = chunkSequence(global, options.batchSize).map((window) => {
    const split = sequenceDuplex(window.pages, options.duplex);
    frontsCount += split.fronts.length;
    backsCount += split.backs.length;
    return { index: window.index, pages: combineDuplex(split) };
  });
  return { batches, frontsCount, backsCount };
}
