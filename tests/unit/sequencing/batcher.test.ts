/**
 * Unit tests for the Batcher
 *
 * @module tests/unit/sequencing/batcher
 */

import { describe, it, expect } from 'vitest';
import { chunkSequence, planBatches, validateBatchSize } from '../../../src/services/sequencing/batcher.js';
import { InvalidConfigurationError } from '../../../src/services/sequencing/errors.js';
import { originalPageNumbers } from '../../../src/services/sequencing/provenance.js';
import { makeSequence } from '../../helpers.js';

describe('chunkSequence', () => {
  it('should split 45 pages into batches of 20, 20 and 5', () => {
    const batches = chunkSequence(makeSequence('doc-a', 45), 20);

    expect(batches.map((b) => b.pages.length)).toEqual([20, 20, 5]);
    expect(batches.map((b) => b.index)).toEqual([1, 2, 3]);
  });

  it('should keep every page exactly once, in order', () => {
    const batches = chunkSequence(makeSequence('doc-a', 7), 3);
    expect(batches.flatMap((b) => originalPageNumbers(b.pages))).toEqual([1, 2, 3, 4, 5, 6, 7]);
  });

  it('should produce a single batch when the size exceeds the sequence', () => {
    expect(chunkSequence(makeSequence('doc-a', 4), 100)).toHaveLength(1);
  });

  it('should produce no batches for an empty sequence', () => {
    expect(chunkSequence([], 20)).toEqual([]);
  });

  it.each([0, -4, 2.5])('should reject batch size %s', (size) => {
    expect(() => chunkSequence(makeSequence('doc-a', 4), size)).toThrow(InvalidConfigurationError);
  });
});

describe('validateBatchSize', () => {
  it('should require an even size for per_batch scope', () => {
    expect(() => validateBatchSize(5, 'per_batch')).toThrow(/must be even/);
  });

  it('should allow an odd size for global scope', () => {
    expect(() => validateBatchSize(5, 'global')).not.toThrow();
  });
});

describe('planBatches', () => {
  it('should split each window separately in per_batch scope', () => {
    const plan = planBatches(makeSequence('doc-a', 8), { batchSize: 4, duplexScope: 'per_batch' });

    expect(plan.batches.map((b) => originalPageNumbers(b.pages))).toEqual([
      [3, 1, 2, 4],
      [7, 5, 6, 8],
    ]);
    expect(plan.frontsCount).toBe(4);
    expect(plan.backsCount).toBe(4);
  });

  it('should split once and chunk fronts then backs in global scope', () => {
    const plan = planBatches(makeSequence('doc-a', 8), { batchSize: 4, duplexScope: 'global' });

    expect(plan.batches.map((b) => originalPageNumbers(b.pages))).toEqual([
      [7, 5, 3, 1],
      [2, 4, 6, 8],
    ]);
  });

  it('should rotate backs inside every per_batch window', () => {
    const plan = planBatches(makeSequence('doc-a', 4), {
      batchSize: 4,
      duplexScope: 'per_batch',
      duplex: { rotationAngle: 90 },
    });

    expect(plan.batches[0]?.pages.map((e) => e.page.rotation)).toEqual([0, 0, 90, 90]);
  });

  it('should reject an odd size in per_batch scope', () => {
    expect(() => planBatches(makeSequence('doc-a', 8), { batchSize: 3, duplexScope: 'per_batch' })).toThrow(
      InvalidConfigurationError
    );
  });
});
