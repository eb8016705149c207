/**
 * Trimmer - drops the first and last page of a document
 *
 * @module sequencing/trimmer
 */

import type { PageSequence } from '../../models/page.js';
import { InsufficientPagesError } from './errors.js';

/** Trimming needs at least one page left over */
export const MIN_TRIMMABLE_PAGES = 3;

/**
 * Return positions [1, n-2] of the input as a new sequence.
 * Provenance is carried over unchanged, so page numbers stay pre-trim.
 *
 * @throws InsufficientPagesError when the sequence has 2 pages or fewer
 */
export function trimBoundaryPages(sequence: PageSequence, documentId?: string): PageSequence {
  if (sequence.length < MIN_TRIMMABLE_PAGES) {
    throw new InsufficientPagesError(sequence.length, documentId);
  }
  return sequence.slice(1, sequence.length - 1);
}
