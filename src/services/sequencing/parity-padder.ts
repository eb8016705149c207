/**
 * Parity Padder - forces an even page count
 *
 * @module sequencing/parity-padder
 */

import type { PageSequence } from '../../models/page.js';
import { createBlankPage, leadingPageSize } from './pages.js';
import { syntheticProvenance } from './provenance.js';

/**
 * Append one blank page when the sequence is odd.
 * An even sequence is returned as-is, which makes the padder idempotent.
 *
 * @param documentId - recorded on the blank page's provenance
 */
export function padToEven(sequence: PageSequence, documentId: string | null = null): PageSequence {
  if (sequence.length % 2 === 0) {
    return sequence;
  }
  const blank = createBlankPage(leadingPageSize(sequence));
  return [...sequence, { page: blank, provenance: syntheticProvenance('blank', documentId) }];
}
