/**
 * Provenance Tracker
 *
 * Provenance is attached to each page as it moves through the pipeline.
 * This module builds provenance values and answers questions about a
 * sequence: which original pages it holds, in what order, from which
 * document, and what each position would be numbered after trimming.
 *
 * @module sequencing/provenance
 */

import type { Page, PageSequence, SequencedPage } from '../../models/page.js';
import type {
  OriginalProvenance,
  Provenance,
  SyntheticKind,
  SyntheticProvenance,
} from '../../models/provenance.js';

export function originalProvenance(documentId: string, pageNumber: number): OriginalProvenance {
  return { kind: 'original', documentId, pageNumber };
}

export function syntheticProvenance(
  syntheticKind: SyntheticKind,
  documentId: string | null = null
): SyntheticProvenance {
  return { kind: 'synthetic', syntheticKind, documentId };
}

export function isOriginal(provenance: Provenance): provenance is OriginalProvenance {
  return provenance.kind === 'original';
}

/**
 * Pair freshly opened pages with Original provenance, numbered from 1
 */
export function attachProvenance(documentId: string, pages: readonly Page[]): PageSequence {
  return pages.map((page, index) => ({
    page,
    provenance: originalProvenance(documentId, index + 1),
  }));
}

/**
 * Document a page belongs to, whether original or generated for it
 */
export function documentIdOf(provenance: Provenance): string | null {
  return provenance.documentId;
}

/**
 * Original page numbers in sequence order, synthetic pages omitted
 */
export function originalPageNumbers(sequence: PageSequence): number[] {
  const numbers: number[] = [];
  for (const { provenance } of sequence) {
    if (isOriginal(provenance)) {
      numbers.push(provenance.pageNumber);
    }
  }
  return numbers;
}

/**
 * Post-trim numbering: each original page's 1-based position among the
 * original pages of its own document in this sequence. Synthetic pages map
 * to null. Trimming leaves pre-trim numbers in provenance; callers that
 * need the renumbered view use this.
 */
export function contentPositions(sequence: PageSequence): Array<number | null> {
  const counters = new Map<string, number>();
  return sequence.map(({ provenance }) => {
    if (!isOriginal(provenance)) {
      return null;
    }
    const next = (counters.get(provenance.documentId) ?? 0) + 1;
    counters.set(provenance.documentId, next);
    return next;
  });
}

export interface ProvenanceCounts {
  original: number;
  title: number;
  blank: number;
}

/**
 * Count pages per document by provenance kind. Keys keep first-seen order.
 */
export function countByDocument(sequence: PageSequence): Map<string | null, ProvenanceCounts> {
  const counts = new Map<string | null, ProvenanceCounts>();
  for (const { provenance } of sequence) {
    const key = documentIdOf(provenance);
    const entry = counts.get(key) ?? { original: 0, title: 0, blank: 0 };
    if (isOriginal(provenance)) {
      entry.original++;
    } else {
      entry[provenance.syntheticKind]++;
    }
    counts.set(key, entry);
  }
  return counts;
}

/**
 * Human-readable label: 'report:p3', 'title:report' or 'blank'
 *
 * @param names - documentId → display name
 */
export function labelPage(entry: SequencedPage, names: ReadonlyMap<string, string>): string {
  const { provenance } = entry;
  if (isOriginal(provenance)) {
    const name = names.get(provenance.documentId) ?? provenance.documentId;
    return `${name}:p${provenance.pageNumber}`;
  }
  if (provenance.syntheticKind === 'title') {
    const name = provenance.documentId
      ? (names.get(provenance.documentId) ?? provenance.documentId)
      : 'untitled';
    return `title:${name}`;
  }
  return 'blank';
}

export function labelSequence(
  sequence: PageSequence,
  names: ReadonlyMap<string, string>
): string[] {
  return sequence.map((entry) => labelPage(entry, names));
}
