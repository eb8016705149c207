/**
 * Provenance for Duplex Sequencer pages
 *
 * Every page records either the source document and original (pre-trim)
 * 1-based page number it came from, or that the pipeline generated it.
 */

export type SyntheticKind = 'title' | 'blank';

export interface OriginalProvenance {
  kind: 'original';
  documentId: string;

  /** 1-based position in the source file, before any trimming */
  pageNumber: number;
}

export interface SyntheticProvenance {
  kind: 'synthetic';
  syntheticKind: SyntheticKind;

  /** Document the page was generated for (title and padding are per document) */
  documentId: string | null;
}

export type Provenance = OriginalProvenance | SyntheticProvenance;
