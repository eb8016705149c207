/**
 * Source document interfaces for Duplex Sequencer
 */

import type { PageSequence } from './page.js';

/**
 * A source file opened for sequencing
 */
export interface SourceDocument {
  /** UUID v4 identifier, also the provenance documentId of its pages */
  id: string;

  /** Full absolute path to source file */
  filePath: string;

  /** Original filename, e.g. 'chapter-1.pdf' */
  fileName: string;

  /** Filename without extension; title text and watermark label */
  displayName: string;

  /** Page count before any trimming */
  originalPageCount: number;

  sequence: PageSequence;
}

/**
 * Result of Trimmer → TitleInjector → Parity Padder for one document
 */
export interface PreprocessedDocument {
  document: SourceDocument;
  sequence: PageSequence;
  trimmed: boolean;
  titleAdded: boolean;
  blankAdded: boolean;
}
