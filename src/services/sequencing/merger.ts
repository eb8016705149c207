/**
 * Multi-Document Merger
 *
 * Concatenates preprocessed per-document sequences, in input order, into
 * one global sequence. Provenance is kept verbatim; documentId tells pages
 * of different sources apart.
 *
 * @module sequencing/merger
 */

import type { PreprocessedDocument } from '../../models/document.js';
import type { PageSequence } from '../../models/page.js';
import { EmptyInputError } from './errors.js';

export interface MergeSegment {
  documentId: string;

  /** Index of the document's first page in the global sequence */
  offset: number;
  length: number;
}

export interface MergeResult {
  sequence: PageSequence;
  segments: MergeSegment[];
}

/**
 * @throws EmptyInputError when the list is empty or every document is empty
 */
export function mergeDocuments(documents: readonly PreprocessedDocument[]): MergeResult {
  if (documents.length === 0) {
    throw new EmptyInputError('No documents to merge');
  }

  const sequence = documents.flatMap((doc) => doc.sequence);
  if (sequence.length === 0) {
    throw new EmptyInputError();
  }

  const segments: MergeSegment[] = [];
  let offset = 0;
  for (const doc of documents) {
    segments.push({ documentId: doc.document.id, offset, length: doc.sequence.length });
    offset += doc.sequence.length;
  }

  return { sequence, segments };
}

/**
 * Recover one document's pages from a merged sequence
 */
export function sliceSegment(sequence: PageSequence, segment: MergeSegment): PageSequence {
  return sequence.slice(segment.offset, segment.offset + segment.length);
}
