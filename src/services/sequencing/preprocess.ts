/**
 * Per-document preprocessing: Trimmer → TitleInjector → Parity Padder
 *
 * @module sequencing/preprocess
 */

import type { PreprocessedDocument, SourceDocument } from '../../models/document.js';
import { InsufficientPagesError } from './errors.js';
import { padToEven } from './parity-padder.js';
import { DEFAULT_TITLE_FONT_SIZE, injectTitlePage, type TitleImage } from './title-injector.js';
import { trimBoundaryPages } from './trimmer.js';

export interface PreprocessOptions {
  removeFirstLast: boolean;
  titleFontSize?: number;
  titleImage?: TitleImage | null;
}

/**
 * @throws InsufficientPagesError when the document has no pages, or too
 *         few to trim while trimming is enabled
 */
export function preprocessDocument(
  document: SourceDocument,
  options: PreprocessOptions
): PreprocessedDocument {
  if (document.sequence.length === 0) {
    throw new InsufficientPagesError(0, document.id);
  }

  const content = options.removeFirstLast
    ? trimBoundaryPages(document.sequence, document.id)
    : document.sequence;

  const titled = injectTitlePage(content, {
    documentId: document.id,
    displayName: document.displayName,
    titleFontSize: options.titleFontSize ?? DEFAULT_TITLE_FONT_SIZE,
    image: options.titleImage ?? null,
  });

  const padded = padToEven(titled, document.id);

  return {
    document,
    sequence: padded,
    trimmed: options.removeFirstLast,
    titleAdded: true,
    blankAdded: padded.length > titled.length,
  };
}
