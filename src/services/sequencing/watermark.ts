/**
 * Provenance watermarks and sequence page numbers
 *
 * Watermarks sit bottom-right as the page is displayed. The anchor is placed
 * in unrotated page space, in the corner that the page's rotation turns to
 * bottom-right: top-left at 180°, top-right at 90°, bottom-left at 270°.
 *
 * @module sequencing/watermark
 */

import type { PageSequence, RotationAngle, SequencedPage, TextOverlay } from '../../models/page.js';
import { addOverlay } from './pages.js';
import { isOriginal } from './provenance.js';

export const DEFAULT_PAGE_NUMBER_FONT_SIZE = 12;

const WATERMARK_MAX_FONT_SIZE = 8;
const WATERMARK_X_MARGIN = 10;
const WATERMARK_Y_MARGIN = 15;
const WATERMARK_GRAY = 0.5;
const WATERMARK_OPACITY = 0.7;

const PAGE_NUMBER_MARGIN = 20;

export function watermarkText(pageNumber: number, documentName: string): string {
  return `${pageNumber} | ${documentName}`;
}

type WatermarkAnchor = Pick<TextOverlay, 'x' | 'y' | 'align'>;

/**
 * Unrotated-space anchor of the displayed bottom-right corner. Text runs
 * along the page's x axis, so `align` keeps it reading inward from the corner.
 */
export function watermarkAnchor(width: number, height: number, rotation: RotationAngle): WatermarkAnchor {
  switch (rotation) {
    case 0:
      return { x: width - WATERMARK_X_MARGIN, y: WATERMARK_Y_MARGIN, align: 'right' };
    case 90:
      return { x: width - WATERMARK_Y_MARGIN, y: height - WATERMARK_X_MARGIN, align: 'right' };
    case 180:
      return { x: WATERMARK_X_MARGIN, y: height - WATERMARK_Y_MARGIN, align: 'left' };
    case 270:
      return { x: WATERMARK_Y_MARGIN, y: WATERMARK_X_MARGIN, align: 'left' };
  }
}

export function buildWatermark(
  width: number,
  height: number,
  text: string,
  rotation: RotationAngle
): TextOverlay {
  const anchor = watermarkAnchor(width, height, rotation);

  return {
    kind: 'text',
    purpose: 'watermark',
    text,
    ...anchor,
    font: 'Helvetica',
    fontSize: Math.min(WATERMARK_MAX_FONT_SIZE, width / 100),
    gray: WATERMARK_GRAY,
    opacity: WATERMARK_OPACITY,
  };
}

/**
 * Stamp "{pageNumber} | {documentName}" on an original page, anchored for
 * its current rotation. Synthetic pages come back unchanged.
 *
 * @param names - documentId → display name
 */
export function stampWatermark(entry: SequencedPage, names: ReadonlyMap<string, string>): SequencedPage {
  const { page, provenance } = entry;
  if (!isOriginal(provenance)) {
    return entry;
  }
  const name = names.get(provenance.documentId) ?? provenance.documentId;
  const overlay = buildWatermark(
    page.width,
    page.height,
    watermarkText(provenance.pageNumber, name),
    page.rotation
  );
  return { page: addOverlay(page, overlay), provenance };
}

export function buildPageNumber(width: number, position: number, fontSize: number): TextOverlay {
  return {
    kind: 'text',
    purpose: 'page_number',
    text: String(position),
    x: width - PAGE_NUMBER_MARGIN - fontSize * 2,
    y: PAGE_NUMBER_MARGIN,
    align: 'left',
    font: 'Helvetica',
    fontSize,
    gray: 0,
    opacity: 1,
  };
}

/**
 * Number every original page with its 1-based position in the sequence
 * (the reading-order position before duplex splitting).
 */
export function numberPages(
  sequence: PageSequence,
  fontSize: number = DEFAULT_PAGE_NUMBER_FONT_SIZE
): PageSequence {
  return sequence.map((entry, index) => {
    if (!isOriginal(entry.provenance)) {
      return entry;
    }
    const overlay = buildPageNumber(entry.page.width, index + 1, fontSize);
    return { page: addOverlay(entry.page, overlay), provenance: entry.provenance };
  });
}
