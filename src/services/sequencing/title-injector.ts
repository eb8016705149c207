/**
 * TitleInjector - prepends a generated title page
 *
 * The title page is a blank page sized like the document's first content
 * page, carrying the display name (and optionally an illustration) as
 * overlays. Rendering happens when the page is written.
 *
 * @module sequencing/title-injector
 */

import type { ImageFormat, Overlay, Page, PageSequence, PageSize } from '../../models/page.js';
import { addOverlay, createBlankPage, leadingPageSize } from './pages.js';
import { syntheticProvenance } from './provenance.js';

export const DEFAULT_TITLE_FONT_SIZE = 36;

/** Illustration may take at most this share of the page height */
const IMAGE_MAX_HEIGHT_RATIO = 0.6;
const IMAGE_MAX_WIDTH_RATIO = 0.8;

/** Illustration sits this share of the page height below centre */
const IMAGE_DROP_RATIO = 0.15;

/** Gap between the top of the illustration and the title baseline */
const IMAGE_TEXT_SPACING = 40;

/**
 * Pre-loaded illustration; width/height are the image's intrinsic size
 */
export interface TitleImage {
  /** Resolved source path */
  id: string;
  format: ImageFormat;
  bytes: Uint8Array;
  width: number;
  height: number;
}

export interface TitleOptions {
  documentId: string;
  displayName: string;
  titleFontSize?: number;
  image?: TitleImage | null;
}

/**
 * Font size is capped so long names still fit narrow pages
 */
export function titleFontSizeFor(width: number, maxFontSize: number = DEFAULT_TITLE_FONT_SIZE): number {
  return Math.min(maxFontSize, width / 16);
}

/**
 * Build the overlays of a title page of the given size
 */
export function buildTitleOverlays(
  size: PageSize,
  displayName: string,
  maxFontSize: number = DEFAULT_TITLE_FONT_SIZE,
  image: TitleImage | null = null
): Overlay[] {
  const fontSize = titleFontSizeFor(size.width, maxFontSize);
  const centreX = size.width / 2;

  if (!image || image.width <= 0 || image.height <= 0) {
    return [titleText(displayName, centreX, size.height / 2, fontSize)];
  }

  const scale = Math.min(
    (size.height * IMAGE_MAX_HEIGHT_RATIO) / image.height,
    (size.width * IMAGE_MAX_WIDTH_RATIO) / image.width,
    1
  );
  const width = image.width * scale;
  const height = image.height * scale;
  const x = (size.width - width) / 2;
  const y = (size.height - height) / 2 - size.height * IMAGE_DROP_RATIO;

  return [
    titleText(displayName, centreX, y + height + IMAGE_TEXT_SPACING, fontSize),
    {
      kind: 'image',
      purpose: 'title',
      imageId: image.id,
      format: image.format,
      bytes: image.bytes,
      x,
      y,
      width,
      height,
    },
  ];
}

function titleText(text: string, x: number, y: number, fontSize: number): Overlay {
  return {
    kind: 'text',
    purpose: 'title',
    text,
    x,
    y,
    align: 'center',
    font: 'HelveticaBold',
    fontSize,
    gray: 0,
    opacity: 1,
  };
}

export function createTitlePage(size: PageSize, options: TitleOptions): Page {
  const overlays = buildTitleOverlays(
    size,
    options.displayName,
    options.titleFontSize,
    options.image ?? null
  );
  return overlays.reduce<Page>((page, overlay) => addOverlay(page, overlay), createBlankPage(size));
}

/**
 * Prepend a title page sized to the first content page (612×792 when the
 * sequence is empty).
 */
export function injectTitlePage(sequence: PageSequence, options: TitleOptions): PageSequence {
  const page = createTitlePage(leadingPageSize(sequence), options);
  return [{ page, provenance: syntheticProvenance('title', options.documentId) }, ...sequence];
}
