/**
 * Page interfaces for Duplex Sequencer
 *
 * A Page is an owned value: content reference, accumulated rotation,
 * intrinsic size and the overlays to composite when it is written.
 * Transforms never mutate a Page; they return a new one.
 */

import type { Provenance } from './provenance.js';

/**
 * Page rotation in degrees, always normalized to [0, 360)
 */
export type RotationAngle = 0 | 90 | 180 | 270;

/**
 * Rotations that may be applied to back pages
 */
export type BackRotationAngle = 90 | 180 | 270;

/**
 * US Letter in PDF units, used when no content page gives a size
 */
export const DEFAULT_PAGE_SIZE: PageSize = { width: 612, height: 792 };

export interface PageSize {
  width: number;
  height: number;
}

/**
 * What a page draws before overlays.
 * 'source' pages are copied from a loaded container at write time.
 */
export type PageContent =
  | { kind: 'source'; documentId: string; pageIndex: number }
  | { kind: 'blank' };

export type OverlayFont = 'Helvetica' | 'HelveticaBold';

export type TextAlign = 'left' | 'center' | 'right';

export type OverlayPurpose = 'watermark' | 'page_number' | 'title';

/**
 * Single line of text composited onto a page.
 * (x, y) is the baseline anchor in unrotated page space; align decides
 * whether the anchor is the left edge, the centre or the right edge.
 */
export interface TextOverlay {
  kind: 'text';
  purpose: OverlayPurpose;
  text: string;
  x: number;
  y: number;
  align: TextAlign;
  font: OverlayFont;
  fontSize: number;

  /** Grey level, 0 = black, 1 = white */
  gray: number;

  /** 0..1 */
  opacity: number;
}

export type ImageFormat = 'png' | 'jpg';

/**
 * Raster image composited onto a page (title illustration)
 */
export interface ImageOverlay {
  kind: 'image';
  purpose: OverlayPurpose;
  /** Identifies the image across cloned overlays */
  imageId: string;
  format: ImageFormat;
  bytes: Uint8Array;
  x: number;
  y: number;
  width: number;
  height: number;
}

export type Overlay = TextOverlay | ImageOverlay;

export interface Page {
  readonly content: PageContent;
  readonly rotation: RotationAngle;
  readonly width: number;
  readonly height: number;
  readonly overlays: readonly Overlay[];
}

/**
 * A page paired with where it came from. Provenance travels with the page
 * through every reorder, insert and removal.
 */
export interface SequencedPage {
  readonly page: Page;
  readonly provenance: Provenance;
}

export type PageSequence = readonly SequencedPage[];

/**
 * Contiguous window of a sequence destined for one output artifact
 */
export interface Batch {
  /** 1-based */
  index: number;
  pages: PageSequence;
}
