/**
 * Overlay Renderer - composites text and image overlays with pdf-lib
 *
 * Overlays are plain descriptors on a Page value; this module is the only
 * place they become PDF drawing operations.
 *
 * @module pdf/overlay-renderer
 */

import { readFile } from 'fs/promises';
import * as path from 'path';
import {
  PDFDocument,
  StandardFonts,
  grayscale,
  type PDFFont,
  type PDFImage,
  type PDFPage,
} from 'pdf-lib';
import type {
  ImageFormat,
  ImageOverlay,
  Overlay,
  OverlayFont,
  TextOverlay,
} from '../../models/page.js';
import { RenderFailureError, describeError } from '../sequencing/errors.js';
import type { TitleImage } from '../sequencing/title-injector.js';

export type OverlayFonts = Record<OverlayFont, PDFFont>;

/**
 * Embedded images keyed by overlay image id. Cloned overlays carry their own
 * byte copies, so the id is what makes an illustration embed once per file.
 */
export type ImageCache = Map<string, PDFImage>;

export interface PageOrigin {
  x: number;
  y: number;
}

export async function embedOverlayFonts(doc: PDFDocument): Promise<OverlayFonts> {
  const [regular, bold] = await Promise.all([
    doc.embedFont(StandardFonts.Helvetica),
    doc.embedFont(StandardFonts.HelveticaBold),
  ]);
  return { Helvetica: regular, HelveticaBold: bold };
}

/**
 * Left edge of a text run for the overlay's alignment
 */
export function alignedX(overlay: TextOverlay, textWidth: number): number {
  switch (overlay.align) {
    case 'left':
      return overlay.x;
    case 'center':
      return overlay.x - textWidth / 2;
    case 'right':
      return overlay.x - textWidth;
  }
}

function drawText(page: PDFPage, overlay: TextOverlay, fonts: OverlayFonts, origin: PageOrigin): void {
  const font = fonts[overlay.font];
  const width = font.widthOfTextAtSize(overlay.text, overlay.fontSize);
  page.drawText(overlay.text, {
    x: origin.x + alignedX(overlay, width),
    y: origin.y + overlay.y,
    size: overlay.fontSize,
    font,
    color: grayscale(overlay.gray),
    opacity: overlay.opacity,
  });
}

async function embedImage(doc: PDFDocument, format: ImageFormat, bytes: Uint8Array): Promise<PDFImage> {
  return format === 'png' ? doc.embedPng(bytes) : doc.embedJpg(bytes);
}

async function drawImage(
  doc: PDFDocument,
  page: PDFPage,
  overlay: ImageOverlay,
  images: ImageCache,
  origin: PageOrigin
): Promise<void> {
  let image = images.get(overlay.imageId);
  if (!image) {
    image = await embedImage(doc, overlay.format, overlay.bytes);
    images.set(overlay.imageId, image);
  }
  page.drawImage(image, {
    x: origin.x + overlay.x,
    y: origin.y + overlay.y,
    width: overlay.width,
    height: overlay.height,
  });
}

/**
 * Draw one overlay onto a page of `doc`
 *
 * @throws RenderFailureError when pdf-lib rejects the text or image
 */
export async function drawOverlay(
  doc: PDFDocument,
  page: PDFPage,
  overlay: Overlay,
  fonts: OverlayFonts,
  images: ImageCache,
  origin: PageOrigin = { x: 0, y: 0 }
): Promise<void> {
  try {
    if (overlay.kind === 'text') {
      drawText(page, overlay, fonts, origin);
    } else {
      await drawImage(doc, page, overlay, images, origin);
    }
  } catch (error) {
    throw new RenderFailureError(`Failed to render ${overlay.purpose} overlay: ${describeError(error)}`, {
      stage: 'emit',
      purpose: overlay.purpose,
    });
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TITLE ILLUSTRATION
// ═══════════════════════════════════════════════════════════════════════════════

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];
const JPEG_SIGNATURE = [0xff, 0xd8, 0xff];

function startsWith(bytes: Uint8Array, signature: readonly number[]): boolean {
  return signature.every((byte, index) => bytes[index] === byte);
}

/**
 * Sniff the image format from its leading bytes
 */
export function detectImageFormat(bytes: Uint8Array): ImageFormat | null {
  if (startsWith(bytes, PNG_SIGNATURE)) {
    return 'png';
  }
  if (startsWith(bytes, JPEG_SIGNATURE)) {
    return 'jpg';
  }
  return null;
}

/**
 * Read a PNG or JPEG illustration and measure it.
 * Embedding into a scratch document both validates the file and yields
 * its intrinsic size.
 *
 * @throws RenderFailureError when the file is missing, unreadable or not a PNG/JPEG
 */
export async function loadTitleImage(filePath: string): Promise<TitleImage> {
  const resolved = path.resolve(filePath);
  let bytes: Uint8Array;
  try {
    bytes = new Uint8Array(await readFile(resolved));
  } catch (error) {
    throw new RenderFailureError(`Title image not readable: ${resolved} (${describeError(error)})`, {
      stage: 'preprocess',
      filePath: resolved,
    });
  }

  const format = detectImageFormat(bytes);
  if (!format) {
    throw new RenderFailureError(`Title image is neither PNG nor JPEG: ${resolved}`, {
      stage: 'preprocess',
      filePath: resolved,
    });
  }

  try {
    const scratch = await PDFDocument.create();
    const image = await embedImage(scratch, format, bytes);
    return { id: resolved, format, bytes, width: image.width, height: image.height };
  } catch (error) {
    throw new RenderFailureError(`Title image is malformed: ${resolved} (${describeError(error)})`, {
      stage: 'preprocess',
      filePath: resolved,
    });
  }
}
