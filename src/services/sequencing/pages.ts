/**
 * Page value operations
 *
 * Pages are immutable values; every operation here returns a new Page and
 * leaves its input untouched.
 *
 * @module sequencing/pages
 */

import {
  DEFAULT_PAGE_SIZE,
  type Overlay,
  type Page,
  type PageSequence,
  type PageSize,
  type RotationAngle,
} from '../../models/page.js';
import { InvalidStateError } from './errors.js';

/**
 * Normalize any multiple of 90 into [0, 360)
 *
 * @throws InvalidStateError for angles that are not multiples of 90
 */
export function normalizeRotation(angle: number): RotationAngle {
  const normalized = ((angle % 360) + 360) % 360;
  if (!isRotationAngle(normalized)) {
    throw new InvalidStateError(`Rotation must be a multiple of 90 degrees, got ${angle}`, {
      angle,
    });
  }
  return normalized;
}

const ROTATION_ANGLES: readonly RotationAngle[] = [0, 90, 180, 270];

function isRotationAngle(value: number): value is RotationAngle {
  return ROTATION_ANGLES.some((angle) => angle === value);
}

export function createBlankPage(size: PageSize = DEFAULT_PAGE_SIZE): Page {
  return {
    content: { kind: 'blank' },
    rotation: 0,
    width: size.width,
    height: size.height,
    overlays: [],
  };
}

/**
 * Deep, independent copy. Overlay image bytes are copied too, so nothing
 * reachable from the clone is shared with the original.
 */
export function clonePage(page: Page): Page {
  return {
    content: { ...page.content },
    rotation: page.rotation,
    width: page.width,
    height: page.height,
    overlays: page.overlays.map(cloneOverlay),
  };
}

function cloneOverlay(overlay: Overlay): Overlay {
  if (overlay.kind === 'image') {
    return { ...overlay, bytes: overlay.bytes.slice() };
  }
  return { ...overlay };
}

/**
 * Add `delta` degrees to the page's current rotation (accumulates mod 360)
 */
export function rotatePage(page: Page, delta: number): Page {
  return { ...clonePage(page), rotation: normalizeRotation(page.rotation + delta) };
}

export function addOverlay(page: Page, overlay: Overlay): Page {
  const copy = clonePage(page);
  return { ...copy, overlays: [...copy.overlays, overlay] };
}

/**
 * Size of the first page, or US Letter for an empty sequence
 */
export function leadingPageSize(sequence: PageSequence): PageSize {
  const first = sequence[0];
  if (!first) {
    return { ...DEFAULT_PAGE_SIZE };
  }
  return { width: first.page.width, height: first.page.height };
}
