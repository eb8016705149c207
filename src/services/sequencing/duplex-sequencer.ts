/**
 * Duplex Sequencer - splits a sequence into fronts and backs
 *
 * Given pages 1..2k in reading order:
 *   fronts = 1, 3, 5, ... reversed   (printed first, face up stack order)
 *   backs  = 2, 4, 6, ...            (each rotated, printed after re-feed)
 *
 * Fronts keep their rotation. Every back's rotation becomes
 * (rotation + rotationAngle) mod 360. Provenance is never altered.
 *
 * @module sequencing/duplex-sequencer
 */

import type { BackRotationAngle, PageSequence, SequencedPage } from '../../models/page.js';
import { InvalidStateError } from './errors.js';
import { rotatePage } from './pages.js';
import { stampWatermark } from './watermark.js';

export const DEFAULT_BACK_ROTATION: BackRotationAngle = 180;

export interface DuplexOptions {
  rotationAngle?: BackRotationAngle;
  addWatermarks?: boolean;

  /** documentId → display name, used for watermark text */
  documentNames?: ReadonlyMap<string, string>;
}

export interface DuplexResult {
  fronts: PageSequence;
  backs: PageSequence;
}

/**
 * @throws InvalidStateError when the sequence length is odd
 */
export function sequenceDuplex(sequence: PageSequence, options: DuplexOptions = {}): DuplexResult {
  if (sequence.length % 2 !== 0) {
    throw new InvalidStateError(
      `Duplex split needs an even page count, got ${sequence.length}. Pad the sequence first.`,
      { stage: 'sequence', pageCount: sequence.length }
    );
  }

  const rotationAngle = options.rotationAngle ?? DEFAULT_BACK_ROTATION;
  const names = options.documentNames ?? new Map<string, string>();
  const watermark = options.addWatermarks ?? false;

  const fronts: SequencedPage[] = [];
  const backs: SequencedPage[] = [];

  // index is 0-based, so even indexes are odd 1-based positions
  sequence.forEach((entry, index) => {
    if (index % 2 === 0) {
      fronts.push(watermark ? stampWatermark(entry, names) : entry);
      return;
    }
    const rotated: SequencedPage = {
      page: rotatePage(entry.page, rotationAngle),
      provenance: entry.provenance,
    };
    backs.push(watermark ? stampWatermark(rotated, names) : rotated);
  });

  fronts.reverse();
  return { fronts, backs };
}

/**
 * Single-file print order: every front, then every back
 */
export function combineDuplex(result: DuplexResult): PageSequence {
  return [...result.fronts, ...result.backs];
}
