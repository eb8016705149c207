/**
 * Unit tests for provenance watermarks and page numbering
 *
 * @module tests/unit/sequencing/watermark
 */

import { describe, it, expect } from 'vitest';
import {
  buildPageNumber,
  buildWatermark,
  numberPages,
  stampWatermark,
  watermarkAnchor,
  watermarkText,
} from '../../../src/services/sequencing/watermark.js';
import { padToEven } from '../../../src/services/sequencing/parity-padder.js';
import { makeSequence } from '../../helpers.js';

describe('watermarkText', () => {
  it('should join page number and document name', () => {
    expect(watermarkText(3, 'invoice')).toBe('3 | invoice');
  });
});

describe('buildWatermark', () => {
  it('should use a grey 8pt font on wide pages', () => {
    const overlay = buildWatermark(1000, 1200, '1 | a', 0);

    expect(overlay).toEqual({
      kind: 'text',
      purpose: 'watermark',
      text: '1 | a',
      x: 990,
      y: 15,
      align: 'right',
      font: 'Helvetica',
      fontSize: 8,
      gray: 0.5,
      opacity: 0.7,
    });
  });

  it('should scale the font with page width on narrow pages', () => {
    expect(buildWatermark(612, 792, 'x', 0).fontSize).toBeCloseTo(6.12);
  });
});

describe('watermarkAnchor', () => {
  it.each([
    [0, { x: 602, y: 15, align: 'right' }],
    [90, { x: 597, y: 782, align: 'right' }],
    [180, { x: 10, y: 777, align: 'left' }],
    [270, { x: 15, y: 10, align: 'left' }],
  ] as const)('should anchor a page rotated %i° at its displayed bottom-right', (rotation, expected) => {
    expect(watermarkAnchor(612, 792, rotation)).toEqual(expected);
  });
});

describe('stampWatermark', () => {
  it('should fall back to the document id without a display name', () => {
    const [entry] = makeSequence('doc-a', 1);
    if (!entry) throw new Error('fixture');

    const stamped = stampWatermark(entry, new Map());
    expect(stamped.page.overlays[0]).toMatchObject({ text: '1 | doc-a' });
  });

  it('should leave synthetic pages unchanged', () => {
    const padded = padToEven(makeSequence('doc-a', 1), 'doc-a');
    const blank = padded[1];
    if (!blank) throw new Error('fixture');

    expect(stampWatermark(blank, new Map())).toBe(blank);
  });
});

describe('numberPages', () => {
  it('should number original pages by sequence position and skip synthetic ones', () => {
    const numbered = numberPages(padToEven(makeSequence('doc-a', 3), 'doc-a'), 10);

    expect(numbered.map((e) => e.page.overlays.map((o) => (o.kind === 'text' ? o.text : '')))).toEqual([
      ['1'],
      ['2'],
      ['3'],
      [],
    ]);
  });

  it('should place numbers bottom-right', () => {
    expect(buildPageNumber(612, 4, 12)).toMatchObject({ text: '4', x: 568, y: 20, fontSize: 12 });
  });
});
