/**
 * Page Container adapter (pdf-lib)
 *
 * Opens source files into Page values and writes page sequences back out.
 * Source pages are copied from their loaded container only at write time,
 * so the sequencing stages never hold pdf-lib objects.
 *
 * @module pdf/container
 */

import { PDFDocument, degrees, type PDFPage } from 'pdf-lib';
import type { Page, PageSequence } from '../../models/page.js';
import type { RunWarning } from '../../models/run.js';
import {
  IOFailureError,
  InvalidStateError,
  RenderFailureError,
  describeError,
} from '../sequencing/errors.js';
import { normalizeRotation } from '../sequencing/pages.js';
import { drawOverlay, embedOverlayFonts, type ImageCache } from './overlay-renderer.js';

/**
 * A parsed source file and the Page values of its pages
 */
export interface PageContainer {
  documentId: string;
  document: PDFDocument;
  pages: Page[];
}

/**
 * documentId → parsed source, consulted when 'source' pages are written
 */
export type ContainerRegistry = ReadonlyMap<string, PDFDocument>;

/**
 * Parse PDF bytes into a container. Page sizes come from the media box;
 * any rotation already set on a source page is kept as its starting rotation.
 *
 * @throws IOFailureError when pdf-lib cannot parse the file or its page tree
 */
export async function openPdfContainer(
  bytes: Uint8Array,
  documentId: string,
  filePath: string
): Promise<PageContainer> {
  let document: PDFDocument;
  let pages: Page[];
  try {
    document = await PDFDocument.load(bytes);
    pages = document.getPages().map((pdfPage, pageIndex): Page => {
      const box = pdfPage.getMediaBox();
      return {
        content: { kind: 'source', documentId, pageIndex },
        rotation: normalizeRotation(pdfPage.getRotation().angle),
        width: box.width,
        height: box.height,
        overlays: [],
      };
    });
  } catch (error) {
    throw new IOFailureError(`Failed to parse PDF: ${describeError(error)}`, filePath, {
      stage: 'ingest',
      documentId,
    });
  }

  return { documentId, document, pages };
}

export interface WriteResult {
  bytes: Uint8Array;

  /** Overlays that could not be drawn; the page is written without them */
  warnings: RunWarning[];
}

/**
 * Copy every source page the sequence references, one copyPages call per
 * source document, indexed by sequence position
 */
async function copySourcePages(
  target: PDFDocument,
  sequence: PageSequence,
  registry: ContainerRegistry
): Promise<Map<number, PDFPage>> {
  const wanted = new Map<string, { positions: number[]; indices: number[] }>();

  sequence.forEach(({ page }, position) => {
    if (page.content.kind !== 'source') {
      return;
    }
    const group = wanted.get(page.content.documentId) ?? { positions: [], indices: [] };
    group.positions.push(position);
    group.indices.push(page.content.pageIndex);
    wanted.set(page.content.documentId, group);
  });

  const copied = new Map<number, PDFPage>();
  for (const [documentId, group] of wanted) {
    const source = registry.get(documentId);
    if (!source) {
      throw new InvalidStateError(`No loaded container for document ${documentId}`, {
        stage: 'emit',
        documentId,
      });
    }
    const pages = await target.copyPages(source, group.indices);
    group.positions.forEach((position, i) => {
      const pdfPage = pages[i];
      if (pdfPage) {
        copied.set(position, pdfPage);
      }
    });
  }
  return copied;
}

/**
 * Serialize a sequence into a new PDF, in sequence order.
 * Render failures are absorbed per overlay and returned as warnings.
 *
 * @throws InvalidStateError when a page references an unloaded document
 */
export async function writePageSequence(
  sequence: PageSequence,
  registry: ContainerRegistry
): Promise<WriteResult> {
  const output = await PDFDocument.create();
  const fonts = await embedOverlayFonts(output);
  const images: ImageCache = new Map();
  const copied = await copySourcePages(output, sequence, registry);
  const warnings: RunWarning[] = [];

  for (const [position, { page, provenance }] of sequence.entries()) {
    const sourcePage = copied.get(position);
    const pdfPage = sourcePage ? output.addPage(sourcePage) : output.addPage([page.width, page.height]);
    pdfPage.setRotation(degrees(page.rotation));

    const box = pdfPage.getMediaBox();
    for (const overlay of page.overlays) {
      try {
        await drawOverlay(output, pdfPage, overlay, fonts, images, { x: box.x, y: box.y });
      } catch (error) {
        if (!(error instanceof RenderFailureError)) {
          throw error;
        }
        warnings.push({
          code: 'RENDER_FAILURE',
          stage: 'emit',
          document_id: provenance.documentId,
          message: error.message,
        });
      }
    }
  }

  return { bytes: await output.save(), warnings };
}
