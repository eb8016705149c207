/**
 * Shared test helpers: temp directories, page sequences and PDF fixtures
 * generated in-process with pdf-lib.
 *
 * @module tests/helpers
 */

import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { PDFDocument, degrees } from 'pdf-lib';
import { v4 as uuidv4 } from 'uuid';
import type { SourceDocument } from '../src/models/document.js';
import type { PageSequence, PageSize } from '../src/models/page.js';
import type { RunReport, RunSettings } from '../src/models/run.js';
import { attachProvenance } from '../src/services/sequencing/provenance.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TEMP DIRECTORIES
// ═══════════════════════════════════════════════════════════════════════════════

/** Removed by tests/global-teardown.ts if a test leaks one */
export const TEMP_DIR_PREFIX = 'duplex-test-';

export function createTempDir(label: string): string {
  return mkdtempSync(join(tmpdir(), `${TEMP_DIR_PREFIX}${label}-`));
}

export function cleanupTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

// ═══════════════════════════════════════════════════════════════════════════════
// PAGE SEQUENCES
// ═══════════════════════════════════════════════════════════════════════════════

export const LETTER: PageSize = { width: 612, height: 792 };

/**
 * `count` source pages of one document, numbered 1..count
 */
export function makeSequence(documentId: string, count: number, size: PageSize = LETTER): PageSequence {
  const pages = Array.from({ length: count }, (_, pageIndex) => ({
    content: { kind: 'source' as const, documentId, pageIndex },
    rotation: 0 as const,
    width: size.width,
    height: size.height,
    overlays: [],
  }));
  return attachProvenance(documentId, pages);
}

export function makeSourceDocument(
  pageCount: number,
  displayName: string = 'report',
  size: PageSize = LETTER
): SourceDocument {
  const id = uuidv4();
  return {
    id,
    filePath: `/fixtures/${displayName}.pdf`,
    fileName: `${displayName}.pdf`,
    displayName,
    originalPageCount: pageCount,
    sequence: makeSequence(id, pageCount, size),
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// PDF FIXTURES
// ═══════════════════════════════════════════════════════════════════════════════

export interface FixturePageOptions {
  size?: [number, number];
  rotation?: number;
}

export async function buildFixturePdf(pageCount: number, options: FixturePageOptions = {}): Promise<Uint8Array> {
  const doc = await PDFDocument.create();
  for (let i = 0; i < pageCount; i++) {
    const page = doc.addPage(options.size ?? [LETTER.width, LETTER.height]);
    page.drawText(`Source page ${i + 1}`, { x: 50, y: 700, size: 18 });
    if (options.rotation) {
      page.setRotation(degrees(options.rotation));
    }
  }
  return doc.save();
}

/**
 * Write a generated PDF into `dir` and return its path
 */
export async function writeFixturePdf(
  dir: string,
  fileName: string,
  pageCount: number,
  options: FixturePageOptions = {}
): Promise<string> {
  const filePath = join(dir, fileName);
  writeFileSync(filePath, await buildFixturePdf(pageCount, options));
  return filePath;
}

export async function readPdf(bytes: Uint8Array): Promise<PDFDocument> {
  return PDFDocument.load(bytes);
}

/** 1×1 PNG */
export const TINY_PNG = new Uint8Array(
  Buffer.from(
    'iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAYAAAAfFcSJAAAADUlEQVR42mNkYPhfDwAChwGA60e6kgAAAABJRU5ErkJggg==',
    'base64'
  )
);

// ═══════════════════════════════════════════════════════════════════════════════
// SETTINGS
// ═══════════════════════════════════════════════════════════════════════════════

export function makeSettings(outputDir: string, overrides: Partial<RunSettings> = {}): RunSettings {
  return {
    remove_first_last: true,
    add_watermarks: true,
    number_pages: false,
    rotation_angle: 180,
    batch_size: 20,
    font_size: 12,
    title_font_size: 36,
    duplex_scope: 'per_batch',
    output_mode: 'batched',
    overwrite: false,
    output_dir: outputDir,
    title_image_path: null,
    ...overrides,
  };
}

/**
 * A completed one-document, one-batch report for storage and tool tests
 */
export function makeReport(overrides: Partial<RunReport> = {}): RunReport {
  return {
    run_id: uuidv4(),
    status: 'completed',
    started_at: '2026-01-05T10:00:00.000Z',
    completed_at: '2026-01-05T10:00:02.000Z',
    settings: makeSettings('/out'),
    total_input_pages: 4,
    trimmed_pages: 2,
    final_page_count: 4,
    fronts_count: 2,
    backs_count: 2,
    documents: [
      {
        document_id: 'doc-1',
        file_name: 'report.pdf',
        source_path: '/in/report.pdf',
        status: 'processed',
        original_page_count: 4,
        trimmed_page_count: 2,
        title_page_added: true,
        blank_page_added: true,
        final_page_count: 4,
        warning: null,
      },
    ],
    original_page_sequence: [3, 2],
    artifacts: [
      {
        kind: 'batch',
        file_name: 'Batch_1.pdf',
        path: '/out/Batch_1.pdf',
        batch_index: 1,
        page_count: 4,
        page_labels: ['report:p3', 'title:report', 'report:p2', 'blank'],
      },
    ],
    warnings: [],
    error: null,
    ...overrides,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL RESPONSES
// ═══════════════════════════════════════════════════════════════════════════════

export interface ParsedToolResponse {
  success: boolean;
  data?: Record<string, unknown>;
  error?: {
    category: string;
    message: string;
    recovery?: { tool: string; hint: string };
    details?: Record<string, unknown>;
  };
}

export function parseResponse(response: { content: Array<{ type: string; text: string }> }): ParsedToolResponse {
  const text = response.content[0]?.text ?? '{}';
  return JSON.parse(text) as ParsedToolResponse;
}
