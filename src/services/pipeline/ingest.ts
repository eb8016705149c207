/**
 * Ingestion - resolve input files and open them as source documents
 *
 * Non-PDF inputs are rejected by extension and by leading signature before
 * pdf-lib ever sees them.
 *
 * @module pipeline/ingest
 */

import { readFile, readdir, stat } from 'fs/promises';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import type { SourceDocument } from '../../models/document.js';
import { ValidationError } from '../../utils/validation.js';
import { openPdfContainer, type PageContainer } from '../pdf/container.js';
import { IOFailureError, describeError } from '../sequencing/errors.js';
import { attachProvenance } from '../sequencing/provenance.js';

/**
 * Files this tool writes. A directory scan skips them so a re-run never
 * ingests its own output.
 */
export const GENERATED_OUTPUT_PATTERNS: readonly RegExp[] = [
  /^Batch_\d+\.pdf$/i,
  /^odd_pages\.pdf$/i,
  /^even_pages_rotated\.pdf$/i,
  /^merged_combined\.pdf$/i,
  /^master_sequence\.pdf$/i,
  /^merged\.pdf$/i,
  /^merged_for_printing\.pdf$/i,
];

const PDF_SIGNATURE = '%PDF-';

export function isGeneratedOutput(fileName: string): boolean {
  return GENERATED_OUTPUT_PATTERNS.some((pattern) => pattern.test(fileName));
}

export function hasPdfExtension(filePath: string): boolean {
  return path.extname(filePath).toLowerCase() === '.pdf';
}

export function hasPdfSignature(bytes: Uint8Array): boolean {
  return Buffer.from(bytes.subarray(0, PDF_SIGNATURE.length)).toString('latin1') === PDF_SIGNATURE;
}

/**
 * PDF files directly inside `dir`, sorted by name, generated outputs excluded
 *
 * @throws IOFailureError when the directory cannot be read
 */
export async function scanInputDirectory(dir: string): Promise<string[]> {
  const resolved = path.resolve(dir);
  const entries = await readdir(resolved, { withFileTypes: true }).catch((error: unknown) => {
    throw new IOFailureError(`Cannot read input directory: ${describeError(error)}`, resolved, {
      stage: 'ingest',
    });
  });

  return entries
    .filter((entry) => entry.isFile() && hasPdfExtension(entry.name) && !isGeneratedOutput(entry.name))
    .map((entry) => entry.name)
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
    .map((name) => path.join(resolved, name));
}

export interface InputSelection {
  inputPaths?: string[];
  inputDir?: string;
}

/**
 * Absolute input paths in processing order
 *
 * @throws ValidationError when nothing is selected or a path is not a .pdf
 * @throws IOFailureError when the input directory is unreadable
 */
export async function resolveInputs(selection: InputSelection): Promise<string[]> {
  const explicit = selection.inputPaths ?? [];
  if (explicit.length > 0 && selection.inputDir) {
    throw new ValidationError('Provide either input_paths or input_dir, not both');
  }

  if (selection.inputDir) {
    const dir = path.resolve(selection.inputDir);
    const info = await stat(dir).catch((error: unknown) => {
      throw new IOFailureError(`Input directory not found: ${describeError(error)}`, dir, {
        stage: 'ingest',
      });
    });
    if (!info.isDirectory()) {
      throw new ValidationError(`input_dir is not a directory: ${dir}`);
    }
    return scanInputDirectory(dir);
  }

  if (explicit.length === 0) {
    throw new ValidationError('No input documents: provide input_paths or input_dir');
  }

  const rejected = explicit.filter((filePath) => !hasPdfExtension(filePath));
  if (rejected.length > 0) {
    throw new ValidationError(`Only .pdf files are accepted, rejected: ${rejected.join(', ')}`);
  }
  return explicit.map((filePath) => path.resolve(filePath));
}

export interface IngestedDocument {
  document: SourceDocument;
  container: PageContainer;
}

/**
 * Read, sniff and parse one source file
 *
 * @throws IOFailureError when the file cannot be read or parsed
 * @throws ValidationError when the content is not a PDF
 */
export async function ingestDocument(
  filePath: string,
  documentId: string = uuidv4()
): Promise<IngestedDocument> {
  let bytes: Uint8Array;
  try {
    bytes = new Uint8Array(await readFile(filePath));
  } catch (error) {
    throw new IOFailureError(`Cannot read source file: ${describeError(error)}`, filePath, {
      stage: 'ingest',
      documentId,
    });
  }

  if (!hasPdfSignature(bytes)) {
    throw new ValidationError(`Not a PDF file (missing ${PDF_SIGNATURE} header): ${filePath}`);
  }

  const container = await openPdfContainer(bytes, documentId, filePath);
  const fileName = path.basename(filePath);

  return {
    document: {
      id: documentId,
      filePath,
      fileName,
      displayName: path.parse(fileName).name,
      originalPageCount: container.pages.length,
      sequence: attachProvenance(documentId, container.pages),
    },
    container,
  };
}
