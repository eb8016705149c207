/**
 * Pipeline integration tests
 *
 * Real PDFs generated with pdf-lib in a temp directory, run through
 * ingest → preprocess → merge → sequence → batch → emit.
 *
 * @module tests/integration/pipeline/processor
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, readFileSync, readdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { runPipeline, validateSettings } from '../../../src/services/pipeline/processor.js';
import { InvalidConfigurationError } from '../../../src/services/sequencing/errors.js';
import { cleanupTempDir, createTempDir, makeSettings, readPdf, writeFixturePdf } from '../../helpers.js';

async function pageRotations(filePath: string): Promise<number[]> {
  const doc = await readPdf(new Uint8Array(readFileSync(filePath)));
  return doc.getPages().map((p) => p.getRotation().angle);
}

describe('runPipeline', () => {
  let inputDir: string;
  let outputDir: string;

  beforeEach(() => {
    inputDir = createTempDir('pipeline-in');
    outputDir = join(createTempDir('pipeline-out'), 'print');
  });

  afterEach(() => {
    cleanupTempDir(inputDir);
    cleanupTempDir(join(outputDir, '..'));
  });

  it('should sequence a 10-page document into one batch of fronts then rotated backs', async () => {
    await writeFixturePdf(inputDir, 'ten.pdf', 10);

    const { report, error } = await runPipeline({
      inputDir,
      settings: makeSettings(outputDir),
      maxConcurrent: 2,
    });

    expect(error).toBeNull();
    expect(report.status).toBe('completed');
    expect(report.total_input_pages).toBe(10);
    expect(report.trimmed_pages).toBe(2);
    expect(report.final_page_count).toBe(10);
    expect(report.fronts_count).toBe(5);
    expect(report.backs_count).toBe(5);
    expect(report.original_page_sequence).toEqual([9, 7, 5, 3, 2, 4, 6, 8]);
    expect(report.artifacts).toHaveLength(1);
    expect(report.artifacts[0]).toMatchObject({
      kind: 'batch',
      file_name: 'Batch_1.pdf',
      path: join(outputDir, 'Batch_1.pdf'),
      batch_index: 1,
      page_count: 10,
      page_labels: [
        'ten:p9',
        'ten:p7',
        'ten:p5',
        'ten:p3',
        'title:ten',
        'ten:p2',
        'ten:p4',
        'ten:p6',
        'ten:p8',
        'blank',
      ],
    });
    expect(report.documents).toEqual([
      expect.objectContaining({
        file_name: 'ten.pdf',
        status: 'processed',
        original_page_count: 10,
        trimmed_page_count: 2,
        title_page_added: true,
        blank_page_added: true,
        final_page_count: 10,
        warning: null,
      }),
    ]);

    expect(await pageRotations(join(outputDir, 'Batch_1.pdf'))).toEqual([0, 0, 0, 0, 0, 180, 180, 180, 180, 180]);
  });

  it('should write odd and even files in split mode', async () => {
    await writeFixturePdf(inputDir, 'five.pdf', 5);

    const { report } = await runPipeline({
      inputDir,
      settings: makeSettings(outputDir, { output_mode: 'split', rotation_angle: 90 }),
      maxConcurrent: 1,
    });

    expect(report.status).toBe('completed');
    expect(report.artifacts.map((a) => [a.kind, a.file_name, a.page_count])).toEqual([
      ['fronts', 'odd_pages.pdf', 2],
      ['backs', 'even_pages_rotated.pdf', 2],
    ]);
    expect(report.artifacts[0]?.page_labels).toEqual(['five:p3', 'title:five']);
    expect(report.artifacts[1]?.page_labels).toEqual(['five:p2', 'five:p4']);
    expect(await pageRotations(join(outputDir, 'even_pages_rotated.pdf'))).toEqual([90, 90]);
  });

  it('should skip documents that are too short and keep going', async () => {
    await writeFixturePdf(inputDir, 'a-short.pdf', 2);
    await writeFixturePdf(inputDir, 'b-long.pdf', 5);

    const { report, error } = await runPipeline({ inputDir, settings: makeSettings(outputDir), maxConcurrent: 4 });

    expect(error).toBeNull();
    expect(report.documents.map((d) => [d.file_name, d.status])).toEqual([
      ['a-short.pdf', 'skipped'],
      ['b-long.pdf', 'processed'],
    ]);
    expect(report.warnings).toHaveLength(1);
    expect(report.warnings[0]).toMatchObject({ code: 'INSUFFICIENT_PAGES', stage: 'preprocess' });
    expect(report.total_input_pages).toBe(7);
    expect(report.final_page_count).toBe(4);
  });

  it('should fail with EMPTY_INPUT when no document survives', async () => {
    await writeFixturePdf(inputDir, 'one.pdf', 1);
    await writeFixturePdf(inputDir, 'two.pdf', 2);

    const { report, error } = await runPipeline({ inputDir, settings: makeSettings(outputDir), maxConcurrent: 2 });

    expect(error).not.toBeNull();
    expect(report.status).toBe('failed');
    expect(report.error).toMatchObject({ category: 'EMPTY_INPUT', stage: 'merge' });
    expect(report.warnings.map((w) => w.code)).toEqual(['INSUFFICIENT_PAGES', 'INSUFFICIENT_PAGES']);
    expect(existsSync(outputDir)).toBe(false);
  });

  it('should plan without writing on a dry run', async () => {
    await writeFixturePdf(inputDir, 'doc.pdf', 45);

    const { report } = await runPipeline({
      inputDir,
      settings: makeSettings(outputDir, { duplex_scope: 'global' }),
      maxConcurrent: 2,
      dryRun: true,
    });

    // 45 → trim 43 → title 44
    expect(report.status).toBe('planned');
    expect(report.artifacts.map((a) => a.page_count)).toEqual([20, 20, 4]);
    expect(report.artifacts.every((a) => a.path === null)).toBe(true);
    expect(existsSync(outputDir)).toBe(false);
  });

  it('should keep input order across documents', async () => {
    const second = await writeFixturePdf(inputDir, 'second.pdf', 3);
    const first = await writeFixturePdf(inputDir, 'first.pdf', 3);

    const { report } = await runPipeline({
      inputPaths: [second, first],
      settings: makeSettings(outputDir, { output_mode: 'split' }),
      maxConcurrent: 1,
    });

    // second: [title, p2] first: [title, p2]
    expect(report.artifacts[0]?.page_labels).toEqual(['title:first', 'title:second']);
    expect(report.artifacts[1]?.page_labels).toEqual(['second:p2', 'first:p2']);
  });

  it('should refuse to overwrite existing outputs', async () => {
    await writeFixturePdf(inputDir, 'doc.pdf', 4);
    await runPipeline({ inputDir, settings: makeSettings(outputDir), maxConcurrent: 1 });

    const { report, error } = await runPipeline({ inputDir, settings: makeSettings(outputDir), maxConcurrent: 1 });

    expect(error).not.toBeNull();
    expect(report.status).toBe('failed');
    expect(report.error).toMatchObject({ category: 'IO_FAILURE', stage: 'emit' });
  });

  it('should not pick up its own outputs on a re-run into the input directory', async () => {
    await writeFixturePdf(inputDir, 'doc.pdf', 4);
    const settings = makeSettings(inputDir, { overwrite: true });

    await runPipeline({ inputDir, settings, maxConcurrent: 1 });
    const { report } = await runPipeline({ inputDir, settings, maxConcurrent: 1 });

    expect(report.documents.map((d) => d.file_name)).toEqual(['doc.pdf']);
    expect(readdirSync(inputDir).sort()).toEqual(['Batch_1.pdf', 'doc.pdf']);
  });

  it('should fail the run for a file that is not a PDF', async () => {
    writeFileSync(join(inputDir, 'fake.pdf'), 'not a pdf');

    const { report } = await runPipeline({ inputDir, settings: makeSettings(outputDir), maxConcurrent: 1 });

    expect(report.status).toBe('failed');
    expect(report.error?.category).toBe('VALIDATION_ERROR');
  });

  it('should skip an unreadable input with an IO warning', async () => {
    const present = await writeFixturePdf(inputDir, 'present.pdf', 4);

    const { report } = await runPipeline({
      inputPaths: [join(inputDir, 'missing.pdf'), present],
      settings: makeSettings(outputDir),
      maxConcurrent: 2,
    });

    expect(report.status).toBe('completed');
    expect(report.documents.map((d) => [d.file_name, d.status])).toEqual([
      ['missing.pdf', 'skipped'],
      ['present.pdf', 'processed'],
    ]);
    expect(report.warnings[0]).toMatchObject({ code: 'IO_FAILURE', stage: 'ingest' });
  });

  it('should fall back to text-only titles when the title image is missing', async () => {
    await writeFixturePdf(inputDir, 'doc.pdf', 4);

    const { report } = await runPipeline({
      inputDir,
      settings: makeSettings(outputDir, { title_image_path: join(inputDir, 'logo.png') }),
      maxConcurrent: 1,
    });

    expect(report.status).toBe('completed');
    expect(report.warnings).toEqual([
      expect.objectContaining({ code: 'RENDER_FAILURE', stage: 'preprocess', document_id: null }),
    ]);
  });

  it('should fail an odd batch size in per_batch scope before reading anything', async () => {
    const { report } = await runPipeline({
      inputDir,
      settings: makeSettings(outputDir, { batch_size: 7 }),
      maxConcurrent: 1,
    });

    expect(report.status).toBe('failed');
    expect(report.error?.category).toBe('INVALID_CONFIGURATION');
    expect(report.documents).toEqual([]);
  });
});

describe('validateSettings', () => {
  it('should accept an odd batch size in split mode', () => {
    expect(() => validateSettings(makeSettings('/out', { output_mode: 'split', batch_size: 7 }))).not.toThrow();
  });

  it('should reject a non-positive font size', () => {
    expect(() => validateSettings(makeSettings('/out', { font_size: 0 }))).toThrow(InvalidConfigurationError);
  });
});
