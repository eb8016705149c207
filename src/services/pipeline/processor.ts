/**
 * Pipeline Processor - runs one duplex sequencing job end to end
 *
 * Ingest → Preprocess (per document) → Merge → Sequence → Batch → Emit.
 * A run never throws: the outcome carries the report (completed, planned
 * or failed) and, on failure, the error that stopped it.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module pipeline/processor
 */

import * as path from 'path';
import type { PDFDocument } from 'pdf-lib';
import { v4 as uuidv4 } from 'uuid';
import type { PreprocessedDocument } from '../../models/document.js';
import type { PageSequence } from '../../models/page.js';
import type {
  ArtifactRecord,
  DocumentBreakdown,
  RunFailure,
  RunReport,
  RunSettings,
  RunWarning,
} from '../../models/run.js';
import { settleInGroups } from '../../utils/concurrency.js';
import { ValidationError } from '../../utils/validation.js';
import { loadTitleImage } from '../pdf/overlay-renderer.js';
import { planBatches, validateBatchSize } from '../sequencing/batcher.js';
import { sequenceDuplex, type DuplexOptions } from '../sequencing/duplex-sequencer.js';
import {
  InsufficientPagesError,
  InvalidConfigurationError,
  PipelineError,
  RenderFailureError,
  describeError,
} from '../sequencing/errors.js';
import { mergeDocuments } from '../sequencing/merger.js';
import { preprocessDocument } from '../sequencing/preprocess.js';
import { labelSequence, originalPageNumbers } from '../sequencing/provenance.js';
import type { TitleImage } from '../sequencing/title-injector.js';
import { numberPages } from '../sequencing/watermark.js';
import {
  BACKS_FILE_NAME,
  FRONTS_FILE_NAME,
  batchFileName,
  emitArtifacts,
  type PlannedArtifact,
} from './emitter.js';
import { ingestDocument, resolveInputs, type IngestedDocument } from './ingest.js';
import { RunStateMachine } from './run-state.js';

const BACK_ROTATIONS: readonly number[] = [90, 180, 270];

export interface ProcessRequest {
  inputPaths?: string[];
  inputDir?: string;
  settings: RunSettings;
  maxConcurrent: number;

  /** Plan artifacts without writing anything */
  dryRun?: boolean;
  runId?: string;
}

export interface PipelineOutcome {
  report: RunReport;

  /** What stopped the run; null when it completed or was planned */
  error: Error | null;
}

/**
 * @throws InvalidConfigurationError for an unusable rotation or batch size
 */
export function validateSettings(settings: RunSettings): void {
  if (!BACK_ROTATIONS.includes(settings.rotation_angle)) {
    throw new InvalidConfigurationError(
      `rotation_angle must be 90, 180 or 270, got ${settings.rotation_angle}`,
      { stage: 'ingest', rotationAngle: settings.rotation_angle }
    );
  }
  if (settings.output_mode === 'batched') {
    validateBatchSize(settings.batch_size, settings.duplex_scope);
  }
  if (!(settings.font_size > 0) || !(settings.title_font_size > 0)) {
    throw new InvalidConfigurationError('font_size and title_font_size must be positive', {
      stage: 'ingest',
    });
  }
}

function failureOf(error: unknown, fallbackStage: RunFailure['stage']): RunFailure {
  if (error instanceof PipelineError) {
    return {
      category: error.category,
      message: error.message,
      stage: error.stage ?? fallbackStage,
      document_id: error.documentId,
    };
  }
  return {
    category: error instanceof ValidationError ? 'VALIDATION_ERROR' : 'INTERNAL_ERROR',
    message: describeError(error),
    stage: fallbackStage,
    document_id: null,
  };
}

function skippedBreakdown(
  ingested: IngestedDocument | null,
  filePath: string,
  documentId: string,
  warning: string
): DocumentBreakdown {
  return {
    document_id: documentId,
    file_name: ingested?.document.fileName ?? path.basename(filePath),
    source_path: filePath,
    status: 'skipped',
    original_page_count: ingested?.document.originalPageCount ?? 0,
    trimmed_page_count: 0,
    title_page_added: false,
    blank_page_added: false,
    final_page_count: 0,
    warning,
  };
}

function processedBreakdown(pre: PreprocessedDocument): DocumentBreakdown {
  const { document } = pre;
  return {
    document_id: document.id,
    file_name: document.fileName,
    source_path: document.filePath,
    status: 'processed',
    original_page_count: document.originalPageCount,
    trimmed_page_count: pre.trimmed ? 2 : 0,
    title_page_added: pre.titleAdded,
    blank_page_added: pre.blankAdded,
    final_page_count: pre.sequence.length,
    warning: null,
  };
}

/**
 * Title illustration, or null with a RENDER_FAILURE warning when unusable
 */
async function resolveTitleImage(
  imagePath: string | null,
  warnings: RunWarning[]
): Promise<TitleImage | null> {
  if (!imagePath) {
    return null;
  }
  try {
    return await loadTitleImage(imagePath);
  } catch (error) {
    if (!(error instanceof RenderFailureError)) {
      throw error;
    }
    console.error(`[Pipeline] ${error.message}; title pages fall back to text only`);
    warnings.push({ code: 'RENDER_FAILURE', stage: 'preprocess', document_id: null, message: error.message });
    return null;
  }
}

/**
 * Plan the output files for a merged, numbered global sequence
 */
export function planArtifacts(
  global: PageSequence,
  settings: RunSettings,
  duplex: DuplexOptions
): { artifacts: PlannedArtifact[]; frontsCount: number; backsCount: number } {
  if (settings.output_mode === 'split') {
    const split = sequenceDuplex(global, duplex);
    return {
      artifacts: [
        { kind: 'fronts', fileName: FRONTS_FILE_NAME, batchIndex: null, sequence: split.fronts },
        { kind: 'backs', fileName: BACKS_FILE_NAME, batchIndex: null, sequence: split.backs },
      ],
      frontsCount: split.fronts.length,
      backsCount: split.backs.length,
    };
  }

  const plan = planBatches(global, {
    batchSize: settings.batch_size,
    duplexScope: settings.duplex_scope,
    duplex,
  });
  return {
    artifacts: plan.batches.map((batch) => ({
      kind: 'batch',
      fileName: batchFileName(batch.index),
      batchIndex: batch.index,
      sequence: batch.pages,
    })),
    frontsCount: plan.frontsCount,
    backsCount: plan.backsCount,
  };
}

/**
 * Run the pipeline once
 */
export async function runPipeline(request: ProcessRequest): Promise<PipelineOutcome> {
  const { settings } = request;
  const machine = new RunStateMachine();
  const warnings: RunWarning[] = [];
  const documents: DocumentBreakdown[] = [];
  const report: RunReport = {
    run_id: request.runId ?? uuidv4(),
    status: 'failed',
    started_at: new Date().toISOString(),
    completed_at: '',
    settings,
    total_input_pages: 0,
    trimmed_pages: 0,
    final_page_count: 0,
    fronts_count: 0,
    backs_count: 0,
    documents,
    original_page_sequence: [],
    artifacts: [],
    warnings,
    error: null,
  };

  try {
    // ─── Ingest ────────────────────────────────────────────────────────────
    machine.advance('ingest');
    validateSettings(settings);
    const titleImage = await resolveTitleImage(settings.title_image_path, warnings);

    const inputPaths = await resolveInputs({
      inputPaths: request.inputPaths,
      inputDir: request.inputDir,
    });
    console.error(`[Pipeline] Run ${report.run_id}: ${inputPaths.length} input document(s)`);

    const documentIds = inputPaths.map(() => uuidv4());
    const loaded = await settleInGroups(inputPaths, request.maxConcurrent, (filePath, index) =>
      ingestDocument(filePath, documentIds[index])
    );

    // Joined by input index, never completion order
    const ingested: Array<IngestedDocument | null> = [];
    const unreadable = new Map<number, DocumentBreakdown>();
    for (const [index, result] of loaded.entries()) {
      const filePath = inputPaths[index] ?? '';
      const documentId = documentIds[index] ?? '';
      if (result.status === 'fulfilled') {
        ingested.push(result.value);
        report.total_input_pages += result.value.document.originalPageCount;
        continue;
      }
      const reason: unknown = result.reason;
      if (!(reason instanceof PipelineError) || reason.category !== 'IO_FAILURE') {
        throw reason;
      }
      console.error(`[Pipeline] Skipping ${filePath}: ${reason.message}`);
      warnings.push({ code: 'IO_FAILURE', stage: 'ingest', document_id: documentId, message: reason.message });
      unreadable.set(index, skippedBreakdown(null, filePath, documentId, reason.message));
      ingested.push(null);
    }

    // ─── Preprocess ────────────────────────────────────────────────────────
    machine.advance('preprocess');
    const registry = new Map<string, PDFDocument>();
    const names = new Map<string, string>();
    const preprocessed: PreprocessedDocument[] = [];

    for (const [index, entry] of ingested.entries()) {
      if (!entry) {
        const skipped = unreadable.get(index);
        if (skipped) {
          documents.push(skipped);
        }
        continue;
      }
      const { document, container } = entry;
      try {
        const pre = preprocessDocument(document, {
          removeFirstLast: settings.remove_first_last,
          titleFontSize: settings.title_font_size,
          titleImage,
        });
        preprocessed.push(pre);
        registry.set(document.id, container.document);
        names.set(document.id, document.displayName);
        documents.push(processedBreakdown(pre));
        report.trimmed_pages += pre.trimmed ? 2 : 0;
      } catch (error) {
        if (!(error instanceof InsufficientPagesError)) {
          throw error;
        }
        const empty = error.pageCount === 0;
        const message = empty ? `${document.fileName} has no pages` : `${document.fileName}: ${error.message}`;
        console.error(`[Pipeline] Skipping ${message}`);
        warnings.push({
          code: empty ? 'EMPTY_DOCUMENT' : 'INSUFFICIENT_PAGES',
          stage: 'preprocess',
          document_id: document.id,
          message,
        });
        documents.push(skippedBreakdown(entry, document.filePath, document.id, message));
      }
    }

    // ─── Merge ─────────────────────────────────────────────────────────────
    machine.advance('merge');
    const merged = mergeDocuments(preprocessed);
    report.final_page_count = merged.sequence.length;

    // ─── Sequence ──────────────────────────────────────────────────────────
    machine.advance('sequence');
    const global = settings.number_pages
      ? numberPages(merged.sequence, settings.font_size)
      : merged.sequence;
    const duplex: DuplexOptions = {
      rotationAngle: settings.rotation_angle,
      addWatermarks: settings.add_watermarks,
      documentNames: names,
    };

    // ─── Batch ─────────────────────────────────────────────────────────────
    machine.advance('batch');
    const plan = planArtifacts(global, settings, duplex);
    report.fronts_count = plan.frontsCount;
    report.backs_count = plan.backsCount;
    report.original_page_sequence = originalPageNumbers(plan.artifacts.flatMap((a) => a.sequence));

    const records = (paths: Array<string | null>): ArtifactRecord[] =>
      plan.artifacts.map((artifact, index) => ({
        kind: artifact.kind,
        file_name: artifact.fileName,
        path: paths[index] ?? null,
        batch_index: artifact.batchIndex,
        page_count: artifact.sequence.length,
        page_labels: labelSequence(artifact.sequence, names),
      }));

    if (request.dryRun) {
      machine.advance('planned');
      report.artifacts = records([]);
      report.status = 'planned';
      report.completed_at = new Date().toISOString();
      return { report, error: null };
    }

    // ─── Emit ──────────────────────────────────────────────────────────────
    machine.advance('emit');
    const emitted = await emitArtifacts(plan.artifacts, {
      outputDir: settings.output_dir,
      overwrite: settings.overwrite,
      registry,
      maxConcurrent: request.maxConcurrent,
    });
    warnings.push(...emitted.warnings);
    report.artifacts = records(emitted.written.map((entry) => entry.path));

    machine.advance('completed');
    report.status = 'completed';
    report.completed_at = new Date().toISOString();
    console.error(
      `[Pipeline] Run ${report.run_id} completed: ${report.final_page_count} pages, ` +
        `${report.artifacts.length} artifact(s), ${warnings.length} warning(s)`
    );
    return { report, error: null };
  } catch (error) {
    const failure = failureOf(error, machine.stage);
    if (!machine.isTerminal) {
      machine.fail(failure.message);
    }
    report.status = 'failed';
    report.error = failure;
    report.completed_at = new Date().toISOString();
    console.error(
      `[Pipeline] Run ${report.run_id} failed at ${failure.stage ?? 'start'}: [${failure.category}] ${failure.message}`
    );
    return { report, error: error instanceof Error ? error : new Error(String(error)) };
  }
}
