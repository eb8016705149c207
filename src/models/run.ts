/**
 * Run report interfaces for Duplex Sequencer
 *
 * One report per pipeline run. Returned by duplex_process and persisted
 * in the run store for duplex_run_get / duplex_run_list.
 */

import type { BackRotationAngle } from './page.js';

/**
 * Where duplex splitting happens relative to batching
 * - global: split the whole merged sequence once, then chunk fronts ++ backs
 * - per_batch: chunk first, then split every window independently
 */
export type DuplexScope = 'global' | 'per_batch';

/**
 * - split: one fronts file and one backs file
 * - batched: Batch_1.pdf ... Batch_N.pdf
 */
export type OutputMode = 'split' | 'batched';

export type RunStatus = 'completed' | 'failed' | 'planned';

/**
 * Pipeline stages, in order
 */
export type RunStage =
  | 'ingest'
  | 'preprocess'
  | 'merge'
  | 'sequence'
  | 'batch'
  | 'emit';

export type WarningCode =
  | 'INSUFFICIENT_PAGES'
  | 'EMPTY_DOCUMENT'
  | 'RENDER_FAILURE'
  | 'IO_FAILURE';

export interface RunWarning {
  code: WarningCode;
  stage: RunStage;
  document_id: string | null;
  message: string;
}

/**
 * Settings a run was executed with (snapshot of config + overrides)
 */
export interface RunSettings {
  remove_first_last: boolean;
  add_watermarks: boolean;
  number_pages: boolean;
  rotation_angle: BackRotationAngle;
  batch_size: number;
  font_size: number;
  title_font_size: number;
  duplex_scope: DuplexScope;
  output_mode: OutputMode;
  overwrite: boolean;
  output_dir: string;
  title_image_path: string | null;
}

export type DocumentRunStatus = 'processed' | 'skipped';

/**
 * Per-document breakdown in a run report
 */
export interface DocumentBreakdown {
  document_id: string;
  file_name: string;
  source_path: string;
  status: DocumentRunStatus;
  original_page_count: number;

  /** Pages removed by the Trimmer (0 or 2) */
  trimmed_page_count: number;
  title_page_added: boolean;
  blank_page_added: boolean;

  /** Pages this document contributes to the global sequence */
  final_page_count: number;
  warning: string | null;
}

export type ArtifactKind = 'fronts' | 'backs' | 'batch';

export interface ArtifactRecord {
  kind: ArtifactKind;
  file_name: string;

  /** Absolute path; null for planned (dry run) artifacts */
  path: string | null;

  /** 1-based, null for fronts/backs */
  batch_index: number | null;
  page_count: number;

  /** Label of every page in print order, e.g. 'report:p3', 'title:report', 'blank' */
  page_labels: string[];
}

export interface RunFailure {
  category: string;
  message: string;
  stage: RunStage | null;
  document_id: string | null;
}

export interface RunReport {
  run_id: string;
  status: RunStatus;
  started_at: string;
  completed_at: string;
  settings: RunSettings;

  /** Sum of source page counts over every ingested document */
  total_input_pages: number;

  /** Pages removed by trimming across all processed documents */
  trimmed_pages: number;

  /** Length of the merged global sequence (always even) */
  final_page_count: number;
  fronts_count: number;
  backs_count: number;
  documents: DocumentBreakdown[];

  /** Original page numbers in output order, synthetic pages omitted */
  original_page_sequence: number[];
  artifacts: ArtifactRecord[];
  warnings: RunWarning[];
  error: RunFailure | null;
}
