/**
 * Type definitions for the run store
 *
 * Row types mirror the SQLite tables one to one; booleans are stored as
 * 0/1 and nested report fields as JSON text.
 */

import type { RunStatus } from '../../models/run.js';

export enum RunStoreErrorCode {
  RUN_NOT_FOUND = 'RUN_NOT_FOUND',
  RUN_ALREADY_EXISTS = 'RUN_ALREADY_EXISTS',
  SCHEMA_MISMATCH = 'SCHEMA_MISMATCH',
  PERMISSION_DENIED = 'PERMISSION_DENIED',
  STORE_CLOSED = 'STORE_CLOSED',
}

export class RunStoreError extends Error {
  constructor(
    message: string,
    public readonly code: RunStoreErrorCode,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'RunStoreError';
  }
}

export interface ListRunsOptions {
  status?: RunStatus;
  limit?: number;
  offset?: number;
}

/**
 * One line of duplex_run_list
 */
export interface RunSummary {
  run_id: string;
  status: RunStatus;
  started_at: string;
  completed_at: string;
  final_page_count: number;
  document_count: number;
  artifact_count: number;
  warning_count: number;
  error_category: string | null;
}

export interface RunRow {
  id: string;
  status: RunStatus;
  started_at: string;
  completed_at: string;
  settings_json: string;
  total_input_pages: number;
  trimmed_pages: number;
  final_page_count: number;
  fronts_count: number;
  backs_count: number;
  original_page_sequence_json: string;
  warnings_json: string;
  error_json: string | null;
}

export interface RunDocumentRow {
  run_id: string;
  position: number;
  document_id: string;
  file_name: string;
  source_path: string;
  status: 'processed' | 'skipped';
  original_page_count: number;
  trimmed_page_count: number;
  title_page_added: number;
  blank_page_added: number;
  final_page_count: number;
  warning: string | null;
}

export interface RunArtifactRow {
  run_id: string;
  position: number;
  kind: 'fronts' | 'backs' | 'batch';
  file_name: string;
  path: string | null;
  batch_index: number | null;
  page_count: number;
  page_labels_json: string;
}

export interface RunSummaryRow {
  id: string;
  status: RunStatus;
  started_at: string;
  completed_at: string;
  final_page_count: number;
  warnings_json: string;
  error_json: string | null;
  document_count: number;
  artifact_count: number;
}
