/**
 * Run Operations for RunStore
 *
 * Insert, fetch, list and delete run reports. A report is split across
 * runs, run_documents and run_artifacts and reassembled on read.
 *
 * @module storage/run-operations
 */

import type Database from 'better-sqlite3';
import type {
  ArtifactRecord,
  DocumentBreakdown,
  RunFailure,
  RunReport,
  RunSettings,
  RunWarning,
} from '../../models/run.js';
import {
  RunStoreError,
  RunStoreErrorCode,
  type ListRunsOptions,
  type RunArtifactRow,
  type RunDocumentRow,
  type RunRow,
  type RunSummary,
  type RunSummaryRow,
} from './types.js';

const DEFAULT_LIST_LIMIT = 50;

// ═══════════════════════════════════════════════════════════════════════════════
// INSERT
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * @throws RunStoreError when a run with the same id is already stored
 */
export function insertRun(db: Database.Database, report: RunReport): void {
  const insertRunRow = db.prepare(
    `INSERT INTO runs (
       id, status, started_at, completed_at, settings_json, total_input_pages,
       trimmed_pages, final_page_count, fronts_count, backs_count,
       original_page_sequence_json, warnings_json, error_json
     ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
  );
  const insertDocument = db.prepare(
    `INSERT INTO run_documents (
       run_id, position, document_id, file_name, source_path, status,
       original_page_count, trimmed_page_count, title_page_added,
       blank_page_added, final_page_count, warning
     ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
  );
  const insertArtifact = db.prepare(
    `INSERT INTO run_artifacts (
       run_id, position, kind, file_name, path, batch_index, page_count, page_labels_json
     ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
  );

  const write = db.transaction(() => {
    insertRunRow.run(
      report.run_id,
      report.status,
      report.started_at,
      report.completed_at,
      JSON.stringify(report.settings),
      report.total_input_pages,
      report.trimmed_pages,
      report.final_page_count,
      report.fronts_count,
      report.backs_count,
      JSON.stringify(report.original_page_sequence),
      JSON.stringify(report.warnings),
      report.error ? JSON.stringify(report.error) : null
    );

    report.documents.forEach((doc, position) => {
      insertDocument.run(
        report.run_id,
        position,
        doc.document_id,
        doc.file_name,
        doc.source_path,
        doc.status,
        doc.original_page_count,
        doc.trimmed_page_count,
        doc.title_page_added ? 1 : 0,
        doc.blank_page_added ? 1 : 0,
        doc.final_page_count,
        doc.warning
      );
    });

    report.artifacts.forEach((artifact, position) => {
      insertArtifact.run(
        report.run_id,
        position,
        artifact.kind,
        artifact.file_name,
        artifact.path,
        artifact.batch_index,
        artifact.page_count,
        JSON.stringify(artifact.page_labels)
      );
    });
  });

  try {
    write();
  } catch (error) {
    if (error instanceof Error && error.message.includes('UNIQUE constraint failed')) {
      throw new RunStoreError(
        `Run "${report.run_id}" already exists`,
        RunStoreErrorCode.RUN_ALREADY_EXISTS,
        error
      );
    }
    throw error;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// READ
// ═══════════════════════════════════════════════════════════════════════════════

function toDocument(row: RunDocumentRow): DocumentBreakdown {
  return {
    document_id: row.document_id,
    file_name: row.file_name,
    source_path: row.source_path,
    status: row.status,
    original_page_count: row.original_page_count,
    trimmed_page_count: row.trimmed_page_count,
    title_page_added: row.title_page_added === 1,
    blank_page_added: row.blank_page_added === 1,
    final_page_count: row.final_page_count,
    warning: row.warning,
  };
}

function toArtifact(row: RunArtifactRow): ArtifactRecord {
  return {
    kind: row.kind,
    file_name: row.file_name,
    path: row.path,
    batch_index: row.batch_index,
    page_count: row.page_count,
    page_labels: JSON.parse(row.page_labels_json) as string[],
  };
}

export function getRun(db: Database.Database, runId: string): RunReport | null {
  const row = db.prepare<[string], RunRow>('SELECT * FROM runs WHERE id = ?').get(runId);
  if (!row) {
    return null;
  }

  const documents = db
    .prepare<[string], RunDocumentRow>('SELECT * FROM run_documents WHERE run_id = ? ORDER BY position')
    .all(runId)
    .map(toDocument);
  const artifacts = db
    .prepare<[string], RunArtifactRow>('SELECT * FROM run_artifacts WHERE run_id = ? ORDER BY position')
    .all(runId)
    .map(toArtifact);

  return {
    run_id: row.id,
    status: row.status,
    started_at: row.started_at,
    completed_at: row.completed_at,
    settings: JSON.parse(row.settings_json) as RunSettings,
    total_input_pages: row.total_input_pages,
    trimmed_pages: row.trimmed_pages,
    final_page_count: row.final_page_count,
    fronts_count: row.fronts_count,
    backs_count: row.backs_count,
    documents,
    original_page_sequence: JSON.parse(row.original_page_sequence_json) as number[],
    artifacts,
    warnings: JSON.parse(row.warnings_json) as RunWarning[],
    error: row.error_json ? (JSON.parse(row.error_json) as RunFailure) : null,
  };
}

/**
 * Most recent first
 */
export function listRuns(db: Database.Database, options: ListRunsOptions = {}): RunSummary[] {
  const limit = options.limit ?? DEFAULT_LIST_LIMIT;
  const offset = options.offset ?? 0;
  const where = options.status ? 'WHERE r.status = ?' : '';
  const params: Array<string | number> = options.status ? [options.status] : [];

  const rows = db
    .prepare<Array<string | number>, RunSummaryRow>(
      `SELECT r.id, r.status, r.started_at, r.completed_at, r.final_page_count,
              r.warnings_json, r.error_json,
              (SELECT COUNT(*) FROM run_documents d WHERE d.run_id = r.id) AS document_count,
              (SELECT COUNT(*) FROM run_artifacts a WHERE a.run_id = r.id) AS artifact_count
       FROM runs r
       ${where}
       ORDER BY r.started_at DESC, r.id
       LIMIT ? OFFSET ?`
    )
    .all(...params, limit, offset);

  return rows.map((row) => {
    const warnings = JSON.parse(row.warnings_json) as RunWarning[];
    const error = row.error_json ? (JSON.parse(row.error_json) as RunFailure) : null;
    return {
      run_id: row.id,
      status: row.status,
      started_at: row.started_at,
      completed_at: row.completed_at,
      final_page_count: row.final_page_count,
      document_count: row.document_count,
      artifact_count: row.artifact_count,
      warning_count: warnings.length,
      error_category: error?.category ?? null,
    };
  });
}

export function countRuns(db: Database.Database, status?: RunReport['status']): number {
  const row = status
    ? db.prepare<[string], { count: number }>('SELECT COUNT(*) AS count FROM runs WHERE status = ?').get(status)
    : db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM runs').get();
  return row?.count ?? 0;
}

// ═══════════════════════════════════════════════════════════════════════════════
// DELETE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Remove a run and its documents and artifacts records (output files stay)
 *
 * @throws RunStoreError when the run does not exist
 */
export function deleteRun(db: Database.Database, runId: string): void {
  const result = db.prepare('DELETE FROM runs WHERE id = ?').run(runId);
  if (result.changes === 0) {
    throw new RunStoreError(`Run "${runId}" not found`, RunStoreErrorCode.RUN_NOT_FOUND);
  }
}
