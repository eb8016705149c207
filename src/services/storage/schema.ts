/**
 * SQL schema for the run store
 *
 * @module storage/schema
 */

import type Database from 'better-sqlite3';
import { RunStoreError, RunStoreErrorCode } from './types.js';

/** Current schema version */
export const SCHEMA_VERSION = 1;

export const DATABASE_PRAGMAS = [
  'PRAGMA journal_mode = WAL',
  'PRAGMA foreign_keys = ON',
  'PRAGMA synchronous = NORMAL',
  'PRAGMA busy_timeout = 5000',
] as const;

export const CREATE_SCHEMA_VERSION_TABLE = `
CREATE TABLE IF NOT EXISTS schema_version (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  version INTEGER NOT NULL,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
)
`;

/**
 * One row per pipeline run; nested report fields are JSON
 */
export const CREATE_RUNS_TABLE = `
CREATE TABLE IF NOT EXISTS runs (
  id TEXT PRIMARY KEY,
  status TEXT NOT NULL CHECK (status IN ('completed', 'failed', 'planned')),
  started_at TEXT NOT NULL,
  completed_at TEXT NOT NULL,
  settings_json TEXT NOT NULL,
  total_input_pages INTEGER NOT NULL,
  trimmed_pages INTEGER NOT NULL,
  final_page_count INTEGER NOT NULL,
  fronts_count INTEGER NOT NULL,
  backs_count INTEGER NOT NULL,
  original_page_sequence_json TEXT NOT NULL,
  warnings_json TEXT NOT NULL,
  error_json TEXT
)
`;

export const CREATE_RUN_DOCUMENTS_TABLE = `
CREATE TABLE IF NOT EXISTS run_documents (
  run_id TEXT NOT NULL REFERENCES runs(id) ON DELETE CASCADE,
  position INTEGER NOT NULL,
  document_id TEXT NOT NULL,
  file_name TEXT NOT NULL,
  source_path TEXT NOT NULL,
  status TEXT NOT NULL CHECK (status IN ('processed', 'skipped')),
  original_page_count INTEGER NOT NULL,
  trimmed_page_count INTEGER NOT NULL,
  title_page_added INTEGER NOT NULL,
  blank_page_added INTEGER NOT NULL,
  final_page_count INTEGER NOT NULL,
  warning TEXT,
  PRIMARY KEY (run_id, position)
)
`;

export const CREATE_RUN_ARTIFACTS_TABLE = `
CREATE TABLE IF NOT EXISTS run_artifacts (
  run_id TEXT NOT NULL REFERENCES runs(id) ON DELETE CASCADE,
  position INTEGER NOT NULL,
  kind TEXT NOT NULL CHECK (kind IN ('fronts', 'backs', 'batch')),
  file_name TEXT NOT NULL,
  path TEXT,
  batch_index INTEGER,
  page_count INTEGER NOT NULL,
  page_labels_json TEXT NOT NULL,
  PRIMARY KEY (run_id, position)
)
`;

/**
 * Runtime config changes made with duplex_config_set
 */
export const CREATE_CONFIG_TABLE = `
CREATE TABLE IF NOT EXISTS config (
  key TEXT PRIMARY KEY,
  value_json TEXT NOT NULL,
  updated_at TEXT NOT NULL
)
`;

export const CREATE_INDEXES = [
  'CREATE INDEX IF NOT EXISTS idx_runs_started_at ON runs(started_at)',
  'CREATE INDEX IF NOT EXISTS idx_runs_status ON runs(status)',
] as const;

export function configurePragmas(db: Database.Database): void {
  for (const pragma of DATABASE_PRAGMAS) {
    db.exec(pragma);
  }
}

export function getCurrentSchemaVersion(db: Database.Database): number {
  const table = db
    .prepare<[], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'schema_version'"
    )
    .get();
  if (!table) {
    return 0;
  }
  const row = db
    .prepare<[number], { version: number }>('SELECT version FROM schema_version WHERE id = ?')
    .get(1);
  return row?.version ?? 0;
}

/**
 * Create every table and stamp the version, in one transaction.
 *
 * @throws RunStoreError when the file was written by a newer schema
 */
export function initializeSchema(db: Database.Database): void {
  configurePragmas(db);

  const version = getCurrentSchemaVersion(db);
  if (version > SCHEMA_VERSION) {
    throw new RunStoreError(
      `Run store schema version ${version} is newer than supported version ${SCHEMA_VERSION}`,
      RunStoreErrorCode.SCHEMA_MISMATCH
    );
  }

  db.transaction(() => {
    db.exec(CREATE_SCHEMA_VERSION_TABLE);
    db.exec(CREATE_RUNS_TABLE);
    db.exec(CREATE_RUN_DOCUMENTS_TABLE);
    db.exec(CREATE_RUN_ARTIFACTS_TABLE);
    db.exec(CREATE_CONFIG_TABLE);
    for (const index of CREATE_INDEXES) {
      db.exec(index);
    }

    // Stamped last, so an interrupted init leaves version 0 and re-runs
    const now = new Date().toISOString();
    db.prepare(
      `INSERT INTO schema_version (id, version, created_at, updated_at)
       VALUES (1, ?, ?, ?)
       ON CONFLICT(id) DO UPDATE SET version = excluded.version, updated_at = excluded.updated_at`
    ).run(SCHEMA_VERSION, now, now);
  })();
}
