/**
 * RunStore - persisted history of pipeline runs
 *
 * One SQLite file (runs.db) under the data path holds every run report
 * and the runtime config overrides.
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import type { RunReport, RunStatus } from '../../models/run.js';
import {
  clearPersistedConfig,
  loadPersistedConfig,
  persistConfigValue,
  type PersistedConfigValue,
} from '../../utils/config-persistence.js';
import * as runOps from './run-operations.js';
import { initializeSchema } from './schema.js';
import { RunStoreError, RunStoreErrorCode, type ListRunsOptions, type RunSummary } from './types.js';

/**
 * Default directory for runs.db
 */
export const DEFAULT_DATA_PATH =
  process.env.DUPLEX_SEQUENCER_DATA_PATH ?? join(homedir(), '.duplex-sequencer');

export const RUN_STORE_FILE_NAME = 'runs.db';

export class RunStore {
  private db: Database.Database;
  private readonly path: string;
  private closed = false;

  private constructor(db: Database.Database, path: string) {
    this.db = db;
    this.path = path;
  }

  /**
   * Open (creating if needed) runs.db under `dataPath`
   *
   * @throws RunStoreError when the file cannot be created or has a newer schema
   */
  static open(dataPath: string = DEFAULT_DATA_PATH): RunStore {
    const dbPath = join(dataPath, RUN_STORE_FILE_NAME);
    let db: Database.Database;
    try {
      if (!existsSync(dataPath)) {
        mkdirSync(dataPath, { recursive: true, mode: 0o700 });
      }
      db = new Database(dbPath);
    } catch (error) {
      throw new RunStoreError(
        `Failed to open run store at ${dbPath}: ${String(error)}`,
        RunStoreErrorCode.PERMISSION_DENIED,
        error
      );
    }
    return RunStore.initialize(db, dbPath);
  }

  /**
   * Store that lives only as long as the process
   */
  static inMemory(): RunStore {
    return RunStore.initialize(new Database(':memory:'), ':memory:');
  }

  private static initialize(db: Database.Database, path: string): RunStore {
    try {
      initializeSchema(db);
    } catch (error) {
      db.close();
      throw error;
    }
    return new RunStore(db, path);
  }

  getPath(): string {
    return this.path;
  }

  getConnection(): Database.Database {
    this.assertOpen();
    return this.db;
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.db.close();
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new RunStoreError(`Run store ${this.path} is closed`, RunStoreErrorCode.STORE_CLOSED);
    }
  }

  // ==================== RUN OPERATIONS ====================

  insertRun(report: RunReport): void {
    runOps.insertRun(this.getConnection(), report);
  }

  getRun(runId: string): RunReport | null {
    return runOps.getRun(this.getConnection(), runId);
  }

  listRuns(options?: ListRunsOptions): RunSummary[] {
    return runOps.listRuns(this.getConnection(), options);
  }

  countRuns(status?: RunStatus): number {
    return runOps.countRuns(this.getConnection(), status);
  }

  deleteRun(runId: string): void {
    runOps.deleteRun(this.getConnection(), runId);
  }

  // ==================== CONFIG OPERATIONS ====================

  persistConfigValue(key: string, value: PersistedConfigValue): void {
    persistConfigValue(this.getConnection(), key, value);
  }

  loadPersistedConfig(): Record<string, unknown> {
    return loadPersistedConfig(this.getConnection());
  }

  clearPersistedConfig(key?: string): void {
    clearPersistedConfig(this.getConnection(), key);
  }
}
