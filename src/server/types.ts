/**
 * MCP Server Type Definitions
 *
 * Defines interfaces for tool results, server configuration, and state.
 *
 * @module server/types
 */

import type { BackRotationAngle } from '../models/page.js';
import type { DuplexScope, OutputMode } from '../models/run.js';
import type { RunStore } from '../services/storage/run-store.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL RESULT TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Successful tool result
 */
interface ToolResultSuccess<T = unknown> {
  success: true;
  data: T;
}

/**
 * Helper to create success result
 */
export function successResult<T>(data: T): ToolResultSuccess<T> {
  return { success: true, data };
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Server configuration options
 */
export interface ServerConfig {
  /** Directory holding runs.db */
  dataPath: string;

  /** Where artifacts are written unless a run names another directory */
  outputDir: string;

  /** Drop the first and last page of every document (default: true) */
  removeFirstLast: boolean;

  /** Stamp "{page} | {document}" on original pages (default: true) */
  addWatermarks: boolean;

  /** Stamp sequence positions on original pages (default: false) */
  numberPages: boolean;

  /** Rotation added to every back page (default: 180) */
  rotationAngle: BackRotationAngle;

  /** Pages per Batch_N.pdf (default: 20) */
  batchSize: number;

  /** Page number font size (default: 12) */
  fontSize: number;

  /** Upper bound of the title font size (default: 36) */
  titleFontSize: number;

  duplexScope: DuplexScope;
  outputMode: OutputMode;

  /** Replace existing output files instead of failing (default: false) */
  overwrite: boolean;

  /** Documents loaded and artifacts written at once (default: 4) */
  maxConcurrent: number;

  /** Optional PNG/JPEG drawn on every title page */
  titleImagePath: string | null;

  /** Bound on the single printer reverse attempt (default: 5000) */
  reverseTimeoutMs: number;

  /** Print queue name; null uses the system default */
  printerName: string | null;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER STATE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Server state tracking
 */
export interface ServerState {
  /** Run history store, opened on first use */
  runStore: RunStore | null;

  /** Server configuration */
  config: ServerConfig;
}
