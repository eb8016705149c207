/**
 * MCP Server State Management
 *
 * Holds the server configuration and the run store connection.
 * FAIL FAST: All state access throws immediately if preconditions not met.
 *
 * @module server/state
 */

import * as path from 'path';
import type { RunSettings } from '../models/run.js';
import { DEFAULT_BATCH_SIZE } from '../services/sequencing/batcher.js';
import { DEFAULT_BACK_ROTATION } from '../services/sequencing/duplex-sequencer.js';
import { DEFAULT_TITLE_FONT_SIZE } from '../services/sequencing/title-injector.js';
import { DEFAULT_PAGE_NUMBER_FONT_SIZE } from '../services/sequencing/watermark.js';
import { DEFAULT_REVERSE_TIMEOUT_MS } from '../services/printer/lp-driver.js';
import { DEFAULT_DATA_PATH, RunStore } from '../services/storage/run-store.js';
import { ConfigUpdate, type ConfigUpdateInput } from '../utils/validation.js';
import type { ServerConfig, ServerState } from './types.js';

// ═══════════════════════════════════════════════════════════════════════════════
// DEFAULT CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Default server configuration
 */
const defaultConfig: ServerConfig = {
  dataPath: DEFAULT_DATA_PATH,
  outputDir: path.resolve('duplex-output'),
  removeFirstLast: true,
  addWatermarks: true,
  numberPages: false,
  rotationAngle: DEFAULT_BACK_ROTATION,
  batchSize: DEFAULT_BATCH_SIZE,
  fontSize: DEFAULT_PAGE_NUMBER_FONT_SIZE,
  titleFontSize: DEFAULT_TITLE_FONT_SIZE,
  duplexScope: 'per_batch',
  outputMode: 'batched',
  overwrite: false,
  maxConcurrent: 4,
  titleImagePath: null,
  reverseTimeoutMs: DEFAULT_REVERSE_TIMEOUT_MS,
  printerName: null,
};

export function getDefaultConfig(): ServerConfig {
  return { ...defaultConfig };
}

// ═══════════════════════════════════════════════════════════════════════════════
// GLOBAL STATE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Global server state
 */
export const state: ServerState = {
  runStore: null,
  config: { ...defaultConfig },
};

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Get current server configuration
 */
export function getConfig(): ServerConfig {
  return { ...state.config };
}

export function updateConfig(updates: Partial<ServerConfig>): void {
  state.config = { ...state.config, ...updates };
}

/**
 * Reset configuration to defaults
 */
export function resetConfig(): void {
  state.config = { ...defaultConfig };
}

/**
 * snake_case config update → ServerConfig patch
 */
export function toConfigPatch(update: ConfigUpdateInput): Partial<ServerConfig> {
  const patch: Partial<ServerConfig> = {};
  if (update.remove_first_last !== undefined) patch.removeFirstLast = update.remove_first_last;
  if (update.add_watermarks !== undefined) patch.addWatermarks = update.add_watermarks;
  if (update.number_pages !== undefined) patch.numberPages = update.number_pages;
  if (update.rotation_angle !== undefined) patch.rotationAngle = update.rotation_angle;
  if (update.batch_size !== undefined) patch.batchSize = update.batch_size;
  if (update.font_size !== undefined) patch.fontSize = update.font_size;
  if (update.title_font_size !== undefined) patch.titleFontSize = update.title_font_size;
  if (update.duplex_scope !== undefined) patch.duplexScope = update.duplex_scope;
  if (update.output_mode !== undefined) patch.outputMode = update.output_mode;
  if (update.overwrite !== undefined) patch.overwrite = update.overwrite;
  if (update.max_concurrent !== undefined) patch.maxConcurrent = update.max_concurrent;
  if (update.output_dir !== undefined) patch.outputDir = path.resolve(update.output_dir);
  if (update.title_image_path !== undefined) {
    patch.titleImagePath = update.title_image_path === null ? null : path.resolve(update.title_image_path);
  }
  if (update.reverse_timeout_ms !== undefined) patch.reverseTimeoutMs = update.reverse_timeout_ms;
  if (update.printer_name !== undefined) patch.printerName = update.printer_name;
  return patch;
}

/**
 * ServerConfig → the snake_case view returned by duplex_config_get
 */
export function toConfigView(config: ServerConfig) {
  return {
    remove_first_last: config.removeFirstLast,
    add_watermarks: config.addWatermarks,
    number_pages: config.numberPages,
    rotation_angle: config.rotationAngle,
    batch_size: config.batchSize,
    font_size: config.fontSize,
    title_font_size: config.titleFontSize,
    duplex_scope: config.duplexScope,
    output_mode: config.outputMode,
    overwrite: config.overwrite,
    max_concurrent: config.maxConcurrent,
    output_dir: config.outputDir,
    title_image_path: config.titleImagePath,
    reverse_timeout_ms: config.reverseTimeoutMs,
    printer_name: config.printerName,
  } satisfies Required<ConfigUpdateInput>;
}

/**
 * Settings snapshot recorded in a run report
 */
export function toRunSettings(config: ServerConfig): RunSettings {
  return {
    remove_first_last: config.removeFirstLast,
    add_watermarks: config.addWatermarks,
    number_pages: config.numberPages,
    rotation_angle: config.rotationAngle,
    batch_size: config.batchSize,
    font_size: config.fontSize,
    title_font_size: config.titleFontSize,
    duplex_scope: config.duplexScope,
    output_mode: config.outputMode,
    overwrite: config.overwrite,
    output_dir: config.outputDir,
    title_image_path: config.titleImagePath,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// RUN STORE ACCESS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Restore config values saved by duplex_config_set in a previous session.
 * Values that no longer validate are skipped with a log line.
 */
function applyPersistedConfig(store: RunStore): void {
  const persisted = store.loadPersistedConfig();
  let applied = 0;
  for (const [key, value] of Object.entries(persisted)) {
    const parsed = ConfigUpdate.safeParse({ [key]: value });
    if (!parsed.success) {
      console.error(`[Config] Ignoring persisted config ${key}: ${parsed.error.errors[0]?.message ?? 'invalid'}`);
      continue;
    }
    updateConfig(toConfigPatch(parsed.data));
    applied++;
  }
  if (applied > 0) {
    console.error(`[Config] Loaded ${applied} persisted config value(s) from run store`);
  }
}

/**
 * Run store for the configured data path, opened on first use
 *
 * @throws RunStoreError when runs.db cannot be opened
 */
export function requireRunStore(): RunStore {
  if (!state.runStore) {
    const store = RunStore.open(state.config.dataPath);
    state.runStore = store;
    applyPersistedConfig(store);
  }
  return state.runStore;
}

/**
 * Install a store (tests use RunStore.inMemory()); closes any previous one
 */
export function setRunStore(store: RunStore | null): void {
  if (state.runStore && state.runStore !== store) {
    state.runStore.close();
  }
  state.runStore = store;
  if (store) {
    applyPersistedConfig(store);
  }
}

export function hasRunStore(): boolean {
  return state.runStore !== null;
}

export function closeRunStore(): void {
  if (state.runStore) {
    state.runStore.close();
    state.runStore = null;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// STATE RESET (FOR TESTING)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Reset all server state - ONLY USE IN TESTS
 */
export function resetState(): void {
  closeRunStore();
  state.config = { ...defaultConfig };
}

// ═══════════════════════════════════════════════════════════════════════════════
// PROCESS EXIT CLEANUP
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Checkpoint WAL files on process exit.
 */
process.on('exit', () => {
  if (state.runStore) {
    try {
      state.runStore.close();
    } catch (error) {
      console.error(
        '[RunStore] Close on exit failed:',
        error instanceof Error ? error.message : String(error)
      );
    }
    state.runStore = null;
  }
});
