/**
 * Duplex Processing MCP Tool
 *
 * Tool: duplex_process
 *
 * Runs the sequencing pipeline with the server config plus per-run
 * overrides and records every run (completed, planned or failed) in the
 * run store.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module tools/processing
 */

import type { RunSettings } from '../models/run.js';
import { MCPError } from '../server/errors.js';
import { getConfig, requireRunStore, toRunSettings } from '../server/state.js';
import { successResult } from '../server/types.js';
import { runPipeline } from '../services/pipeline/processor.js';
import {
  ProcessInput,
  ProcessInputShape,
  sanitizePath,
  validateInput,
  type ProcessInputData,
} from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

/**
 * Server config overlaid with the overrides given for this run
 */
export function resolveRunSettings(input: ProcessInputData, base: RunSettings): RunSettings {
  return {
    remove_first_last: input.remove_first_last ?? base.remove_first_last,
    add_watermarks: input.add_watermarks ?? base.add_watermarks,
    number_pages: input.number_pages ?? base.number_pages,
    rotation_angle: input.rotation_angle ?? base.rotation_angle,
    batch_size: input.batch_size ?? base.batch_size,
    font_size: input.font_size ?? base.font_size,
    title_font_size: input.title_font_size ?? base.title_font_size,
    duplex_scope: input.duplex_scope ?? base.duplex_scope,
    output_mode: input.output_mode ?? base.output_mode,
    overwrite: input.overwrite ?? base.overwrite,
    output_dir: input.output_dir !== undefined ? sanitizePath(input.output_dir) : base.output_dir,
    title_image_path:
      input.title_image_path === undefined
        ? base.title_image_path
        : input.title_image_path === null
          ? null
          : sanitizePath(input.title_image_path),
  };
}

export async function handleProcess(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ProcessInput, params);
    const config = getConfig();
    const settings = resolveRunSettings(input, toRunSettings(config));
    const store = requireRunStore();

    const { report, error } = await runPipeline({
      inputPaths: input.input_paths?.map((p) => sanitizePath(p)),
      inputDir: input.input_dir !== undefined ? sanitizePath(input.input_dir) : undefined,
      settings,
      maxConcurrent: config.maxConcurrent,
      dryRun: input.dry_run,
    });

    store.insertRun(report);

    if (error) {
      throw MCPError.fromUnknown(error, 'INTERNAL_ERROR', {
        run_id: report.run_id,
        stage: report.error?.stage ?? null,
        warnings: report.warnings,
      });
    }

    const nextSteps =
      report.status === 'planned'
        ? [{ tool: 'duplex_process', description: 'Run again with dry_run=false to write the files' }]
        : [
            { tool: 'duplex_print_submit', description: 'Send an artifact to the printer' },
            { tool: 'duplex_run_get', description: 'Inspect the page order of every artifact' },
          ];

    return formatResponse(
      successResult({
        run_id: report.run_id,
        status: report.status,
        total_input_pages: report.total_input_pages,
        trimmed_pages: report.trimmed_pages,
        final_page_count: report.final_page_count,
        fronts_count: report.fronts_count,
        backs_count: report.backs_count,
        documents: report.documents,
        artifacts: report.artifacts.map((a) => ({
          kind: a.kind,
          file_name: a.file_name,
          path: a.path,
          batch_index: a.batch_index,
          page_count: a.page_count,
        })),
        warnings: report.warnings,
        next_steps: nextSteps,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS FOR MCP REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════════

export const processingTools: Record<string, ToolDefinition> = {
  duplex_process: {
    description:
      '[CORE] Use to turn PDFs into duplex print files. Trims first/last pages, adds a title page per document, pads to even, then writes odd/even (split) or Batch_N.pdf (batched) files. Use dry_run=true to preview.',
    inputSchema: {
      ...ProcessInputShape,
      input_paths: ProcessInputShape.input_paths.describe('PDF files in print order'),
      input_dir: ProcessInputShape.input_dir.describe('Directory of PDFs, processed in name order'),
      dry_run: ProcessInputShape.dry_run.describe('Plan artifacts without writing files'),
    },
    handler: handleProcess,
  },
};
