/**
 * Run History MCP Tools
 *
 * Tools: duplex_run_list, duplex_run_get, duplex_run_delete
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module tools/runs
 */

import { runNotFoundError } from '../server/errors.js';
import { requireRunStore } from '../server/state.js';
import { successResult } from '../server/types.js';
import { RunDeleteInput, RunGetInput, RunListInput, validateInput } from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

export async function handleRunList(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(RunListInput, params);
    const store = requireRunStore();
    const runs = store.listRuns({ status: input.status, limit: input.limit, offset: input.offset });
    const total = store.countRuns(input.status);

    return formatResponse(
      successResult({
        runs,
        total,
        limit: input.limit,
        offset: input.offset,
        has_more: input.offset + runs.length < total,
        next_steps: [{ tool: 'duplex_run_get', description: 'Inspect one run in full' }],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handleRunGet(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(RunGetInput, params);
    const report = requireRunStore().getRun(input.run_id);
    if (!report) {
      throw runNotFoundError(input.run_id);
    }

    const artifacts = input.include_page_labels
      ? report.artifacts
      : report.artifacts.map(({ page_labels: _labels, ...rest }) => rest);

    return formatResponse(
      successResult({
        ...report,
        artifacts,
        next_steps: [
          { tool: 'duplex_print_submit', description: 'Print one of the artifacts' },
          { tool: 'duplex_run_delete', description: 'Remove this run from history' },
        ],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Deletes the history record only; artifact files stay on disk
 */
export async function handleRunDelete(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(RunDeleteInput, params);
    const store = requireRunStore();
    if (!store.getRun(input.run_id)) {
      throw runNotFoundError(input.run_id);
    }
    store.deleteRun(input.run_id);
    console.error(`[RunStore] Deleted run ${input.run_id}`);

    return formatResponse(successResult({ run_id: input.run_id, deleted: true }));
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS FOR MCP REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════════

export const runTools: Record<string, ToolDefinition> = {
  duplex_run_list: {
    description: '[STATUS] Use to list recorded sequencing runs, most recent first. Filter by status.',
    inputSchema: RunListInput.shape,
    handler: handleRunList,
  },
  duplex_run_get: {
    description:
      '[STATUS] Use to get the full report of one run: per-document breakdown, artifacts with page order labels, warnings, and any failure.',
    inputSchema: RunGetInput.shape,
    handler: handleRunGet,
  },
  duplex_run_delete: {
    description: '[DESTRUCTIVE] Use to remove a run from history. Output files are kept. Requires confirm=true.',
    inputSchema: RunDeleteInput.shape,
    handler: handleRunDelete,
  },
};
