/**
 * Printer MCP Tools
 *
 * Tools: duplex_print_submit, duplex_printer_reverse, duplex_manual_instructions
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module tools/printer
 */

import { stat } from 'fs/promises';
import { pathNotFoundError, runNotFoundError, validationError } from '../server/errors.js';
import { getConfig, requireRunStore } from '../server/state.js';
import { successResult } from '../server/types.js';
import { manualReverseInstructions } from '../services/printer/instructions.js';
import { LpPrinterDriver } from '../services/printer/lp-driver.js';
import type { PrinterDriver } from '../services/printer/types.js';
import {
  ManualInstructionsInput,
  PrintSubmitInput,
  PrintSubmitInputShape,
  PrinterReverseInput,
  sanitizePath,
  validateInput,
} from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// DRIVER
// ═══════════════════════════════════════════════════════════════════════════════

let driverOverride: PrinterDriver | null = null;

/**
 * Replace the print queue driver (tests install a fake); null restores lp/lpr
 */
export function setPrinterDriver(driver: PrinterDriver | null): void {
  driverOverride = driver;
}

function printerDriver(): PrinterDriver {
  return driverOverride ?? new LpPrinterDriver({ reverseTimeoutMs: getConfig().reverseTimeoutMs });
}

/**
 * Absolute path of the artifact named by file name (or kind, for fronts/backs) in a recorded run
 */
function resolveRunArtifact(runId: string, artifact: string): string {
  const report = requireRunStore().getRun(runId);
  if (!report) {
    throw runNotFoundError(runId);
  }
  const record = report.artifacts.find((a) => a.file_name === artifact || a.kind === artifact);
  if (!record) {
    throw validationError(`Run ${runId} has no artifact "${artifact}"`, {
      run_id: runId,
      available: report.artifacts.map((a) => a.file_name),
    });
  }
  if (!record.path) {
    throw validationError(`Artifact ${record.file_name} of run ${runId} was only planned (dry run)`, {
      run_id: runId,
    });
  }
  return record.path;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

export async function handlePrintSubmit(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(PrintSubmitInput, params);
    const filePath =
      input.file_path !== undefined
        ? sanitizePath(input.file_path)
        : resolveRunArtifact(input.run_id ?? '', input.artifact ?? '');

    const info = await stat(filePath).catch(() => null);
    if (!info?.isFile()) {
      throw pathNotFoundError(filePath);
    }

    const result = await printerDriver().submit(filePath, input.printer ?? getConfig().printerName);
    return formatResponse(
      successResult({
        ...result,
        next_steps: [
          { tool: 'duplex_printer_reverse', description: 'Ask the printer to hand the stack back' },
          { tool: 'duplex_manual_instructions', description: 'How to re-feed the stack by hand' },
        ],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

/**
 * One reverse attempt; manual instructions come back whenever it fails
 */
export async function handlePrinterReverse(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(PrinterReverseInput, params);
    const reversed = await printerDriver().attemptReverse(
      input.count,
      input.printer ?? getConfig().printerName
    );

    return formatResponse(
      successResult(
        reversed
          ? { reversed: true, count: input.count }
          : { reversed: false, count: input.count, manual_instructions: manualReverseInstructions() }
      )
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handleManualInstructions(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    validateInput(ManualInstructionsInput, params);
    return formatResponse(successResult(manualReverseInstructions()));
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS FOR MCP REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════════

export const printerTools: Record<string, ToolDefinition> = {
  duplex_print_submit: {
    description:
      '[PRINT] Use to send a PDF to the print queue (lp on Linux, lpr on macOS). Give file_path, or run_id with an artifact file name such as "Batch_1.pdf" or "fronts".',
    inputSchema: PrintSubmitInputShape,
    handler: handlePrintSubmit,
  },
  duplex_printer_reverse: {
    description:
      '[PRINT] Use after printing fronts: one attempt to have the printer return the stack in reverse order. Returns manual re-feed instructions if it fails.',
    inputSchema: PrinterReverseInput.shape,
    handler: handlePrinterReverse,
  },
  duplex_manual_instructions: {
    description: '[PRINT] Use to get the step-by-step manual re-feed instructions for duplex printing.',
    inputSchema: ManualInstructionsInput.shape,
    handler: handleManualInstructions,
  },
};
