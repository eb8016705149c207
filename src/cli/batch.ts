/**
 * duplex-batch: one pipeline run from the command line
 *
 * Prints a human-readable summary on stdout; diagnostics go to stderr.
 * Exit codes: 0 success, 1 run failure, 2 invalid arguments.
 *
 * @module cli/batch
 */

import * as path from 'node:path';
import { parseArgs } from 'node:util';
import type { RunReport, RunSettings } from '../models/run.js';
import { getConfig, toRunSettings } from '../server/state.js';
import { runPipeline } from '../services/pipeline/processor.js';
import { formatManualInstructions } from '../services/printer/instructions.js';
import { BatchSize, DuplexScope, OutputMode, PathString, RotationAngle } from '../utils/validation.js';

// ─── Terminal formatting ─────────────────────────────────────────────────────

const bold = (s: string): string => `\x1b[1m${s}\x1b[0m`;
const green = (s: string): string => `\x1b[32m${s}\x1b[0m`;
const red = (s: string): string => `\x1b[31m${s}\x1b[0m`;
const yellow = (s: string): string => `\x1b[33m${s}\x1b[0m`;
const dim = (s: string): string => `\x1b[2m${s}\x1b[0m`;

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export const USAGE = `Usage: duplex-batch (--input-dir DIR | FILE.pdf ...) [options]

Options:
  --input-dir DIR          Process every PDF in DIR, in name order
  --output-dir DIR         Where to write the output files
  --batch-size N           Pages per Batch_N.pdf
  --scope SCOPE            global | per_batch
  --mode MODE              split | batched
  --rotation DEG           Rotation added to back pages: 90 | 180 | 270
  --no-trim                Keep the first and last page of each document
  --no-watermarks          Do not stamp page/document watermarks
  --number-pages           Stamp sequence numbers on original pages
  --title-image FILE       PNG or JPEG drawn on every title page
  --overwrite              Replace existing output files
  --dry-run                Plan the output without writing files
  --instructions           Print manual re-feed instructions after the run
  -h, --help               Show this help`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface BatchCommand {
  inputPaths?: string[];
  inputDir?: string;
  settings: RunSettings;
  dryRun: boolean;
  instructions: boolean;
  help: boolean;
}

export interface BatchIO {
  out: (line: string) => void;
  err: (line: string) => void;
  color: boolean;
}

type Parsed<T> =
  | { success: true; data: T }
  | { success: false; error: { errors: Array<{ message: string }> } };

function parsedOrUsage<T>(result: Parsed<T>, flag: string): T {
  if (!result.success) {
    throw new UsageError(`${flag}: ${result.error.errors.map((e) => e.message).join('; ')}`);
  }
  return result.data;
}

function readArgs(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      options: {
        'input-dir': { type: 'string' },
        'output-dir': { type: 'string' },
        'batch-size': { type: 'string' },
        scope: { type: 'string' },
        mode: { type: 'string' },
        rotation: { type: 'string' },
        'no-trim': { type: 'boolean', default: false },
        'no-watermarks': { type: 'boolean', default: false },
        'number-pages': { type: 'boolean', default: false },
        'title-image': { type: 'string' },
        overwrite: { type: 'boolean', default: false },
        'dry-run': { type: 'boolean', default: false },
        instructions: { type: 'boolean', default: false },
        help: { type: 'boolean', short: 'h', default: false },
      },
    });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * @throws UsageError for unknown flags, missing inputs or invalid values
 */
export function parseBatchArgs(argv: readonly string[], base: RunSettings): BatchCommand {
  const parsed = readArgs(argv);
  const { values, positionals } = parsed;
  const settings: RunSettings = { ...base };

  if (values.help) {
    return { settings, dryRun: false, instructions: false, help: true };
  }

  const inputDir = values['input-dir'];
  if ((inputDir === undefined) === (positionals.length === 0)) {
    throw new UsageError('Provide either --input-dir or one or more PDF files');
  }

  if (values['output-dir'] !== undefined) {
    settings.output_dir = path.resolve(parsedOrUsage(PathString.safeParse(values['output-dir']), '--output-dir'));
  }
  if (values['batch-size'] !== undefined) {
    settings.batch_size = parsedOrUsage(BatchSize.safeParse(Number(values['batch-size'])), '--batch-size');
  }
  if (values.scope !== undefined) {
    settings.duplex_scope = parsedOrUsage(DuplexScope.safeParse(values.scope), '--scope');
  }
  if (values.mode !== undefined) {
    settings.output_mode = parsedOrUsage(OutputMode.safeParse(values.mode), '--mode');
  }
  if (values.rotation !== undefined) {
    settings.rotation_angle = parsedOrUsage(RotationAngle.safeParse(Number(values.rotation)), '--rotation');
  }
  if (values['title-image'] !== undefined) {
    settings.title_image_path = path.resolve(
      parsedOrUsage(PathString.safeParse(values['title-image']), '--title-image')
    );
  }
  if (values['no-trim']) settings.remove_first_last = false;
  if (values['no-watermarks']) settings.add_watermarks = false;
  if (values['number-pages']) settings.number_pages = true;
  if (values.overwrite) settings.overwrite = true;

  return {
    inputPaths: inputDir === undefined ? positionals : undefined,
    inputDir,
    settings,
    dryRun: values['dry-run'],
    instructions: values.instructions,
    help: false,
  };
}

/**
 * Summary lines printed after a run
 */
export function formatRunSummary(report: RunReport, io: Pick<BatchIO, 'color'>): string[] {
  const paint = (fn: (s: string) => string, s: string): string => (io.color ? fn(s) : s);
  const lines: string[] = [];
  const statusLabel =
    report.status === 'failed'
      ? paint(red, 'FAILED')
      : report.status === 'planned'
        ? paint(yellow, 'PLANNED')
        : paint(green, 'COMPLETED');

  lines.push(`${paint(bold, 'Run')} ${report.run_id}: ${statusLabel}`);
  lines.push(
    `  Input pages: ${report.total_input_pages}, trimmed: ${report.trimmed_pages}, ` +
      `final: ${report.final_page_count} (fronts ${report.fronts_count}, backs ${report.backs_count})`
  );

  for (const doc of report.documents) {
    const detail =
      doc.status === 'skipped'
        ? paint(yellow, `skipped: ${doc.warning ?? 'unknown reason'}`)
        : `${doc.original_page_count} → ${doc.final_page_count} pages` +
          (doc.blank_page_added ? ' (blank added)' : '');
    lines.push(`  ${doc.file_name}: ${detail}`);
  }

  for (const artifact of report.artifacts) {
    const where = artifact.path ?? paint(dim, '(not written)');
    lines.push(`  ${artifact.file_name}: ${artifact.page_count} pages ${where}`);
  }

  for (const warning of report.warnings) {
    lines.push(`  ${paint(yellow, 'warning')} [${warning.code}] ${warning.message}`);
  }

  if (report.error) {
    lines.push(`  ${paint(red, 'error')} [${report.error.category}] ${report.error.message}`);
  }
  return lines;
}

/**
 * Parse arguments, run the pipeline once and print the summary
 *
 * @returns the process exit code
 */
export async function runBatchCli(argv: readonly string[], io: BatchIO): Promise<number> {
  const config = getConfig();
  let command: BatchCommand;
  try {
    command = parseBatchArgs(argv, toRunSettings(config));
  } catch (error) {
    if (error instanceof UsageError) {
      io.err(`duplex-batch: ${error.message}`);
      io.err(USAGE);
      return EXIT_USAGE;
    }
    throw error;
  }

  if (command.help) {
    io.out(USAGE);
    return EXIT_OK;
  }

  const { report } = await runPipeline({
    inputPaths: command.inputPaths,
    inputDir: command.inputDir,
    settings: command.settings,
    maxConcurrent: config.maxConcurrent,
    dryRun: command.dryRun,
  });

  for (const line of formatRunSummary(report, io)) {
    io.out(line);
  }
  if (command.instructions && report.status === 'completed') {
    io.out('');
    io.out(formatManualInstructions());
  }
  return report.status === 'failed' ? EXIT_FAILURE : EXIT_OK;
}
