/**
 * LpPrinterDriver - CUPS print queue via lp (Linux) or lpr (macOS)
 *
 * @module printer/lp-driver
 */

import { rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { spawnCommand } from './command-runner.js';
import {
  PrinterError,
  type CommandResult,
  type CommandRunner,
  type PrinterDriver,
  type SubmitResult,
} from './types.js';

export const DEFAULT_REVERSE_TIMEOUT_MS = 5000;
const SUBMIT_TIMEOUT_MS = 30_000;

/**
 * One blank Letter page; submitting it with reversed output order is the
 * only queue-level nudge most printers understand
 */
export const REVERSE_FEED_POSTSCRIPT = `%!PS-Adobe-3.0
<< /PageSize [612 792] >> setpagedevice
showpage
`;

export interface LpPrinterDriverOptions {
  runner?: CommandRunner;
  platform?: NodeJS.Platform;
  reverseTimeoutMs?: number;
  tempDir?: string;
}

/**
 * "request id is office-42 (1 file(s))" → "office-42"
 */
export function parseJobId(output: string): string | null {
  const match = /request id is (\S+)/i.exec(output);
  return match?.[1] ?? null;
}

export class LpPrinterDriver implements PrinterDriver {
  private readonly runner: CommandRunner;
  private readonly platform: NodeJS.Platform;
  private readonly reverseTimeoutMs: number;
  private readonly tempDir: string;

  constructor(options: LpPrinterDriverOptions = {}) {
    this.runner = options.runner ?? spawnCommand;
    this.platform = options.platform ?? process.platform;
    this.reverseTimeoutMs = options.reverseTimeoutMs ?? DEFAULT_REVERSE_TIMEOUT_MS;
    this.tempDir = options.tempDir ?? tmpdir();
  }

  /**
   * Print command for this platform, with any extra options before the file
   *
   * @throws PrinterError on platforms without lp/lpr
   */
  buildCommand(filePath: string, printer: string | null, extra: readonly string[] = []): string[] {
    if (this.platform === 'linux') {
      return ['lp', ...(printer ? ['-d', printer] : []), ...extra, filePath];
    }
    if (this.platform === 'darwin') {
      return ['lpr', ...(printer ? ['-P', printer] : []), ...extra, filePath];
    }
    throw new PrinterError(`Printing is not supported on platform "${this.platform}"`, {
      platform: this.platform,
    });
  }

  async submit(filePath: string, printer: string | null = null): Promise<SubmitResult> {
    const command = this.buildCommand(path.resolve(filePath), printer);
    const [executable, ...args] = command;
    if (!executable) {
      throw new PrinterError('Empty print command');
    }

    let result: CommandResult;
    try {
      result = await this.runner(executable, args, { timeoutMs: SUBMIT_TIMEOUT_MS });
    } catch (error) {
      throw new PrinterError(
        `Failed to start ${executable}: ${error instanceof Error ? error.message : String(error)}. ` +
          'Install the CUPS client tools (cups-client).',
        { command }
      );
    }

    if (result.code !== 0) {
      throw new PrinterError(
        `${executable} exited with ${result.code ?? result.signal ?? 'unknown status'}: ${result.stderr.trim()}`,
        { command, code: result.code, signal: result.signal }
      );
    }

    const jobId = parseJobId(result.stdout);
    console.error(`[Printer] Submitted ${filePath}${jobId ? ` as ${jobId}` : ''}`);
    return { job_id: jobId, printer, file_path: path.resolve(filePath), command };
  }

  async attemptReverse(count: number, printer: string | null = null): Promise<boolean> {
    const copies = Math.max(1, Math.floor(count));
    const copiesFlag = this.platform === 'darwin' ? '-#' : '-n';

    let command: string[];
    const psPath = path.join(this.tempDir, `duplex-reverse-${uuidv4()}.ps`);
    try {
      command = this.buildCommand(psPath, printer, ['-o', 'outputorder=reverse', copiesFlag, String(copies)]);
    } catch (error) {
      console.error(`[Printer] Reverse not attempted: ${error instanceof Error ? error.message : String(error)}`);
      return false;
    }

    const [executable, ...args] = command;
    if (!executable) {
      return false;
    }

    try {
      await writeFile(psPath, REVERSE_FEED_POSTSCRIPT, 'utf-8');
      const result = await this.runner(executable, args, { timeoutMs: this.reverseTimeoutMs });
      if (result.code === 0) {
        console.error(`[Printer] Reverse request for ${copies} sheet(s) accepted`);
        return true;
      }
      console.error(
        `[Printer] Reverse request rejected (${result.code ?? result.signal ?? 'unknown status'}): ${result.stderr.trim()}`
      );
      return false;
    } catch (error) {
      console.error(`[Printer] Reverse request failed: ${error instanceof Error ? error.message : String(error)}`);
      return false;
    } finally {
      try {
        await rm(psPath, { force: true });
      } catch (error) {
        console.error(
          `[Printer] Failed to remove reverse job file ${psPath}: ${error instanceof Error ? error.message : String(error)}`
        );
      }
    }
  }
}
