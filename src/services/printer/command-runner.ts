/**
 * Default CommandRunner backed by child_process.spawn
 *
 * @module printer/command-runner
 */

import { spawn } from 'child_process';
import type { CommandOptions, CommandResult, CommandRunner } from './types.js';

/** Max output accumulation per stream: 10KB */
const MAX_OUTPUT_LENGTH = 10_000;

export const spawnCommand: CommandRunner = (
  command: string,
  args: readonly string[],
  options: CommandOptions
): Promise<CommandResult> =>
  new Promise((resolve, reject) => {
    const proc = spawn(command, [...args], { timeout: options.timeoutMs });

    let stdout = '';
    let stderr = '';
    let settled = false;

    proc.stdout.on('data', (data: Buffer) => {
      if (stdout.length < MAX_OUTPUT_LENGTH) {
        stdout += data.toString();
      }
    });

    proc.stderr.on('data', (data: Buffer) => {
      if (stderr.length < MAX_OUTPUT_LENGTH) {
        stderr += data.toString();
      }
    });

    proc.on('error', (err) => {
      if (settled) return;
      settled = true;
      reject(err);
    });

    proc.on('close', (code, signal) => {
      if (settled) return;
      settled = true;
      resolve({ code, signal, stdout, stderr });
    });
  });
