#!/usr/bin/env node
/**
 * Duplex Sequencer - batch CLI entry point
 *
 * Usage:
 *   duplex-batch --input-dir ./scans --output-dir ./print
 *   duplex-batch a.pdf b.pdf --mode split --dry-run
 *
 * @module bin-batch
 */

import { runBatchCli, EXIT_FAILURE, EXIT_USAGE } from './cli/batch.js';
import { loadEnvironment } from './server/env.js';
import { MCPError } from './server/errors.js';
import { validateStartupDependencies } from './server/startup.js';

async function main(): Promise<number> {
  loadEnvironment();
  try {
    validateStartupDependencies();
  } catch (error) {
    if (error instanceof MCPError) {
      console.error(`duplex-batch: ${error.message}`);
      return EXIT_USAGE;
    }
    throw error;
  }

  return runBatchCli(process.argv.slice(2), {
    out: (line) => process.stdout.write(`${line}\n`),
    err: (line) => process.stderr.write(`${line}\n`),
    color: process.stdout.isTTY === true,
  });
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('duplex-batch: unexpected error:', error);
    process.exitCode = EXIT_FAILURE;
  });
