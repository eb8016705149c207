/**
 * Printer Service Module
 */

export { LpPrinterDriver, parseJobId, DEFAULT_REVERSE_TIMEOUT_MS, REVERSE_FEED_POSTSCRIPT } from './lp-driver.js';
export { spawnCommand } from './command-runner.js';
export { manualReverseInstructions, formatManualInstructions, type ManualInstructions } from './instructions.js';
export {
  PrinterError,
  type CommandOptions,
  type CommandResult,
  type CommandRunner,
  type PrinterDriver,
  type SubmitResult,
} from './types.js';
