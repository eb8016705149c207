/**
 * Printer driver interfaces
 *
 * The OS print queue sits behind PrinterDriver so the tools and the CLI
 * never spawn print commands directly.
 */

export interface SubmitResult {
  /** Queue job id parsed from the command output, when it reported one */
  job_id: string | null;
  printer: string | null;
  file_path: string;
  command: string[];
}

export interface PrinterDriver {
  /**
   * Queue a file for printing. Resolves once the queue accepted it, never
   * waits for the physical print.
   *
   * @throws PrinterError when no print command exists or the queue rejects the job
   */
  submit(filePath: string, printer?: string | null): Promise<SubmitResult>;

  /**
   * Single best-effort attempt to have the printer hand back `count`
   * sheets. Never retried; false means the caller should show manual
   * re-feed instructions.
   */
  attemptReverse(count: number, printer?: string | null): Promise<boolean>;
}

export interface CommandResult {
  code: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
}

export interface CommandOptions {
  timeoutMs: number;
}

/**
 * Runs an executable without a shell. Rejects only when the process could
 * not be started; a non-zero exit resolves with its code.
 */
export type CommandRunner = (
  command: string,
  args: readonly string[],
  options: CommandOptions
) => Promise<CommandResult>;

export class PrinterError extends Error {
  constructor(
    message: string,
    public readonly details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'PrinterError';
  }
}
