/**
 * Pipeline Error Classes
 *
 * Every error carries its category so the tool layer can map it without
 * string matching. Structural errors abort the run; RenderFailureError is
 * the one category callers absorb and report as a warning.
 */

import type { RunStage } from '../../models/run.js';

export type PipelineErrorCategory =
  | 'INSUFFICIENT_PAGES'
  | 'INVALID_CONFIGURATION'
  | 'EMPTY_INPUT'
  | 'RENDER_FAILURE'
  | 'IO_FAILURE'
  | 'INVALID_STATE';

export interface PipelineErrorDetails {
  stage?: RunStage;
  documentId?: string;
  [key: string]: unknown;
}

export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly category: PipelineErrorCategory,
    public readonly details: PipelineErrorDetails = {}
  ) {
    super(message);
    this.name = 'PipelineError';
  }

  get stage(): RunStage | null {
    return this.details.stage ?? null;
  }

  get documentId(): string | null {
    return this.details.documentId ?? null;
  }
}

export class InsufficientPagesError extends PipelineError {
  constructor(
    public readonly pageCount: number,
    documentId?: string
  ) {
    super(
      `Document has only ${pageCount} page(s). Need at least 3 pages to remove first and last.`,
      'INSUFFICIENT_PAGES',
      { stage: 'preprocess', documentId, pageCount }
    );
    this.name = 'InsufficientPagesError';
  }
}

export class InvalidConfigurationError extends PipelineError {
  constructor(message: string, details: PipelineErrorDetails = {}) {
    super(message, 'INVALID_CONFIGURATION', details);
    this.name = 'InvalidConfigurationError';
  }
}

export class EmptyInputError extends PipelineError {
  constructor(message: string = 'No valid documents survived preprocessing') {
    super(message, 'EMPTY_INPUT', { stage: 'merge' });
    this.name = 'EmptyInputError';
  }
}

export class RenderFailureError extends PipelineError {
  constructor(message: string, details: PipelineErrorDetails = {}) {
    super(message, 'RENDER_FAILURE', details);
    this.name = 'RenderFailureError';
  }
}

export class IOFailureError extends PipelineError {
  constructor(
    message: string,
    public readonly filePath: string,
    details: PipelineErrorDetails = {}
  ) {
    super(message, 'IO_FAILURE', { ...details, filePath });
    this.name = 'IOFailureError';
  }
}

export class InvalidStateError extends PipelineError {
  constructor(message: string, details: PipelineErrorDetails = {}) {
    super(message, 'INVALID_STATE', details);
    this.name = 'InvalidStateError';
  }
}

/**
 * Message of any caught value, for warnings and logs
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
