/**
 * MCP Server Error Handling
 *
 * FAIL FAST: All errors throw immediately with descriptive context.
 * Recoverable render problems never reach this layer; the pipeline absorbs
 * them as run warnings.
 *
 * @module server/errors
 */

import { PipelineError } from '../services/sequencing/errors.js';
import { RunStoreError, RunStoreErrorCode } from '../services/storage/types.js';

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Error categories for MCP tool errors
 * Each category maps to specific failure modes for debugging
 */
export type ErrorCategory =
  // Validation errors
  | 'VALIDATION_ERROR'

  // Pipeline errors
  | 'INSUFFICIENT_PAGES'
  | 'INVALID_CONFIGURATION'
  | 'EMPTY_INPUT'
  | 'RENDER_FAILURE'
  | 'IO_FAILURE'
  | 'INVALID_STATE'

  // Run history errors
  | 'RUN_NOT_FOUND'
  | 'RUN_STORE_ERROR'

  // Printer errors
  | 'PRINTER_ERROR'

  // File system errors
  | 'PATH_NOT_FOUND'

  // Configuration errors
  | 'CONFIGURATION_ERROR'

  // Internal errors
  | 'INTERNAL_ERROR';

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR NAME TO CATEGORY MAPPING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Map error class names without a category of their own to MCPError categories.
 * PipelineError and RunStoreError are resolved in fromUnknown() from the
 * category / code they carry.
 */
const ERROR_NAME_TO_CATEGORY: Record<string, ErrorCategory> = {
  ValidationError: 'VALIDATION_ERROR',
  ZodError: 'VALIDATION_ERROR',
  PrinterError: 'PRINTER_ERROR',
  SqliteError: 'RUN_STORE_ERROR',
};

function categoryOf(error: Error, defaultCategory: ErrorCategory): ErrorCategory {
  if (error instanceof PipelineError) {
    return error.category;
  }
  if (error instanceof RunStoreError) {
    return error.code === RunStoreErrorCode.RUN_NOT_FOUND ? 'RUN_NOT_FOUND' : 'RUN_STORE_ERROR';
  }
  return ERROR_NAME_TO_CATEGORY[error.name] ?? defaultCategory;
}

function detailsOf(error: Error): Record<string, unknown> | undefined {
  if (error instanceof PipelineError) {
    return error.details;
  }
  if (error instanceof RunStoreError) {
    return { code: error.code };
  }
  if ('details' in error && error.details && typeof error.details === 'object') {
    return { ...error.details };
  }
  return undefined;
}

// ═══════════════════════════════════════════════════════════════════════════════
// MCP ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * MCPError - Structured error class for all MCP tool failures
 *
 * FAIL FAST: Thrown immediately when any error condition is detected.
 * Provides category, message, and optional details for debugging.
 */
export class MCPError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'MCPError';
    this.category = category;
    this.details = details;

    // Preserve stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MCPError);
    }
  }

  /**
   * Create error from unknown caught value
   * FAIL FAST: Always produces a typed error
   *
   * @param context - extra details merged in, e.g. the run_id of a failed run
   */
  static fromUnknown(
    error: unknown,
    defaultCategory: ErrorCategory = 'INTERNAL_ERROR',
    context?: Record<string, unknown>
  ): MCPError {
    if (error instanceof MCPError) {
      return context ? new MCPError(error.category, error.message, { ...error.details, ...context }) : error;
    }

    if (error instanceof Error) {
      const errorDetails = detailsOf(error);
      return new MCPError(categoryOf(error, defaultCategory), error.message, {
        originalName: error.name,
        ...(errorDetails && { errorDetails }),
        ...context,
        stack: error.stack,
      });
    }

    return new MCPError(defaultCategory, String(error), {
      originalValue: error,
      ...context,
    });
  }

  /**
   * Convert to JSON for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
      stack: this.stack,
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// RECOVERY HINTS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Recovery hint for AI agents to self-correct after errors.
 * Every ErrorCategory maps to a suggested tool and human-readable hint.
 */
export interface RecoveryHint {
  tool: string;
  hint: string;
}

const RECOVERY_HINTS: Record<ErrorCategory, RecoveryHint> = {
  VALIDATION_ERROR: {
    tool: 'duplex_process',
    hint: 'Check parameter types and required fields; inputs must be .pdf files',
  },
  INSUFFICIENT_PAGES: {
    tool: 'duplex_process',
    hint: 'Documents need at least 3 pages when remove_first_last is on; pass remove_first_last=false to keep them',
  },
  INVALID_CONFIGURATION: {
    tool: 'duplex_config_get',
    hint: 'rotation_angle must be 90/180/270 and batch_size a positive integer (even for per_batch scope)',
  },
  EMPTY_INPUT: {
    tool: 'duplex_run_get',
    hint: 'No document survived preprocessing; inspect the run warnings for skipped documents',
  },
  RENDER_FAILURE: {
    tool: 'duplex_config_set',
    hint: 'Check title_image_path points to a readable PNG or JPEG, or clear it',
  },
  IO_FAILURE: {
    tool: 'duplex_process',
    hint: 'Check the output directory is writable; set overwrite=true to replace existing outputs',
  },
  INVALID_STATE: { tool: 'duplex_run_get', hint: 'Internal sequencing invariant broken; report the run_id' },
  RUN_NOT_FOUND: { tool: 'duplex_run_list', hint: 'Use duplex_run_list to find run ids' },
  RUN_STORE_ERROR: {
    tool: 'duplex_run_list',
    hint: 'Check DUPLEX_SEQUENCER_DATA_PATH is writable and runs.db is not locked',
  },
  PRINTER_ERROR: {
    tool: 'duplex_manual_instructions',
    hint: 'Check the printer name and that CUPS (lp/lpr) is installed; print the files manually otherwise',
  },
  PATH_NOT_FOUND: { tool: 'duplex_run_get', hint: 'Verify the file path exists on the filesystem' },
  CONFIGURATION_ERROR: {
    tool: 'duplex_config_get',
    hint: 'Check DUPLEX_* environment variables and the .env file',
  },
  INTERNAL_ERROR: { tool: 'duplex_run_list', hint: 'Retry; if it persists inspect the server stderr log' },
};

/**
 * Get recovery hint for an error category.
 * Exported for testing and direct use.
 */
export function getRecoveryHint(category: ErrorCategory): RecoveryHint {
  return RECOVERY_HINTS[category];
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Format MCPError for tool response
 * ALWAYS includes category, message, recovery hint, and optional details.
 */
export function formatErrorResponse(error: MCPError): {
  success: false;
  error: {
    category: ErrorCategory;
    message: string;
    recovery: RecoveryHint;
    details?: Record<string, unknown>;
  };
} {
  return {
    success: false,
    error: {
      category: error.category,
      message: error.message,
      recovery: RECOVERY_HINTS[error.category],
      details: error.details,
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR FACTORY FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export function validationError(message: string, details?: Record<string, unknown>): MCPError {
  return new MCPError('VALIDATION_ERROR', message, details);
}

export function runNotFoundError(runId: string): MCPError {
  return new MCPError(
    'RUN_NOT_FOUND',
    `Run not found: ${runId}. Use duplex_run_list to browse recorded runs.`,
    { runId }
  );
}

/**
 * Create configuration error for bad environment variables or setup issues
 */
export function configurationError(message: string, details?: Record<string, unknown>): MCPError {
  return new MCPError('CONFIGURATION_ERROR', message, details);
}

export function pathNotFoundError(path: string): MCPError {
  return new MCPError('PATH_NOT_FOUND', `Path does not exist: ${path}`, { path });
}
