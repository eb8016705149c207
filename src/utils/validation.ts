/**
 * Duplex Sequencer MCP - Zod Validation Schemas
 *
 * Input validation for every MCP tool and for runtime config changes.
 * Each schema carries its constraints and descriptive error messages.
 *
 * @module utils/validation
 */

import { z } from 'zod';
import * as path from 'path';

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Custom validation error with descriptive message
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @throws ValidationError with path-prefixed messages joined by '; '
 */
export function validateInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const errors = result.error.errors.map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    });
    throw new ValidationError(errors.join('; '));
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SHARED ENUMS AND BASE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const DuplexScope = z.enum(['global', 'per_batch']);

export const OutputMode = z.enum(['split', 'batched']);

export const RunStatus = z.enum(['completed', 'failed', 'planned']);

export const RotationAngle = z.union([z.literal(90), z.literal(180), z.literal(270)], {
  errorMap: () => ({ message: 'rotation_angle must be 90, 180 or 270' }),
});

export const BatchSize = z
  .number()
  .int('batch_size must be an integer')
  .min(1, 'batch_size must be a positive integer')
  .max(10000);

const FontSize = z.number().positive().max(144);

export const PathString = z
  .string()
  .min(1, 'Path cannot be empty')
  .refine((value) => !value.includes('\0'), 'Path contains null bytes');

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Every runtime-settable config value; all fields optional so the same
 * schema validates one key (duplex_config_set) or a persisted record
 */
export const ConfigUpdate = z
  .object({
    remove_first_last: z.boolean(),
    add_watermarks: z.boolean(),
    number_pages: z.boolean(),
    rotation_angle: RotationAngle,
    batch_size: BatchSize,
    font_size: FontSize,
    title_font_size: FontSize,
    duplex_scope: DuplexScope,
    output_mode: OutputMode,
    overwrite: z.boolean(),
    max_concurrent: z.number().int().min(1).max(16),
    output_dir: PathString,
    title_image_path: PathString.nullable(),
    reverse_timeout_ms: z.number().int().min(100).max(60000),
    printer_name: z.string().min(1).nullable(),
  })
  .partial()
  .strict();

export type ConfigUpdateInput = z.infer<typeof ConfigUpdate>;

/**
 * Configuration keys that can be set
 */
export const ConfigKey = ConfigUpdate.keyof();

export const ConfigGetInput = z.object({
  key: ConfigKey.optional(),
});

export const ConfigSetInput = z.object({
  key: ConfigKey,
  value: z.union([z.string(), z.number(), z.boolean(), z.null()]),
});

// ═══════════════════════════════════════════════════════════════════════════════
// PROCESSING SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Schema for duplex_process. Settings left out fall back to the server config.
 */
export const ProcessInputShape = {
  input_paths: z.array(PathString).min(1, 'At least one input path is required').optional(),
  input_dir: PathString.optional(),
  output_dir: PathString.optional(),
  remove_first_last: z.boolean().optional(),
  add_watermarks: z.boolean().optional(),
  number_pages: z.boolean().optional(),
  rotation_angle: RotationAngle.optional(),
  batch_size: BatchSize.optional(),
  font_size: FontSize.optional(),
  title_font_size: FontSize.optional(),
  duplex_scope: DuplexScope.optional(),
  output_mode: OutputMode.optional(),
  overwrite: z.boolean().optional(),
  title_image_path: PathString.nullable().optional(),
  dry_run: z.boolean().default(false),
};

export const ProcessInput = z
  .object(ProcessInputShape)
  .refine((input) => (input.input_paths === undefined) !== (input.input_dir === undefined), {
    message: 'Provide exactly one of input_paths or input_dir',
    path: ['input_paths'],
  });

export type ProcessInputData = z.infer<typeof ProcessInput>;

// ═══════════════════════════════════════════════════════════════════════════════
// RUN HISTORY SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const RunListInput = z.object({
  status: RunStatus.optional(),
  limit: z.number().int().min(1).max(500).default(50),
  offset: z.number().int().min(0).default(0),
});

export const RunGetInput = z.object({
  run_id: z.string().min(1, 'Run ID is required'),
  include_page_labels: z.boolean().default(true),
});

export const RunDeleteInput = z.object({
  run_id: z.string().min(1, 'Run ID is required'),
  confirm: z.literal(true, {
    errorMap: () => ({ message: 'Confirm must be true to delete a run' }),
  }),
});

// ═══════════════════════════════════════════════════════════════════════════════
// PRINTER SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const PrintSubmitInputShape = {
  file_path: PathString.optional(),
  run_id: z.string().min(1).optional(),
  artifact: z.string().min(1).optional(),
  printer: z.string().min(1).optional(),
};

export const PrintSubmitInput = z
  .object(PrintSubmitInputShape)
  .refine((input) => input.file_path !== undefined || (input.run_id !== undefined && input.artifact !== undefined), {
    message: 'Provide file_path, or run_id together with artifact',
    path: ['file_path'],
  });

export const PrinterReverseInput = z.object({
  count: z.number().int().min(1).max(500).default(1),
  printer: z.string().min(1).optional(),
});

export const ManualInstructionsInput = z.object({});

// ═══════════════════════════════════════════════════════════════════════════════
// PATH SANITIZATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Directories listed in DUPLEX_ALLOWED_DIRS (comma-separated); empty means unrestricted
 */
function getAllowedBaseDirs(): string[] {
  const extraDirs = process.env.DUPLEX_ALLOWED_DIRS;
  if (!extraDirs) {
    return [];
  }
  return extraDirs
    .split(',')
    .map((d) => d.trim())
    .filter((d) => d.length > 0)
    .map((d) => path.resolve(d));
}

/**
 * Resolve a path and keep it inside the allowed directories.
 *
 * @param allowedBaseDirs - overrides DUPLEX_ALLOWED_DIRS when given
 * @throws ValidationError if the path contains null bytes or escapes allowed directories
 */
export function sanitizePath(filePath: string, allowedBaseDirs?: string[]): string {
  if (filePath.includes('\0')) {
    throw new ValidationError('Path contains null bytes');
  }

  const resolved = path.resolve(filePath);
  const baseDirs = (allowedBaseDirs ?? getAllowedBaseDirs()).map((d) => path.resolve(d));
  if (baseDirs.length === 0) {
    return resolved;
  }

  const withinAllowed = baseDirs.some(
    (base) => resolved === base || resolved.startsWith(base + path.sep)
  );
  if (!withinAllowed) {
    throw new ValidationError(
      `Path "${resolved}" is outside allowed directories: ${baseDirs.join(', ')}. ` +
        'Add it to DUPLEX_ALLOWED_DIRS (comma-separated list of directories).'
    );
  }
  return resolved;
}
