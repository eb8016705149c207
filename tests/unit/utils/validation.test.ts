/**
 * Unit tests for the Zod validation schemas and path sanitization
 *
 * @module tests/unit/utils/validation
 */

import { describe, it, expect, afterEach } from 'vitest';
import { resolve, sep } from 'path';
import {
  ConfigUpdate,
  PrintSubmitInput,
  ProcessInput,
  RunDeleteInput,
  RunListInput,
  ValidationError,
  sanitizePath,
  validateInput,
} from '../../../src/utils/validation.js';

describe('validateInput', () => {
  it('should return parsed data with defaults applied', () => {
    expect(validateInput(RunListInput, {})).toEqual({ limit: 50, offset: 0 });
  });

  it('should throw ValidationError with path-prefixed messages', () => {
    expect(() => validateInput(RunListInput, { limit: 0 })).toThrow(ValidationError);
    expect(() => validateInput(RunListInput, { limit: 0 })).toThrow(/^limit: /);
  });
});

describe('ProcessInput', () => {
  it('should accept exactly one input source', () => {
    expect(ProcessInput.safeParse({ input_dir: '/in' }).success).toBe(true);
    expect(ProcessInput.safeParse({ input_paths: ['/a.pdf'] }).success).toBe(true);
    expect(ProcessInput.safeParse({}).success).toBe(false);
    expect(ProcessInput.safeParse({ input_dir: '/in', input_paths: ['/a.pdf'] }).success).toBe(false);
  });

  it('should reject an empty input_paths list', () => {
    expect(ProcessInput.safeParse({ input_paths: [] }).success).toBe(false);
  });

  it('should default dry_run to false', () => {
    const parsed = ProcessInput.parse({ input_dir: '/in' });
    expect(parsed.dry_run).toBe(false);
  });

  it('should only take back rotations of 90, 180 or 270', () => {
    expect(ProcessInput.safeParse({ input_dir: '/in', rotation_angle: 270 }).success).toBe(true);
    expect(ProcessInput.safeParse({ input_dir: '/in', rotation_angle: 0 }).success).toBe(false);
  });
});

describe('ConfigUpdate', () => {
  it('should reject unknown keys', () => {
    expect(ConfigUpdate.safeParse({ color_profile: 'cmyk' }).success).toBe(false);
  });

  it('should reject a fractional batch size', () => {
    const result = ConfigUpdate.safeParse({ batch_size: 2.5 });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.errors[0]?.message).toBe('batch_size must be an integer');
    }
  });

  it('should accept null for nullable keys', () => {
    expect(ConfigUpdate.parse({ title_image_path: null, printer_name: null })).toEqual({
      title_image_path: null,
      printer_name: null,
    });
  });
});

describe('PrintSubmitInput', () => {
  it('should need file_path or run_id with artifact', () => {
    expect(PrintSubmitInput.safeParse({ file_path: '/out/a.pdf' }).success).toBe(true);
    expect(PrintSubmitInput.safeParse({ run_id: 'r', artifact: 'fronts' }).success).toBe(true);
    expect(PrintSubmitInput.safeParse({ artifact: 'fronts' }).success).toBe(false);
  });
});

describe('RunDeleteInput', () => {
  it('should demand confirm=true', () => {
    expect(RunDeleteInput.safeParse({ run_id: 'r', confirm: false }).success).toBe(false);
  });
});

describe('sanitizePath', () => {
  const saved = process.env.DUPLEX_ALLOWED_DIRS;

  afterEach(() => {
    if (saved === undefined) {
      delete process.env.DUPLEX_ALLOWED_DIRS;
    } else {
      process.env.DUPLEX_ALLOWED_DIRS = saved;
    }
  });

  it('should resolve relative paths when unrestricted', () => {
    delete process.env.DUPLEX_ALLOWED_DIRS;
    expect(sanitizePath('docs/a.pdf')).toBe(resolve('docs/a.pdf'));
  });

  it('should reject null bytes', () => {
    expect(() => sanitizePath('a\0b.pdf')).toThrow('Path contains null bytes');
  });

  it('should keep paths inside the allowed directories', () => {
    const base = resolve('/srv/prints');
    expect(sanitizePath(`${base}${sep}run${sep}a.pdf`, [base])).toBe(`${base}${sep}run${sep}a.pdf`);
    expect(sanitizePath(base, [base])).toBe(base);
  });

  it('should reject traversal and sibling prefixes', () => {
    const base = resolve('/srv/prints');
    expect(() => sanitizePath(`${base}${sep}..${sep}etc${sep}passwd`, [base])).toThrow(/outside allowed directories/);
    expect(() => sanitizePath(`${base}-other${sep}a.pdf`, [base])).toThrow(ValidationError);
  });

  it('should read DUPLEX_ALLOWED_DIRS', () => {
    process.env.DUPLEX_ALLOWED_DIRS = ' /srv/a , /srv/b ';
    expect(sanitizePath('/srv/b/x.pdf')).toBe(resolve('/srv/b/x.pdf'));
    expect(() => sanitizePath('/tmp/x.pdf')).toThrow(ValidationError);
  });
});
