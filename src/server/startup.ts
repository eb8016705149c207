/**
 * Shared Startup Validation
 *
 * Applies environment-driven config overrides before the server or the
 * batch CLI starts a run.
 *
 * CRITICAL: NEVER use console.log() - stdout may be reserved for JSON-RPC protocol.
 *
 * @module server/startup
 */

import * as path from 'path';
import { ConfigUpdate, type ConfigUpdateInput } from '../utils/validation.js';
import { configurationError } from './errors.js';
import { toConfigPatch, updateConfig } from './state.js';

type Env = Record<string, string | undefined>;

/**
 * Environment variable → config key. Numeric keys are parsed before validation.
 */
const ENV_CONFIG_KEYS = {
  DUPLEX_OUTPUT_DIR: 'output_dir',
  DUPLEX_BATCH_SIZE: 'batch_size',
  DUPLEX_SCOPE: 'duplex_scope',
  DUPLEX_ROTATION_ANGLE: 'rotation_angle',
  DUPLEX_TITLE_IMAGE: 'title_image_path',
} as const;

const NUMERIC_KEYS: ReadonlySet<string> = new Set(['batch_size', 'rotation_angle']);

/**
 * Collect DUPLEX_* overrides as a validated config update
 *
 * @throws MCPError (CONFIGURATION_ERROR) naming the offending variable
 */
export function readEnvironmentConfig(env: Env = process.env): ConfigUpdateInput {
  const raw: Record<string, string | number> = {};
  for (const [variable, key] of Object.entries(ENV_CONFIG_KEYS)) {
    const value = env[variable]?.trim();
    if (!value) {
      continue;
    }
    raw[key] = NUMERIC_KEYS.has(key) ? Number(value) : value;
  }

  const parsed = ConfigUpdate.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.errors[0];
    const key = issue?.path[0];
    const variable = Object.entries(ENV_CONFIG_KEYS).find(([, k]) => k === key)?.[0];
    throw configurationError(
      `Invalid ${variable ?? 'DUPLEX_*'} environment variable: ${issue?.message ?? 'invalid value'}`,
      { variable, value: variable ? env[variable] : undefined }
    );
  }
  return parsed.data;
}

/**
 * Apply environment-driven config overrides.
 *
 * @throws MCPError (CONFIGURATION_ERROR) for values that do not validate
 */
export function validateStartupDependencies(env: Env = process.env): void {
  const update = readEnvironmentConfig(env);
  const patch = toConfigPatch(update);

  const dataPath = env.DUPLEX_SEQUENCER_DATA_PATH?.trim();
  if (dataPath) {
    patch.dataPath = path.resolve(dataPath);
  }

  const keys = Object.keys(patch);
  if (keys.length > 0) {
    updateConfig(patch);
    console.error(`[Config] Environment overrides: ${keys.join(', ')}`);
  }
}
