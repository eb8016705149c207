/**
 * Configuration Management MCP Tools
 *
 * Tools: duplex_config_get, duplex_config_set
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/config
 */

import { z } from 'zod';
import { getConfig, requireRunStore, toConfigPatch, toConfigView, updateConfig } from '../server/state.js';
import { successResult } from '../server/types.js';
import { validationError } from '../server/errors.js';
import {
  validateInput,
  ConfigGetInput,
  ConfigSetInput,
  ConfigKey,
  ConfigUpdate,
} from '../utils/validation.js';
import { formatResponse, handleError, type ToolResponse, type ToolDefinition } from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG TOOL HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

const configNextSteps = [
  { tool: 'duplex_config_set', description: 'Change a configuration setting' },
  { tool: 'duplex_process', description: 'Sequence documents with these settings' },
];

export async function handleConfigGet(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ConfigGetInput, params);
    const config = getConfig();
    const view = toConfigView(config);

    if (input.key) {
      return formatResponse(
        successResult({ key: input.key, value: view[input.key], next_steps: configNextSteps })
      );
    }

    return formatResponse(
      successResult({
        ...view,

        // Informational only
        data_path: config.dataPath,

        next_steps: configNextSteps,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handleConfigSet(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ConfigSetInput, params);

    const parsed = ConfigUpdate.safeParse({ [input.key]: input.value });
    if (!parsed.success) {
      throw validationError(
        `Invalid value for ${input.key}: ${parsed.error.errors.map((e) => e.message).join('; ')}`,
        { key: input.key, value: input.value }
      );
    }

    const patch = toConfigPatch(parsed.data);
    updateConfig(patch);
    console.error(`[Config] ${input.key} = ${JSON.stringify(input.value)}`);

    try {
      requireRunStore().persistConfigValue(input.key, input.value);
    } catch (persistErr) {
      throw new Error(
        `Config value set but persistence failed: ${persistErr instanceof Error ? persistErr.message : String(persistErr)}`
      );
    }

    return formatResponse(
      successResult({
        key: input.key,
        value: toConfigView(getConfig())[input.key],
        updated: true,
        persisted: true,
        next_steps: [
          { tool: 'duplex_config_get', description: 'Verify the updated configuration' },
          { tool: 'duplex_process', description: 'Sequence documents with the new settings' },
        ],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS FOR MCP REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Config tools collection for MCP server registration
 */
export const configTools: Record<string, ToolDefinition> = {
  duplex_config_get: {
    description:
      '[STATUS] Use to view the sequencing configuration (trimming, watermarks, rotation, batch size, duplex scope, output). Returns all or one specific key.',
    inputSchema: {
      key: ConfigKey.optional().describe('Specific config key to retrieve'),
    },
    handler: handleConfigGet,
  },
  duplex_config_set: {
    description:
      '[SETUP] Use to change one configuration setting. The value is validated, applied, and persisted for later sessions.',
    inputSchema: {
      key: ConfigKey.describe('Configuration key to update'),
      value: z.union([z.string(), z.number(), z.boolean(), z.null()]).describe('New value'),
    },
    handler: handleConfigSet,
  },
};
