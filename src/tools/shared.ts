/**
 * Shared Tool Utilities
 *
 * Common types, formatters, and error handlers used across all tool modules.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/shared
 */

import { z } from 'zod';
import { MCPError, formatErrorResponse } from '../server/errors.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

/** MCP tool response format */
export type ToolResponse = { content: Array<{ type: 'text'; text: string }>; isError?: boolean };

/** Tool handler function signature */
type ToolHandler = (params: Record<string, unknown>) => Promise<ToolResponse>;

/** Tool definition with description, schema, and handler */
export interface ToolDefinition {
  description: string;
  inputSchema: Record<string, z.ZodTypeAny>;
  handler: ToolHandler;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/** Max response size in bytes before page label arrays get truncated (700KB) */
export const MAX_RESPONSE_BYTES = 700 * 1024;

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Format tool result as MCP content response.
 * If the serialized JSON exceeds maxBytes, the largest arrays are capped
 * and a `_response_truncated` note is added so the caller can paginate.
 */
export function formatResponse(result: unknown, maxBytes: number = MAX_RESPONSE_BYTES): ToolResponse {
  const json = JSON.stringify(result, null, 2);
  if (json.length <= maxBytes || !isRecord(result)) {
    return { content: [{ type: 'text', text: json }] };
  }
  return { content: [{ type: 'text', text: JSON.stringify(truncateResult(result, maxBytes), null, 2) }] };
}

interface FoundArray {
  holder: JsonRecord;
  key: string;
  path: string;
  length: number;
  size: number;
}

function findArrays(obj: JsonRecord, prefix: string, found: FoundArray[]): void {
  for (const [key, value] of Object.entries(obj)) {
    const here = prefix ? `${prefix}.${key}` : key;
    if (Array.isArray(value)) {
      found.push({ holder: obj, key, path: here, length: value.length, size: JSON.stringify(value).length });
      value.forEach((item, index) => {
        if (isRecord(item)) findArrays(item, `${here}.${index}`, found);
      });
    } else if (isRecord(value)) {
      findArrays(value, here, found);
    }
  }
}

/**
 * Cap the largest arrays of a deep copy until it fits within maxBytes
 */
function truncateResult(obj: JsonRecord, maxBytes: number): JsonRecord {
  const copy: unknown = JSON.parse(JSON.stringify(obj));
  if (!isRecord(copy)) {
    return obj;
  }

  const arrays: FoundArray[] = [];
  findArrays(copy, '', arrays);
  arrays.sort((a, b) => b.size - a.size);

  let currentSize = JSON.stringify(copy, null, 2).length;
  const truncatedFields: string[] = [];

  for (const entry of arrays) {
    if (currentSize <= maxBytes) break;
    const value = entry.holder[entry.key];
    if (!Array.isArray(value) || value.length <= 5) continue;

    const cap = Math.min(50, Math.max(5, Math.floor(value.length * 0.1)));
    entry.holder[entry.key] = value.slice(0, cap);
    entry.holder[`_${entry.key}_total`] = value.length;
    truncatedFields.push(`${entry.path} (${value.length} → ${cap})`);
    currentSize = JSON.stringify(copy, null, 2).length;
  }

  if (currentSize > maxBytes) {
    return {
      _response_truncated: {
        reason: `Response exceeded ${Math.round(maxBytes / 1024)}KB limit and could not be reduced by array truncation`,
        original_size_bytes: JSON.stringify(obj, null, 2).length,
        suggestion: 'Use include_page_labels=false or limit/offset to reduce response size',
      },
    };
  }

  if (truncatedFields.length > 0) {
    copy._response_truncated = {
      reason: `Response exceeded ${Math.round(maxBytes / 1024)}KB limit`,
      truncated_fields: truncatedFields,
      suggestion: 'Use include_page_labels=false or limit/offset to reduce response size',
    };
  }
  return copy;
}

/**
 * Handle errors uniformly - FAIL FAST
 */
export function handleError(error: unknown): ToolResponse {
  const mcpError = MCPError.fromUnknown(error);
  console.error(`[ERROR] ${mcpError.category}: ${mcpError.message}`);
  return {
    content: [{ type: 'text', text: JSON.stringify(formatErrorResponse(mcpError), null, 2) }],
    isError: true,
  };
}
