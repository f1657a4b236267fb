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

import type { z } from 'zod';
import { MCPError, formatErrorResponse } from '../server/errors.js';
import type { ServerConfig } from '../server/types.js';

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
  inputSchema: z.ZodRawShape;
  handler: ToolHandler;
}

/** Builds a tool module bound to one server configuration */
export type ToolModuleFactory = (config: ServerConfig) => Record<string, ToolDefinition>;

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/** Max response size in bytes before truncation (700KB) */
const MAX_RESPONSE_BYTES = 700 * 1024;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Format tool result as MCP content response.
 * If the serialized JSON exceeds MAX_RESPONSE_BYTES, arrays are progressively
 * truncated and a `_response_truncated` warning is injected.
 */
export function formatResponse(result: unknown): ToolResponse {
  const json = JSON.stringify(result, null, 2);
  if (json.length <= MAX_RESPONSE_BYTES || !isRecord(result)) {
    return { content: [{ type: 'text', text: json }] };
  }

  const truncated = truncateResult(result, MAX_RESPONSE_BYTES);
  return { content: [{ type: 'text', text: JSON.stringify(truncated, null, 2) }] };
}

/**
 * Truncate the largest arrays in a result object until it fits within maxBytes
 */
function truncateResult(obj: Record<string, unknown>, maxBytes: number): Record<string, unknown> {
  const arrays: { path: string[]; arr: unknown[]; size: number }[] = [];
  findArrays(obj, [], arrays);
  arrays.sort((a, b) => b.size - a.size);

  const copy: Record<string, unknown> = JSON.parse(JSON.stringify(obj));
  let currentSize = JSON.stringify(copy, null, 2).length;
  const truncatedFields: string[] = [];

  for (const { path, arr } of arrays) {
    if (currentSize <= maxBytes) break;
    if (arr.length <= 5) continue;

    const cap = Math.min(50, Math.max(5, Math.floor(arr.length * 0.1)));
    setNestedValue(copy, path, arr.slice(0, cap));

    const countPath = [...path.slice(0, -1), `_${path[path.length - 1]}_total`];
    setNestedValue(copy, countPath, arr.length);

    truncatedFields.push(`${path.join('.')} (${arr.length} → ${cap})`);
    currentSize = JSON.stringify(copy, null, 2).length;
  }

  if (truncatedFields.length > 0) {
    copy._response_truncated = {
      reason: `Response exceeded ${Math.round(maxBytes / 1024)}KB limit`,
      truncated_fields: truncatedFields,
      suggestion: 'Request a smaller page with limit/offset to reduce response size',
    };
  }

  if (currentSize > maxBytes) {
    return {
      _response_truncated: {
        reason: `Response exceeded ${Math.round(maxBytes / 1024)}KB limit and could not be reduced by array truncation`,
        original_size_bytes: JSON.stringify(obj, null, 2).length,
      },
    };
  }

  return copy;
}

function findArrays(
  obj: unknown,
  path: string[],
  result: { path: string[]; arr: unknown[]; size: number }[]
): void {
  if (Array.isArray(obj)) {
    result.push({ path: [...path], arr: obj, size: JSON.stringify(obj).length });
    return;
  }
  if (isRecord(obj)) {
    for (const [key, value] of Object.entries(obj)) {
      findArrays(value, [...path, key], result);
    }
  }
}

function setNestedValue(obj: Record<string, unknown>, path: string[], value: unknown): void {
  let current = obj;
  for (let i = 0; i < path.length - 1; i++) {
    const next = current[path[i]];
    if (!isRecord(next)) return;
    current = next;
  }
  current[path[path.length - 1]] = value;
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
