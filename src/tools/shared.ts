/**
 * Shared Tool Utilities
 *
 * Common types, formatters, input guards and error handlers used across all
 * tool modules.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/shared
 */

import { z } from 'zod';
import {
  MCPError,
  comparisonTooLargeError,
  formatErrorResponse,
  inputTooLargeError,
} from '../server/errors.js';
import { getConfig } from '../server/state.js';

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
// RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

/** Max response size in bytes before arrays are capped (700KB) */
const MAX_RESPONSE_BYTES = 700 * 1024;

/** Items kept from an oversized array */
const TRUNCATED_ARRAY_LENGTH = 50;

/**
 * Format tool result as MCP content response.
 *
 * Large batch runs and long diffs can exceed what a client will accept in
 * one message. When the JSON is over MAX_RESPONSE_BYTES, every array longer
 * than TRUNCATED_ARRAY_LENGTH is cut down and a `_response_truncated` note
 * lists what was cut. Aggregates (batch summary, diff counts) are never
 * touched, so they still describe the full input.
 */
export function formatResponse(result: unknown): ToolResponse {
  const json = JSON.stringify(result, null, 2);
  if (json.length <= MAX_RESPONSE_BYTES) {
    return { content: [{ type: 'text', text: json }] };
  }

  const truncatedFields: string[] = [];
  const capped = capArrays(result, [], truncatedFields);
  const withNote =
    capped !== null && typeof capped === 'object' && !Array.isArray(capped)
      ? {
          ...capped,
          _response_truncated: {
            reason: `Response exceeded ${Math.round(MAX_RESPONSE_BYTES / 1024)}KB limit`,
            truncated_fields: truncatedFields,
            suggestion: 'Split the batch or lower max_operations to get complete results',
          },
        }
      : capped;

  return { content: [{ type: 'text', text: JSON.stringify(withNote, null, 2) }] };
}

function capArrays(value: unknown, path: string[], truncatedFields: string[]): unknown {
  if (Array.isArray(value)) {
    const kept = value.slice(0, TRUNCATED_ARRAY_LENGTH);
    if (value.length > TRUNCATED_ARRAY_LENGTH) {
      truncatedFields.push(`${path.join('.') || '<root>'} (${value.length} → ${kept.length})`);
    }
    return kept.map((item, i) => capArrays(item, [...path, String(i)], truncatedFields));
  }
  if (value !== null && typeof value === 'object') {
    const copy: Record<string, unknown> = {};
    for (const [key, child] of Object.entries(value)) {
      copy[key] = capArrays(child, [...path, key], truncatedFields);
    }
    return copy;
  }
  return value;
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

// ═══════════════════════════════════════════════════════════════════════════════
// INPUT GUARDS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Resolve the whitespace trimming flag: explicit parameter, else config
 */
export function resolveTrim(trimWhitespace: boolean | undefined): boolean {
  return trimWhitespace ?? getConfig().trimWhitespace;
}

/**
 * Prepare a text for measuring: optionally trim, then enforce max_input_chars.
 *
 * This bounds each string on its own; enforceComparisonBudget() bounds the
 * work done on a pair.
 *
 * @param field - Parameter name, for the error message
 * @throws MCPError with INPUT_TOO_LARGE when over the limit
 */
export function prepareText(field: string, text: string, trim: boolean): string {
  const prepared = trim ? text.trim() : text;
  const { maxInputChars } = getConfig();
  // Cheap UTF-16 pre-check; a code-point count is never larger
  if (prepared.length > maxInputChars) {
    const codePoints = Array.from(prepared).length;
    if (codePoints > maxInputChars) {
      throw inputTooLargeError(field, codePoints, maxInputChars);
    }
  }
  return prepared;
}

/**
 * Enforce max_comparison_cells over every pair a tool call will measure.
 *
 * The edit-distance table of a pair has len(ground truth) x len(predicted)
 * cells, so per-string limits alone leave the work quadratic. Cells are
 * summed across pairs, so a batch or engine comparison shares one budget.
 *
 * @param field - Parameter name, for the error message
 * @throws MCPError with INPUT_TOO_LARGE when the total is over the limit
 */
export function enforceComparisonBudget(
  field: string,
  pairs: ReadonlyArray<readonly [groundTruth: string, predicted: string]>
): void {
  const { maxComparisonCells } = getConfig();
  let cells = 0;
  for (const [groundTruth, predicted] of pairs) {
    cells += Array.from(groundTruth).length * Array.from(predicted).length;
  }
  if (cells > maxComparisonCells) {
    throw comparisonTooLargeError(field, cells, maxComparisonCells);
  }
}
