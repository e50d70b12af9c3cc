/**
 * MCP Server Type Definitions
 *
 * Defines interfaces for tool results, server configuration, and state.
 *
 * @module server/types
 */

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL RESULT TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Successful tool result
 */
interface ToolResultSuccess<T = unknown> {
  success: true;
  data: T;
}

/**
 * Helper to create success result
 */
export function successResult<T>(data: T): ToolResultSuccess<T> {
  return { success: true, data };
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Server configuration options
 */
export interface ServerConfig {
  /** Maximum length of any single text, in code points (default: 100000) */
  maxInputChars: number;

  /**
   * Maximum edit-distance table cells (ground truth length x predicted length,
   * summed over every pair) one tool call may compute (default: 25000000)
   */
  maxComparisonCells: number;

  /** Maximum number of pairs in one ocr_accuracy_batch call (default: 200) */
  maxBatchSize: number;

  /** Maximum diff operations returned by ocr_accuracy_diff (default: 1000) */
  maxDiffOperations: number;

  /** Strip leading/trailing whitespace from texts when the caller does not say (default: true) */
  trimWhitespace: boolean;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER STATE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Server state tracking
 */
export interface ServerState {
  /** Server configuration */
  config: ServerConfig;
}
