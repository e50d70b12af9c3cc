/**
 * MCP Server State Management
 *
 * Holds the runtime configuration. The metrics engine itself is stateless;
 * only the tool layer reads these limits.
 *
 * @module server/state
 */

import type { ServerState, ServerConfig } from './types.js';

// ═══════════════════════════════════════════════════════════════════════════════
// DEFAULT CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Default server configuration
 */
const defaultConfig: ServerConfig = {
  maxInputChars: 100_000,
  maxComparisonCells: 25_000_000,
  maxBatchSize: 200,
  maxDiffOperations: 1000,
  trimWhitespace: true,
};

// ═══════════════════════════════════════════════════════════════════════════════
// GLOBAL STATE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Global server state
 */
export const state: ServerState = {
  config: { ...defaultConfig },
};

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION ACCESS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Get a copy of the current server configuration
 */
export function getConfig(): ServerConfig {
  return { ...state.config };
}

/**
 * Update server configuration
 */
export function updateConfig(updates: Partial<ServerConfig>): void {
  state.config = { ...state.config, ...updates };
}

/**
 * Get the default configuration (reported by ocr_config_get)
 */
export function getDefaultConfig(): ServerConfig {
  return { ...defaultConfig };
}

/**
 * Reset state to defaults (used by tests)
 */
export function resetState(): void {
  state.config = { ...defaultConfig };
}
