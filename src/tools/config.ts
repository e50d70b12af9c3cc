/**
 * Configuration Management MCP Tools
 *
 * Tools: ocr_config_get, ocr_config_set
 *
 * Changes are held in memory for the life of the server process.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/config
 */

import { z } from 'zod';
import { getConfig, getDefaultConfig, updateConfig } from '../server/state.js';
import { successResult, type ServerConfig } from '../server/types.js';
import { validateInput, ConfigGetInput, ConfigSetInput, ConfigKey } from '../utils/validation.js';
import { validationError } from '../server/errors.js';
import { METRIC_PRECISION } from '../services/metrics/index.js';
import { formatResponse, handleError, type ToolResponse, type ToolDefinition } from './shared.js';

type ConfigKeyName = z.infer<typeof ConfigKey>;

// ═══════════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════════

/** Map config keys to their state property names */
const CONFIG_KEY_MAP: Record<ConfigKeyName, keyof ServerConfig> = {
  max_input_chars: 'maxInputChars',
  max_comparison_cells: 'maxComparisonCells',
  max_batch_size: 'maxBatchSize',
  max_diff_operations: 'maxDiffOperations',
  trim_whitespace: 'trimWhitespace',
};

function integerInRange(key: ConfigKeyName, value: unknown, min: number, max: number): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min || value > max) {
    throw validationError(`${key} must be an integer between ${min} and ${max}`, { value });
  }
  return value;
}

/** Validate a value and turn it into a config update, per key */
const CONFIG_SETTERS: Record<ConfigKeyName, (value: unknown) => Partial<ServerConfig>> = {
  max_input_chars: (v) => ({ maxInputChars: integerInRange('max_input_chars', v, 1, 1_000_000) }),
  max_comparison_cells: (v) => ({
    maxComparisonCells: integerInRange('max_comparison_cells', v, 1, 10_000_000_000),
  }),
  max_batch_size: (v) => ({ maxBatchSize: integerInRange('max_batch_size', v, 1, 1000) }),
  max_diff_operations: (v) => ({
    maxDiffOperations: integerInRange('max_diff_operations', v, 1, 10_000),
  }),
  trim_whitespace: (v) => {
    if (typeof v !== 'boolean') {
      throw validationError('trim_whitespace must be a boolean', { value: v });
    }
    return { trimWhitespace: v };
  },
};

function getConfigValue(key: ConfigKeyName): ServerConfig[keyof ServerConfig] {
  return getConfig()[CONFIG_KEY_MAP[key]];
}

/** Config in the snake_case keys the tools accept */
function toConfigKeys(config: ServerConfig): Record<ConfigKeyName, ServerConfig[keyof ServerConfig]> {
  return {
    max_input_chars: config.maxInputChars,
    max_comparison_cells: config.maxComparisonCells,
    max_batch_size: config.maxBatchSize,
    max_diff_operations: config.maxDiffOperations,
    trim_whitespace: config.trimWhitespace,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG TOOL HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

export async function handleConfigGet(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ConfigGetInput, params);
    if (input.key) {
      return formatResponse(successResult({ key: input.key, value: getConfigValue(input.key) }));
    }

    return formatResponse(
      successResult({
        ...toConfigKeys(getConfig()),
        defaults: toConfigKeys(getDefaultConfig()),

        // Immutable values (informational only)
        metric_precision: METRIC_PRECISION,
        character_comparison: 'case-sensitive, Unicode code points',
        word_comparison: 'case-insensitive, whitespace tokens',

        next_steps: [{ tool: 'ocr_config_set', description: 'Change a configuration setting' }],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handleConfigSet(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ConfigSetInput, params);

    updateConfig(CONFIG_SETTERS[input.key](input.value));
    console.error(`[Config] ${input.key}=${String(input.value)}`);

    return formatResponse(
      successResult({
        key: input.key,
        value: getConfigValue(input.key),
        updated: true,
        next_steps: [{ tool: 'ocr_config_get', description: 'Verify the updated configuration' }],
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
  ocr_config_get: {
    description:
      '[STATUS] Use to view current limits and defaults (max input size, comparison budget, batch size, diff size, whitespace trimming). Returns all or one specific key.',
    inputSchema: {
      key: ConfigKey.optional().describe('Specific config key to retrieve'),
    },
    handler: handleConfigGet,
  },
  ocr_config_set: {
    description:
      '[SETUP] Use to change a limit or default (max_input_chars, max_comparison_cells, max_batch_size, max_diff_operations, trim_whitespace). Returns updated value.',
    inputSchema: {
      key: ConfigKey.describe('Configuration key to update'),
      value: z.union([z.string(), z.number(), z.boolean()]).describe('New value'),
    },
    handler: handleConfigSet,
  },
};
