/**
 * Startup Configuration
 *
 * Applies environment-driven config overrides before the server connects.
 * FAIL FAST: a malformed value stops startup instead of silently falling
 * back to the default.
 *
 * CRITICAL: NEVER use console.log() - stdout may be reserved for JSON-RPC protocol.
 *
 * @module server/startup
 */

import { updateConfig } from './state.js';
import { configurationError } from './errors.js';
import type { ServerConfig } from './types.js';

type Env = Record<string, string | undefined>;

function readIntegerEnv(env: Env, name: string, min: number, max: number): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw configurationError(`${name} must be an integer between ${min} and ${max}`, {
      variable: name,
      value: raw,
    });
  }
  return value;
}

function readBooleanEnv(env: Env, name: string): boolean | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;

  const normalized = raw.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  throw configurationError(`${name} must be "true" or "false"`, { variable: name, value: raw });
}

/**
 * Validate startup configuration and apply environment overrides.
 *
 * @param env - Environment to read (defaults to process.env)
 * @returns The overrides that were applied
 * @throws MCPError with CONFIGURATION_ERROR on a malformed value
 */
export function validateStartupDependencies(env: Env = process.env): Partial<ServerConfig> {
  const overrides: Partial<ServerConfig> = {};

  const maxInputChars = readIntegerEnv(env, 'OCR_ACCURACY_MAX_INPUT_CHARS', 1, 1_000_000);
  if (maxInputChars !== undefined) overrides.maxInputChars = maxInputChars;

  const maxComparisonCells = readIntegerEnv(
    env,
    'OCR_ACCURACY_MAX_COMPARISON_CELLS',
    1,
    10_000_000_000
  );
  if (maxComparisonCells !== undefined) overrides.maxComparisonCells = maxComparisonCells;

  const maxBatchSize = readIntegerEnv(env, 'OCR_ACCURACY_MAX_BATCH_SIZE', 1, 1000);
  if (maxBatchSize !== undefined) overrides.maxBatchSize = maxBatchSize;

  const trimWhitespace = readBooleanEnv(env, 'OCR_ACCURACY_TRIM_WHITESPACE');
  if (trimWhitespace !== undefined) overrides.trimWhitespace = trimWhitespace;

  if (Object.keys(overrides).length > 0) {
    updateConfig(overrides);
    for (const [key, value] of Object.entries(overrides)) {
      console.error(`[Config] ${key}=${String(value)}`);
    }
  }

  return overrides;
}
