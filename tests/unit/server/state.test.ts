/**
 * Unit tests for MCP Server State Management
 *
 * @module tests/unit/server/state
 */

import { describe, it, expect, afterEach } from 'vitest';
import {
  state,
  getConfig,
  updateConfig,
  getDefaultConfig,
  resetState,
} from '../../../src/server/state.js';

afterEach(() => {
  resetState();
});

describe('configuration', () => {
  it('starts from the defaults', () => {
    expect(getConfig()).toEqual({
      maxInputChars: 100_000,
      maxComparisonCells: 25_000_000,
      maxBatchSize: 200,
      maxDiffOperations: 1000,
      trimWhitespace: true,
    });
  });

  it('getConfig returns a copy', () => {
    const config = getConfig();
    config.maxBatchSize = 1;
    expect(state.config.maxBatchSize).toBe(200);
  });

  it('updateConfig merges partial updates', () => {
    updateConfig({ maxBatchSize: 10 });
    updateConfig({ trimWhitespace: false });

    expect(getConfig()).toEqual({ ...getDefaultConfig(), maxBatchSize: 10, trimWhitespace: false });
  });

  it('resetState restores the defaults', () => {
    updateConfig({ maxInputChars: 5 });
    resetState();
    expect(getConfig()).toEqual(getDefaultConfig());
  });

  it('getDefaultConfig is unaffected by updates', () => {
    updateConfig({ maxDiffOperations: 3 });
    expect(getDefaultConfig().maxDiffOperations).toBe(1000);
  });
});
