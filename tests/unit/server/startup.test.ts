/**
 * Unit tests for startup configuration
 *
 * @module tests/unit/server/startup
 */

import { describe, it, expect, afterEach } from 'vitest';
import { validateStartupDependencies } from '../../../src/server/startup.js';
import { getConfig, getDefaultConfig, resetState } from '../../../src/server/state.js';
import { MCPError } from '../../../src/server/errors.js';

afterEach(() => {
  resetState();
});

describe('validateStartupDependencies', () => {
  it('no variables -> no overrides, defaults kept', () => {
    expect(validateStartupDependencies({})).toEqual({});
    expect(getConfig()).toEqual(getDefaultConfig());
  });

  it('applies integer and boolean overrides', () => {
    const overrides = validateStartupDependencies({
      OCR_ACCURACY_MAX_INPUT_CHARS: '5000',
      OCR_ACCURACY_MAX_BATCH_SIZE: '10',
      OCR_ACCURACY_TRIM_WHITESPACE: 'false',
    });

    expect(overrides).toEqual({ maxInputChars: 5000, maxBatchSize: 10, trimWhitespace: false });
    expect(getConfig()).toEqual({ ...getDefaultConfig(), ...overrides });
  });

  it('applies the comparison cell budget', () => {
    expect(validateStartupDependencies({ OCR_ACCURACY_MAX_COMPARISON_CELLS: '1000' })).toEqual({
      maxComparisonCells: 1000,
    });
    expect(getConfig().maxComparisonCells).toBe(1000);
  });

  it('accepts 1/0 and mixed case for booleans', () => {
    expect(validateStartupDependencies({ OCR_ACCURACY_TRIM_WHITESPACE: '0' })).toEqual({
      trimWhitespace: false,
    });
    expect(validateStartupDependencies({ OCR_ACCURACY_TRIM_WHITESPACE: 'TRUE' })).toEqual({
      trimWhitespace: true,
    });
  });

  it('ignores blank values', () => {
    expect(validateStartupDependencies({ OCR_ACCURACY_MAX_BATCH_SIZE: '  ' })).toEqual({});
  });

  it.each(['0', '-5', '2.5', 'lots', '1000001'])(
    'rejects OCR_ACCURACY_MAX_INPUT_CHARS=%s',
    (value) => {
      expect(() => validateStartupDependencies({ OCR_ACCURACY_MAX_INPUT_CHARS: value })).toThrow(
        'OCR_ACCURACY_MAX_INPUT_CHARS must be an integer between 1 and 1000000'
      );
    }
  );

  it('rejects a malformed boolean with CONFIGURATION_ERROR', () => {
    let caught: unknown;
    try {
      validateStartupDependencies({ OCR_ACCURACY_TRIM_WHITESPACE: 'yes' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(MCPError);
    if (!(caught instanceof MCPError)) return;
    expect(caught.category).toBe('CONFIGURATION_ERROR');
    expect(caught.message).toBe('OCR_ACCURACY_TRIM_WHITESPACE must be "true" or "false"');
    expect(getConfig()).toEqual(getDefaultConfig());
  });
});
