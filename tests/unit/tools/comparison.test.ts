/**
 * Unit Tests for Comparison MCP Tools
 *
 * @module tests/unit/tools/comparison
 */

import { describe, it, expect, afterEach } from 'vitest';
import { comparisonTools, handleAccuracyDiff } from '../../../src/tools/comparison.js';
import { resetState, updateConfig } from '../../../src/server/state.js';
import { parseResponse } from './helpers.js';

afterEach(() => {
  resetState();
});

describe('comparisonTools exports', () => {
  it('exports ocr_accuracy_diff', () => {
    expect(Object.keys(comparisonTools)).toEqual(['ocr_accuracy_diff']);
  });
});

describe('handleAccuracyDiff', () => {
  it('character diff by default', async () => {
    const result = parseResponse(
      await handleAccuracyDiff({ ground_truth: 'abc', predicted: 'abxc' })
    );

    expect(result.success).toBe(true);
    expect(result.data?.diff).toMatchObject({
      granularity: 'character',
      inserted_chars: 1,
      deleted_chars: 0,
      unchanged_chars: 3,
      similarity_ratio: 0.8571,
      truncated: false,
    });
    expect(result.data?.summary).toBe(
      'Character alignment similarity: 86%. 3 unchanged, 0 missing, 1 extra characters.'
    );
  });

  it('max_diff_operations from config truncates the operations', async () => {
    updateConfig({ maxDiffOperations: 1 });
    const result = parseResponse(
      await handleAccuracyDiff({ ground_truth: 'abc', predicted: 'abxc' })
    );

    expect(result.data?.diff).toMatchObject({ total_operations: 3, truncated: true });
    expect(result.data?.summary).toBe(
      'Character alignment similarity: 86%. 3 unchanged, 0 missing, 1 extra characters. ' +
        '(Diff truncated: showing 1 of 3 operations.)'
    );
  });

  it('explicit max_operations overrides the config', async () => {
    updateConfig({ maxDiffOperations: 1 });
    const result = parseResponse(
      await handleAccuracyDiff({ ground_truth: 'abc', predicted: 'abxc', max_operations: 3 })
    );

    expect(result.data?.diff).toMatchObject({ truncated: false });
  });

  it('word granularity ignores case', async () => {
    const result = parseResponse(
      await handleAccuracyDiff({
        ground_truth: 'Hello World',
        predicted: 'hello world',
        granularity: 'word',
      })
    );

    expect(result.data?.diff).toMatchObject({
      granularity: 'word',
      inserted_chars: 0,
      deleted_chars: 0,
      similarity_ratio: 1,
    });
  });

  it('texts over max_comparison_cells -> INPUT_TOO_LARGE', async () => {
    updateConfig({ maxComparisonCells: 11 });
    const result = parseResponse(
      await handleAccuracyDiff({ ground_truth: 'abc', predicted: 'abxc' })
    );

    expect(result.error?.category).toBe('INPUT_TOO_LARGE');
    expect(result.error?.details).toEqual({ field: 'texts', cells: 12, limit: 11 });
  });

  it('unknown granularity -> VALIDATION_ERROR', async () => {
    const response = await handleAccuracyDiff({
      ground_truth: 'a',
      predicted: 'b',
      granularity: 'line',
    });

    expect(response.isError).toBe(true);
    expect(parseResponse(response).error?.category).toBe('VALIDATION_ERROR');
  });
});
