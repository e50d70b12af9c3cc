/**
 * Accuracy Metrics Tests
 *
 * Tests CER/WER computation and the reported metrics record in
 * src/services/metrics/accuracy.ts.
 *
 * Uses REAL data, NO mocks.
 */

import { describe, it, expect } from 'vitest';
import {
  computeCharacterMetrics,
  computeWordMetrics,
  getDetailedMetrics,
  measurePair,
  toMetricsResult,
} from '../../../../src/services/metrics/accuracy.js';

// ═══════════════════════════════════════════════════════════════════════════════
// getDetailedMetrics TESTS
// ═══════════════════════════════════════════════════════════════════════════════

describe('getDetailedMetrics', () => {
  it('one missing character -> exact reported record', () => {
    expect(getDetailedMetrics('Hello World', 'Helo World')).toEqual({
      character_accuracy: 90.91,
      word_accuracy: 50,
      character_error_rate: 9.09,
      word_error_rate: 50,
      levenshtein_distance: 1,
      ground_truth_length: 11,
      predicted_length: 10,
      ground_truth_word_count: 2,
      predicted_word_count: 2,
    });
  });

  it.each(['Hello World', 'a', 'The quick brown fox', 'café \u{1F600}', '   '])(
    'identical input %j -> distance 0, accuracies 100, rates 0',
    (text) => {
      const metrics = getDetailedMetrics(text, text);
      expect(metrics.levenshtein_distance).toBe(0);
      expect(metrics.character_accuracy).toBe(100);
      expect(metrics.word_accuracy).toBe(100);
      expect(metrics.character_error_rate).toBe(0);
      expect(metrics.word_error_rate).toBe(0);
    }
  );

  it('both empty -> distance 0, accuracy 100, error rate 0', () => {
    expect(getDetailedMetrics('', '')).toEqual({
      character_accuracy: 100,
      word_accuracy: 100,
      character_error_rate: 0,
      word_error_rate: 0,
      levenshtein_distance: 0,
      ground_truth_length: 0,
      predicted_length: 0,
      ground_truth_word_count: 0,
      predicted_word_count: 0,
    });
  });

  it('empty ground truth, non-empty prediction -> error rate 100, accuracy 0', () => {
    const metrics = getDetailedMetrics('', 'abc');
    expect(metrics.levenshtein_distance).toBe(3);
    expect(metrics.character_error_rate).toBe(100);
    expect(metrics.character_accuracy).toBe(0);
    expect(metrics.word_error_rate).toBe(100);
    expect(metrics.word_accuracy).toBe(0);
  });

  it('empty prediction -> every ground-truth unit deleted', () => {
    const metrics = getDetailedMetrics('abc', '');
    expect(metrics.levenshtein_distance).toBe(3);
    expect(metrics.character_error_rate).toBe(100);
    expect(metrics.character_accuracy).toBe(0);
  });

  it('prediction much longer than ground truth -> error rate above 100, accuracy clamped at 0', () => {
    const metrics = getDetailedMetrics('a', 'abcd');
    expect(metrics.levenshtein_distance).toBe(3);
    expect(metrics.character_error_rate).toBe(300);
    expect(metrics.character_accuracy).toBe(0);
  });

  it('extra words -> word error rate above 100, word accuracy clamped at 0', () => {
    const metrics = getDetailedMetrics('cat', 'the black cat sat');
    expect(metrics.word_error_rate).toBe(300);
    expect(metrics.word_accuracy).toBe(0);
  });

  it('distance is symmetric but the error rate is not', () => {
    const forward = getDetailedMetrics('abc', 'abcdef');
    const backward = getDetailedMetrics('abcdef', 'abc');
    expect(forward.levenshtein_distance).toBe(3);
    expect(backward.levenshtein_distance).toBe(3);
    expect(forward.character_error_rate).toBe(100);
    expect(backward.character_error_rate).toBe(50);
  });

  it('character metrics are case-sensitive, word metrics are not', () => {
    const metrics = getDetailedMetrics('Hello World', 'hello world');
    expect(metrics.levenshtein_distance).toBe(2);
    expect(metrics.character_error_rate).toBe(18.18);
    expect(metrics.character_accuracy).toBe(81.82);
    expect(metrics.word_error_rate).toBe(0);
    expect(metrics.word_accuracy).toBe(100);
  });

  it('one wrong character makes the whole word wrong', () => {
    const metrics = getDetailedMetrics('Hello World', 'Hello Earth');
    expect(metrics.levenshtein_distance).toBe(4);
    expect(metrics.character_accuracy).toBe(63.64);
    expect(metrics.word_accuracy).toBe(50);
  });

  it('missing word -> one word deletion', () => {
    const metrics = getDetailedMetrics(
      'Machine learning is fascinating',
      'Machine learning fascinating'
    );
    expect(metrics.levenshtein_distance).toBe(3);
    expect(metrics.ground_truth_length).toBe(31);
    expect(metrics.character_error_rate).toBe(9.68);
    expect(metrics.character_accuracy).toBe(90.32);
    expect(metrics.word_error_rate).toBe(25);
    expect(metrics.word_accuracy).toBe(75);
    expect(metrics.ground_truth_word_count).toBe(4);
    expect(metrics.predicted_word_count).toBe(3);
  });

  it('does not trim: surrounding whitespace counts as characters but not as words', () => {
    const metrics = getDetailedMetrics('Hello ', 'Hello');
    expect(metrics.ground_truth_length).toBe(6);
    expect(metrics.levenshtein_distance).toBe(1);
    expect(metrics.ground_truth_word_count).toBe(1);
    expect(metrics.word_error_rate).toBe(0);
  });

  it('lengths count code points', () => {
    const metrics = getDetailedMetrics('\u{1F600}\u{1F600}', '\u{1F600}');
    expect(metrics.ground_truth_length).toBe(2);
    expect(metrics.predicted_length).toBe(1);
    expect(metrics.levenshtein_distance).toBe(1);
    expect(metrics.character_error_rate).toBe(50);
  });

  it('repeated calls return identical records', () => {
    const a = getDetailedMetrics('The quick brown fox', 'The quik brown f0x');
    const b = getDetailedMetrics('The quick brown fox', 'The quik brown f0x');
    expect(a).toEqual(b);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// RAW COMPUTATION TESTS
// ═══════════════════════════════════════════════════════════════════════════════

describe('computeCharacterMetrics', () => {
  it('returns unrounded values derived from one distance', () => {
    const result = computeCharacterMetrics('Hello World', 'Helo World');
    expect(result.distance).toBe(1);
    expect(result.errorRate).toBeCloseTo(100 / 11, 10);
    expect(result.accuracy).toBeCloseTo(100 - 100 / 11, 10);
  });
});

describe('computeWordMetrics', () => {
  it('lower-cases tokens before comparing', () => {
    expect(computeWordMetrics('OCR Output', 'ocr OUTPUT')).toEqual({
      distance: 0,
      accuracy: 100,
      errorRate: 0,
    });
  });

  it('both empty -> accuracy 100', () => {
    expect(computeWordMetrics('', '')).toEqual({ distance: 0, accuracy: 100, errorRate: 0 });
  });

  it('whitespace-only ground truth counts as empty', () => {
    expect(computeWordMetrics('  ', 'word')).toEqual({ distance: 1, accuracy: 0, errorRate: 100 });
  });
});

describe('measurePair / toMetricsResult', () => {
  it('keeps raw values until the record is built', () => {
    const measurement = measurePair('abc', 'abd');
    expect(measurement.character.errorRate).toBeCloseTo(100 / 3, 10);
    expect(measurement.word.distance).toBe(1);
    expect(toMetricsResult(measurement).character_error_rate).toBe(33.33);
    expect(toMetricsResult(measurement).character_accuracy).toBe(66.67);
  });
});
