/**
 * OCR Accuracy Metrics
 *
 * Character Error Rate (CER), Word Error Rate (WER) and the derived
 * accuracy percentages for a ground-truth / predicted text pair.
 *
 * Everything here is pure and synchronous. Values stay unrounded inside
 * PairMeasurement; toMetricsResult() is the only place that rounds.
 *
 * @module services/metrics/accuracy
 */

import { editDistance, toCodePoints, tokenizeWords } from './edit-distance.js';
import { roundTo } from '../../utils/math.js';
import type { MetricsResult } from '../../models/metrics.js';

/** Decimal places of every reported percentage */
export const METRIC_PRECISION = 2;

/**
 * Edit distance and the rates derived from it, unrounded
 */
export interface RateMetrics {
  distance: number;
  /** max(0, 100 - errorRate) */
  accuracy: number;
  /** 100 * distance / reference length; may exceed 100 */
  errorRate: number;
}

/**
 * Unrounded measurements of one text pair
 */
export interface PairMeasurement {
  character: RateMetrics;
  word: RateMetrics;
  groundTruthLength: number;
  predictedLength: number;
  groundTruthWordCount: number;
  predictedWordCount: number;
}

/**
 * Error rate as a percentage of the reference length.
 *
 * An empty reference has nothing to divide by: the rate is 0 when the
 * hypothesis is empty too, and 100 otherwise.
 */
function errorRateFor(distance: number, referenceLength: number, hypothesisLength: number): number {
  if (referenceLength === 0) {
    return hypothesisLength === 0 ? 0 : 100;
  }
  return (100 * distance) / referenceLength;
}

function rateMetrics(distance: number, referenceLength: number, hypothesisLength: number): RateMetrics {
  const errorRate = errorRateFor(distance, referenceLength, hypothesisLength);
  return { distance, accuracy: Math.max(0, 100 - errorRate), errorRate };
}

function measureCharacters(groundTruth: readonly string[], predicted: readonly string[]): RateMetrics {
  return rateMetrics(editDistance(groundTruth, predicted), groundTruth.length, predicted.length);
}

function measureWords(groundTruth: readonly string[], predicted: readonly string[]): RateMetrics {
  const gtWords = groundTruth.map((word) => word.toLowerCase());
  const predWords = predicted.map((word) => word.toLowerCase());
  return rateMetrics(editDistance(gtWords, predWords), gtWords.length, predWords.length);
}

/**
 * Character-level metrics: case-sensitive, code point by code point.
 */
export function computeCharacterMetrics(groundTruth: string, predicted: string): RateMetrics {
  return measureCharacters(toCodePoints(groundTruth), toCodePoints(predicted));
}

/**
 * Word-level metrics over whitespace tokens, lower-cased before comparison.
 *
 * A word with a single wrong character counts as a full substitution,
 * matching the usual WER definition.
 */
export function computeWordMetrics(groundTruth: string, predicted: string): RateMetrics {
  return measureWords(tokenizeWords(groundTruth), tokenizeWords(predicted));
}

/**
 * Measure a text pair without rounding anything
 */
export function measurePair(groundTruth: string, predicted: string): PairMeasurement {
  const gtChars = toCodePoints(groundTruth);
  const predChars = toCodePoints(predicted);
  const gtWords = tokenizeWords(groundTruth);
  const predWords = tokenizeWords(predicted);

  return {
    character: measureCharacters(gtChars, predChars),
    word: measureWords(gtWords, predWords),
    groundTruthLength: gtChars.length,
    predictedLength: predChars.length,
    groundTruthWordCount: gtWords.length,
    predictedWordCount: predWords.length,
  };
}

/**
 * Round a percentage for reporting
 */
export function roundMetric(value: number): number {
  return roundTo(value, METRIC_PRECISION);
}

/**
 * Convert a measurement to the reported record
 */
export function toMetricsResult(measurement: PairMeasurement): MetricsResult {
  return {
    character_accuracy: roundMetric(measurement.character.accuracy),
    word_accuracy: roundMetric(measurement.word.accuracy),
    character_error_rate: roundMetric(measurement.character.errorRate),
    word_error_rate: roundMetric(measurement.word.errorRate),
    levenshtein_distance: measurement.character.distance,
    ground_truth_length: measurement.groundTruthLength,
    predicted_length: measurement.predictedLength,
    ground_truth_word_count: measurement.groundTruthWordCount,
    predicted_word_count: measurement.predictedWordCount,
  };
}

/**
 * Full metrics record for a ground-truth / predicted pair
 *
 * @example
 * getDetailedMetrics('Hello World', 'Helo World');
 * // => { character_accuracy: 90.91, character_error_rate: 9.09,
 * //      word_accuracy: 50, word_error_rate: 50, levenshtein_distance: 1, ... }
 */
export function getDetailedMetrics(groundTruth: string, predicted: string): MetricsResult {
  return toMetricsResult(measurePair(groundTruth, predicted));
}
