/**
 * Benchmark Run Summary
 *
 * Aggregates the measurements of many text pairs. Means are macro averages
 * over items; the corpus rates are micro averages (total edits over total
 * reference units), which weight long documents more heavily.
 *
 * @module services/metrics/summary
 */

import { mean, safeMax, safeMin } from '../../utils/math.js';
import { roundMetric, type PairMeasurement } from './accuracy.js';
import type { BatchSummary } from '../../models/metrics.js';

function corpusErrorRate(totalDistance: number, totalReference: number, totalHypothesis: number): number {
  if (totalReference === 0) {
    return totalHypothesis === 0 ? 0 : 100;
  }
  return (100 * totalDistance) / totalReference;
}

function sum(values: readonly number[]): number {
  return values.reduce((acc, value) => acc + value, 0);
}

/**
 * Summarize a run. All aggregation happens on unrounded values; only the
 * reported numbers are rounded.
 */
export function summarizeMeasurements(measurements: readonly PairMeasurement[]): BatchSummary {
  const charAccuracies = measurements.map((m) => m.character.accuracy);
  const minAccuracy = safeMin(charAccuracies);
  const maxAccuracy = safeMax(charAccuracies);

  const totalCharDistance = sum(measurements.map((m) => m.character.distance));
  const totalWordDistance = sum(measurements.map((m) => m.word.distance));

  return {
    item_count: measurements.length,
    mean_character_accuracy: roundMetric(mean(charAccuracies) ?? 0),
    mean_word_accuracy: roundMetric(mean(measurements.map((m) => m.word.accuracy)) ?? 0),
    mean_character_error_rate: roundMetric(
      mean(measurements.map((m) => m.character.errorRate)) ?? 0
    ),
    mean_word_error_rate: roundMetric(mean(measurements.map((m) => m.word.errorRate)) ?? 0),
    min_character_accuracy: minAccuracy === undefined ? null : roundMetric(minAccuracy),
    max_character_accuracy: maxAccuracy === undefined ? null : roundMetric(maxAccuracy),
    total_levenshtein_distance: totalCharDistance,
    corpus_character_error_rate: roundMetric(
      corpusErrorRate(
        totalCharDistance,
        sum(measurements.map((m) => m.groundTruthLength)),
        sum(measurements.map((m) => m.predictedLength))
      )
    ),
    corpus_word_error_rate: roundMetric(
      corpusErrorRate(
        totalWordDistance,
        sum(measurements.map((m) => m.groundTruthWordCount)),
        sum(measurements.map((m) => m.predictedWordCount))
      )
    ),
  };
}
