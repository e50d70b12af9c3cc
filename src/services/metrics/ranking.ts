/**
 * Multi-Engine Ranking
 *
 * Scores several OCR engines against the same ground truth and orders them
 * best first. Engines that failed upstream are never scored and always go
 * last, in their original order.
 *
 * @module services/metrics/ranking
 */

import { getDetailedMetrics } from './accuracy.js';
import type {
  EngineComparisonEntry,
  EngineResult,
  FailedEngineEntry,
  MetricsResult,
  SuccessfulEngineEntry,
} from '../../models/metrics.js';

interface ScoredEngine {
  engine_name: string;
  metrics: MetricsResult;
}

/**
 * Descending character accuracy, then descending word accuracy.
 * Equal keys compare as 0 so the stable sort keeps input order.
 */
function byAccuracyDescending(a: ScoredEngine, b: ScoredEngine): number {
  return (
    b.metrics.character_accuracy - a.metrics.character_accuracy ||
    b.metrics.word_accuracy - a.metrics.word_accuracy
  );
}

function toFailedEntry(result: EngineResult): FailedEngineEntry {
  return {
    engine_name: result.engine,
    ok: false,
    metrics: null,
    rank: null,
    error: result.error ?? null,
  };
}

/**
 * Compare OCR engine outputs against one ground truth.
 *
 * An engine counts as successful when `success` is true and it returned a
 * text string (an empty string is a valid, if poor, result).
 *
 * @returns successful engines ranked best first, then failed engines
 */
export function compareEngines(
  groundTruth: string,
  engineResults: readonly EngineResult[]
): EngineComparisonEntry[] {
  const scored: ScoredEngine[] = [];
  const failed: FailedEngineEntry[] = [];

  for (const result of engineResults) {
    if (result.success && typeof result.text === 'string') {
      scored.push({
        engine_name: result.engine,
        metrics: getDetailedMetrics(groundTruth, result.text),
      });
    } else {
      failed.push(toFailedEntry(result));
    }
  }

  // Array.prototype.sort is stable (ES2019+)
  const ranked: SuccessfulEngineEntry[] = [...scored]
    .sort(byAccuracyDescending)
    .map((entry, index): SuccessfulEngineEntry => ({ ...entry, ok: true, rank: index + 1 }));

  return [...ranked, ...failed];
}
