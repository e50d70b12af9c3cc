/**
 * Metrics Engine
 *
 * Pure, synchronous OCR accuracy computations. No I/O and no shared state:
 * safe to call from any number of concurrent requests.
 *
 * @module services/metrics
 */

export {
  editDistance,
  levenshteinDistance,
  toCodePoints,
  tokenizeWords,
  type UnitEquals,
} from './edit-distance.js';
export {
  computeCharacterMetrics,
  computeWordMetrics,
  getDetailedMetrics,
  measurePair,
  toMetricsResult,
  roundMetric,
  METRIC_PRECISION,
  type RateMetrics,
  type PairMeasurement,
} from './accuracy.js';
export { compareEngines } from './ranking.js';
export { getRatingTier, RATING_THRESHOLDS } from './rating.js';
export { summarizeMeasurements } from './summary.js';
export type {
  BatchSummary,
  EngineComparisonEntry,
  EngineResult,
  FailedEngineEntry,
  MetricsResult,
  RatingTier,
  SuccessfulEngineEntry,
} from '../../models/metrics.js';
