/**
 * Accuracy metric interfaces for the OCR Accuracy MCP server
 *
 * Field names are snake_case because these records are serialized as-is
 * into tool responses.
 * Pure types - no logic.
 */

/**
 * Accuracy metrics for one (ground truth, predicted) pair.
 *
 * Percentages are rounded to 2 decimal places. Accuracies are clamped to
 * [0, 100]; error rates are not capped and exceed 100 when the prediction
 * is much longer than the ground truth.
 */
export interface MetricsResult {
  readonly character_accuracy: number;
  readonly word_accuracy: number;
  readonly character_error_rate: number;
  readonly word_error_rate: number;
  /** Case-sensitive code-point edit distance */
  readonly levenshtein_distance: number;
  /** Length in code points */
  readonly ground_truth_length: number;
  readonly predicted_length: number;
  readonly ground_truth_word_count: number;
  readonly predicted_word_count: number;
}

/**
 * Raw output of one OCR engine, as handed over by the caller
 */
export interface EngineResult {
  engine: string;
  /** Recognized text; absent or null when the engine produced nothing */
  text?: string | null;
  success: boolean;
  /** Upstream failure message, carried through to the comparison entry */
  error?: string | null;
}

/**
 * Ranked comparison entry for an engine that produced text
 */
export interface SuccessfulEngineEntry {
  engine_name: string;
  ok: true;
  metrics: MetricsResult;
  /** 1-based position among successful engines */
  rank: number;
}

/**
 * Comparison entry for an engine whose OCR attempt failed upstream
 */
export interface FailedEngineEntry {
  engine_name: string;
  ok: false;
  metrics: null;
  rank: null;
  error: string | null;
}

export type EngineComparisonEntry = SuccessfulEngineEntry | FailedEngineEntry;

/**
 * Qualitative bucket for an accuracy percentage
 */
export type RatingTier = 'Excellent' | 'Good' | 'Fair' | 'Poor' | 'Bad';

/**
 * Aggregate over a benchmark run of many text pairs
 */
export interface BatchSummary {
  item_count: number;
  mean_character_accuracy: number;
  mean_word_accuracy: number;
  mean_character_error_rate: number;
  mean_word_error_rate: number;
  min_character_accuracy: number | null;
  max_character_accuracy: number | null;
  total_levenshtein_distance: number;
  /** Total character edits over total ground-truth characters */
  corpus_character_error_rate: number;
  /** Total word edits over total ground-truth words */
  corpus_word_error_rate: number;
}
