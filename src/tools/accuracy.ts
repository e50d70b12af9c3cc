/**
 * OCR Accuracy MCP Tools
 *
 * Tools: ocr_accuracy_calculate, ocr_accuracy_compare_engines,
 *        ocr_accuracy_batch, ocr_accuracy_rating
 *
 * Thin wrappers over the metrics engine: validate, enforce size limits,
 * compute, attach rating tiers. No state is kept between calls.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/accuracy
 */

import { v4 as uuidv4 } from 'uuid';
import { getConfig } from '../server/state.js';
import { successResult } from '../server/types.js';
import { inputTooLargeError } from '../server/errors.js';
import {
  validateInput,
  AccuracyCalculateInput,
  AccuracyCompareEnginesInput,
  AccuracyBatchInput,
  AccuracyRatingInput,
  TrimWhitespace,
  GroundTruthText,
  PredictedText,
} from '../utils/validation.js';
import {
  compareEngines,
  getDetailedMetrics,
  getRatingTier,
  measurePair,
  summarizeMeasurements,
  toMetricsResult,
  RATING_THRESHOLDS,
} from '../services/metrics/index.js';
import type { EngineResult } from '../models/metrics.js';
import {
  enforceComparisonBudget,
  formatResponse,
  handleError,
  prepareText,
  resolveTrim,
  type ToolResponse,
  type ToolDefinition,
} from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// HANDLER: ocr_accuracy_calculate
// ═══════════════════════════════════════════════════════════════════════════════

export async function handleAccuracyCalculate(
  params: Record<string, unknown>
): Promise<ToolResponse> {
  try {
    const input = validateInput(AccuracyCalculateInput, params);
    const trim = resolveTrim(input.trim_whitespace);
    const groundTruth = prepareText('ground_truth', input.ground_truth, trim);
    const predicted = prepareText('predicted', input.predicted, trim);
    enforceComparisonBudget('texts', [[groundTruth, predicted]]);

    const metrics = getDetailedMetrics(groundTruth, predicted);
    console.error(
      `[INFO] Scored pair: ${metrics.ground_truth_length} vs ${metrics.predicted_length} chars, ` +
        `CER=${metrics.character_error_rate}% WER=${metrics.word_error_rate}%`
    );

    return formatResponse(
      successResult({
        metrics,
        rating: {
          character: getRatingTier(metrics.character_accuracy),
          word: getRatingTier(metrics.word_accuracy),
        },
        next_steps: [
          { tool: 'ocr_accuracy_diff', description: 'See where the prediction differs' },
          { tool: 'ocr_accuracy_compare_engines', description: 'Rank several engines on this text' },
        ],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HANDLER: ocr_accuracy_compare_engines
// ═══════════════════════════════════════════════════════════════════════════════

export async function handleAccuracyCompareEngines(
  params: Record<string, unknown>
): Promise<ToolResponse> {
  try {
    const input = validateInput(AccuracyCompareEnginesInput, params);
    const trim = resolveTrim(input.trim_whitespace);
    const groundTruth = prepareText('ground_truth', input.ground_truth, trim);

    const engineResults: EngineResult[] = input.engine_results.map((result, i) => ({
      engine: result.engine,
      success: result.success,
      error: result.error,
      text:
        typeof result.text === 'string'
          ? prepareText(`engine_results.${i}.text`, result.text, trim)
          : result.text,
    }));
    enforceComparisonBudget(
      'engine_results',
      engineResults.flatMap((result) =>
        result.success && typeof result.text === 'string'
          ? [[groundTruth, result.text] as const]
          : []
      )
    );

    const ranked = compareEngines(groundTruth, engineResults);
    const engines = ranked.map((entry) =>
      entry.ok ? { ...entry, rating: getRatingTier(entry.metrics.character_accuracy) } : entry
    );
    const best = ranked.find((entry) => entry.ok);
    const successfulCount = ranked.filter((entry) => entry.ok).length;

    console.error(
      `[INFO] Compared ${ranked.length} engines (${ranked.length - successfulCount} failed), ` +
        `best=${best?.engine_name ?? 'none'}`
    );

    return formatResponse(
      successResult({
        engines,
        best_engine: best?.engine_name ?? null,
        successful_count: successfulCount,
        failed_count: ranked.length - successfulCount,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HANDLER: ocr_accuracy_batch
// ═══════════════════════════════════════════════════════════════════════════════

export async function handleAccuracyBatch(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(AccuracyBatchInput, params);
    const { maxBatchSize } = getConfig();
    if (input.items.length > maxBatchSize) {
      throw inputTooLargeError('items', input.items.length, maxBatchSize);
    }

    const trim = resolveTrim(input.trim_whitespace);
    const pairs = input.items.map(
      (item, i) =>
        [
          prepareText(`items.${i}.ground_truth`, item.ground_truth, trim),
          prepareText(`items.${i}.predicted`, item.predicted, trim),
        ] as const
    );
    enforceComparisonBudget('items', pairs);

    const measured = input.items.map((item, i) => ({
      id: item.id ?? `item-${i + 1}`,
      measurement: measurePair(...pairs[i]),
    }));

    const items = measured.map(({ id, measurement }) => {
      const metrics = toMetricsResult(measurement);
      return { id, metrics, rating: getRatingTier(metrics.character_accuracy) };
    });
    const summary = summarizeMeasurements(measured.map((m) => m.measurement));

    console.error(
      `[INFO] Batch of ${summary.item_count} pairs: corpus CER=${summary.corpus_character_error_rate}% ` +
        `WER=${summary.corpus_word_error_rate}%`
    );

    return formatResponse(
      successResult({
        run_id: uuidv4(),
        created_at: new Date().toISOString(),
        summary,
        items,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HANDLER: ocr_accuracy_rating
// ═══════════════════════════════════════════════════════════════════════════════

export async function handleAccuracyRating(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(AccuracyRatingInput, params);
    return formatResponse(
      successResult({
        accuracy: input.accuracy,
        tier: getRatingTier(input.accuracy),
        thresholds: RATING_THRESHOLDS,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS FOR MCP REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Accuracy tools collection for MCP server registration
 */
export const accuracyTools: Record<string, ToolDefinition> = {
  ocr_accuracy_calculate: {
    description:
      '[ANALYSIS] Use to score OCR output against ground truth. Returns character/word accuracy, CER, WER, Levenshtein distance, lengths, word counts and rating tiers.',
    inputSchema: {
      ground_truth: GroundTruthText,
      predicted: PredictedText,
      trim_whitespace: TrimWhitespace,
    },
    handler: handleAccuracyCalculate,
  },
  ocr_accuracy_compare_engines: {
    description:
      '[ANALYSIS] Use to rank several OCR engines on the same ground truth. Returns engines best first (by character then word accuracy); failed engines are listed last.',
    inputSchema: {
      ground_truth: GroundTruthText,
      engine_results: AccuracyCompareEnginesInput.shape.engine_results.describe(
        'Engine outputs: { engine, text, success (default true), error }'
      ),
      trim_whitespace: TrimWhitespace,
    },
    handler: handleAccuracyCompareEngines,
  },
  ocr_accuracy_batch: {
    description:
      '[ANALYSIS] Use to benchmark a set of (ground_truth, predicted) pairs. Returns per-item metrics plus mean and corpus-level CER/WER.',
    inputSchema: {
      items: AccuracyBatchInput.shape.items.describe('Pairs to score: { id?, ground_truth, predicted }'),
      trim_whitespace: TrimWhitespace,
    },
    handler: handleAccuracyBatch,
  },
  ocr_accuracy_rating: {
    description:
      '[STATUS] Use to map an accuracy percentage to its tier (Excellent >= 95, Good >= 85, Fair >= 70, Poor >= 50, else Bad).',
    inputSchema: {
      accuracy: AccuracyRatingInput.shape.accuracy,
    },
    handler: handleAccuracyRating,
  },
};
