/**
 * Text Comparison MCP Tools
 *
 * Tools: ocr_accuracy_diff
 *
 * Shows where a prediction departs from its ground truth, as a list of
 * equal / delete / insert operations.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/comparison
 */

import { getConfig } from '../server/state.js';
import { successResult } from '../server/types.js';
import { validateInput, AccuracyDiffInput, TrimWhitespace } from '../utils/validation.js';
import { diffTexts, generateSummary } from '../services/comparison/diff-service.js';
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
// HANDLER: ocr_accuracy_diff
// ═══════════════════════════════════════════════════════════════════════════════

export async function handleAccuracyDiff(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(AccuracyDiffInput, params);
    const trim = resolveTrim(input.trim_whitespace);
    const groundTruth = prepareText('ground_truth', input.ground_truth, trim);
    const predicted = prepareText('predicted', input.predicted, trim);
    enforceComparisonBudget('texts', [[groundTruth, predicted]]);
    const maxOperations = input.max_operations ?? getConfig().maxDiffOperations;

    const diff = diffTexts(groundTruth, predicted, input.granularity, maxOperations);
    console.error(
      `[INFO] ${input.granularity} diff: ${diff.total_operations} operations` +
        (diff.truncated ? ` (truncated to ${maxOperations})` : '')
    );

    return formatResponse(
      successResult({
        diff,
        summary: generateSummary(diff),
        next_steps: [{ tool: 'ocr_accuracy_calculate', description: 'Get CER/WER for this pair' }],
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
 * Comparison tools collection for MCP server registration
 */
export const comparisonTools: Record<string, ToolDefinition> = {
  ocr_accuracy_diff: {
    description:
      '[ANALYSIS] Use to see where OCR output differs from ground truth. Returns equal/delete/insert operations at character or word granularity with a similarity ratio.',
    inputSchema: {
      ground_truth: AccuracyDiffInput.shape.ground_truth,
      predicted: AccuracyDiffInput.shape.predicted,
      granularity: AccuracyDiffInput.shape.granularity.describe(
        "'character' (case-sensitive, default) or 'word' (case-insensitive)"
      ),
      max_operations: AccuracyDiffInput.shape.max_operations.describe(
        'Maximum operations to return (default from config)'
      ),
      trim_whitespace: TrimWhitespace,
    },
    handler: handleAccuracyDiff,
  },
};
