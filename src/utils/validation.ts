/**
 * OCR Accuracy MCP - Zod Validation Schemas
 *
 * This module provides input validation for all MCP tool inputs.
 * Each schema includes:
 * - Type validation
 * - Constraint validation (min/max)
 * - Default values where appropriate
 *
 * Size limits that depend on runtime configuration (max_input_chars,
 * max_batch_size) are enforced by the tool handlers, not here.
 *
 * @module utils/validation
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Custom validation error with descriptive message
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @param schema - Zod schema to validate against
 * @param input - Input value to validate
 * @returns Validated and typed input data (defaults applied)
 * @throws ValidationError listing every failing path
 */
export function validateInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.infer<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const errors = result.error.errors.map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    });
    throw new ValidationError(errors.join('; '));
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SHARED ENUMS AND BASE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Reference text. May be empty.
 */
export const GroundTruthText = z
  .string({ required_error: 'ground_truth is required' })
  .describe('Correct reference text');

/**
 * OCR output. May be empty.
 */
export const PredictedText = z
  .string({ required_error: 'predicted is required' })
  .describe('Text produced by the OCR engine');

/**
 * Per-call whitespace trimming override
 */
export const TrimWhitespace = z
  .boolean()
  .optional()
  .describe('Strip leading/trailing whitespace before measuring (default from config)');

/**
 * Alignment unit for diffs
 */
export const DiffGranularity = z.enum(['character', 'word']);

/**
 * Configuration keys that can be set
 */
export const ConfigKey = z.enum([
  'max_input_chars',
  'max_comparison_cells',
  'max_batch_size',
  'max_diff_operations',
  'trim_whitespace',
]);

// ═══════════════════════════════════════════════════════════════════════════════
// ACCURACY SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Schema for scoring one text pair
 */
export const AccuracyCalculateInput = z.object({
  ground_truth: GroundTruthText,
  predicted: PredictedText,
  trim_whitespace: TrimWhitespace,
});

/**
 * One engine's raw output. `success` defaults to true, so a bare
 * { engine, text } counts as a successful run.
 */
export const EngineResultInput = z.object({
  engine: z.string().min(1, 'engine name is required').max(200),
  text: z.string().nullable().optional(),
  success: z.boolean().default(true),
  error: z.string().nullable().optional(),
});

/**
 * Schema for ranking several engines against one ground truth
 */
export const AccuracyCompareEnginesInput = z.object({
  ground_truth: GroundTruthText,
  engine_results: z
    .array(EngineResultInput)
    .min(1, 'At least one engine result is required')
    .max(50, 'At most 50 engine results per comparison'),
  trim_whitespace: TrimWhitespace,
});

/**
 * One pair of a benchmark run
 */
export const BatchItemInput = z.object({
  id: z.string().min(1).max(200).optional(),
  ground_truth: GroundTruthText,
  predicted: PredictedText,
});

/**
 * Schema for scoring a benchmark run
 */
export const AccuracyBatchInput = z.object({
  items: z.array(BatchItemInput).min(1, 'At least one item is required'),
  trim_whitespace: TrimWhitespace,
});

/**
 * Schema for rating lookup
 */
export const AccuracyRatingInput = z.object({
  accuracy: z.number().min(0).max(100).describe('Accuracy percentage (0-100)'),
});

/**
 * Schema for the ground truth vs. prediction diff
 */
export const AccuracyDiffInput = z.object({
  ground_truth: GroundTruthText,
  predicted: PredictedText,
  granularity: DiffGranularity.default('character'),
  max_operations: z.number().int().min(1).max(10000).optional(),
  trim_whitespace: TrimWhitespace,
});

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Schema for getting configuration
 */
export const ConfigGetInput = z.object({
  key: ConfigKey.optional(),
});

/**
 * Schema for setting configuration
 */
export const ConfigSetInput = z.object({
  key: ConfigKey,
  value: z.union([z.string(), z.number(), z.boolean()]),
});
