/**
 * Text alignment interfaces for the OCR Accuracy MCP server
 *
 * Types for the ground-truth vs. predicted diff.
 * Pure types - no logic.
 */

/**
 * Unit the two texts are aligned on
 */
export type DiffGranularity = 'character' | 'word';

/**
 * A single diff operation.
 *
 * `delete` text appears only in the ground truth (the engine missed it),
 * `insert` text appears only in the prediction (the engine invented it).
 */
export interface TextDiffOperation {
  type: 'insert' | 'delete' | 'equal';
  text: string;
  /** Code-point offset into the ground truth */
  ground_truth_offset: number;
  /** Code-point offset into the prediction */
  predicted_offset: number;
}

/**
 * Result of aligning ground truth against a prediction
 */
export interface TextDiffResult {
  granularity: DiffGranularity;
  operations: TextDiffOperation[];
  total_operations: number;
  truncated: boolean;
  inserted_chars: number;
  deleted_chars: number;
  /** Unchanged code points, counted in the ground truth */
  unchanged_chars: number;
  similarity_ratio: number;
  ground_truth_length: number;
  predicted_length: number;
}
