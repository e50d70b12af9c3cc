/**
 * Ground Truth vs. Prediction Diff Service
 *
 * Aligns a predicted OCR text against its ground truth so callers can see
 * where the errors are, not just how many there are.
 * Uses the `diff` npm package (jsdiff) for the alignment, over explicit
 * token arrays so each side's offsets are counted from its own text.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 */

import { diffArrays } from 'diff';
import type {
  DiffGranularity,
  TextDiffOperation,
  TextDiffResult,
} from '../../models/comparison.js';

/** Words and the whitespace runs between them; joined back they give the input */
const WORD_OR_SPACE = /\s+|\S+/gu;

function toTokens(text: string, granularity: DiffGranularity): string[] {
  return granularity === 'word' ? (text.match(WORD_OR_SPACE) ?? []) : Array.from(text);
}

function codePointLength(tokens: readonly string[]): number {
  let length = 0;
  for (const token of tokens) length += Array.from(token).length;
  return length;
}

const caseInsensitive = (a: string, b: string): boolean => a.toLowerCase() === b.toLowerCase();

/**
 * Align two texts
 *
 * Character granularity is case-sensitive, like the character metrics.
 * Word granularity ignores case, like the word metrics, and treats each
 * whitespace run as a token of its own, so spacing changes show up as
 * delete/insert operations. `equal` operations carry the ground truth's
 * text; offsets and counts are taken from each side's own tokens.
 *
 * @param groundTruth - Reference text
 * @param predicted - OCR output
 * @param granularity - Alignment unit
 * @param maxOperations - Maximum operations to return (default 1000)
 * @returns TextDiffResult with operations, counts, and similarity ratio
 */
export function diffTexts(
  groundTruth: string,
  predicted: string,
  granularity: DiffGranularity,
  maxOperations: number = 1000
): TextDiffResult {
  const gtTokens = toTokens(groundTruth, granularity);
  const predTokens = toTokens(predicted, granularity);
  const options = granularity === 'word' ? { comparator: caseInsensitive } : undefined;
  const changes = diffArrays(gtTokens, predTokens, options);

  let gtIndex = 0;
  let predIndex = 0;
  let gtOffset = 0;
  let predOffset = 0;
  let insertedChars = 0;
  let deletedChars = 0;
  let unchangedChars = 0;
  let predUnchangedChars = 0;
  const operations: TextDiffOperation[] = [];

  for (const change of changes) {
    const count = change.value.length;
    if (count === 0) continue;

    if (change.added) {
      const tokens = predTokens.slice(predIndex, predIndex + count);
      const length = codePointLength(tokens);
      operations.push({
        type: 'insert',
        text: tokens.join(''),
        ground_truth_offset: gtOffset,
        predicted_offset: predOffset,
      });
      insertedChars += length;
      predIndex += count;
      predOffset += length;
    } else if (change.removed) {
      const tokens = gtTokens.slice(gtIndex, gtIndex + count);
      const length = codePointLength(tokens);
      operations.push({
        type: 'delete',
        text: tokens.join(''),
        ground_truth_offset: gtOffset,
        predicted_offset: predOffset,
      });
      deletedChars += length;
      gtIndex += count;
      gtOffset += length;
    } else {
      const gtPart = gtTokens.slice(gtIndex, gtIndex + count);
      const gtLength = codePointLength(gtPart);
      // Case folding can change a token's length, so measure both sides
      const predLength = codePointLength(predTokens.slice(predIndex, predIndex + count));
      operations.push({
        type: 'equal',
        text: gtPart.join(''),
        ground_truth_offset: gtOffset,
        predicted_offset: predOffset,
      });
      unchangedChars += gtLength;
      predUnchangedChars += predLength;
      gtIndex += count;
      predIndex += count;
      gtOffset += gtLength;
      predOffset += predLength;
    }
  }

  const gtLength = Array.from(groundTruth).length;
  const predLength = Array.from(predicted).length;
  const totalChars = gtLength + predLength;
  const similarityRatio =
    totalChars === 0 ? 1.0 : (unchangedChars + predUnchangedChars) / totalChars;

  const totalOps = operations.length;
  const truncated = totalOps > maxOperations;

  return {
    granularity,
    operations: truncated ? operations.slice(0, maxOperations) : operations,
    total_operations: totalOps,
    truncated,
    inserted_chars: insertedChars,
    deleted_chars: deletedChars,
    unchanged_chars: unchangedChars,
    similarity_ratio: Math.round(similarityRatio * 10000) / 10000,
    ground_truth_length: gtLength,
    predicted_length: predLength,
  };
}

/**
 * Generate a human-readable summary of the alignment
 */
export function generateSummary(diff: TextDiffResult): string {
  const parts: string[] = [];

  const pct = Math.round(diff.similarity_ratio * 100);
  parts.push(`${diff.granularity === 'word' ? 'Word' : 'Character'} alignment similarity: ${pct}%.`);
  parts.push(
    `${diff.unchanged_chars} unchanged, ${diff.deleted_chars} missing, ${diff.inserted_chars} extra characters.`
  );
  if (diff.truncated) {
    parts.push(
      `(Diff truncated: showing ${diff.operations.length} of ${diff.total_operations} operations.)`
    );
  }

  return parts.join(' ');
}
