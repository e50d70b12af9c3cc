/**
 * Levenshtein Edit Distance
 *
 * One dynamic-programming routine shared by the character-level and
 * word-level metrics. Units are compared through an equality predicate, so
 * the same code scores code points and whole word tokens.
 *
 * @module services/metrics/edit-distance
 */

/** Equality predicate between two units of a sequence */
export type UnitEquals<T> = (a: T, b: T) => boolean;

/**
 * Minimum number of unit insertions, deletions and substitutions that turn
 * `source` into `target`. Each operation costs 1; matching units cost 0.
 *
 * Keeps a single rolling row sized to the shorter sequence, so memory is
 * O(min(m, n)) while time stays O(m * n). The result is symmetric for any
 * symmetric `equals`.
 */
export function editDistance<T>(
  source: readonly T[],
  target: readonly T[],
  equals: UnitEquals<T> = Object.is
): number {
  const [longer, shorter] = source.length >= target.length ? [source, target] : [target, source];

  if (shorter.length === 0) {
    return longer.length;
  }

  let previous: number[] = Array.from({ length: shorter.length + 1 }, (_, j) => j);

  for (let i = 0; i < longer.length; i++) {
    const current: number[] = [i + 1];
    for (let j = 0; j < shorter.length; j++) {
      const insertion = previous[j + 1] + 1;
      const deletion = current[j] + 1;
      const substitution = previous[j] + (equals(longer[i], shorter[j]) ? 0 : 1);
      current.push(Math.min(insertion, deletion, substitution));
    }
    previous = current;
  }

  return previous[shorter.length];
}

/**
 * Split a string into Unicode code points.
 *
 * Surrogate pairs (emoji, CJK extension planes) count as one unit, unlike
 * String.prototype.length.
 */
export function toCodePoints(text: string): string[] {
  return Array.from(text);
}

/**
 * Split text into words on runs of whitespace. Leading and trailing
 * whitespace produce no empty tokens.
 */
export function tokenizeWords(text: string): string[] {
  return text.split(/\s+/).filter((token) => token.length > 0);
}

/**
 * Case-sensitive character edit distance between two strings
 */
export function levenshteinDistance(a: string, b: string): number {
  return editDistance(toCodePoints(a), toCodePoints(b));
}
