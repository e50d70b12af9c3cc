/**
 * Accuracy Rating Tiers
 *
 * @module services/metrics/rating
 */

import type { RatingTier } from '../../models/metrics.js';

/** Lower bound (inclusive) of each tier, highest first. Anything below is 'Bad'. */
export const RATING_THRESHOLDS: ReadonlyArray<{ tier: RatingTier; min_accuracy: number }> = [
  { tier: 'Excellent', min_accuracy: 95 },
  { tier: 'Good', min_accuracy: 85 },
  { tier: 'Fair', min_accuracy: 70 },
  { tier: 'Poor', min_accuracy: 50 },
];

/**
 * Map an accuracy percentage to its tier. NaN rates as 'Bad'.
 */
export function getRatingTier(accuracy: number): RatingTier {
  for (const { tier, min_accuracy } of RATING_THRESHOLDS) {
    if (accuracy >= min_accuracy) return tier;
  }
  return 'Bad';
}
