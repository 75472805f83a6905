/**
 * Score Calculation Module
 *
 * Combines factor scores into the weighted total and derives the
 * priority tier.
 *
 * @module lead-scorer/scoring
 */

import { calculatePriority, type Lead, type Priority, type ScoreDetails } from '@cloud-prospector/lib';
import type { ScoringWeights } from './contracts/scoring-result';
import { DEFAULT_SCORING_WEIGHTS, ScoringWeightsSchema } from './contracts/scoring-result';
import { evaluateFactors } from './factors';

// ===========================================
// Score Calculation
// ===========================================

/**
 * Round to two decimal places
 */
export function roundScore(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Weighted sum of factor scores, rounded to 2 decimals
 */
export function weightedTotal(details: Required<ScoreDetails>, weights: ScoringWeights): number {
  const total =
    details.company_size * weights.company_size +
    details.digital_maturity * weights.digital_maturity +
    details.cloud_usage * weights.cloud_usage +
    details.sector_fit * weights.sector_fit;

  return roundScore(total);
}

/**
 * Calculate the total score for a lead
 */
export function calculateScore(
  lead: Lead,
  weights: ScoringWeights = DEFAULT_SCORING_WEIGHTS
): {
  score: number;
  priority: Priority;
  details: Required<ScoreDetails>;
} {
  const details = evaluateFactors(lead);
  const score = weightedTotal(details, weights);

  return {
    score,
    priority: calculatePriority(score),
    details,
  };
}

/**
 * Return a scored copy of the lead. The input is left untouched.
 */
export function applyScore(
  lead: Lead,
  weights: ScoringWeights = DEFAULT_SCORING_WEIGHTS,
  now: Date = new Date()
): Lead {
  const { score, details } = calculateScore(lead, weights);

  return {
    ...lead,
    score,
    score_details: details,
    updated_at: now.toISOString(),
  };
}

// ===========================================
// Priority Helpers
// ===========================================

/**
 * Get priority rank for sorting (lower = higher priority)
 */
export function getPriorityRank(priority: Priority): number {
  switch (priority) {
    case 'HOT':
      return 1;
    case 'WARM':
      return 2;
    case 'COOL':
      return 3;
    case 'COLD':
      return 4;
  }
}

// ===========================================
// Weight Helpers
// ===========================================

/**
 * Merge weight overrides over the defaults. Negative or non-finite
 * overrides are ignored; the sum is not enforced.
 */
export function loadScoringWeights(
  overrides: Partial<Record<keyof ScoringWeights, number | undefined>> = {}
): ScoringWeights {
  const pick = (key: keyof ScoringWeights): number => {
    const value = overrides[key];
    return value !== undefined && Number.isFinite(value) && value >= 0
      ? value
      : DEFAULT_SCORING_WEIGHTS[key];
  };

  return ScoringWeightsSchema.parse({
    company_size: pick('company_size'),
    digital_maturity: pick('digital_maturity'),
    cloud_usage: pick('cloud_usage'),
    sector_fit: pick('sector_fit'),
  });
}
