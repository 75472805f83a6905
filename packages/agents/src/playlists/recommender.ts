/**
 * Playlist Template Recommender
 *
 * Ranks the template catalogue for a user. Confidence is accumulated in
 * integer hundredths so ties compare exactly.
 *
 * @module playlists/recommender
 */

import type { Lead, PlaylistCriteria, UserPreferences } from '@cloud-prospector/lib';
import { filterLeadsByCriteria } from './criteria';
import { PLAYLIST_TEMPLATES } from './templates';
import type { PlaylistRecommendation, PlaylistTemplate } from './types';

// ===========================================
// Constants
// ===========================================

export const DEFAULT_USER_PREFERENCES: Omit<UserPreferences, 'user_id'> = {
  preferred_sectors: ['banking', 'technology', 'retail'],
  preferred_company_sizes: ['medium', 'large', 'enterprise'],
  min_score: 60,
  max_leads_per_day: 10,
};

export function defaultPreferences(userId: string): UserPreferences {
  return {
    user_id: userId,
    ...DEFAULT_USER_PREFERENCES,
    preferred_sectors: [...DEFAULT_USER_PREFERENCES.preferred_sectors],
    preferred_company_sizes: [...DEFAULT_USER_PREFERENCES.preferred_company_sizes],
  };
}

const ESTIMATE_BASE = 100;

/** Percent kept once min_score exceeds the threshold, checked in order */
const SCORE_SELECTIVITY: ReadonlyArray<{ above: number; percent: number }> = [
  { above: 80, percent: 30 },
  { above: 70, percent: 50 },
  { above: 60, percent: 70 },
];

/** Percent kept for exactly N named sectors */
const SECTOR_SELECTIVITY: Readonly<Record<number, number>> = { 1: 60, 2: 80 };

const CONFIDENCE_BASE = 50;
const CONFIDENCE_SECTOR_OVERLAP = 20;
const CONFIDENCE_SCORE_ALIGNED = 15;
const CONFIDENCE_KEYWORD = 15;
const SCORE_ALIGNMENT_TOLERANCE = 10;
const NEUTRAL_MIN_SCORE = 50;

const DESCRIPTION_KEYWORDS = ['aws', 'cloud', 'migration', 'banking', 'fintech'];

// ===========================================
// Filtering
// ===========================================

function sharesSector(criteria: PlaylistCriteria, preferences: UserPreferences): boolean {
  const sectors = criteria.sectors ?? [];
  return sectors.some((sector) => preferences.preferred_sectors.includes(sector));
}

/**
 * A template is offered when its sectors overlap the preferred ones (if
 * both name any) and its score floor is no lower than the user's
 */
export function matchesUserPreferences(template: PlaylistTemplate, preferences: UserPreferences): boolean {
  const sectors = template.criteria.sectors ?? [];
  if (sectors.length > 0 && preferences.preferred_sectors.length > 0 && !sharesSector(template.criteria, preferences)) {
    return false;
  }

  return (template.criteria.min_score ?? 0) >= preferences.min_score;
}

// ===========================================
// Estimation and Confidence
// ===========================================

/**
 * Matching lead count over a non-empty pool, otherwise a heuristic from
 * the criteria's selectivity
 */
export function estimatePlaylistSize(criteria: PlaylistCriteria, pool?: readonly Lead[]): number {
  if (pool && pool.length > 0) {
    return filterLeadsByCriteria(pool, { ...criteria, limit: undefined }).length;
  }

  const minScore = criteria.min_score ?? 0;
  const scorePercent = SCORE_SELECTIVITY.find((step) => minScore > step.above)?.percent ?? 100;
  const sectorPercent = SECTOR_SELECTIVITY[criteria.sectors?.length ?? 0] ?? 100;

  return Math.floor((ESTIMATE_BASE * scorePercent * sectorPercent) / 10_000);
}

export function calculateConfidence(template: PlaylistTemplate, preferences: UserPreferences): number {
  let hundredths = CONFIDENCE_BASE;

  if (sharesSector(template.criteria, preferences)) {
    hundredths += CONFIDENCE_SECTOR_OVERLAP;
  }

  const minScore = template.criteria.min_score ?? NEUTRAL_MIN_SCORE;
  if (Math.abs(minScore - preferences.min_score) <= SCORE_ALIGNMENT_TOLERANCE) {
    hundredths += CONFIDENCE_SCORE_ALIGNED;
  }

  const description = template.description.toLowerCase();
  if (DESCRIPTION_KEYWORDS.some((keyword) => description.includes(keyword))) {
    hundredths += CONFIDENCE_KEYWORD;
  }

  return Math.min(hundredths, 100) / 100;
}

// ===========================================
// Ranking
// ===========================================

export function recommendTemplates(
  preferences: UserPreferences,
  options: { pool?: readonly Lead[]; limit?: number; templates?: readonly PlaylistTemplate[] } = {}
): PlaylistRecommendation[] {
  const templates = options.templates ?? PLAYLIST_TEMPLATES;
  const limit = options.limit ?? 5;

  return templates
    .filter((template) => matchesUserPreferences(template, preferences))
    .map((template) => ({
      ...template,
      estimated_leads: estimatePlaylistSize(template.criteria, options.pool),
      confidence: calculateConfidence(template, preferences),
      playlist_type: 'dynamic' as const,
    }))
    .sort((a, b) => b.confidence - a.confidence || b.estimated_leads - a.estimated_leads)
    .slice(0, limit);
}
