/**
 * Playlist Criteria Matching
 *
 * A lead matches when every present criterion holds. Empty arrays impose
 * no constraint. Matching is pure and idempotent.
 *
 * @module playlists/criteria
 */

import type { Lead, PlaylistCriteria } from '@cloud-prospector/lib';

function isConstrained<T>(values: readonly T[] | undefined): values is readonly T[] {
  return values !== undefined && values.length > 0;
}

/**
 * True when any keyword is a substring of the lowercased, space-joined list
 */
function mentionsAny(items: readonly string[], keywords: readonly string[]): boolean {
  const haystack = items.map((item) => item.toLowerCase()).join(' ');
  return keywords.some((keyword) => haystack.includes(keyword.toLowerCase()));
}

export function matchesCriteria(lead: Lead, criteria: PlaylistCriteria): boolean {
  if (criteria.min_score !== undefined && lead.score < criteria.min_score) {
    return false;
  }

  if (isConstrained(criteria.sectors) && (!lead.sector || !criteria.sectors.includes(lead.sector))) {
    return false;
  }

  if (
    isConstrained(criteria.company_sizes) &&
    (!lead.company_size || !criteria.company_sizes.includes(lead.company_size))
  ) {
    return false;
  }

  if (
    isConstrained(criteria.cloud_maturity) &&
    (!lead.cloud_maturity || !criteria.cloud_maturity.includes(lead.cloud_maturity))
  ) {
    return false;
  }

  if (isConstrained(criteria.competitor_cloud)) {
    const competitor = lead.competitor_cloud?.toLowerCase();
    if (!competitor || !criteria.competitor_cloud.some((c) => c.toLowerCase() === competitor)) {
      return false;
    }
  }

  if (criteria.has_website && !lead.website) {
    return false;
  }

  if (
    isConstrained(criteria.technologies_mentioned) &&
    !mentionsAny(lead.technologies_used, criteria.technologies_mentioned)
  ) {
    return false;
  }

  if (isConstrained(criteria.pain_points) && !mentionsAny(lead.pain_points, criteria.pain_points)) {
    return false;
  }

  return true;
}

/**
 * Matching leads by score descending (ties keep pool order), truncated
 * to the criteria limit
 */
export function filterLeadsByCriteria(leads: readonly Lead[], criteria: PlaylistCriteria): Lead[] {
  const matched = leads
    .filter((lead) => matchesCriteria(lead, criteria))
    .sort((a, b) => b.score - a.score);

  return criteria.limit === undefined ? matched : matched.slice(0, criteria.limit);
}
