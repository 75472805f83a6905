/**
 * Opportunity Scoring
 *
 * Change detection and the additive opportunity score for a job move.
 *
 * @module job-change-monitor/opportunity
 */

import type { ChangeType, ProfileSnapshot, TrackedContact } from '@cloud-prospector/lib';
import type { ChangeFlags, OpportunityInput } from './types';

// ===========================================
// Keyword Tables
// ===========================================

/** Title fragments that mark a decision-making role */
export const SENIOR_KEYWORDS: readonly string[] = [
  'diretor',
  'director',
  'head',
  'vp',
  'vice',
  'chief',
  'ceo',
  'cto',
  'cio',
];

/** Company name fragments for the target industry */
export const TARGET_INDUSTRY_KEYWORDS: readonly string[] = [
  'tecnologia',
  'tech',
  'cloud',
  'aws',
  'digital',
  'software',
];

export const OPPORTUNITY_POINTS = {
  base: 50,
  companyChange: 20,
  promotion: 30,
  seniorToSenior: 15,
  targetIndustry: 10,
  recency: 10,
} as const;

// ===========================================
// Detection
// ===========================================

export function isSeniorTitle(title: string): boolean {
  const lower = title.toLowerCase();
  return SENIOR_KEYWORDS.some((keyword) => lower.includes(keyword));
}

/**
 * Compare a stored contact with an observed profile. A field counts as
 * changed only when the observed value is present and differs.
 */
export function detectChange(contact: TrackedContact, observed: ProfileSnapshot): ChangeFlags {
  return {
    company_changed: observed.company !== null && observed.company !== contact.current_company,
    role_changed: observed.role !== null && observed.role !== contact.current_role,
  };
}

export function classifyChange(flags: ChangeFlags): ChangeType | null {
  if (flags.company_changed && flags.role_changed) return 'both';
  if (flags.company_changed) return 'company';
  if (flags.role_changed) return 'role';
  return null;
}

// ===========================================
// Scoring
// ===========================================

/**
 * Additive opportunity score, capped at 100. Seniority points need both
 * the previous and the new role.
 */
export function calculateOpportunityScore(input: OpportunityInput): number {
  let score: number = OPPORTUNITY_POINTS.base;

  if (input.company_changed) {
    score += OPPORTUNITY_POINTS.companyChange;
  }

  if (input.previous_role && input.new_role) {
    const wasSenior = isSeniorTitle(input.previous_role);
    const isSenior = isSeniorTitle(input.new_role);

    if (isSenior && !wasSenior) {
      score += OPPORTUNITY_POINTS.promotion;
    } else if (isSenior) {
      score += OPPORTUNITY_POINTS.seniorToSenior;
    }
  }

  if (input.new_company) {
    const company = input.new_company.toLowerCase();
    if (TARGET_INDUSTRY_KEYWORDS.some((keyword) => company.includes(keyword))) {
      score += OPPORTUNITY_POINTS.targetIndustry;
    }
  }

  // A fresh move is always a good moment to reach out
  score += OPPORTUNITY_POINTS.recency;

  return Math.min(score, 100);
}
