/**
 * Scoring Factors
 *
 * Pure evaluators for the four fit factors. Each returns 0-100.
 *
 * Note the deliberate mix of additive bonuses and max() floors:
 * - digital_maturity: the cloud-maturity stage score is a floor over the
 *   website/technology total; notes keywords are added on top of it
 * - cloud_usage: the pain-point value competes with the provider value
 *   via max(), it is never added to it
 *
 * @module lead-scorer/factors
 */

import {
  COMPANY_SIZE_SCORES,
  CLOUD_MATURITY_SCORES,
  SECTOR_FIT_SCORES,
  isTargetSector,
  type Lead,
  type ScoreDetails,
  type ScoringFactor,
} from '@cloud-prospector/lib';

// ===========================================
// Keyword Tables
// ===========================================

/** Free-text notes keywords hinting at digital transformation */
export const NOTES_TECH_KEYWORDS: readonly string[] = [
  'digital',
  'tech',
  'software',
  'cloud',
  'data',
  'analytics',
  'ai',
  'ml',
  'automation',
  'devops',
];

/** Target-provider managed services recognised inside technology names */
export const AWS_SERVICE_KEYWORDS: readonly string[] = [
  'ec2',
  's3',
  'rds',
  'lambda',
  'cloudfront',
  'elastic',
  'dynamodb',
  'redshift',
  'sagemaker',
  'ecs',
  'eks',
  'fargate',
  'aurora',
  'cloudwatch',
  'route53',
];

/** Pain points the target provider can address */
export const AWS_SOLVABLE_PAIN_KEYWORDS: readonly string[] = [
  'scalability',
  'performance',
  'cost',
  'reliability',
  'security',
  'compliance',
  'infrastructure',
  'deployment',
  'monitoring',
  'backup',
  'disaster recovery',
];

/** Migration potential per competing provider (lowercase keys) */
export const COMPETITOR_CLOUD_SCORES: Readonly<Record<string, number>> = {
  azure: 80,
  gcp: 80,
  'google cloud': 80,
  ibm: 70,
  'ibm cloud': 70,
  oracle: 70,
  'oracle cloud': 70,
  alibaba: 60,
  other: 50,
};

// ===========================================
// Defaults
// ===========================================

export const UNKNOWN_SIZE_SCORE = 30;
export const UNKNOWN_SECTOR_SCORE = 40;
export const DEFAULT_COMPETITOR_SCORE = 50;
export const DEFAULT_TARGET_SECTOR_SCORE = 80;

const WEBSITE_POINTS = 20;
const POINTS_PER_TECHNOLOGY = 10;
const MAX_TECHNOLOGY_POINTS = 40;
const POINTS_PER_NOTES_KEYWORD = 5;
const POINTS_PER_AWS_SERVICE = 20;
const MAX_AWS_SERVICE_POINTS = 80;
const POINTS_PER_PAIN_POINT = 10;
const MAX_PAIN_POINTS = 70;

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

// ===========================================
// Factor Evaluators
// ===========================================

export function scoreCompanySize(lead: Lead): number {
  return lead.company_size ? COMPANY_SIZE_SCORES[lead.company_size] : UNKNOWN_SIZE_SCORE;
}

export function scoreDigitalMaturity(lead: Lead): number {
  let score = 0;

  if (lead.website) {
    score += WEBSITE_POINTS;
  }

  const distinctTechnologies = new Set(lead.technologies_used).size;
  score += Math.min(distinctTechnologies * POINTS_PER_TECHNOLOGY, MAX_TECHNOLOGY_POINTS);

  if (lead.cloud_maturity) {
    score = Math.max(score, CLOUD_MATURITY_SCORES[lead.cloud_maturity]);
  }

  if (lead.notes) {
    const notes = lead.notes.toLowerCase();
    for (const keyword of NOTES_TECH_KEYWORDS) {
      if (notes.includes(keyword)) {
        score += POINTS_PER_NOTES_KEYWORD;
        if (score >= 100) break;
      }
    }
  }

  return clamp(score, 0, 100);
}

export function scoreCloudUsage(lead: Lead): number {
  let score = 0;

  if (lead.aws_usage) {
    score = 100;
  } else if (lead.competitor_cloud) {
    score = COMPETITOR_CLOUD_SCORES[lead.competitor_cloud.trim().toLowerCase()] ?? DEFAULT_COMPETITOR_SCORE;
  } else if (lead.technologies_used.length > 0) {
    const serviceMentions = lead.technologies_used.filter((tech) => {
      const name = tech.toLowerCase();
      return AWS_SERVICE_KEYWORDS.some((keyword) => name.includes(keyword));
    }).length;
    score = Math.min(serviceMentions * POINTS_PER_AWS_SERVICE, MAX_AWS_SERVICE_POINTS);
  }

  const solvablePains = lead.pain_points.filter((pain) => {
    const text = pain.toLowerCase();
    return AWS_SOLVABLE_PAIN_KEYWORDS.some((keyword) => text.includes(keyword));
  }).length;

  return Math.max(score, Math.min(solvablePains * POINTS_PER_PAIN_POINT, MAX_PAIN_POINTS));
}

export function scoreSectorFit(lead: Lead): number {
  if (!lead.sector) {
    return UNKNOWN_SECTOR_SCORE;
  }
  if (!isTargetSector(lead.sector)) {
    return UNKNOWN_SECTOR_SCORE;
  }
  return SECTOR_FIT_SCORES[lead.sector] ?? DEFAULT_TARGET_SECTOR_SCORE;
}

// ===========================================
// All Factors
// ===========================================

export const FACTOR_EVALUATORS: Readonly<Record<ScoringFactor, (lead: Lead) => number>> = {
  company_size: scoreCompanySize,
  digital_maturity: scoreDigitalMaturity,
  cloud_usage: scoreCloudUsage,
  sector_fit: scoreSectorFit,
};

/**
 * Evaluate every factor for a lead
 */
export function evaluateFactors(lead: Lead): Required<ScoreDetails> {
  return {
    company_size: FACTOR_EVALUATORS.company_size(lead),
    digital_maturity: FACTOR_EVALUATORS.digital_maturity(lead),
    cloud_usage: FACTOR_EVALUATORS.cloud_usage(lead),
    sector_fit: FACTOR_EVALUATORS.sector_fit(lead),
  };
}
