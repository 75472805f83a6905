/**
 * Technographic Classifier
 *
 * Pure functions over a signal bag: cloud maturity stage, migration
 * opportunities and intent signals. applyTechnographics() folds the
 * resulting profile into a lead without mutating it.
 *
 * @module technographics/classifier
 */

import type { CloudMaturity, Lead } from '@cloud-prospector/lib';
import type {
  TechCategory,
  TechSignalBag,
  TechnographicProfile,
  IntentSignals,
  IntentIndicator,
  Urgency,
} from './contracts/tech-signals';
import { MODERN_FRONTEND_FRAMEWORKS, TARGET_PROVIDER } from './signatures';
import { logger as defaultLogger, type TechnographicsLogger } from './logger';

// ===========================================
// Thresholds
// ===========================================

export const MATURITY_THRESHOLDS = {
  /** Distinct managed-service indicators for 'native' */
  native: 5,
  /** Distinct managed-service indicators for 'mature' */
  mature: 2,
  /** Cloud-readiness indicators (cdn, analytics, modern frontend) for 'exploring' */
  exploring: 2,
} as const;

export const URGENCY_THRESHOLDS = {
  high: 50,
  medium: 30,
} as const;

/** Opportunities folded into a lead's pain points */
export const MAX_PAIN_POINT_OPPORTUNITIES = 3;

// ===========================================
// Bag Helpers
// ===========================================

function categoryMembers(bag: TechSignalBag, category: TechCategory): string[] {
  return bag.categories[category] ?? [];
}

function hasCategory(bag: TechSignalBag, category: TechCategory): boolean {
  return categoryMembers(bag, category).length > 0;
}

function hasModernFrontend(bag: TechSignalBag): boolean {
  return categoryMembers(bag, 'frontend').some((tech) =>
    MODERN_FRONTEND_FRAMEWORKS.includes(tech)
  );
}

/**
 * First detected provider other than the target, or null
 */
export function findCompetitorCloud(bag: TechSignalBag): string | null {
  return categoryMembers(bag, 'cloud_provider').find((p) => p !== TARGET_PROVIDER) ?? null;
}

// ===========================================
// Cloud Maturity
// ===========================================

/**
 * Derive the cloud maturity stage. Rules are ordered; first match wins.
 */
export function calculateCloudMaturity(bag: TechSignalBag): CloudMaturity {
  if (bag.technologies.length === 0) {
    return 'none';
  }

  const providers = categoryMembers(bag, 'cloud_provider');
  if (providers.length > 0) {
    if (!providers.includes(TARGET_PROVIDER)) {
      return 'adopting';
    }

    const services = new Set(bag.aws_services).size;
    if (services >= MATURITY_THRESHOLDS.native) return 'native';
    if (services >= MATURITY_THRESHOLDS.mature) return 'mature';
    return 'adopting';
  }

  let readinessIndicators = 0;
  if (hasCategory(bag, 'cdn')) readinessIndicators++;
  if (hasCategory(bag, 'analytics')) readinessIndicators++;
  if (hasModernFrontend(bag)) readinessIndicators++;

  return readinessIndicators >= MATURITY_THRESHOLDS.exploring ? 'exploring' : 'none';
}

// ===========================================
// Migration Opportunities
// ===========================================

export const MIGRATION_OPPORTUNITIES = {
  competitor: 'Migration from competitor cloud to AWS',
  firstTime: 'Cloud migration opportunity - currently on-premises or traditional hosting',
  ecommerce: 'E-commerce platform would benefit from AWS scalability',
  database: 'Database migration to Amazon RDS for better management',
  cdn: 'CloudFront CDN implementation for better performance',
  analytics: 'Analytics workload migration to AWS for better insights',
} as const;

/**
 * All applicable opportunities, in fixed order
 */
export function detectMigrationOpportunities(bag: TechSignalBag): string[] {
  const opportunities: string[] = [];
  const hasProvider = hasCategory(bag, 'cloud_provider');

  if (findCompetitorCloud(bag) !== null) {
    opportunities.push(MIGRATION_OPPORTUNITIES.competitor);
  }

  if (!hasProvider && bag.tech_count > 0) {
    opportunities.push(MIGRATION_OPPORTUNITIES.firstTime);
  }

  if (hasCategory(bag, 'ecommerce') && !hasProvider) {
    opportunities.push(MIGRATION_OPPORTUNITIES.ecommerce);
  }

  if (hasCategory(bag, 'database') && !bag.aws_services.includes('rds')) {
    opportunities.push(MIGRATION_OPPORTUNITIES.database);
  }

  if (!hasCategory(bag, 'cdn') && bag.tech_count > 3) {
    opportunities.push(MIGRATION_OPPORTUNITIES.cdn);
  }

  if (hasCategory(bag, 'analytics') && !hasProvider) {
    opportunities.push(MIGRATION_OPPORTUNITIES.analytics);
  }

  return opportunities;
}

// ===========================================
// Intent Signals
// ===========================================

export function urgencyForScore(score: number): Urgency {
  if (score >= URGENCY_THRESHOLDS.high) return 'high';
  if (score >= URGENCY_THRESHOLDS.medium) return 'medium';
  return 'low';
}

/**
 * Additive buying-intent score with the indicator behind each addition
 */
export function calculateIntentSignals(bag: TechSignalBag): IntentSignals {
  const indicators: IntentIndicator[] = [];
  const providers = categoryMembers(bag, 'cloud_provider');
  const hasProvider = providers.length > 0;

  if (!hasProvider) {
    indicators.push({ indicator: 'No cloud provider detected - migration opportunity', points: 20 });
  }

  if (hasProvider && !providers.includes(TARGET_PROVIDER)) {
    indicators.push({ indicator: 'Using competitor cloud - potential switch', points: 30 });
  }

  if (hasCategory(bag, 'ecommerce') && !hasCategory(bag, 'cdn')) {
    indicators.push({ indicator: 'E-commerce without CDN - performance opportunity', points: 25 });
  }

  if (hasCategory(bag, 'database') && !hasProvider) {
    indicators.push({ indicator: 'Database workloads not in cloud', points: 15 });
  }

  if (hasModernFrontend(bag)) {
    indicators.push({ indicator: 'Modern tech stack - cloud-ready', points: 10 });
  }

  const score = indicators.reduce((sum, i) => sum + i.points, 0);

  return {
    score,
    urgency: urgencyForScore(score),
    indicators,
  };
}

// ===========================================
// Profile
// ===========================================

/**
 * Classify a signal bag into a full technographic profile
 */
export function classifyTechnographics(
  bag: TechSignalBag,
  log: TechnographicsLogger = defaultLogger,
  companyName?: string
): TechnographicProfile {
  const profile: TechnographicProfile = {
    cloud_maturity: calculateCloudMaturity(bag),
    migration_opportunities: detectMigrationOpportunities(bag),
    intent: calculateIntentSignals(bag),
    aws_usage: bag.technologies.includes(TARGET_PROVIDER),
    competitor_cloud: findCompetitorCloud(bag),
  };

  log.technographicsClassified({
    company_name: companyName,
    cloud_maturity: profile.cloud_maturity,
    intent_score: profile.intent.score,
    urgency: profile.intent.urgency,
    opportunities: profile.migration_opportunities.length,
  });

  return profile;
}

/**
 * Return a copy of the lead enriched with the bag and its profile.
 *
 * aws_usage and competitor_cloud are only ever set, never cleared, so a
 * value known from another source survives an inspection that missed it.
 */
export function applyTechnographics(
  lead: Lead,
  bag: TechSignalBag,
  log: TechnographicsLogger = defaultLogger
): Lead {
  const profile = classifyTechnographics(bag, log, lead.company_name);

  const painPoints = [...lead.pain_points];
  for (const opportunity of profile.migration_opportunities.slice(0, MAX_PAIN_POINT_OPPORTUNITIES)) {
    if (!painPoints.includes(opportunity)) {
      painPoints.push(opportunity);
    }
  }

  return {
    ...lead,
    technologies_used: bag.technologies,
    cloud_maturity: profile.cloud_maturity,
    aws_usage: lead.aws_usage || profile.aws_usage,
    competitor_cloud: profile.competitor_cloud ?? lead.competitor_cloud,
    pain_points: painPoints,
    metadata: {
      ...lead.metadata,
      technographics: {
        categories: bag.categories,
        aws_services: bag.aws_services,
        intent_signals: profile.intent,
        migration_opportunities: profile.migration_opportunities,
      },
    },
    updated_at: new Date().toISOString(),
  };
}
