/**
 * Technographic Classifier Tests
 *
 * Tests for cloud maturity derivation, migration opportunities,
 * intent signals and lead enrichment.
 *
 * @module __tests__/technographics/classifier.test
 */

import { describe, it, expect } from 'vitest';
import { validateLead, type Lead } from '@cloud-prospector/lib';
import {
  calculateCloudMaturity,
  detectMigrationOpportunities,
  calculateIntentSignals,
  classifyTechnographics,
  applyTechnographics,
  MIGRATION_OPPORTUNITIES,
} from '../../technographics/classifier';
import { createLogger } from '../../technographics/logger';
import type { TechCategory, TechSignalBag } from '../../technographics/contracts';

// ===========================================
// Test Helpers
// ===========================================

const silentLogger = createLogger({ output: () => {} });

function createBag(
  categories: Partial<Record<TechCategory, string[]>>,
  awsServices: string[] = []
): TechSignalBag {
  const technologies = Array.from(
    new Set(Object.values(categories).flatMap((members) => members ?? []))
  );
  return {
    technologies,
    categories,
    aws_services: awsServices,
    tech_count: technologies.length,
  };
}

function createTestLead(overrides: Partial<Lead> = {}): Lead {
  return {
    ...validateLead({ lead_id: 'lead-1', company_name: 'Acme Varejo' }),
    ...overrides,
  };
}

// ===========================================
// calculateCloudMaturity
// ===========================================

describe('calculateCloudMaturity', () => {
  it('returns none when nothing was detected', () => {
    expect(calculateCloudMaturity(createBag({}))).toBe('none');
  });

  it('returns adopting for a competing provider without the target', () => {
    expect(calculateCloudMaturity(createBag({ cloud_provider: ['azure'] }))).toBe('adopting');
  });

  it('returns native with five or more distinct target services', () => {
    const bag = createBag({ cloud_provider: ['aws'] }, ['s3', 'cloudfront', 'rds', 'lambda', 'ecs']);
    expect(calculateCloudMaturity(bag)).toBe('native');
  });

  it('returns mature with two to four target services', () => {
    const bag = createBag({ cloud_provider: ['aws'] }, ['s3', 'cloudfront']);
    expect(calculateCloudMaturity(bag)).toBe('mature');
  });

  it('returns adopting with the target provider and fewer than two services', () => {
    expect(calculateCloudMaturity(createBag({ cloud_provider: ['aws'] }, ['s3']))).toBe('adopting');
  });

  it('counts duplicate service indicators once', () => {
    const bag = createBag({ cloud_provider: ['aws'] }, ['s3', 's3']);
    expect(calculateCloudMaturity(bag)).toBe('adopting');
  });

  it('uses target-service depth when both target and competitor are present', () => {
    const bag = createBag({ cloud_provider: ['azure', 'aws'] }, ['s3', 'rds']);
    expect(calculateCloudMaturity(bag)).toBe('mature');
  });

  it('returns exploring with two readiness indicators and no provider', () => {
    expect(calculateCloudMaturity(createBag({ cdn: ['cloudflare'], analytics: ['hotjar'] }))).toBe(
      'exploring'
    );
    expect(calculateCloudMaturity(createBag({ frontend: ['react'], cdn: ['akamai'] }))).toBe(
      'exploring'
    );
  });

  it('returns none with a single readiness indicator', () => {
    expect(calculateCloudMaturity(createBag({ cdn: ['cloudflare'] }))).toBe('none');
  });

  it('ignores non-modern frontend libraries', () => {
    expect(calculateCloudMaturity(createBag({ frontend: ['jquery'], cdn: ['akamai'] }))).toBe('none');
  });
});

// ===========================================
// detectMigrationOpportunities
// ===========================================

describe('detectMigrationOpportunities', () => {
  it('flags competitor migration', () => {
    expect(detectMigrationOpportunities(createBag({ cloud_provider: ['gcp'] }))).toEqual([
      MIGRATION_OPPORTUNITIES.competitor,
    ]);
  });

  it('returns every applicable opportunity in fixed order', () => {
    const bag = createBag({
      ecommerce: ['magento'],
      database: ['mysql'],
      analytics: ['google_analytics'],
      backend: ['php'],
    });

    expect(detectMigrationOpportunities(bag)).toEqual([
      MIGRATION_OPPORTUNITIES.firstTime,
      MIGRATION_OPPORTUNITIES.ecommerce,
      MIGRATION_OPPORTUNITIES.database,
      MIGRATION_OPPORTUNITIES.cdn,
      MIGRATION_OPPORTUNITIES.analytics,
    ]);
  });

  it('skips the managed database opportunity when rds is detected', () => {
    const bag = createBag({ cloud_provider: ['aws'], database: ['postgresql'] }, ['rds']);
    expect(detectMigrationOpportunities(bag)).toEqual([]);
  });

  it('returns nothing for an empty bag', () => {
    expect(detectMigrationOpportunities(createBag({}))).toEqual([]);
  });
});

// ===========================================
// calculateIntentSignals
// ===========================================

describe('calculateIntentSignals', () => {
  it('adds points with an indicator for each signal', () => {
    const bag = createBag({
      ecommerce: ['magento'],
      database: ['mysql'],
      analytics: ['google_analytics'],
      backend: ['php'],
    });

    const intent = calculateIntentSignals(bag);

    expect(intent.score).toBe(60);
    expect(intent.urgency).toBe('high');
    expect(intent.indicators.map((i) => i.points)).toEqual([20, 25, 15]);
  });

  it('scores a competitor-only stack as medium urgency', () => {
    const intent = calculateIntentSignals(createBag({ cloud_provider: ['azure'] }));

    expect(intent.score).toBe(30);
    expect(intent.urgency).toBe('medium');
    expect(intent.indicators).toEqual([
      { indicator: 'Using competitor cloud - potential switch', points: 30 },
    ]);
  });

  it('gives no points to a target-only stack', () => {
    const intent = calculateIntentSignals(createBag({ cloud_provider: ['aws'] }, ['s3']));

    expect(intent).toEqual({ score: 0, urgency: 'low', indicators: [] });
  });

  it('rewards a modern frontend', () => {
    const intent = calculateIntentSignals(createBag({ frontend: ['react'] }));

    expect(intent.score).toBe(30);
    expect(intent.urgency).toBe('medium');
  });
});

// ===========================================
// classifyTechnographics / applyTechnographics
// ===========================================

describe('classifyTechnographics', () => {
  it('identifies target usage and the first competitor', () => {
    const profile = classifyTechnographics(
      createBag({ cloud_provider: ['aws', 'azure', 'gcp'] }),
      silentLogger
    );

    expect(profile.aws_usage).toBe(true);
    expect(profile.competitor_cloud).toBe('azure');
  });
});

describe('applyTechnographics', () => {
  const bag = createBag({
    ecommerce: ['magento'],
    database: ['mysql'],
    analytics: ['google_analytics'],
    backend: ['php'],
  });

  it('folds the profile into a copy of the lead', () => {
    const lead = createTestLead({ pain_points: ['cost'] });
    const enriched = applyTechnographics(lead, bag, silentLogger);

    expect(enriched.technologies_used).toEqual(['magento', 'mysql', 'google_analytics', 'php']);
    expect(enriched.cloud_maturity).toBe('none');
    expect(enriched.aws_usage).toBe(false);
    expect(enriched.competitor_cloud).toBeUndefined();
    expect(enriched.pain_points).toEqual([
      'cost',
      MIGRATION_OPPORTUNITIES.firstTime,
      MIGRATION_OPPORTUNITIES.ecommerce,
      MIGRATION_OPPORTUNITIES.database,
    ]);
    expect(lead.pain_points).toEqual(['cost']);
  });

  it('records intent signals in metadata', () => {
    const enriched = applyTechnographics(createTestLead(), bag, silentLogger);

    expect(enriched.metadata.technographics).toMatchObject({
      intent_signals: { score: 60, urgency: 'high' },
    });
  });

  it('does not duplicate opportunities already present', () => {
    const lead = createTestLead({ pain_points: [MIGRATION_OPPORTUNITIES.firstTime] });
    const enriched = applyTechnographics(lead, bag, silentLogger);

    expect(enriched.pain_points.filter((p) => p === MIGRATION_OPPORTUNITIES.firstTime)).toHaveLength(1);
  });

  it('keeps a known target usage flag', () => {
    const lead = createTestLead({ aws_usage: true });
    expect(applyTechnographics(lead, createBag({}), silentLogger).aws_usage).toBe(true);
  });

  it('sets the competitor from the bag', () => {
    const enriched = applyTechnographics(
      createTestLead(),
      createBag({ cloud_provider: ['azure'] }),
      silentLogger
    );

    expect(enriched.competitor_cloud).toBe('azure');
    expect(enriched.cloud_maturity).toBe('adopting');
  });
});
