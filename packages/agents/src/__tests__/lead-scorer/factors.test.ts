/**
 * Scoring Factor Tests
 *
 * @module __tests__/lead-scorer/factors.test
 */

import { describe, it, expect } from 'vitest';
import { LeadSchema, type Lead, type RawLead } from '@cloud-prospector/lib';
import {
  scoreCompanySize,
  scoreDigitalMaturity,
  scoreCloudUsage,
  scoreSectorFit,
  evaluateFactors,
} from '../../lead-scorer/factors';

function createTestLead(overrides: Partial<RawLead> = {}): Lead {
  return LeadSchema.parse({ company_name: 'Test Co', ...overrides });
}

describe('scoreCompanySize', () => {
  it('uses the size table', () => {
    expect(scoreCompanySize(createTestLead({ company_size: 'micro' }))).toBe(10);
    expect(scoreCompanySize(createTestLead({ company_size: 'large' }))).toBe(90);
    expect(scoreCompanySize(createTestLead({ company_size: 'enterprise' }))).toBe(100);
  });

  it('scores unknown size as 30', () => {
    expect(scoreCompanySize(createTestLead())).toBe(30);
  });
});

describe('scoreDigitalMaturity', () => {
  it('is 0 with nothing to go on', () => {
    expect(scoreDigitalMaturity(createTestLead())).toBe(0);
  });

  it('counts distinct technologies only', () => {
    const lead = createTestLead({ website: 'https://test.example', technologies_used: ['php', 'mysql', 'php'] });
    expect(scoreDigitalMaturity(lead)).toBe(40);
  });

  it('caps technology points at 40', () => {
    const lead = createTestLead({ technologies_used: ['a', 'b', 'c', 'd', 'e', 'f'] });
    expect(scoreDigitalMaturity(lead)).toBe(40);
  });

  it('uses the maturity stage as a floor, then adds notes keywords', () => {
    const lead = createTestLead({
      website: 'https://test.example',
      technologies_used: ['a', 'b'],
      cloud_maturity: 'native',
      notes: 'Cloud data platform',
    });
    // max(20 + 20, 80) + cloud + data
    expect(scoreDigitalMaturity(lead)).toBe(90);
  });

  it('keeps a higher website/technology total over the stage score', () => {
    const lead = createTestLead({
      website: 'https://test.example',
      technologies_used: ['a', 'b', 'c'],
      cloud_maturity: 'exploring',
    });
    expect(scoreDigitalMaturity(lead)).toBe(50);
  });

  it('stops adding notes keywords at 100', () => {
    const lead = createTestLead({
      cloud_maturity: 'native',
      notes: 'digital tech software cloud data analytics',
    });
    expect(scoreDigitalMaturity(lead)).toBe(100);
  });
});

describe('scoreCloudUsage', () => {
  it('gives 100 for target provider usage', () => {
    expect(scoreCloudUsage(createTestLead({ aws_usage: true, competitor_cloud: 'azure' }))).toBe(100);
  });

  it('looks up competitors case-insensitively', () => {
    expect(scoreCloudUsage(createTestLead({ competitor_cloud: 'Azure' }))).toBe(80);
    expect(scoreCloudUsage(createTestLead({ competitor_cloud: 'Oracle Cloud' }))).toBe(70);
    expect(scoreCloudUsage(createTestLead({ competitor_cloud: 'alibaba' }))).toBe(60);
  });

  it('scores an unrecognized competitor as 50', () => {
    expect(scoreCloudUsage(createTestLead({ competitor_cloud: 'Hetzner' }))).toBe(50);
  });

  it('counts technologies naming managed services', () => {
    const lead = createTestLead({ technologies_used: ['Amazon S3', 'AWS Lambda', 'Redis'] });
    expect(scoreCloudUsage(lead)).toBe(40);
  });

  it('takes the maximum with the pain point value', () => {
    const lead = createTestLead({
      technologies_used: ['Amazon S3'],
      pain_points: ['Scalability issues', 'High hosting cost', 'Weak security posture'],
    });
    expect(scoreCloudUsage(lead)).toBe(30);
  });

  it('caps the pain point value at 70', () => {
    const lead = createTestLead({
      pain_points: Array.from({ length: 9 }, (_, i) => `security gap ${i}`),
    });
    expect(scoreCloudUsage(lead)).toBe(70);
  });
});

describe('scoreSectorFit', () => {
  it('uses the fit table for target sectors', () => {
    expect(scoreSectorFit(createTestLead({ sector: 'banking' }))).toBe(100);
    expect(scoreSectorFit(createTestLead({ sector: 'fintech' }))).toBe(95);
    expect(scoreSectorFit(createTestLead({ sector: 'ecommerce' }))).toBe(80);
  });

  it('scores unknown and non-target sectors as 40', () => {
    expect(scoreSectorFit(createTestLead())).toBe(40);
    expect(scoreSectorFit(createTestLead({ sector: 'other' }))).toBe(40);
  });
});

describe('evaluateFactors', () => {
  it('returns every factor', () => {
    expect(evaluateFactors(createTestLead())).toEqual({
      company_size: 30,
      digital_maturity: 0,
      cloud_usage: 0,
      sector_fit: 40,
    });
  });
});
