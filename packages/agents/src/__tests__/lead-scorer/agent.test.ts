/**
 * Lead Scorer Agent Tests
 *
 * Tests for single-lead scoring, recommendations and batch processing:
 * - every input lead appears in the output
 * - failures become score 0 items with a ScoreError
 * - stable ordering by score
 * - progress callbacks and logging
 *
 * @module __tests__/lead-scorer/agent.test
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { LeadSchema, type Lead, type RawLead } from '@cloud-prospector/lib';
import { LeadScorerAgent, createLeadScorerAgent } from '../../lead-scorer/agent';
import type { CrmSyncAdapter } from '../../lead-scorer/crm-sync';
import { createLogger } from '../../lead-scorer/logger';

// ===========================================
// Test Fixtures
// ===========================================

function createTestLead(id: string, overrides: Partial<RawLead> = {}): Lead {
  return LeadSchema.parse({ lead_id: id, company_name: `Company ${id}`, ...overrides });
}

function captureLogger() {
  const lines: Array<Record<string, unknown>> = [];
  const logger = createLogger({
    level: 'debug',
    output: (message) => lines.push(JSON.parse(message)),
  });
  return { logger, lines };
}

const HOT_FIELDS: Partial<RawLead> = {
  sector: 'banking',
  company_size: 'enterprise',
  website: 'https://bank.example',
  aws_usage: true,
};

// ===========================================
// Single Lead
// ===========================================

describe('LeadScorerAgent.scoreLead', () => {
  let agent: LeadScorerAgent;
  let lines: Array<Record<string, unknown>>;

  beforeEach(() => {
    const captured = captureLogger();
    lines = captured.lines;
    agent = createLeadScorerAgent();
    agent.setLogger(captured.logger);
  });

  it('scores and logs the lead', () => {
    const scored = agent.scoreLead(createTestLead('l1', HOT_FIELDS));

    expect(scored.score).toBe(80);
    expect(lines[0]).toMatchObject({
      event: 'lead_scored',
      lead_id: 'l1',
      company_name: 'Company l1',
      score: 80,
      priority: 'HOT',
    });
  });

  it('uses configured weights', () => {
    const custom = createLeadScorerAgent({
      weights: { company_size: 1, digital_maturity: 0, cloud_usage: 0, sector_fit: 0 },
    });
    custom.setLogger(captureLogger().logger);

    expect(custom.scoreLead(createTestLead('l1')).score).toBe(30);
  });

  it('returns priority and recommendations', () => {
    const response = agent.scoreWithRecommendations(
      createTestLead('l1', { ...HOT_FIELDS, cloud_maturity: 'none' })
    );

    expect(response.priority).toBe('HOT');
    expect(response.score).toBe(response.lead.score);
    expect(response.recommendations).toEqual([
      'Enterprise-grade AWS solutions with dedicated support',
      'Cost optimization assessment for large-scale infrastructure',
      'Cloud readiness assessment and migration planning',
      'Compliance and security assessment',
      'High-availability architecture',
    ]);
  });

  it('honours maxRecommendations', () => {
    const limited = createLeadScorerAgent({ maxRecommendations: 2 });
    limited.setLogger(captureLogger().logger);

    const response = limited.scoreWithRecommendations(createTestLead('l1', HOT_FIELDS));
    expect(response.recommendations).toHaveLength(2);
  });
});

// ===========================================
// Batch
// ===========================================

describe('LeadScorerAgent.scoreBatch', () => {
  let agent: LeadScorerAgent;
  let lines: Array<Record<string, unknown>>;

  beforeEach(() => {
    const captured = captureLogger();
    lines = captured.lines;
    agent = new LeadScorerAgent();
    agent.setLogger(captured.logger);
  });

  it('returns every lead sorted by score, ties in input order', () => {
    const leads = [
      createTestLead('a'),
      createTestLead('b', HOT_FIELDS),
      createTestLead('c'),
    ];

    const result = agent.scoreBatch(leads);

    expect(result.leads.map((l) => l.lead_id)).toEqual(['b', 'a', 'c']);
    expect(result.leads.map((l) => l.score)).toEqual([80, 17, 17]);
    expect(result.items.map((i) => i.index)).toEqual([1, 0, 2]);
    expect(result.total_processed).toBe(3);
    expect(result.succeeded).toBe(3);
    expect(result.by_priority).toEqual({ HOT: 1, WARM: 0, COOL: 0, COLD: 2 });
    expect(result.errors).toEqual([]);
  });

  it('keeps a failed lead with score 0 and reports the error', () => {
    const original = agent.scoreLead.bind(agent);
    vi.spyOn(agent, 'scoreLead').mockImplementation((lead) => {
      if (lead.lead_id === 'broken') {
        throw new Error('factor evaluation failed');
      }
      return original(lead);
    });

    const leads = [
      createTestLead('a'),
      createTestLead('broken', { score: 55, score_details: { sector_fit: 40 } }),
      createTestLead('b', HOT_FIELDS),
    ];

    const result = agent.scoreBatch(leads);

    expect(result.leads.map((l) => l.lead_id)).toEqual(['b', 'a', 'broken']);
    expect(result.total_processed).toBe(3);
    expect(result.succeeded).toBe(2);

    const failed = result.items[2];
    expect(failed.lead.score).toBe(0);
    expect(failed.lead.score_details).toEqual({});
    expect(failed.result).toEqual({
      ok: false,
      error: {
        lead_id: 'broken',
        company_name: 'Company broken',
        error_code: 'SCORING_FAILED',
        message: 'factor evaluation failed',
      },
    });
    expect(result.by_priority).toEqual({ HOT: 1, WARM: 0, COOL: 0, COLD: 1 });
  });

  it('reports progress for each lead', () => {
    const onProgress = vi.fn();

    agent.scoreBatch([createTestLead('a'), createTestLead('b')], { onProgress });

    expect(onProgress.mock.calls).toEqual([
      [1, 2],
      [2, 2],
    ]);
  });

  it('logs batch start and completion', () => {
    agent.scoreBatch([createTestLead('a')]);

    const events = lines.map((line) => line.event);
    expect(events).toEqual(['batch_started', 'lead_scored', 'batch_completed']);
    expect(lines[2]).toMatchObject({ total_processed: 1, succeeded: 1, failed: 0 });
  });

  it('handles an empty batch', () => {
    const result = agent.scoreBatch([]);

    expect(result.leads).toEqual([]);
    expect(result.total_processed).toBe(0);
  });
});

// ===========================================
// CRM Sync
// ===========================================

describe('LeadScorerAgent.syncToCrm', () => {
  const syncAll: CrmSyncAdapter = {
    syncLead: async () => ({ success: true, errors: [] }),
  };

  it('uses the configured minimum score', async () => {
    const { logger, lines } = captureLogger();
    const agent = createLeadScorerAgent({ crmMinScore: 75 });
    agent.setLogger(logger);

    const summary = await agent.syncToCrm(
      [createTestLead('a', { score: 80 }), createTestLead('b', { score: 70 }), createTestLead('c', { score: 75 })],
      syncAll
    );

    expect(summary.qualified).toBe(2);
    expect(summary.results.map((r) => r.lead_id)).toEqual(['a', 'c']);
    expect(lines.at(-1)).toMatchObject({ event: 'crm_sync_completed', total: 3, qualified: 2, successful: 2 });
  });

  it('defaults to a minimum of 60', async () => {
    const agent = createLeadScorerAgent();
    agent.setLogger(captureLogger().logger);

    const summary = await agent.syncToCrm(
      [createTestLead('a', { score: 60 }), createTestLead('b', { score: 59.5 })],
      syncAll
    );

    expect(summary.results.map((r) => r.lead_id)).toEqual(['a']);
  });
});
