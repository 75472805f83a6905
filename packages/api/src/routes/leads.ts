/**
 * Lead routes
 * Scoring (single and batch), listing, export and lookup of scored leads
 */
import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import {
  normalizeLead,
  normalizeLeads,
  summarizeLeads,
  toExportRecord,
} from '@cloud-prospector/agents/lead-scorer';
import type { AppDeps, AppEnv } from '../types';
import { notFoundError, readJsonBody, rejectInvalid, validationError } from '../middleware/error-handler';

const MAX_BATCH_SIZE = 1000;

const batchBodySchema = z.object({
  leads: z.array(z.unknown()).min(1).max(MAX_BATCH_SIZE),
});

const listQuerySchema = z.object({
  min_score: z.coerce.number().min(0).max(100).optional(),
});

export function createLeadRoutes(deps: AppDeps) {
  const leads = new Hono<AppEnv>();

  /**
   * POST /api/leads/score
   * Normalize, score and store one raw lead
   */
  leads.post('/score', async (c) => {
    const body = await readJsonBody(c);

    const normalized = normalizeLead(body);
    if (!normalized.ok) {
      throw validationError('Invalid lead', { errors: normalized.error.errors });
    }

    const result = deps.scorer.scoreWithRecommendations(normalized.value);
    await deps.leads.save(result.lead);

    return c.json({ success: true, ...result });
  });

  /**
   * POST /api/leads/batch
   * Score a list of raw leads; invalid records are reported, not fatal
   */
  leads.post('/batch', zValidator('json', batchBodySchema, rejectInvalid), async (c) => {
    const { leads: raws } = c.req.valid('json');

    const { leads: normalized, rejected } = normalizeLeads(raws);
    const batch = deps.scorer.scoreBatch(normalized);
    await deps.leads.saveMany(batch.leads);

    return c.json({
      success: true,
      leads: batch.leads,
      total_processed: batch.total_processed,
      succeeded: batch.succeeded,
      by_priority: batch.by_priority,
      errors: batch.errors,
      rejected,
      processing_time_ms: batch.processing_time_ms,
    });
  });

  /**
   * GET /api/leads?min_score=
   * Stored leads by score descending, with a summary
   */
  leads.get('/', zValidator('query', listQuerySchema, rejectInvalid), async (c) => {
    const { min_score } = c.req.valid('query');
    const list = await deps.leads.list({ minScore: min_score });

    return c.json({ success: true, leads: list, summary: summarizeLeads(list) });
  });

  /**
   * GET /api/leads/export
   * Every stored lead with its derived priority
   */
  leads.get('/export', async (c) => {
    const records = (await deps.leads.list()).map(toExportRecord);
    return c.json({ success: true, exported_at: new Date().toISOString(), records });
  });

  /**
   * GET /api/leads/:id
   */
  leads.get('/:id', async (c) => {
    const lead = await deps.leads.get(c.req.param('id'));
    if (!lead) {
      throw notFoundError('Lead');
    }
    return c.json({ success: true, lead, priority: toExportRecord(lead).priority });
  });

  return leads;
}
