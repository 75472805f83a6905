/**
 * Technographics routes
 * Classify a signal bag, or inspect a website first; optionally apply the
 * profile to a stored lead and rescore it
 */
import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import {
  TechSignalInputSchema,
  applyTechnographics,
  classifyTechnographics,
  fetchWebsiteSignals,
  technographicsLogger,
} from '@cloud-prospector/agents/technographics';
import type { AppDeps, AppEnv } from '../types';
import { notFoundError, rejectInvalid, serviceError } from '../middleware/error-handler';

const classifyBodySchema = z
  .object({
    company_name: z.string().optional(),
    lead_id: z.string().min(1).optional(),
    signals: TechSignalInputSchema.optional(),
    url: z.string().min(1).optional(),
  })
  .refine((body) => body.signals !== undefined || body.url !== undefined, {
    message: 'either signals or url is required',
    path: ['signals'],
  });

export function createTechnographicsRoutes(deps: AppDeps) {
  const technographics = new Hono<AppEnv>();
  const log = deps.technographicsLogger ?? technographicsLogger;

  /**
   * POST /api/technographics/classify
   */
  technographics.post('/classify', zValidator('json', classifyBodySchema, rejectInvalid), async (c) => {
    const body = c.req.valid('json');

    const lead = body.lead_id ? await deps.leads.get(body.lead_id) : null;
    if (body.lead_id && !lead) {
      throw notFoundError('Lead');
    }

    let signals = body.signals;
    if (!signals) {
      const url = body.url ?? '';
      const inspected = await fetchWebsiteSignals(url, { fetch: deps.fetch, logger: log });
      if (!inspected) {
        throw serviceError('website', `could not inspect ${url}`);
      }
      signals = inspected;
    }

    const profile = classifyTechnographics(signals, log, body.company_name ?? lead?.company_name);

    if (!lead) {
      return c.json({ success: true, signals, profile });
    }

    const updated = deps.scorer.scoreLead(applyTechnographics(lead, signals, log));
    await deps.leads.save(updated);

    return c.json({ success: true, signals, profile, lead: updated });
  });

  return technographics;
}
