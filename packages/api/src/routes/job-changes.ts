/**
 * Job change routes
 * Seed tracked contacts from stored leads, run a poll cycle, read recent
 * changes with their alerts, and action or dismiss an alert
 */
import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import type { Lead } from '@cloud-prospector/lib';
import type { AppDeps, AppEnv } from '../types';
import { notFoundError, rejectInvalid, serviceError, validationError } from '../middleware/error-handler';

const seedBodySchema = z.object({
  lead_ids: z.array(z.string().min(1)).optional(),
});

const recentQuerySchema = z.object({
  days: z.coerce.number().int().positive().optional(),
  min_score: z.coerce.number().min(0).max(100).optional(),
});

const alertStatusBodySchema = z.object({
  alert_status: z.enum(['actioned', 'dismissed']),
});

export function createJobChangeRoutes(deps: AppDeps) {
  const jobChanges = new Hono<AppEnv>();

  /**
   * POST /api/job-changes/contacts
   * Track decision makers of the given stored leads (all leads when omitted)
   */
  jobChanges.post('/contacts', zValidator('json', seedBodySchema, rejectInvalid), async (c) => {
    const { lead_ids } = c.req.valid('json');

    let leads: Lead[];
    if (lead_ids) {
      const { found, missing } = await deps.leads.getMany(lead_ids);
      if (missing.length > 0) {
        throw validationError('Unknown lead ids', { lead_ids: missing });
      }
      leads = found;
    } else {
      leads = await deps.leads.list();
    }

    const added = await deps.monitor.addContactsFromLeads(leads);
    return c.json({ success: true, leads: leads.length, added }, 201);
  });

  /**
   * POST /api/job-changes/poll
   * Run one poll cycle now
   */
  jobChanges.post('/poll', async (c) => {
    if (!deps.pollingEnabled) {
      throw serviceError('profile lookup', 'PROFILE_LOOKUP_URL is not configured');
    }

    const summary = await deps.monitor.pollOnce();
    return c.json({ success: true, ...summary });
  });

  /**
   * GET /api/job-changes/recent?days=&min_score=
   */
  jobChanges.get('/recent', zValidator('query', recentQuerySchema, rejectInvalid), async (c) => {
    const { days, min_score } = c.req.valid('query');

    const changes = await deps.monitor.getRecentChanges(days, min_score);
    const alerts = await deps.monitor.generateAlerts(changes);

    return c.json({ success: true, changes, alerts, total: changes.length });
  });

  /**
   * PATCH /api/job-changes/:id
   */
  jobChanges.patch('/:id', zValidator('json', alertStatusBodySchema, rejectInvalid), async (c) => {
    const id = Number(c.req.param('id'));
    if (!Number.isInteger(id) || id <= 0) {
      throw validationError('Event id must be a positive integer');
    }
    const { alert_status } = c.req.valid('json');

    const event = await deps.monitor.updateAlertStatus(id, alert_status);
    if (!event) throw notFoundError('Job change event');

    return c.json({ success: true, event });
  });

  return jobChanges;
}
