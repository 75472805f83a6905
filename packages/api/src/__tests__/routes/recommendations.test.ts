/**
 * Recommendation route tests
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { z } from 'zod';
import { PlaylistSchema } from '@cloud-prospector/lib';
import {
  AWS_BANK_LEAD,
  BANK_LEAD,
  SMALL_LEAD,
  createTestApp,
  jsonRequest,
  type TestContext,
} from '../helpers';

const PlaylistBodySchema = z.object({ playlist: PlaylistSchema });

describe('recommendation routes', () => {
  let ctx: TestContext;

  async function createAndRefresh(body: unknown): Promise<string> {
    const res = await ctx.app.request('/api/playlists', jsonRequest('POST', body));
    const { id } = PlaylistBodySchema.parse(await res.json()).playlist;
    await ctx.app.request(`/api/playlists/${id}/refresh`, { method: 'POST' });
    return id;
  }

  beforeEach(async () => {
    ctx = createTestApp();
    await ctx.app.request(
      '/api/leads/batch',
      jsonRequest('POST', { leads: [BANK_LEAD, AWS_BANK_LEAD, SMALL_LEAD] })
    );
  });

  describe('GET /api/recommendations/playlists', () => {
    it('ranks templates for default preferences, sized on stored leads', async () => {
      const res = await ctx.app.request('/api/recommendations/playlists?user_id=user-1');

      expect(await res.json()).toMatchObject({
        recommendations: [
          { name: 'Banking Digital Transformation', confidence: 1, estimated_leads: 0, playlist_type: 'dynamic' },
          { name: 'Hot AWS Migration Prospects', confidence: 0.85, estimated_leads: 1 },
          { name: 'Scale-up Tech Companies', confidence: 0.85, estimated_leads: 0 },
        ],
      });
    });

    it('requires user_id', async () => {
      const res = await ctx.app.request('/api/recommendations/playlists');

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ details: { fields: { user_id: ['Required'] } } });
    });
  });

  describe('GET /api/recommendations/daily', () => {
    beforeEach(async () => {
      await createAndRefresh({ name: 'Banks', criteria: { sectors: ['banking'], min_score: 70 } });
      await createAndRefresh({ name: 'Everyone' });
    });

    it('picks new members once per company, best first', async () => {
      const res = await ctx.app.request('/api/recommendations/daily?user_id=user-1');

      expect(await res.json()).toMatchObject({
        recommendations: [
          { lead: { lead_id: 'lead_aws_bank' }, score: 80, priority: 'HOT' },
          { lead: { lead_id: 'lead_bank' }, score: 75, priority: 'WARM' },
          {
            lead: { lead_id: 'lead_small' },
            score: 17,
            priority: 'COLD',
            source_playlist: 'Everyone',
            reasoning: "Selected from playlist 'Everyone'. No cloud yet: first migration opportunity",
            suggested_actions: ['Research contacts on LinkedIn', 'Nurture with content'],
          },
        ],
        total: 3,
      });
    });

    it('honours the limit and the daily cap', async () => {
      const limited = await ctx.app.request('/api/recommendations/daily?user_id=user-1&limit=2');
      expect(await limited.json()).toMatchObject({ total: 2 });

      await ctx.app.request(
        '/api/recommendations/preferences/user-1',
        jsonRequest('PUT', { max_leads_per_day: 1 })
      );
      const capped = await ctx.app.request('/api/recommendations/daily?user_id=user-1&limit=5');
      expect(await capped.json()).toMatchObject({
        recommendations: [{ lead: { lead_id: 'lead_aws_bank' } }],
        total: 1,
      });
    });

    it('skips leads already contacted', async () => {
      const engaged = await ctx.app.request(
        '/api/recommendations/engagement',
        jsonRequest('POST', { lead_id: 'lead_aws_bank', user_id: 'user-1', action_type: 'meeting_scheduled' })
      );
      expect(engaged.status).toBe(201);

      const res = await ctx.app.request('/api/recommendations/daily?user_id=user-1');
      expect(await res.json()).toMatchObject({
        recommendations: [{ lead: { lead_id: 'lead_bank' } }, { lead: { lead_id: 'lead_small' } }],
        total: 2,
      });
    });
  });

  describe('preferences', () => {
    it('returns defaults for an unknown user', async () => {
      const res = await ctx.app.request('/api/recommendations/preferences/user-2');

      expect(await res.json()).toMatchObject({
        preferences: {
          user_id: 'user-2',
          preferred_sectors: ['banking', 'technology', 'retail'],
          preferred_company_sizes: ['medium', 'large', 'enterprise'],
          min_score: 60,
          max_leads_per_day: 10,
        },
      });
    });

    it('merges a partial update over the defaults', async () => {
      const res = await ctx.app.request(
        '/api/recommendations/preferences/user-3',
        jsonRequest('PUT', { preferred_sectors: ['fintech'], min_score: 70 })
      );

      expect(await res.json()).toMatchObject({
        preferences: { user_id: 'user-3', preferred_sectors: ['fintech'], min_score: 70, max_leads_per_day: 10 },
      });

      const stored = await ctx.app.request('/api/recommendations/preferences/user-3');
      expect(await stored.json()).toMatchObject({ preferences: { preferred_sectors: ['fintech'] } });
    });

    it('rejects an out-of-range score floor', async () => {
      const res = await ctx.app.request(
        '/api/recommendations/preferences/user-3',
        jsonRequest('PUT', { min_score: 150 })
      );

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: 'Invalid preferences',
        details: { errors: ['min_score: Number must be less than or equal to 100'] },
      });
    });
  });

  describe('POST /api/recommendations/engagement', () => {
    it('stores the engagement record', async () => {
      const res = await ctx.app.request(
        '/api/recommendations/engagement',
        jsonRequest('POST', { lead_id: 'lead_bank', user_id: 'user-1', action_type: 'viewed', notes: 'first look' })
      );

      expect(res.status).toBe(201);
      expect(await res.json()).toMatchObject({
        engagement: {
          id: expect.stringMatching(/^eng_/),
          lead_id: 'lead_bank',
          user_id: 'user-1',
          action_type: 'viewed',
          notes: 'first look',
        },
      });
    });

    it('rejects an unknown action', async () => {
      const res = await ctx.app.request(
        '/api/recommendations/engagement',
        jsonRequest('POST', { lead_id: 'lead_bank', user_id: 'user-1', action_type: 'called' })
      );

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ code: 'VALIDATION_ERROR', error: 'Invalid engagement' });
    });
  });
});
