/**
 * Recommendation routes
 * Template recommendations, daily lead picks, preferences and engagement
 */
import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import type { AppDeps, AppEnv } from '../types';
import { playlistError, readJsonBody, rejectInvalid } from '../middleware/error-handler';

const userQuerySchema = z.object({
  user_id: z.string().min(1),
});

const dailyQuerySchema = userQuerySchema.extend({
  limit: z.coerce.number().int().positive().max(100).optional(),
});

export function createRecommendationRoutes(deps: AppDeps) {
  const recommendations = new Hono<AppEnv>();

  /**
   * GET /api/recommendations/playlists?user_id=
   * Templates ranked for the user, sized against the stored leads
   */
  recommendations.get('/playlists', zValidator('query', userQuerySchema, rejectInvalid), async (c) => {
    const { user_id } = c.req.valid('query');
    const pool = await deps.leads.list();
    const list = await deps.playlists.recommendPlaylists(user_id, pool);

    return c.json({ success: true, recommendations: list });
  });

  /**
   * GET /api/recommendations/daily?user_id=&limit=
   */
  recommendations.get('/daily', zValidator('query', dailyQuerySchema, rejectInvalid), async (c) => {
    const { user_id, limit } = c.req.valid('query');
    const list = await deps.playlists.getDailyRecommendations(user_id, limit);

    return c.json({ success: true, recommendations: list, total: list.length });
  });

  /**
   * GET /api/recommendations/preferences/:user_id
   */
  recommendations.get('/preferences/:user_id', async (c) => {
    const preferences = await deps.playlists.getPreferences(c.req.param('user_id'));
    return c.json({ success: true, preferences });
  });

  /**
   * PUT /api/recommendations/preferences/:user_id
   * Partial update merged over the stored or default preferences
   */
  recommendations.put('/preferences/:user_id', async (c) => {
    const result = await deps.playlists.setPreferences(c.req.param('user_id'), await readJsonBody(c));
    if (!result.ok) throw playlistError(result.error);

    return c.json({ success: true, preferences: result.value });
  });

  /**
   * POST /api/recommendations/engagement
   */
  recommendations.post('/engagement', async (c) => {
    const result = await deps.playlists.trackEngagement(await readJsonBody(c));
    if (!result.ok) throw playlistError(result.error);

    return c.json({ success: true, engagement: result.value }, 201);
  });

  return recommendations;
}
