/**
 * Playlist routes
 * Create, list, refresh and archive playlists; static adds; members and
 * performance
 */
import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import { PlaylistStatusSchema } from '@cloud-prospector/lib';
import type { AppDeps, AppEnv } from '../types';
import {
  notFoundError,
  playlistError,
  readJsonBody,
  rejectInvalid,
  validationError,
} from '../middleware/error-handler';

const listQuerySchema = z.object({
  status: PlaylistStatusSchema.optional(),
});

const addLeadsBodySchema = z.object({
  lead_ids: z.array(z.string().min(1)).min(1),
});

export function createPlaylistRoutes(deps: AppDeps) {
  const playlists = new Hono<AppEnv>();

  /**
   * POST /api/playlists
   */
  playlists.post('/', async (c) => {
    const result = await deps.playlists.createPlaylist(await readJsonBody(c));
    if (!result.ok) throw playlistError(result.error);

    return c.json({ success: true, playlist: result.value }, 201);
  });

  /**
   * GET /api/playlists?status=
   */
  playlists.get('/', zValidator('query', listQuerySchema, rejectInvalid), async (c) => {
    const { status } = c.req.valid('query');
    const list = await deps.playlists.listPlaylists({ status });

    return c.json({ success: true, playlists: list, total: list.length });
  });

  /**
   * GET /api/playlists/:id
   */
  playlists.get('/:id', async (c) => {
    const playlist = await deps.playlists.getPlaylist(c.req.param('id'));
    if (!playlist) throw notFoundError('Playlist');

    return c.json({ success: true, playlist });
  });

  /**
   * POST /api/playlists/:id/refresh
   * Re-evaluate a dynamic playlist against every stored lead
   */
  playlists.post('/:id/refresh', async (c) => {
    const pool = await deps.leads.list();
    const result = await deps.playlists.refreshPlaylist(c.req.param('id'), pool);
    if (!result.ok) throw playlistError(result.error);

    return c.json({ success: true, ...result.value });
  });

  /**
   * POST /api/playlists/:id/leads
   * Add stored leads to a static playlist
   */
  playlists.post('/:id/leads', zValidator('json', addLeadsBodySchema, rejectInvalid), async (c) => {
    const { lead_ids } = c.req.valid('json');

    const { found, missing } = await deps.leads.getMany(lead_ids);
    if (missing.length > 0) {
      throw validationError('Unknown lead ids', { lead_ids: missing });
    }

    const result = await deps.playlists.addToStaticPlaylist(c.req.param('id'), found);
    if (!result.ok) throw playlistError(result.error);

    return c.json({ success: true, ...result.value });
  });

  /**
   * POST /api/playlists/:id/archive
   */
  playlists.post('/:id/archive', async (c) => {
    const result = await deps.playlists.archivePlaylist(c.req.param('id'));
    if (!result.ok) throw playlistError(result.error);

    return c.json({ success: true, playlist: result.value });
  });

  /**
   * GET /api/playlists/:id/members
   */
  playlists.get('/:id/members', async (c) => {
    const result = await deps.playlists.getMembers(c.req.param('id'));
    if (!result.ok) throw playlistError(result.error);

    return c.json({ success: true, members: result.value, total: result.value.length });
  });

  /**
   * GET /api/playlists/:id/performance
   */
  playlists.get('/:id/performance', async (c) => {
    const result = await deps.playlists.getPlaylistPerformance(c.req.param('id'));
    if (!result.ok) throw playlistError(result.error);

    return c.json({ success: true, performance: result.value });
  });

  return playlists;
}
