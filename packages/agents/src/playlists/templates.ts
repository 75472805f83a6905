/**
 * Playlist Templates
 *
 * The fixed catalogue of recommended playlists, loaded from
 * data/templates.json and validated once at module load.
 *
 * @module playlists/templates
 */

import { z } from 'zod';
import { PlaylistCriteriaSchema } from '@cloud-prospector/lib';
import templateData from './data/templates.json';
import type { PlaylistTemplate } from './types';

const PlaylistTemplateSchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  criteria: PlaylistCriteriaSchema,
  reasoning: z.string(),
});

const TemplateCatalogueSchema = z.object({
  templates: z.array(PlaylistTemplateSchema),
});

export const PLAYLIST_TEMPLATES: readonly PlaylistTemplate[] = TemplateCatalogueSchema.parse(templateData).templates;
