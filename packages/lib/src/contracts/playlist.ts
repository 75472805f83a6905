/**
 * Playlist Contracts
 *
 * A playlist is a named, reusable targeting definition over leads.
 * Membership rows carry a score/priority snapshot taken at insertion.
 *
 * @module contracts/playlist
 */

import { z } from 'zod';
import { SectorSchema, CompanySizeSchema, CloudMaturitySchema, PrioritySchema } from '../types';
import { LeadSchema } from './lead';

// ===========================================
// Criteria
// ===========================================

export const PlaylistCriteriaSchema = z
  .object({
    min_score: z.number().min(0).max(100).optional(),
    sectors: z.array(SectorSchema).optional(),
    company_sizes: z.array(CompanySizeSchema).optional(),
    cloud_maturity: z.array(CloudMaturitySchema).optional(),
    competitor_cloud: z.array(z.string()).optional(),
    has_website: z.boolean().optional(),
    technologies_mentioned: z
      .array(z.string())
      .optional()
      .describe('Keywords matched as substrings of the joined technology list'),
    pain_points: z
      .array(z.string())
      .optional()
      .describe('Keywords matched as substrings of the joined pain points'),
    limit: z.number().int().positive().optional(),
  })
  .strict();

export type PlaylistCriteria = z.infer<typeof PlaylistCriteriaSchema>;

// ===========================================
// Playlist
// ===========================================

export const PlaylistTypeSchema = z.enum(['dynamic', 'static']);

export type PlaylistType = z.infer<typeof PlaylistTypeSchema>;

export const PlaylistStatusSchema = z.enum(['active', 'archived']);

export type PlaylistStatus = z.infer<typeof PlaylistStatusSchema>;

export const PlaylistSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1, 'name is required'),
  description: z.string().default(''),
  type: PlaylistTypeSchema,
  criteria: PlaylistCriteriaSchema,
  target_count: z.number().int().positive().default(50),
  refresh_frequency_hours: z.number().positive().default(24),
  created_at: z.string().datetime(),
  updated_at: z.string().datetime(),
  last_refreshed_at: z.string().datetime().nullable(),
  status: PlaylistStatusSchema,
});

export type Playlist = z.infer<typeof PlaylistSchema>;

export const CreatePlaylistRequestSchema = z.object({
  name: z.string().trim().min(1, 'name is required'),
  description: z.string().optional(),
  type: PlaylistTypeSchema.default('dynamic'),
  criteria: PlaylistCriteriaSchema.default({}),
  target_count: z.number().int().positive().optional(),
  refresh_frequency_hours: z.number().positive().optional(),
});

export type CreatePlaylistRequest = z.input<typeof CreatePlaylistRequestSchema>;

// ===========================================
// Membership
// ===========================================

export const MembershipStatusSchema = z.enum(['new', 'contacted']);

export type MembershipStatus = z.infer<typeof MembershipStatusSchema>;

export const PlaylistMemberSchema = z.object({
  lead: LeadSchema,
  score: z.number().describe('Score snapshot at insertion'),
  priority: PrioritySchema.describe('Priority snapshot at insertion'),
  added_at: z.string().datetime(),
  status: MembershipStatusSchema,
});

export type PlaylistMember = z.infer<typeof PlaylistMemberSchema>;

/** All rows of one playlist, stored as a single record so refresh swaps them in one write */
export const PlaylistMembershipSchema = z.object({
  playlist_id: z.string(),
  members: z.array(PlaylistMemberSchema),
  replaced_at: z.string().datetime(),
});

export type PlaylistMembership = z.infer<typeof PlaylistMembershipSchema>;

// ===========================================
// User Preferences
// ===========================================

export const UserPreferencesSchema = z.object({
  user_id: z.string().min(1),
  preferred_sectors: z.array(SectorSchema),
  preferred_company_sizes: z.array(CompanySizeSchema),
  min_score: z.number().min(0).max(100),
  max_leads_per_day: z.number().int().positive(),
});

export type UserPreferences = z.infer<typeof UserPreferencesSchema>;

// ===========================================
// Engagement
// ===========================================

export const EngagementActionSchema = z.enum([
  'viewed',
  'contacted',
  'meeting_scheduled',
  'proposal_sent',
  'dismissed',
]);

export type EngagementAction = z.infer<typeof EngagementActionSchema>;

export const EngagementRecordSchema = z.object({
  id: z.string(),
  lead_id: z.string().min(1),
  user_id: z.string().min(1),
  action_type: EngagementActionSchema,
  outcome: z.string().optional(),
  notes: z.string().optional(),
  created_at: z.string().datetime(),
});

export type EngagementRecord = z.infer<typeof EngagementRecordSchema>;
