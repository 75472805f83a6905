/**
 * Tracked Contact and Job Change Event Contracts
 *
 * A tracked contact is a decision maker whose employment is polled over
 * time. Its baseline (original_*) is copied from the originating lead when
 * tracking begins and never changes afterwards.
 *
 * @module contracts/tracked-contact
 */

import { z } from 'zod';

// ===========================================
// Tracked Contact
// ===========================================

export const ContactStatusSchema = z.enum(['active', 'inactive']);

export type ContactStatus = z.infer<typeof ContactStatusSchema>;

export const TrackedContactSchema = z.object({
  linkedin_url: z
    .string()
    .min(1)
    .describe('Profile URL; unique identity of the contact'),

  name: z.string().min(1),

  email: z.string().optional(),

  phone: z.string().optional(),

  current_company: z.string().nullable(),

  current_role: z.string().nullable(),

  original_company: z
    .string()
    .describe('Company of the originating lead when tracking began'),

  original_role: z.string().nullable(),

  original_lead_score: z.number().min(0),

  added_at: z.string().datetime(),

  last_checked_at: z
    .string()
    .datetime()
    .nullable()
    .describe('Last successful profile check; null until the first one'),

  status: ContactStatusSchema,
});

export type TrackedContact = z.infer<typeof TrackedContactSchema>;

// ===========================================
// Job Change Event
// ===========================================

export const ChangeTypeSchema = z.enum(['company', 'role', 'both']);

export type ChangeType = z.infer<typeof ChangeTypeSchema>;

export const AlertStatusSchema = z.enum(['new', 'actioned', 'dismissed']);

export type AlertStatus = z.infer<typeof AlertStatusSchema>;

export const JobChangeEventSchema = z.object({
  id: z.number().int().positive(),

  contact_id: z
    .string()
    .describe('Profile URL of the tracked contact'),

  contact_name: z.string(),

  previous_company: z.string().nullable(),

  new_company: z.string().nullable(),

  previous_role: z.string().nullable(),

  new_role: z.string().nullable(),

  change_type: ChangeTypeSchema,

  detected_at: z.string().datetime(),

  opportunity_score: z.number().min(0).max(100),

  alert_status: AlertStatusSchema,
});

export type JobChangeEvent = z.infer<typeof JobChangeEventSchema>;

// ===========================================
// Profile Snapshot
// ===========================================

/** What the profile lookup collaborator returns for a contact */
export const ProfileSnapshotSchema = z.object({
  company: z.string().nullable(),
  role: z.string().nullable(),
});

export type ProfileSnapshot = z.infer<typeof ProfileSnapshotSchema>;
