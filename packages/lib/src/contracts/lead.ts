/**
 * Lead Contract
 *
 * Canonical record for a prospective company. Raw acquisition output is
 * validated against this schema; only company_name is required.
 *
 * Priority is deliberately absent: it is derived from score on read
 * (see calculatePriority).
 *
 * @module contracts/lead
 */

import { z } from 'zod';
import {
  SectorSchema,
  CompanySizeSchema,
  CloudMaturitySchema,
  generateId,
} from '../types';

// ===========================================
// Decision Maker
// ===========================================

export const DecisionMakerSchema = z.object({
  name: z
    .string()
    .min(1, 'name is required')
    .describe('Full name of the decision maker'),

  role: z
    .string()
    .optional()
    .describe('Job title at the lead company'),

  linkedin_url: z
    .string()
    .optional()
    .describe('Professional network profile URL; required for job-change tracking'),

  email: z.string().optional(),

  phone: z.string().optional(),
});

export type DecisionMaker = z.infer<typeof DecisionMakerSchema>;

// ===========================================
// Score Details
// ===========================================

export const ScoringFactorSchema = z.enum([
  'company_size',
  'digital_maturity',
  'cloud_usage',
  'sector_fit',
]);

export type ScoringFactor = z.infer<typeof ScoringFactorSchema>;

export const ScoreDetailsSchema = z
  .object({
    company_size: z.number().min(0).max(100).optional(),
    digital_maturity: z.number().min(0).max(100).optional(),
    cloud_usage: z.number().min(0).max(100).optional(),
    sector_fit: z.number().min(0).max(100).optional(),
  })
  .describe('Per-factor scores (0-100) that the weighted total was computed from');

export type ScoreDetails = z.infer<typeof ScoreDetailsSchema>;

// ===========================================
// Lead Schema
// ===========================================

export const LeadSchema = z.object({
  // === Identity ===
  lead_id: z
    .string()
    .min(1)
    .default(() => generateId('lead'))
    .describe('Storage key; generated when the source does not provide one'),

  company_name: z
    .string()
    .trim()
    .min(1, 'company_name is required')
    .describe('Company name (not guaranteed unique)'),

  tax_id: z
    .string()
    .optional()
    .describe('National tax identifier'),

  // === Contact ===
  website: z.string().optional(),
  email: z.string().optional(),
  phone: z.string().optional(),
  address: z.string().optional(),
  city: z.string().optional(),
  region: z.string().optional(),

  // === Classification ===
  industry: z
    .string()
    .optional()
    .describe('Free-text industry label from the source; used to infer sector'),

  sector: SectorSchema.optional(),

  company_size: CompanySizeSchema.optional(),

  employee_count: z.number().int().nonnegative().optional(),

  annual_revenue: z.number().nonnegative().optional(),

  linkedin_url: z.string().optional(),

  decision_makers: z.array(DecisionMakerSchema).default([]),

  // === Cloud ===
  technologies_used: z
    .array(z.string())
    .default([])
    .describe('Detected technology names'),

  cloud_maturity: CloudMaturitySchema.optional(),

  aws_usage: z
    .boolean()
    .default(false)
    .describe('Whether the company already runs on the target cloud provider'),

  competitor_cloud: z
    .string()
    .optional()
    .describe('Name of a competing cloud provider in use'),

  pain_points: z.array(z.string()).default([]),

  // === Scoring ===
  score: z.number().min(0).default(0),

  score_details: ScoreDetailsSchema.default({}),

  // === Provenance ===
  notes: z.string().optional(),

  source: z.string().optional(),

  extracted_at: z
    .string()
    .datetime()
    .default(() => new Date().toISOString()),

  updated_at: z
    .string()
    .datetime()
    .default(() => new Date().toISOString()),

  metadata: z.record(z.unknown()).default({}),
});

export type Lead = z.infer<typeof LeadSchema>;

/** Raw acquisition shape: everything but company_name may be missing */
export type RawLead = z.input<typeof LeadSchema>;

// ===========================================
// Validation Helpers
// ===========================================

/**
 * Validate a raw lead record
 * @throws ZodError if validation fails
 */
export function validateLead(input: unknown): Lead {
  return LeadSchema.parse(input);
}

/**
 * Safely validate a lead, returning null on failure
 */
export function safeValidateLead(input: unknown): Lead | null {
  const result = LeadSchema.safeParse(input);
  return result.success ? result.data : null;
}

/**
 * Get validation errors for a raw lead record
 */
export function getLeadErrors(input: unknown): string[] {
  const result = LeadSchema.safeParse(input);
  if (result.success) return [];

  return result.error.issues.map(
    (issue) => `${issue.path.join('.')}: ${issue.message}`
  );
}
