/**
 * Scoring Result Contract
 *
 * Defines the scoring weights, the per-lead scoring response and the
 * export representation handed to reporting consumers.
 *
 * @module contracts/scoring-result
 */

import { z } from 'zod';
import {
  LeadSchema,
  PrioritySchema,
  ScoreDetailsSchema,
  calculatePriority,
  type Lead,
  type Priority,
  type Sector,
} from '@cloud-prospector/lib';

// ===========================================
// Weights
// ===========================================

export const ScoringWeightsSchema = z
  .object({
    company_size: z.number().nonnegative(),
    digital_maturity: z.number().nonnegative(),
    cloud_usage: z.number().nonnegative(),
    sector_fit: z.number().nonnegative(),
  })
  .describe('Factor weights; expected to sum to 1.0 but not enforced');

export type ScoringWeights = z.infer<typeof ScoringWeightsSchema>;

export const DEFAULT_SCORING_WEIGHTS: ScoringWeights = {
  company_size: 0.3,
  digital_maturity: 0.25,
  cloud_usage: 0.25,
  sector_fit: 0.2,
};

// ===========================================
// Scoring Response
// ===========================================

export const ScoreLeadResponseSchema = z.object({
  lead: LeadSchema,
  score: z.number().min(0),
  priority: PrioritySchema,
  score_details: ScoreDetailsSchema,
  recommendations: z.array(z.string()).max(5),
});

export type ScoreLeadResponse = z.infer<typeof ScoreLeadResponseSchema>;

// ===========================================
// Export Representation
// ===========================================

/** A lead as handed to export/reporting: the record plus its derived priority */
export const ExportRecordSchema = LeadSchema.extend({
  priority: PrioritySchema,
});

export type ExportRecord = z.infer<typeof ExportRecordSchema>;

/**
 * Build the export record for a scored lead
 */
export function toExportRecord(lead: Lead): ExportRecord {
  return {
    ...lead,
    priority: calculatePriority(lead.score),
  };
}

/**
 * Parse an export record back into a lead.
 *
 * Priority is derived data: it is validated against the score and then
 * dropped, so a record whose priority disagrees with its score is rejected.
 *
 * @throws ZodError if validation fails
 */
export function parseExportRecord(input: unknown): Lead {
  const record = ExportRecordSchema.refine(
    (r) => r.priority === calculatePriority(r.score),
    { message: 'priority does not match score', path: ['priority'] }
  ).parse(input);

  const { priority: _priority, ...lead } = record;
  return lead;
}

// ===========================================
// Summaries
// ===========================================

export interface LeadSummary {
  total: number;
  average_score: number;
  by_priority: Record<Priority, number>;
  by_sector: Partial<Record<Sector | 'unknown', number>>;
}

/**
 * Aggregate counts for a list of scored leads
 */
export function summarizeLeads(leads: readonly Lead[]): LeadSummary {
  const byPriority: Record<Priority, number> = { HOT: 0, WARM: 0, COOL: 0, COLD: 0 };
  const bySector: Partial<Record<Sector | 'unknown', number>> = {};
  let total = 0;

  for (const lead of leads) {
    byPriority[calculatePriority(lead.score)]++;
    const sector = lead.sector ?? 'unknown';
    bySector[sector] = (bySector[sector] ?? 0) + 1;
    total += lead.score;
  }

  return {
    total: leads.length,
    average_score: leads.length === 0 ? 0 : Math.round((total / leads.length) * 100) / 100,
    by_priority: byPriority,
    by_sector: bySector,
  };
}
