/**
 * Lead Normalization
 *
 * Turns an acquisition record into a Lead: zod validation, then sector
 * and company size inference for fields the source left empty.
 *
 * @module lead-scorer/normalize
 */

import {
  LeadSchema,
  companySizeFromEmployees,
  err,
  ok,
  type Lead,
  type Result,
} from '@cloud-prospector/lib';
import { detectSector } from './sector-detector';
import { logger as defaultLogger, type LeadScorerLogger } from './logger';

export interface NormalizationError {
  /** Position in the input list, when normalizing a batch */
  index?: number;
  errors: string[];
}

/**
 * Validate and enrich one raw record
 */
export function normalizeLead(
  raw: unknown,
  log: LeadScorerLogger = defaultLogger
): Result<Lead, NormalizationError> {
  const parsed = LeadSchema.safeParse(raw);

  if (!parsed.success) {
    const errors = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    log.leadRejected({ errors });
    return err({ errors });
  }

  const lead = { ...parsed.data };
  let sectorInferred = false;
  let sizeInferred = false;

  if (!lead.sector) {
    const detection = detectSector(lead);
    if (detection) {
      lead.sector = detection.sector;
      sectorInferred = true;
    }
  }

  if (!lead.company_size && lead.employee_count !== undefined) {
    lead.company_size = companySizeFromEmployees(lead.employee_count);
    sizeInferred = true;
  }

  log.leadNormalized({
    lead_id: lead.lead_id,
    company_name: lead.company_name,
    sector_inferred: sectorInferred,
    size_inferred: sizeInferred,
  });

  return ok(lead);
}

/**
 * Normalize a list of raw records. Invalid records are reported per
 * index and never abort the rest.
 */
export function normalizeLeads(
  raws: readonly unknown[],
  log: LeadScorerLogger = defaultLogger
): { leads: Lead[]; rejected: NormalizationError[] } {
  const leads: Lead[] = [];
  const rejected: NormalizationError[] = [];

  raws.forEach((raw, index) => {
    const result = normalizeLead(raw, log);
    if (result.ok) {
      leads.push(result.value);
    } else {
      rejected.push({ index, errors: result.error.errors });
    }
  });

  return { leads, rejected };
}
