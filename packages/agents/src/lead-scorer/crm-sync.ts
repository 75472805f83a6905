/**
 * CRM Synchronization
 *
 * Hands qualified leads to a CRM adapter one at a time. Adapter
 * exceptions become failed records; they never abort the run.
 *
 * @module lead-scorer/crm-sync
 */

import { errorMessage, type Lead } from '@cloud-prospector/lib';
import type { CrmSyncRecord, CrmSyncResult, CrmSyncSummary } from './contracts/crm-sync';
import { logger as defaultLogger, type LeadScorerLogger } from './logger';

/**
 * Vendor-specific CRM client (companies, contacts and deals)
 */
export interface CrmSyncAdapter {
  syncLead(lead: Lead): Promise<CrmSyncResult>;
}

export interface CrmSyncOptions {
  /** Minimum score for a lead to be synced (default: 60) */
  minScore?: number;
  logger?: LeadScorerLogger;
}

export const DEFAULT_CRM_MIN_SCORE = 60;

/**
 * Sync every lead scoring at or above `minScore`
 */
export async function syncQualifiedLeads(
  leads: readonly Lead[],
  adapter: CrmSyncAdapter,
  options: CrmSyncOptions = {}
): Promise<CrmSyncSummary> {
  const minScore = options.minScore ?? DEFAULT_CRM_MIN_SCORE;
  const log = options.logger ?? defaultLogger;
  const qualified = leads.filter((lead) => lead.score >= minScore);
  const results: CrmSyncRecord[] = [];

  for (const lead of qualified) {
    let result: CrmSyncResult;
    try {
      result = await adapter.syncLead(lead);
    } catch (error) {
      result = { success: false, errors: [errorMessage(error)] };
    }

    if (!result.success) {
      log.crmSyncFailed({
        lead_id: lead.lead_id,
        company_name: lead.company_name,
        errors: result.errors,
      });
    }

    results.push({
      ...result,
      lead_id: lead.lead_id,
      company_name: lead.company_name,
      score: lead.score,
    });
  }

  const successful = results.filter((r) => r.success).length;
  const summary: CrmSyncSummary = {
    total: leads.length,
    qualified: qualified.length,
    successful,
    failed: results.length - successful,
    results,
  };

  log.crmSyncCompleted({
    total: summary.total,
    qualified: summary.qualified,
    successful: summary.successful,
    failed: summary.failed,
  });

  return summary;
}
