/**
 * Lead Scorer Agent
 *
 * Main agent class for lead scoring operations.
 * Scores leads on the four weighted fit factors, derives priority,
 * and produces sales recommendations.
 *
 * @module lead-scorer/agent
 */

import {
  calculatePriority,
  err,
  errorMessage,
  generateId,
  ok,
  type Lead,
  type Priority,
} from '@cloud-prospector/lib';
import type { ScoreLeadResponse } from './contracts/scoring-result';
import type {
  BatchItem,
  BatchScoringOptions,
  BatchScoringResult,
  LeadScorerConfig,
  ScoreError,
} from './types';
import { DEFAULT_LEAD_SCORER_CONFIG } from './types';
import { applyScore } from './scoring';
import { getRecommendations } from './recommendations';
import { syncQualifiedLeads, type CrmSyncAdapter } from './crm-sync';
import type { CrmSyncSummary } from './contracts/crm-sync';
import { logger, LeadScorerLogger } from './logger';

// ===========================================
// Agent Class
// ===========================================

/**
 * Lead Scorer Agent
 *
 * Stateless apart from its configuration; safe to share across requests.
 */
export class LeadScorerAgent {
  private config: LeadScorerConfig;
  private logger: LeadScorerLogger;

  constructor(config: Partial<LeadScorerConfig> = {}) {
    this.config = { ...DEFAULT_LEAD_SCORER_CONFIG, ...config };
    this.logger = logger;
  }

  /**
   * Set a custom logger
   */
  setLogger(customLogger: LeadScorerLogger): void {
    this.logger = customLogger;
  }

  getConfig(): LeadScorerConfig {
    return this.config;
  }

  // ===========================================
  // Single Lead Scoring
  // ===========================================

  /**
   * Score a single lead. Returns a new lead with score, score_details
   * and updated_at set.
   */
  scoreLead(lead: Lead): Lead {
    try {
      const scored = applyScore(lead, this.config.weights);

      this.logger.leadScored({
        lead_id: scored.lead_id,
        company_name: scored.company_name,
        score: scored.score,
        priority: calculatePriority(scored.score),
      });

      return scored;
    } catch (error) {
      this.logger.scoringFailed({
        lead_id: lead.lead_id,
        company_name: lead.company_name,
        error_code: 'SCORING_FAILED',
        error_message: errorMessage(error),
      });
      throw error;
    }
  }

  /**
   * Score a lead and attach priority and recommendations
   */
  scoreWithRecommendations(lead: Lead): ScoreLeadResponse {
    const scored = this.scoreLead(lead);

    return {
      lead: scored,
      score: scored.score,
      priority: calculatePriority(scored.score),
      score_details: scored.score_details,
      recommendations: getRecommendations(scored, this.config.maxRecommendations),
    };
  }

  // ===========================================
  // Batch Processing
  // ===========================================

  /**
   * Score every lead. A lead that fails is kept with score 0 and empty
   * details, so the output always has the input's length. Output is
   * sorted by score descending; ties keep input order.
   */
  scoreBatch(leads: readonly Lead[], options: BatchScoringOptions = {}): BatchScoringResult {
    const { onProgress } = options;
    const startTime = Date.now();
    const batchId = generateId('batch');

    this.logger.setSessionId(batchId);
    this.logger.batchStarted({ batch_id: batchId, total_leads: leads.length });

    const items: BatchItem[] = leads.map((lead, index) => {
      let item: BatchItem;
      try {
        const scored = this.scoreLead(lead);
        item = { index, lead: scored, result: ok(scored) };
      } catch (error) {
        const failure: ScoreError = {
          lead_id: lead.lead_id,
          company_name: lead.company_name,
          error_code: 'SCORING_FAILED',
          message: errorMessage(error),
        };
        item = { index, lead: { ...lead, score: 0, score_details: {} }, result: err(failure) };
      }

      onProgress?.(index + 1, leads.length);
      return item;
    });

    // Array.prototype.sort is stable, so equal scores keep input order
    items.sort((a, b) => b.lead.score - a.lead.score);

    const byPriority: Record<Priority, number> = { HOT: 0, WARM: 0, COOL: 0, COLD: 0 };
    const errors: ScoreError[] = [];
    for (const item of items) {
      if (item.result.ok) {
        byPriority[calculatePriority(item.lead.score)]++;
      } else {
        errors.push(item.result.error);
      }
    }

    const result: BatchScoringResult = {
      leads: items.map((item) => item.lead),
      items,
      total_processed: items.length,
      succeeded: items.length - errors.length,
      by_priority: byPriority,
      errors,
      processing_time_ms: Date.now() - startTime,
    };

    this.logger.batchCompleted({
      batch_id: batchId,
      total_processed: result.total_processed,
      succeeded: result.succeeded,
      failed: errors.length,
      by_priority: byPriority,
      processing_time_ms: result.processing_time_ms,
    });

    return result;
  }

  // ===========================================
  // CRM Sync
  // ===========================================

  /**
   * Push leads scoring at or above `crmMinScore` to the CRM
   */
  async syncToCrm(leads: readonly Lead[], adapter: CrmSyncAdapter): Promise<CrmSyncSummary> {
    return syncQualifiedLeads(leads, adapter, {
      minScore: this.config.crmMinScore,
      logger: this.logger,
    });
  }
}

// ===========================================
// Factory Function
// ===========================================

/**
 * Create a new LeadScorerAgent instance
 */
export function createLeadScorerAgent(config?: Partial<LeadScorerConfig>): LeadScorerAgent {
  return new LeadScorerAgent(config);
}
