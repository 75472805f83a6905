/**
 * Lead Scorer Agent Types
 *
 * Internal types used by the lead scorer agent.
 * For contract types, see ./contracts/
 *
 * @module lead-scorer/types
 */

import type { Lead, Priority, Result } from '@cloud-prospector/lib';
import type { ScoringWeights } from './contracts/scoring-result';
import { DEFAULT_SCORING_WEIGHTS } from './contracts/scoring-result';

// ===========================================
// Configuration Types
// ===========================================

/**
 * Lead scorer agent configuration
 */
export interface LeadScorerConfig {
  /** Factor weights (default: 0.3 / 0.25 / 0.25 / 0.2) */
  weights: ScoringWeights;

  /** Minimum score for CRM sync (default: 60) */
  crmMinScore: number;

  /** Maximum recommendations per lead (default: 5) */
  maxRecommendations: number;
}

/**
 * Default configuration values
 */
export const DEFAULT_LEAD_SCORER_CONFIG: LeadScorerConfig = {
  weights: DEFAULT_SCORING_WEIGHTS,
  crmMinScore: 60,
  maxRecommendations: 5,
};

// ===========================================
// Processing Types
// ===========================================

/** A lead whose score and score_details were produced by the scorer */
export type ScoredLead = Lead;

/**
 * Why a single lead could not be scored
 */
export interface ScoreError {
  lead_id: string;
  company_name: string;
  error_code: 'SCORING_FAILED';
  message: string;
}

/** Outcome for one lead of a batch, in output (score-sorted) order */
export interface BatchItem {
  /** Position of the lead in the input list */
  index: number;

  /** The scored lead, or the input lead reset to score 0 on failure */
  lead: Lead;

  result: Result<ScoredLead, ScoreError>;
}

/**
 * Options for batch scoring
 */
export interface BatchScoringOptions {
  /** Progress callback */
  onProgress?: (processed: number, total: number) => void;
}

/**
 * Batch scoring result
 */
export interface BatchScoringResult {
  /** Every input lead, sorted by score descending (ties keep input order) */
  leads: Lead[];

  items: BatchItem[];

  total_processed: number;

  succeeded: number;

  by_priority: Record<Priority, number>;

  errors: ScoreError[];

  processing_time_ms: number;
}

// ===========================================
// Logging Types
// ===========================================

export type LogEventType =
  | 'lead_scored'
  | 'scoring_failed'
  | 'batch_started'
  | 'batch_completed'
  | 'lead_normalized'
  | 'lead_rejected'
  | 'crm_sync_completed'
  | 'crm_sync_failed';
