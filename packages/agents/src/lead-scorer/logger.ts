/**
 * Structured JSON Logger for Lead Scorer
 *
 * Provides structured logging for lead scoring events:
 * - lead_scored: Successful lead scoring
 * - scoring_failed: Error during scoring
 * - batch_started: Batch processing started
 * - batch_completed: Batch processing completed
 * - lead_normalized: Raw record accepted (sector/size inference)
 * - lead_rejected: Raw record failed validation
 * - crm_sync_completed / crm_sync_failed: CRM adapter outcomes
 *
 * @module lead-scorer/logger
 */

import { StructuredLogger, type LoggerConfig, type Priority } from '@cloud-prospector/lib';
import type { LogEventType } from './types';

// ===========================================
// Logger Class
// ===========================================

export class LeadScorerLogger extends StructuredLogger<LogEventType> {
  // ===========================================
  // Scoring Events
  // ===========================================

  /**
   * Log successful lead scoring
   */
  leadScored(data: {
    lead_id: string;
    company_name: string;
    score: number;
    priority: Priority;
  }): void {
    this.log('info', 'lead_scored', data);
  }

  /**
   * Log scoring failure
   */
  scoringFailed(data: {
    lead_id: string;
    company_name?: string;
    error_code: string;
    error_message: string;
  }): void {
    this.log('error', 'scoring_failed', data);
  }

  // ===========================================
  // Batch Events
  // ===========================================

  batchStarted(data: { batch_id: string; total_leads: number }): void {
    this.log('info', 'batch_started', data);
  }

  batchCompleted(data: {
    batch_id: string;
    total_processed: number;
    succeeded: number;
    failed: number;
    by_priority: Record<Priority, number>;
    processing_time_ms: number;
  }): void {
    this.log('info', 'batch_completed', data);
  }

  // ===========================================
  // Input Events
  // ===========================================

  leadNormalized(data: {
    lead_id: string;
    company_name: string;
    sector_inferred: boolean;
    size_inferred: boolean;
  }): void {
    this.log('debug', 'lead_normalized', data);
  }

  leadRejected(data: { index?: number; errors: string[] }): void {
    this.log('warn', 'lead_rejected', data);
  }

  // ===========================================
  // CRM Events
  // ===========================================

  crmSyncCompleted(data: {
    total: number;
    qualified: number;
    successful: number;
    failed: number;
  }): void {
    this.log('info', 'crm_sync_completed', data);
  }

  crmSyncFailed(data: { lead_id: string; company_name: string; errors: string[] }): void {
    this.log('warn', 'crm_sync_failed', data);
  }
}

// ===========================================
// Default Instance
// ===========================================

export const logger = new LeadScorerLogger();

/**
 * Create a new logger instance with custom config
 */
export function createLogger(config: Partial<LoggerConfig> = {}): LeadScorerLogger {
  return new LeadScorerLogger(config);
}
