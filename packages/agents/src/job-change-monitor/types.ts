/**
 * Job Change Monitor Types
 *
 * @module job-change-monitor/types
 */

import type { AlertStatus, ChangeType, JobChangeEvent } from '@cloud-prospector/lib';

// ===========================================
// Configuration Types
// ===========================================

export interface JobChangeMonitorConfig {
  /** Maximum contacts checked per poll cycle (default: 50) */
  batchSize: number;

  /** Pause between two profile fetches in a cycle (default: 2000ms) */
  requestDelayMs: number;

  /** Days without a successful check before a contact goes inactive (default: 90) */
  inactivityDays: number;

  /** Lookback window for recent changes and alerts (default: 7 days) */
  recentDays: number;

  /** Minimum opportunity score for recent changes and alerts (default: 60) */
  alertMinScore: number;
}

export const DEFAULT_JOB_CHANGE_MONITOR_CONFIG: JobChangeMonitorConfig = {
  batchSize: 50,
  requestDelayMs: 2000,
  inactivityDays: 90,
  recentDays: 7,
  alertMinScore: 60,
};

// ===========================================
// Processing Types
// ===========================================

/** Which fields differ between the stored and the observed profile */
export interface ChangeFlags {
  company_changed: boolean;
  role_changed: boolean;
}

export interface OpportunityInput extends ChangeFlags {
  previous_role: string | null;
  new_role: string | null;
  new_company: string | null;
}

export interface PollSummary {
  /** Contacts whose lookup returned a profile */
  checked: number;

  /** Contacts whose lookup returned nothing or failed */
  skipped: number;

  changes: number;

  events: JobChangeEvent[];
}

// ===========================================
// Alert Types
// ===========================================

export type AlertPriority = 'HIGH' | 'MEDIUM' | 'LOW';

export interface JobChangeAlert {
  type: 'job_change_opportunity';
  event_id: number;
  priority: AlertPriority;
  contact_name: string;
  linkedin_url: string;
  change_type: ChangeType;
  previous_company: string | null;
  new_company: string | null;
  new_role: string | null;
  opportunity_score: number;
  detected_at: string;
  alert_status: AlertStatus;
  message: string;
  action_items: string[];
}

// ===========================================
// Logging Types
// ===========================================

export type LogEventType =
  | 'contacts_tracked'
  | 'poll_started'
  | 'poll_completed'
  | 'job_change_detected'
  | 'profile_lookup_failed'
  | 'contact_skipped'
  | 'contacts_deactivated'
  | 'alert_status_updated';
