/**
 * Structured JSON Logger for the Job Change Monitor
 *
 * @module job-change-monitor/logger
 */

import { StructuredLogger, type AlertStatus, type ChangeType, type LoggerConfig } from '@cloud-prospector/lib';
import type { LogEventType } from './types';

export class JobChangeLogger extends StructuredLogger<LogEventType> {
  // ===========================================
  // Roster Events
  // ===========================================

  contactsTracked(data: { leads: number; added: number; already_tracked: number }): void {
    this.log('info', 'contacts_tracked', data);
  }

  contactsDeactivated(data: { deactivated: number; inactivity_days: number }): void {
    this.log('info', 'contacts_deactivated', data);
  }

  // ===========================================
  // Poll Events
  // ===========================================

  pollStarted(data: { selected: number; active: number }): void {
    this.log('info', 'poll_started', data);
  }

  pollCompleted(data: {
    checked: number;
    skipped: number;
    changes: number;
    duration_ms: number;
  }): void {
    this.log('info', 'poll_completed', data);
  }

  /**
   * Log a detected change (one event per contact per cycle)
   */
  jobChangeDetected(data: {
    event_id: number;
    contact_id: string;
    change_type: ChangeType;
    opportunity_score: number;
  }): void {
    this.log('info', 'job_change_detected', data);
  }

  profileLookupFailed(data: {
    contact_id: string;
    reason: 'timeout' | 'network_error' | 'http_status' | 'invalid_response';
    status?: number;
    error_message?: string;
  }): void {
    this.log('warn', 'profile_lookup_failed', data);
  }

  contactSkipped(data: { contact_id: string }): void {
    this.log('debug', 'contact_skipped', data);
  }

  // ===========================================
  // Alert Events
  // ===========================================

  alertStatusUpdated(data: { event_id: number; alert_status: AlertStatus }): void {
    this.log('info', 'alert_status_updated', data);
  }
}

// ===========================================
// Default Instance
// ===========================================

export const logger = new JobChangeLogger();

export function createLogger(config: Partial<LoggerConfig> = {}): JobChangeLogger {
  return new JobChangeLogger(config);
}
