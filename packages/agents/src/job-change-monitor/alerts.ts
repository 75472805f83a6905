/**
 * Opportunity Alerts
 *
 * Turns job change events into prioritized alerts with a message and
 * follow-up action items.
 *
 * @module job-change-monitor/alerts
 */

import type { JobChangeEvent } from '@cloud-prospector/lib';
import type { AlertPriority, JobChangeAlert } from './types';

export const ALERT_PRIORITY_THRESHOLDS = {
  HIGH: 80,
  MEDIUM: 65,
} as const;

export function alertPriority(score: number): AlertPriority {
  if (score >= ALERT_PRIORITY_THRESHOLDS.HIGH) return 'HIGH';
  if (score >= ALERT_PRIORITY_THRESHOLDS.MEDIUM) return 'MEDIUM';
  return 'LOW';
}

const UNKNOWN = 'unknown';

export function alertMessage(event: JobChangeEvent): string {
  const name = event.contact_name;
  const newCompany = event.new_company ?? UNKNOWN;
  const newRole = event.new_role ?? UNKNOWN;

  switch (event.change_type) {
    case 'company':
      return `${name} moved from ${event.previous_company ?? UNKNOWN} to ${newCompany} as ${newRole}`;
    case 'role':
      return `${name} was promoted to ${newRole} at ${newCompany}`;
    case 'both':
      return `${name} moved to ${newCompany} as ${newRole}`;
  }
}

export function actionItems(score: number): string[] {
  const actions = [
    'Send a congratulations message on LinkedIn',
    'Assess whether the new company is a qualified prospect',
  ];

  if (score >= ALERT_PRIORITY_THRESHOLDS.HIGH) {
    actions.push('Schedule an AWS discovery meeting', 'Share similar customer case studies');
  } else if (score >= ALERT_PRIORITY_THRESHOLDS.MEDIUM) {
    actions.push('Assess fit with AWS solutions');
  }

  return actions;
}

export function buildAlert(event: JobChangeEvent): JobChangeAlert {
  return {
    type: 'job_change_opportunity',
    event_id: event.id,
    priority: alertPriority(event.opportunity_score),
    contact_name: event.contact_name,
    linkedin_url: event.contact_id,
    change_type: event.change_type,
    previous_company: event.previous_company,
    new_company: event.new_company,
    new_role: event.new_role,
    opportunity_score: event.opportunity_score,
    detected_at: event.detected_at,
    alert_status: event.alert_status,
    message: alertMessage(event),
    action_items: actionItems(event.opportunity_score),
  };
}
