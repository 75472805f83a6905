/**
 * Job Change Monitor
 *
 * Tracks decision makers seeded from leads and polls their profiles for
 * company or role moves. Every roster mutation (seeding, poll cycles,
 * deactivation sweeps, alert status updates) runs through a single-writer
 * queue, so two cycles never interleave their read-modify-write steps.
 *
 * Contact lifecycle: active -> active (checked), active -> active + event
 * (change detected), active -> inactive (stale). Inactive is terminal.
 *
 * @module job-change-monitor/monitor
 */

import pLimit, { type LimitFunction } from 'p-limit';
import { setTimeout as delay } from 'node:timers/promises';
import {
  JobChangeEventSchema,
  TrackedContactSchema,
  errorMessage,
  type AlertStatus,
  type JobChangeEvent,
  type Lead,
  type ProfileSnapshot,
  type RecordStore,
  type RecordStoreFactory,
  type TrackedContact,
} from '@cloud-prospector/lib';
import type { JobChangeAlert, JobChangeMonitorConfig, PollSummary } from './types';
import { DEFAULT_JOB_CHANGE_MONITOR_CONFIG } from './types';
import { calculateOpportunityScore, classifyChange, detectChange } from './opportunity';
import { buildAlert } from './alerts';
import type { ProfileLookup } from './profile-lookup';
import { logger, JobChangeLogger } from './logger';

const DAY_MS = 24 * 60 * 60 * 1000;

export const CONTACTS_COLLECTION = 'tracked_contacts';
export const EVENTS_COLLECTION = 'job_changes';

export interface JobChangeMonitorDeps {
  stores: RecordStoreFactory;
  lookup: ProfileLookup;
  /** Injectable pause between fetches (tests pass a no-op) */
  sleep?: (ms: number) => Promise<void>;
  /** Injectable clock */
  now?: () => Date;
}

// ===========================================
// Selection
// ===========================================

/**
 * Active contacts to check next: never-checked first in added_at order,
 * then by oldest last_checked_at.
 */
export function selectContactsToPoll(contacts: readonly TrackedContact[], limit: number): TrackedContact[] {
  return contacts
    .filter((contact) => contact.status === 'active')
    .sort((a, b) => {
      if (a.last_checked_at === null && b.last_checked_at === null) {
        return a.added_at.localeCompare(b.added_at);
      }
      if (a.last_checked_at === null) return -1;
      if (b.last_checked_at === null) return 1;
      return a.last_checked_at.localeCompare(b.last_checked_at);
    })
    .slice(0, limit);
}

// ===========================================
// Monitor Class
// ===========================================

export class JobChangeMonitor {
  private config: JobChangeMonitorConfig;
  private logger: JobChangeLogger;
  private contacts: RecordStore<TrackedContact>;
  private events: RecordStore<JobChangeEvent>;
  private lookup: ProfileLookup;
  private sleep: (ms: number) => Promise<void>;
  private now: () => Date;
  private writer: LimitFunction = pLimit(1);

  constructor(deps: JobChangeMonitorDeps, config: Partial<JobChangeMonitorConfig> = {}) {
    this.config = { ...DEFAULT_JOB_CHANGE_MONITOR_CONFIG, ...config };
    this.logger = logger;
    this.contacts = deps.stores(CONTACTS_COLLECTION, TrackedContactSchema);
    this.events = deps.stores(EVENTS_COLLECTION, JobChangeEventSchema);
    this.lookup = deps.lookup;
    this.sleep = deps.sleep ?? ((ms) => delay(ms));
    this.now = deps.now ?? (() => new Date());
  }

  setLogger(customLogger: JobChangeLogger): void {
    this.logger = customLogger;
  }

  getConfig(): JobChangeMonitorConfig {
    return this.config;
  }

  // ===========================================
  // Roster
  // ===========================================

  /**
   * Start tracking every decision maker with a profile URL who is not
   * tracked yet. Returns the number of contacts added.
   */
  addContactsFromLeads(leads: readonly Lead[]): Promise<number> {
    return this.writer(async () => {
      let added = 0;
      let alreadyTracked = 0;
      const addedAt = this.now().toISOString();

      for (const lead of leads) {
        for (const dm of lead.decision_makers) {
          const linkedinUrl = dm.linkedin_url?.trim();
          if (!linkedinUrl) continue;

          if (await this.contacts.get(linkedinUrl)) {
            alreadyTracked++;
            continue;
          }

          const role = dm.role ?? null;
          await this.contacts.put(linkedinUrl, {
            linkedin_url: linkedinUrl,
            name: dm.name,
            email: dm.email,
            phone: dm.phone,
            current_company: lead.company_name,
            current_role: role,
            original_company: lead.company_name,
            original_role: role,
            original_lead_score: lead.score,
            added_at: addedAt,
            last_checked_at: null,
            status: 'active',
          });
          added++;
        }
      }

      this.logger.contactsTracked({ leads: leads.length, added, already_tracked: alreadyTracked });
      return added;
    });
  }

  listContacts(): Promise<TrackedContact[]> {
    return this.contacts.list();
  }

  getContact(linkedinUrl: string): Promise<TrackedContact | null> {
    return this.contacts.get(linkedinUrl);
  }

  // ===========================================
  // Polling
  // ===========================================

  /**
   * Run one poll cycle over up to batchSize active contacts
   */
  pollOnce(): Promise<PollSummary> {
    return this.writer(() => this.runPollCycle());
  }

  private async runPollCycle(): Promise<PollSummary> {
    const startTime = Date.now();
    const all = await this.contacts.list();
    const selected = selectContactsToPoll(all, this.config.batchSize);

    this.logger.pollStarted({
      selected: selected.length,
      active: all.filter((c) => c.status === 'active').length,
    });

    const summary: PollSummary = { checked: 0, skipped: 0, changes: 0, events: [] };

    for (const [position, contact] of selected.entries()) {
      if (position > 0) {
        await this.sleep(this.config.requestDelayMs);
      }

      let observed: ProfileSnapshot | null;
      try {
        observed = await this.lookup.lookup(contact.linkedin_url);
      } catch (error) {
        this.logger.profileLookupFailed({
          contact_id: contact.linkedin_url,
          reason: 'network_error',
          error_message: errorMessage(error),
        });
        observed = null;
      }

      if (!observed) {
        summary.skipped++;
        this.logger.contactSkipped({ contact_id: contact.linkedin_url });
        continue;
      }

      const checkedAt = this.now().toISOString();
      const newCompany = observed.company ?? contact.current_company;
      const newRole = observed.role ?? contact.current_role;
      const flags = detectChange(contact, observed);
      const changeType = classifyChange(flags);

      if (changeType) {
        const event: JobChangeEvent = {
          id: await this.events.nextSequence(),
          contact_id: contact.linkedin_url,
          contact_name: contact.name,
          previous_company: contact.current_company,
          new_company: newCompany,
          previous_role: contact.current_role,
          new_role: newRole,
          change_type: changeType,
          detected_at: checkedAt,
          opportunity_score: calculateOpportunityScore({
            ...flags,
            previous_role: contact.current_role,
            new_role: newRole,
            new_company: newCompany,
          }),
          alert_status: 'new',
        };

        await this.events.put(String(event.id), event);
        summary.events.push(event);
        summary.changes++;

        this.logger.jobChangeDetected({
          event_id: event.id,
          contact_id: event.contact_id,
          change_type: event.change_type,
          opportunity_score: event.opportunity_score,
        });
      }

      await this.contacts.put(contact.linkedin_url, {
        ...contact,
        current_company: newCompany,
        current_role: newRole,
        last_checked_at: checkedAt,
      });
      summary.checked++;
    }

    this.logger.pollCompleted({
      checked: summary.checked,
      skipped: summary.skipped,
      changes: summary.changes,
      duration_ms: Date.now() - startTime,
    });

    return summary;
  }

  /**
   * Mark contacts inactive when their last successful check (or, if never
   * checked, their added_at) is older than the inactivity window
   */
  deactivateStaleContacts(inactivityDays: number = this.config.inactivityDays): Promise<number> {
    return this.writer(async () => {
      const cutoff = this.now().getTime() - inactivityDays * DAY_MS;
      let deactivated = 0;

      for (const contact of await this.contacts.list()) {
        if (contact.status !== 'active') continue;

        const lastSeen = Date.parse(contact.last_checked_at ?? contact.added_at);
        if (lastSeen < cutoff) {
          await this.contacts.put(contact.linkedin_url, { ...contact, status: 'inactive' });
          deactivated++;
        }
      }

      this.logger.contactsDeactivated({ deactivated, inactivity_days: inactivityDays });
      return deactivated;
    });
  }

  // ===========================================
  // Events and Alerts
  // ===========================================

  /**
   * Events detected within `days` scoring at least `minScore`, ordered by
   * score then detection time, both descending
   */
  async getRecentChanges(
    days: number = this.config.recentDays,
    minScore: number = this.config.alertMinScore
  ): Promise<JobChangeEvent[]> {
    const cutoff = this.now().getTime() - days * DAY_MS;

    return (await this.events.list())
      .filter((event) => Date.parse(event.detected_at) >= cutoff && event.opportunity_score >= minScore)
      .sort(
        (a, b) =>
          b.opportunity_score - a.opportunity_score || b.detected_at.localeCompare(a.detected_at)
      );
  }

  /**
   * Alerts for the given events, or for the recent changes when omitted
   */
  async generateAlerts(events?: readonly JobChangeEvent[]): Promise<JobChangeAlert[]> {
    const source = events ?? (await this.getRecentChanges());
    return source.map(buildAlert);
  }

  getEvent(id: number): Promise<JobChangeEvent | null> {
    return this.events.get(String(id));
  }

  /**
   * Move an event's alert to actioned or dismissed. Returns null for an
   * unknown event id.
   */
  updateAlertStatus(id: number, status: Exclude<AlertStatus, 'new'>): Promise<JobChangeEvent | null> {
    return this.writer(async () => {
      const event = await this.events.get(String(id));
      if (!event) return null;

      const updated: JobChangeEvent = { ...event, alert_status: status };
      await this.events.put(String(id), updated);
      this.logger.alertStatusUpdated({ event_id: id, alert_status: status });
      return updated;
    });
  }
}

// ===========================================
// Factory Function
// ===========================================

export function createJobChangeMonitor(
  deps: JobChangeMonitorDeps,
  config?: Partial<JobChangeMonitorConfig>
): JobChangeMonitor {
  return new JobChangeMonitor(deps, config);
}
