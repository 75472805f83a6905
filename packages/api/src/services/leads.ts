/**
 * Lead repository
 * Scored leads keyed by lead_id; the pool every playlist refresh reads.
 */
import { LeadSchema, type Lead, type RecordStore, type RecordStoreFactory } from '@cloud-prospector/lib';

export const LEADS_COLLECTION = 'leads';

export class LeadRepository {
  private store: RecordStore<Lead>;

  constructor(stores: RecordStoreFactory) {
    this.store = stores(LEADS_COLLECTION, LeadSchema);
  }

  async save(lead: Lead): Promise<void> {
    await this.store.put(lead.lead_id, lead);
  }

  async saveMany(leads: readonly Lead[]): Promise<void> {
    for (const lead of leads) {
      await this.store.put(lead.lead_id, lead);
    }
  }

  get(leadId: string): Promise<Lead | null> {
    return this.store.get(leadId);
  }

  /**
   * Stored leads by score descending, optionally at or above a floor
   */
  async list(options: { minScore?: number } = {}): Promise<Lead[]> {
    const { minScore } = options;
    return (await this.store.list())
      .filter((lead) => minScore === undefined || lead.score >= minScore)
      .sort((a, b) => b.score - a.score || a.lead_id.localeCompare(b.lead_id));
  }

  /**
   * Resolve ids to stored leads, reporting the ones that do not exist
   */
  async getMany(leadIds: readonly string[]): Promise<{ found: Lead[]; missing: string[] }> {
    const found: Lead[] = [];
    const missing: string[] = [];

    for (const leadId of leadIds) {
      const lead = await this.store.get(leadId);
      if (lead) {
        found.push(lead);
      } else {
        missing.push(leadId);
      }
    }

    return { found, missing };
  }
}
