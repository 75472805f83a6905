/**
 * Playlist Engine
 *
 * Owns playlists, their membership rows, user preferences and engagement
 * records. The lead pool is passed in by the caller on every refresh, so
 * the engine never reads the lead store itself.
 *
 * Each playlist's membership is one record. Refresh builds the new rows
 * off to the side and swaps them in with a single put; readers see either
 * the old or the new membership. Membership writes (refresh, static adds,
 * engagement status updates) run through a single-writer queue.
 *
 * @module playlists/engine
 */

import pLimit, { type LimitFunction } from 'p-limit';
import {
  CreatePlaylistRequestSchema,
  EngagementRecordSchema,
  PlaylistMembershipSchema,
  PlaylistSchema,
  UserPreferencesSchema,
  calculatePriority,
  err,
  errorMessage,
  generateId,
  ok,
  type EngagementAction,
  type EngagementRecord,
  type Lead,
  type Playlist,
  type PlaylistMember,
  type PlaylistMembership,
  type RecordStore,
  type RecordStoreFactory,
  type Result,
  type UserPreferences,
} from '@cloud-prospector/lib';
import { filterLeadsByCriteria } from './criteria';
import { defaultPreferences, recommendTemplates } from './recommender';
import { generateLeadReasoning, generateSuggestedActions } from './reasoning';
import { logger, PlaylistLogger } from './logger';
import type {
  DailyRecommendation,
  PlaylistEngineConfig,
  PlaylistError,
  PlaylistPerformance,
  PlaylistRecommendation,
  RefreshResult,
  StaticAddResult,
} from './types';
import { DEFAULT_PLAYLIST_ENGINE_CONFIG } from './types';

const HOUR_MS = 60 * 60 * 1000;

export const PLAYLISTS_COLLECTION = 'playlists';
export const MEMBERSHIPS_COLLECTION = 'playlist_members';
export const PREFERENCES_COLLECTION = 'user_preferences';
export const ENGAGEMENT_COLLECTION = 'engagement';

/** Engagement actions that move a lead's membership rows to `contacted` */
export const CONTACT_ACTIONS: readonly EngagementAction[] = ['contacted', 'meeting_scheduled', 'proposal_sent'];

const EngagementInputSchema = EngagementRecordSchema.omit({ id: true, created_at: true });

const PreferencesUpdateSchema = UserPreferencesSchema.omit({ user_id: true }).partial();

export type PlaylistResult<T> = Result<T, PlaylistError>;

export interface PlaylistEngineDeps {
  stores: RecordStoreFactory;
  /** Injectable clock */
  now?: () => Date;
}

export interface AutoRefreshSummary {
  checked: number;
  refreshed: RefreshResult[];
  failed: Array<{ playlist_id: string; error: PlaylistError }>;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function companyKey(lead: Lead): string {
  return lead.company_name.trim().toLowerCase();
}

function failure(kind: PlaylistError['kind'], message: string, details?: string[]): PlaylistResult<never> {
  return err(details ? { kind, message, details } : { kind, message });
}

// ===========================================
// Engine Class
// ===========================================

export class PlaylistEngine {
  private config: PlaylistEngineConfig;
  private logger: PlaylistLogger;
  private playlists: RecordStore<Playlist>;
  private memberships: RecordStore<PlaylistMembership>;
  private preferences: RecordStore<UserPreferences>;
  private engagement: RecordStore<EngagementRecord>;
  private now: () => Date;
  private writer: LimitFunction = pLimit(1);

  constructor(deps: PlaylistEngineDeps, config: Partial<PlaylistEngineConfig> = {}) {
    this.config = { ...DEFAULT_PLAYLIST_ENGINE_CONFIG, ...config };
    this.logger = logger;
    this.playlists = deps.stores(PLAYLISTS_COLLECTION, PlaylistSchema);
    this.memberships = deps.stores(MEMBERSHIPS_COLLECTION, PlaylistMembershipSchema);
    this.preferences = deps.stores(PREFERENCES_COLLECTION, UserPreferencesSchema);
    this.engagement = deps.stores(ENGAGEMENT_COLLECTION, EngagementRecordSchema);
    this.now = deps.now ?? (() => new Date());
  }

  setLogger(customLogger: PlaylistLogger): void {
    this.logger = customLogger;
  }

  getConfig(): PlaylistEngineConfig {
    return this.config;
  }

  /**
   * Run an operation, turning store exceptions into `store_failed` and
   * logging every failed result
   */
  private async run<T>(
    operation: string,
    playlistId: string | undefined,
    fn: () => Promise<PlaylistResult<T>>
  ): Promise<PlaylistResult<T>> {
    let result: PlaylistResult<T>;
    try {
      result = await fn();
    } catch (error) {
      result = failure('store_failed', errorMessage(error));
    }

    if (!result.ok) {
      this.logger.operationFailed({
        operation,
        playlist_id: playlistId,
        kind: result.error.kind,
        error_message: result.error.message,
      });
    }
    return result;
  }

  // ===========================================
  // Playlists
  // ===========================================

  createPlaylist(input: unknown): Promise<PlaylistResult<Playlist>> {
    return this.run('create', undefined, async () => {
      const parsed = CreatePlaylistRequestSchema.safeParse(input);
      if (!parsed.success) {
        return failure(
          'invalid',
          'Invalid playlist definition',
          parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        );
      }

      const request = parsed.data;
      const timestamp = this.now().toISOString();
      const playlist = PlaylistSchema.parse({
        id: generateId('pl'),
        name: request.name,
        description: request.description,
        type: request.type,
        criteria: request.criteria,
        target_count: request.target_count,
        refresh_frequency_hours: request.refresh_frequency_hours,
        created_at: timestamp,
        updated_at: timestamp,
        last_refreshed_at: null,
        status: 'active',
      });

      await this.playlists.put(playlist.id, playlist);
      this.logger.playlistCreated({ playlist_id: playlist.id, name: playlist.name, type: playlist.type });
      return ok(playlist);
    });
  }

  getPlaylist(id: string): Promise<Playlist | null> {
    return this.playlists.get(id);
  }

  /**
   * Playlists by creation time, optionally restricted to one status
   */
  async listPlaylists(filter: { status?: Playlist['status'] } = {}): Promise<Playlist[]> {
    return (await this.playlists.list())
      .filter((playlist) => !filter.status || playlist.status === filter.status)
      .sort((a, b) => a.created_at.localeCompare(b.created_at) || a.id.localeCompare(b.id));
  }

  archivePlaylist(id: string): Promise<PlaylistResult<Playlist>> {
    return this.writer(() =>
      this.run('archive', id, async () => {
        const playlist = await this.playlists.get(id);
        if (!playlist) return failure('not_found', `Playlist ${id} not found`);
        if (playlist.status === 'archived') return ok(playlist);

        const archived: Playlist = { ...playlist, status: 'archived', updated_at: this.now().toISOString() };
        await this.playlists.put(id, archived);
        this.logger.playlistArchived({ playlist_id: id });
        return ok(archived);
      })
    );
  }

  // ===========================================
  // Membership
  // ===========================================

  /**
   * Membership rows of a playlist; empty until its first refresh or add
   */
  getMembers(id: string): Promise<PlaylistResult<PlaylistMember[]>> {
    return this.run('members', id, async () => {
      const playlist = await this.playlists.get(id);
      if (!playlist) return failure('not_found', `Playlist ${id} not found`);

      const membership = await this.memberships.get(id);
      return ok(membership?.members ?? []);
    });
  }

  /**
   * Re-evaluate a dynamic playlist against the pool and replace its rows.
   * Leads that stay in the playlist keep a `contacted` status.
   */
  refreshPlaylist(id: string, pool: readonly Lead[]): Promise<PlaylistResult<RefreshResult>> {
    return this.writer(() => this.run('refresh', id, () => this.refreshUnlocked(id, pool)));
  }

  private async refreshUnlocked(id: string, pool: readonly Lead[]): Promise<PlaylistResult<RefreshResult>> {
    const playlist = await this.playlists.get(id);
    if (!playlist) return failure('not_found', `Playlist ${id} not found`);
    if (playlist.status === 'archived') return failure('archived', `Playlist ${id} is archived`);
    if (playlist.type !== 'dynamic') {
      return failure('not_dynamic', `Playlist ${id} is static and cannot be refreshed`);
    }

    const previous = await this.memberships.get(id);
    const contacted = new Set(
      (previous?.members ?? [])
        .filter((member) => member.status === 'contacted')
        .map((member) => member.lead.lead_id)
    );

    const refreshedAt = this.now().toISOString();
    const members: PlaylistMember[] = filterLeadsByCriteria(pool, playlist.criteria).map((lead): PlaylistMember => ({
      lead,
      score: lead.score,
      priority: calculatePriority(lead.score),
      added_at: refreshedAt,
      status: contacted.has(lead.lead_id) ? 'contacted' : 'new',
    }));

    await this.memberships.put(id, { playlist_id: id, members, replaced_at: refreshedAt });
    await this.playlists.put(id, { ...playlist, last_refreshed_at: refreshedAt, updated_at: refreshedAt });

    this.logger.playlistRefreshed({ playlist_id: id, members: members.length, pool_size: pool.length });
    return ok({ playlist_id: id, name: playlist.name, members: members.length, refreshed_at: refreshedAt });
  }

  /**
   * Refresh every active dynamic playlist that was never refreshed or
   * whose last refresh is older than its cadence
   */
  autoRefresh(pool: readonly Lead[]): Promise<AutoRefreshSummary> {
    return this.writer(async () => {
      const nowMs = this.now().getTime();
      const summary: AutoRefreshSummary = { checked: 0, refreshed: [], failed: [] };

      for (const playlist of await this.listPlaylists({ status: 'active' })) {
        if (playlist.type !== 'dynamic') continue;
        summary.checked++;

        const due =
          playlist.last_refreshed_at === null ||
          nowMs - Date.parse(playlist.last_refreshed_at) >= playlist.refresh_frequency_hours * HOUR_MS;
        if (!due) continue;

        const result = await this.run('auto_refresh', playlist.id, () => this.refreshUnlocked(playlist.id, pool));
        if (result.ok) {
          summary.refreshed.push(result.value);
        } else {
          summary.failed.push({ playlist_id: playlist.id, error: result.error });
        }
      }

      this.logger.autoRefreshCompleted({ checked: summary.checked, refreshed: summary.refreshed.length });
      return summary;
    });
  }

  /**
   * Append leads to a static playlist, skipping any already present
   */
  addToStaticPlaylist(id: string, leads: readonly Lead[]): Promise<PlaylistResult<StaticAddResult>> {
    return this.writer(() =>
      this.run('static_add', id, async () => {
        const playlist = await this.playlists.get(id);
        if (!playlist) return failure('not_found', `Playlist ${id} not found`);
        if (playlist.status === 'archived') return failure('archived', `Playlist ${id} is archived`);
        if (playlist.type !== 'static') {
          return failure('not_static', `Playlist ${id} is dynamic; leads come from its criteria`);
        }

        const existing = (await this.memberships.get(id))?.members ?? [];
        const present = new Set(existing.map((member) => member.lead.lead_id));
        const addedAt = this.now().toISOString();
        const added: PlaylistMember[] = [];

        for (const lead of leads) {
          if (present.has(lead.lead_id)) continue;
          present.add(lead.lead_id);
          added.push({
            lead,
            score: lead.score,
            priority: calculatePriority(lead.score),
            added_at: addedAt,
            status: 'new',
          });
        }

        const members = [...existing, ...added];
        await this.memberships.put(id, { playlist_id: id, members, replaced_at: addedAt });
        await this.playlists.put(id, { ...playlist, updated_at: addedAt });

        const skipped = leads.length - added.length;
        this.logger.staticLeadsAdded({ playlist_id: id, added: added.length, skipped });
        return ok({ playlist_id: id, added: added.length, skipped, total: members.length });
      })
    );
  }

  // ===========================================
  // Preferences
  // ===========================================

  async getPreferences(userId: string): Promise<UserPreferences> {
    return (await this.preferences.get(userId)) ?? defaultPreferences(userId);
  }

  /**
   * Merge a partial update over the stored (or default) preferences
   */
  setPreferences(userId: string, update: unknown): Promise<PlaylistResult<UserPreferences>> {
    return this.run('preferences', undefined, async () => {
      const parsed = PreferencesUpdateSchema.safeParse(update);
      if (!parsed.success) {
        return failure(
          'invalid',
          'Invalid preferences',
          parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        );
      }

      const current = await this.getPreferences(userId);
      const next: UserPreferences = { ...current, ...parsed.data, user_id: userId };
      await this.preferences.put(userId, next);
      this.logger.preferencesUpdated({ user_id: userId });
      return ok(next);
    });
  }

  // ===========================================
  // Recommendations
  // ===========================================

  async recommendPlaylists(userId: string, pool?: readonly Lead[]): Promise<PlaylistRecommendation[]> {
    const preferences = await this.getPreferences(userId);
    const recommendations = recommendTemplates(preferences, {
      pool,
      limit: this.config.maxTemplateRecommendations,
    });

    this.logger.recommendationsGenerated({
      user_id: userId,
      count: recommendations.length,
      pool_size: pool?.length ?? 0,
    });
    return recommendations;
  }

  /**
   * Uncontacted rows from active playlists, best score first (newest row
   * on ties), one per company, capped by the user's daily allowance
   */
  async getDailyRecommendations(userId: string, limit: number = this.config.dailyLimit): Promise<DailyRecommendation[]> {
    const preferences = await this.getPreferences(userId);
    const candidates: Array<{ member: PlaylistMember; playlist: Playlist }> = [];

    for (const playlist of await this.listPlaylists({ status: 'active' })) {
      const membership = await this.memberships.get(playlist.id);
      for (const member of membership?.members ?? []) {
        if (member.status === 'new') {
          candidates.push({ member, playlist });
        }
      }
    }

    candidates.sort(
      (a, b) => b.member.score - a.member.score || b.member.added_at.localeCompare(a.member.added_at)
    );

    const cap = Math.min(limit, preferences.max_leads_per_day);
    const seen = new Set<string>();
    const recommendedAt = this.now().toISOString();
    const recommendations: DailyRecommendation[] = [];

    for (const { member, playlist } of candidates) {
      if (recommendations.length >= cap) break;

      const key = companyKey(member.lead);
      if (seen.has(key)) continue;
      seen.add(key);

      recommendations.push({
        lead: member.lead,
        score: member.score,
        priority: member.priority,
        source_playlist: playlist.name,
        reasoning: generateLeadReasoning(member.lead, playlist.name),
        suggested_actions: generateSuggestedActions(member.lead, this.config.maxSuggestedActions),
        recommended_at: recommendedAt,
      });
    }

    this.logger.dailyRecommendationsGenerated({
      user_id: userId,
      candidates: candidates.length,
      count: recommendations.length,
    });
    return recommendations;
  }

  // ===========================================
  // Engagement
  // ===========================================

  /**
   * Record an engagement; contact-type actions mark every membership row
   * of the lead as contacted
   */
  trackEngagement(input: unknown): Promise<PlaylistResult<EngagementRecord>> {
    return this.writer(() =>
      this.run('engagement', undefined, async () => {
        const parsed = EngagementInputSchema.safeParse(input);
        if (!parsed.success) {
          return failure(
            'invalid',
            'Invalid engagement',
            parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
          );
        }

        const record: EngagementRecord = {
          ...parsed.data,
          id: generateId('eng'),
          created_at: this.now().toISOString(),
        };
        await this.engagement.put(record.id, record);

        let updated = 0;
        if (CONTACT_ACTIONS.includes(record.action_type)) {
          for (const membership of await this.memberships.list()) {
            let touched = false;
            const members = membership.members.map((member) => {
              if (member.lead.lead_id !== record.lead_id || member.status === 'contacted') return member;
              touched = true;
              updated++;
              return { ...member, status: 'contacted' as const };
            });
            if (touched) {
              await this.memberships.put(membership.playlist_id, { ...membership, members });
            }
          }
        }

        this.logger.engagementTracked({
          lead_id: record.lead_id,
          user_id: record.user_id,
          action_type: record.action_type,
          memberships_updated: updated,
        });
        return ok(record);
      })
    );
  }

  getPlaylistPerformance(id: string): Promise<PlaylistResult<PlaylistPerformance>> {
    return this.run('performance', id, async () => {
      const playlist = await this.playlists.get(id);
      if (!playlist) return failure('not_found', `Playlist ${id} not found`);

      const members = (await this.memberships.get(id))?.members ?? [];
      const total = members.length;
      const contacted = members.filter((member) => member.status === 'contacted').length;
      const leadIds = new Set(members.map((member) => member.lead.lead_id));

      const byAction: PlaylistPerformance['engagement_by_action'] = {};
      for (const record of await this.engagement.list()) {
        if (!leadIds.has(record.lead_id)) continue;
        const entry = byAction[record.action_type] ?? { count: 0, positive_outcomes: 0 };
        entry.count++;
        if (record.outcome === 'positive') entry.positive_outcomes++;
        byAction[record.action_type] = entry;
      }

      return ok({
        playlist_id: id,
        name: playlist.name,
        description: playlist.description,
        created_at: playlist.created_at,
        last_refreshed_at: playlist.last_refreshed_at,
        total_leads: total,
        average_score: total === 0 ? 0 : round2(members.reduce((sum, m) => sum + m.score, 0) / total),
        hot_leads: members.filter((member) => member.priority === 'HOT').length,
        warm_leads: members.filter((member) => member.priority === 'WARM').length,
        contacted_leads: contacted,
        conversion_rate: total === 0 ? 0 : round2((contacted / total) * 100),
        engagement_by_action: byAction,
      });
    });
  }
}

// ===========================================
// Factory Function
// ===========================================

export function createPlaylistEngine(
  deps: PlaylistEngineDeps,
  config?: Partial<PlaylistEngineConfig>
): PlaylistEngine {
  return new PlaylistEngine(deps, config);
}
