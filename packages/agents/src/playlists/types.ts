/**
 * Playlist Engine Types
 *
 * @module playlists/types
 */

import type {
  EngagementAction,
  Lead,
  PlaylistCriteria,
  PlaylistType,
  Priority,
} from '@cloud-prospector/lib';

// ===========================================
// Configuration Types
// ===========================================

export interface PlaylistEngineConfig {
  /** Maximum template recommendations returned (default: 5) */
  maxTemplateRecommendations: number;

  /** Default daily recommendation limit (default: 10) */
  dailyLimit: number;

  /** Maximum suggested actions per daily recommendation (default: 4) */
  maxSuggestedActions: number;
}

export const DEFAULT_PLAYLIST_ENGINE_CONFIG: PlaylistEngineConfig = {
  maxTemplateRecommendations: 5,
  dailyLimit: 10,
  maxSuggestedActions: 4,
};

// ===========================================
// Errors
// ===========================================

export type PlaylistErrorKind =
  | 'invalid'
  | 'not_found'
  | 'not_dynamic'
  | 'not_static'
  | 'archived'
  | 'store_failed';

export interface PlaylistError {
  kind: PlaylistErrorKind;
  message: string;
  details?: string[];
}

// ===========================================
// Results
// ===========================================

export interface RefreshResult {
  playlist_id: string;
  name: string;
  members: number;
  refreshed_at: string;
}

export interface StaticAddResult {
  playlist_id: string;
  added: number;
  skipped: number;
  total: number;
}

export interface PlaylistTemplate {
  name: string;
  description: string;
  criteria: PlaylistCriteria;
  reasoning: string;
}

export interface PlaylistRecommendation extends PlaylistTemplate {
  estimated_leads: number;
  confidence: number;
  playlist_type: PlaylistType;
}

export interface DailyRecommendation {
  lead: Lead;
  score: number;
  priority: Priority;
  source_playlist: string;
  reasoning: string;
  suggested_actions: string[];
  recommended_at: string;
}

export interface PlaylistPerformance {
  playlist_id: string;
  name: string;
  description: string;
  created_at: string;
  last_refreshed_at: string | null;
  total_leads: number;
  average_score: number;
  hot_leads: number;
  warm_leads: number;
  contacted_leads: number;
  conversion_rate: number;
  engagement_by_action: Partial<Record<EngagementAction, { count: number; positive_outcomes: number }>>;
}

// ===========================================
// Logging Types
// ===========================================

export type LogEventType =
  | 'playlist_created'
  | 'playlist_refreshed'
  | 'playlist_archived'
  | 'static_leads_added'
  | 'auto_refresh_completed'
  | 'recommendations_generated'
  | 'daily_recommendations_generated'
  | 'engagement_tracked'
  | 'preferences_updated'
  | 'playlist_operation_failed';
