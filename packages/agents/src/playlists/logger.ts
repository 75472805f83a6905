/**
 * Structured JSON Logger for Playlists
 *
 * @module playlists/logger
 */

import { StructuredLogger, type EngagementAction, type LoggerConfig } from '@cloud-prospector/lib';
import type { LogEventType, PlaylistErrorKind } from './types';

export class PlaylistLogger extends StructuredLogger<LogEventType> {
  // ===========================================
  // Playlist Lifecycle
  // ===========================================

  playlistCreated(data: { playlist_id: string; name: string; type: string }): void {
    this.log('info', 'playlist_created', data);
  }

  playlistRefreshed(data: { playlist_id: string; members: number; pool_size: number }): void {
    this.log('info', 'playlist_refreshed', data);
  }

  playlistArchived(data: { playlist_id: string }): void {
    this.log('info', 'playlist_archived', data);
  }

  staticLeadsAdded(data: { playlist_id: string; added: number; skipped: number }): void {
    this.log('info', 'static_leads_added', data);
  }

  autoRefreshCompleted(data: { checked: number; refreshed: number }): void {
    this.log('info', 'auto_refresh_completed', data);
  }

  operationFailed(data: {
    operation: string;
    playlist_id?: string;
    kind: PlaylistErrorKind;
    error_message: string;
  }): void {
    this.log('warn', 'playlist_operation_failed', data);
  }

  // ===========================================
  // Recommendations
  // ===========================================

  recommendationsGenerated(data: { user_id: string; count: number; pool_size: number }): void {
    this.log('info', 'recommendations_generated', data);
  }

  dailyRecommendationsGenerated(data: { user_id: string; candidates: number; count: number }): void {
    this.log('info', 'daily_recommendations_generated', data);
  }

  // ===========================================
  // Engagement
  // ===========================================

  engagementTracked(data: {
    lead_id: string;
    user_id: string;
    action_type: EngagementAction;
    memberships_updated: number;
  }): void {
    this.log('info', 'engagement_tracked', data);
  }

  preferencesUpdated(data: { user_id: string }): void {
    this.log('debug', 'preferences_updated', data);
  }
}

// ===========================================
// Default Instance
// ===========================================

export const logger = new PlaylistLogger();

export function createLogger(config: Partial<LoggerConfig> = {}): PlaylistLogger {
  return new PlaylistLogger(config);
}
