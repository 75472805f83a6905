/**
 * Playlists
 *
 * Criteria matching, template recommendations, daily lead picks and
 * engagement tracking.
 *
 * @module playlists
 */

export * from './types';
export * from './criteria';
export * from './templates';
export * from './recommender';
export * from './reasoning';
export {
  PlaylistEngine,
  createPlaylistEngine,
  CONTACT_ACTIONS,
  PLAYLISTS_COLLECTION,
  MEMBERSHIPS_COLLECTION,
  PREFERENCES_COLLECTION,
  ENGAGEMENT_COLLECTION,
  type AutoRefreshSummary,
  type PlaylistEngineDeps,
  type PlaylistResult,
} from './engine';
export { PlaylistLogger, logger as playlistLogger, createLogger as createPlaylistLogger } from './logger';
