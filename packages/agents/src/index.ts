/**
 * Cloud Prospector Agents
 *
 * Lead scoring, technographic classification, job-change monitoring and
 * playlists.
 *
 * @module @cloud-prospector/agents
 */

// Lead Scorer - exported in full
export * from './lead-scorer';

// Technographics - no conflicting names
export * from './technographics';

// Job Change Monitor and Playlists - use subpath imports for their types
// import { JobChangeMonitorConfig } from '@cloud-prospector/agents/job-change-monitor';
export {
  JobChangeMonitor,
  createJobChangeMonitor,
  HttpProfileLookup,
  type ProfileLookup,
  type JobChangeAlert,
} from './job-change-monitor';

export {
  PlaylistEngine,
  createPlaylistEngine,
  filterLeadsByCriteria,
  matchesCriteria,
  type PlaylistRecommendation,
  type DailyRecommendation,
} from './playlists';
