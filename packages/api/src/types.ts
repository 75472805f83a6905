/**
 * Shared API types
 */
import type { LeadScorerAgent } from '@cloud-prospector/agents/lead-scorer';
import type { FetchLike, TechnographicsLogger } from '@cloud-prospector/agents/technographics';
import type { JobChangeMonitor } from '@cloud-prospector/agents/job-change-monitor';
import type { PlaylistEngine } from '@cloud-prospector/agents/playlists';
import type { LeadRepository } from './services/leads';
import type { ApiLogger } from './logger';

// Hono environment: per-request variables set by middleware
export type AppEnv = {
  Variables: {
    requestId: string;
  };
};

// Everything the routes need, built once at startup (or per test)
export interface AppDeps {
  leads: LeadRepository;
  scorer: LeadScorerAgent;
  monitor: JobChangeMonitor;
  playlists: PlaylistEngine;
  logger: ApiLogger;
  technographicsLogger?: TechnographicsLogger;
  /** False when no profile lookup service is configured */
  pollingEnabled: boolean;
  /** Website fetch used for inspection (defaults to global fetch) */
  fetch?: FetchLike;
}
