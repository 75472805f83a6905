/**
 * Test helpers: an app wired to in-memory stores, silent loggers, a
 * scripted profile lookup and a scripted website fetch
 */
import { vi } from 'vitest';
import { createMemoryStoreFactory, type ProfileSnapshot, type RawLead } from '@cloud-prospector/lib';
import { createLeadScorerAgent, createLeadScorerLogger } from '@cloud-prospector/agents/lead-scorer';
import {
  createJobChangeLogger,
  createJobChangeMonitor,
  type ProfileLookup,
} from '@cloud-prospector/agents/job-change-monitor';
import { createPlaylistEngine, createPlaylistLogger } from '@cloud-prospector/agents/playlists';
import { createTechnographicsLogger, type FetchLike } from '@cloud-prospector/agents/technographics';
import { createApp } from '../index';
import { createLogger } from '../logger';
import { LeadRepository } from '../services/leads';
import type { AppDeps } from '../types';

export interface TestContext {
  app: ReturnType<typeof createApp>;
  deps: AppDeps;
  profiles: Map<string, ProfileSnapshot>;
  pages: Map<string, string>;
  apiLines: Array<Record<string, unknown>>;
}

export function createTestApp(options: { pollingEnabled?: boolean } = {}): TestContext {
  const stores = createMemoryStoreFactory();
  const silent = { output: () => undefined };
  const apiLines: Array<Record<string, unknown>> = [];

  const profiles = new Map<string, ProfileSnapshot>();
  const lookup: ProfileLookup = {
    lookup: async (url) => profiles.get(url) ?? null,
  };

  const pages = new Map<string, string>();
  const fetchPage = vi.fn<FetchLike>(async (url) => {
    const html = pages.get(url);
    return html === undefined ? new Response('missing', { status: 404 }) : new Response(html, { status: 200 });
  });

  const scorer = createLeadScorerAgent();
  scorer.setLogger(createLeadScorerLogger(silent));

  const monitor = createJobChangeMonitor({ stores, lookup, sleep: async () => undefined });
  monitor.setLogger(createJobChangeLogger(silent));

  const playlists = createPlaylistEngine({ stores });
  playlists.setLogger(createPlaylistLogger(silent));

  const deps: AppDeps = {
    leads: new LeadRepository(stores),
    scorer,
    monitor,
    playlists,
    logger: createLogger({ level: 'debug', output: (message) => apiLines.push(JSON.parse(message)) }),
    technographicsLogger: createTechnographicsLogger(silent),
    pollingEnabled: options.pollingEnabled ?? true,
    fetch: fetchPage,
  };

  return { app: createApp(deps), deps, profiles, pages, apiLines };
}

export function jsonRequest(method: string, body: unknown): RequestInit {
  return {
    method,
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  };
}

/** 75 points: enterprise 30 + website 5 + azure 20 + banking 20 */
export const BANK_LEAD: RawLead = {
  lead_id: 'lead_bank',
  company_name: 'Banco Alfa',
  sector: 'banking',
  company_size: 'enterprise',
  website: 'https://alfa.example',
  competitor_cloud: 'azure',
  decision_makers: [
    { name: 'Ana Souza', role: 'CTO', linkedin_url: 'https://profiles.example/ana' },
    { name: 'Bruno Lima', role: 'CFO' },
  ],
};

/** 80 points: enterprise 30 + website 5 + aws 25 + banking 20 */
export const AWS_BANK_LEAD: RawLead = {
  lead_id: 'lead_aws_bank',
  company_name: 'Banco Gama',
  sector: 'banking',
  company_size: 'enterprise',
  website: 'https://gama.example',
  aws_usage: true,
};

/** 17 points: small 9 + other sector 8 */
export const SMALL_LEAD: RawLead = {
  lead_id: 'lead_small',
  company_name: 'Norte Ltda',
  sector: 'other',
  company_size: 'small',
};
