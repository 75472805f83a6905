/**
 * Service container
 * Builds the stores and agents from configuration: Upstash Redis when
 * credentials are present, in-memory stores otherwise.
 */
import {
  createMemoryStoreFactory,
  createRedisClient,
  createRedisStoreFactory,
  type RecordStoreFactory,
} from '@cloud-prospector/lib';
import { createLeadScorerAgent, createLeadScorerLogger, loadScoringWeights } from '@cloud-prospector/agents/lead-scorer';
import {
  HttpProfileLookup,
  createJobChangeLogger,
  createJobChangeMonitor,
  type ProfileLookup,
} from '@cloud-prospector/agents/job-change-monitor';
import { createPlaylistEngine, createPlaylistLogger } from '@cloud-prospector/agents/playlists';
import { createTechnographicsLogger } from '@cloud-prospector/agents/technographics';
import type { ApiConfig } from '../config';
import { createLogger } from '../logger';
import type { AppDeps } from '../types';
import { LeadRepository } from './leads';

export interface Services extends AppDeps {
  storage: 'redis' | 'memory';
}

/** Stand-in used when no lookup service is configured; never called by the poller */
const noProfileLookup: ProfileLookup = {
  lookup: async () => null,
};

function createStores(config: ApiConfig): { stores: RecordStoreFactory; storage: 'redis' | 'memory' } {
  const client = config.redis ? createRedisClient(config.redis) : null;
  return client
    ? { stores: createRedisStoreFactory(client), storage: 'redis' }
    : { stores: createMemoryStoreFactory(), storage: 'memory' };
}

export function createServices(config: ApiConfig): Services {
  const loggerConfig = config.logLevel ? { level: config.logLevel } : {};
  const { stores, storage } = createStores(config);

  const scorer = createLeadScorerAgent({ weights: loadScoringWeights(config.weights) });
  scorer.setLogger(createLeadScorerLogger(loggerConfig));

  const jobChangeLogger = createJobChangeLogger(loggerConfig);
  let lookup = noProfileLookup;
  if (config.jobChanges.lookupUrl) {
    const http = new HttpProfileLookup({
      baseUrl: config.jobChanges.lookupUrl,
      timeoutMs: config.jobChanges.lookupTimeoutMs,
    });
    http.setLogger(jobChangeLogger);
    lookup = http;
  }

  const monitor = createJobChangeMonitor(
    { stores, lookup },
    {
      batchSize: config.jobChanges.batchSize,
      requestDelayMs: config.jobChanges.requestDelayMs,
      inactivityDays: config.jobChanges.inactivityDays,
    }
  );
  monitor.setLogger(jobChangeLogger);

  const playlists = createPlaylistEngine({ stores });
  playlists.setLogger(createPlaylistLogger(loggerConfig));

  return {
    storage,
    leads: new LeadRepository(stores),
    scorer,
    monitor,
    playlists,
    logger: createLogger(loggerConfig),
    technographicsLogger: createTechnographicsLogger(loggerConfig),
    pollingEnabled: config.jobChanges.lookupUrl !== null,
  };
}
