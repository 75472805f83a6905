/**
 * Lead Scorer
 *
 * Weighted four-factor scoring, priority tiers, recommendations,
 * lead normalization, export records and CRM sync.
 *
 * @module lead-scorer
 */

// Contracts
export * from './contracts';

// Types
export * from './types';

// Modules
export * from './factors';
export * from './scoring';
export * from './recommendations';
export * from './sector-detector';
export * from './normalize';
export * from './crm-sync';
export { LeadScorerLogger, logger as leadScorerLogger, createLogger as createLeadScorerLogger } from './logger';

// Agent
export { LeadScorerAgent, createLeadScorerAgent } from './agent';
