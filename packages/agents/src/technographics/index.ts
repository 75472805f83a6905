/**
 * Technographics
 *
 * Website inspection and cloud-maturity classification.
 *
 * @module technographics
 */

export * from './contracts';

export {
  calculateCloudMaturity,
  detectMigrationOpportunities,
  calculateIntentSignals,
  classifyTechnographics,
  applyTechnographics,
  findCompetitorCloud,
  urgencyForScore,
  MATURITY_THRESHOLDS,
  URGENCY_THRESHOLDS,
  MIGRATION_OPPORTUNITIES,
} from './classifier';

export {
  inspectWebsite,
  fetchWebsiteSignals,
  normalizeWebsiteUrl,
  extractTagAttributes,
  DEFAULT_FETCH_TIMEOUT_MS,
  type WebsiteSnapshot,
  type FetchLike,
  type FetchWebsiteOptions,
} from './inspector';

export { SIGNATURES, TARGET_PROVIDER, MODERN_FRONTEND_FRAMEWORKS } from './signatures';

export {
  TechnographicsLogger,
  logger as technographicsLogger,
  createLogger as createTechnographicsLogger,
} from './logger';
