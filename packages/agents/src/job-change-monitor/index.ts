/**
 * Job Change Monitor
 *
 * Contact roster, profile polling, opportunity scoring and alerts.
 *
 * @module job-change-monitor
 */

export * from './types';
export * from './opportunity';
export * from './alerts';
export * from './profile-lookup';
export {
  JobChangeMonitor,
  createJobChangeMonitor,
  selectContactsToPoll,
  CONTACTS_COLLECTION,
  EVENTS_COLLECTION,
  type JobChangeMonitorDeps,
} from './monitor';
export { JobChangeLogger, logger as jobChangeLogger, createLogger as createJobChangeLogger } from './logger';
