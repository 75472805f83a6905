/**
 * Cloud Prospector Library
 *
 * Shared record model, logger and persistence for all packages.
 */

// Types, enumerations and constant tables
export * from './types';

// Record model contracts (zod)
export * from './contracts';

// Structured logging
export {
  StructuredLogger,
  DEFAULT_LOGGER_CONFIG,
  LOG_LEVEL_PRIORITY,
  isLogLevel,
  errorMessage,
  type LoggerConfig,
  type LogLevel,
} from './logger';

// Keyed record stores (memory, Upstash Redis)
export * from './store';
