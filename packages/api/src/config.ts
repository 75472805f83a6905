/**
 * API configuration
 * Environment variables are validated once at startup; unset optional
 * values fall back to the agents' own defaults.
 */
import { z } from 'zod';

const optionalNumber = z.coerce.number().finite().optional();
const optionalInterval = z.coerce.number().int().positive().optional();

export const ApiEnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(4010),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),

  // Persistence (in-memory stores when either is missing)
  UPSTASH_REDIS_REST_URL: z.string().url().optional(),
  UPSTASH_REDIS_REST_TOKEN: z.string().min(1).optional(),

  // Scoring weight overrides
  WEIGHT_COMPANY_SIZE: optionalNumber,
  WEIGHT_DIGITAL_MATURITY: optionalNumber,
  WEIGHT_CLOUD_USAGE: optionalNumber,
  WEIGHT_SECTOR_FIT: optionalNumber,

  // Job-change monitoring (poller disabled without a lookup URL)
  PROFILE_LOOKUP_URL: z.string().url().optional(),
  PROFILE_LOOKUP_TIMEOUT_MS: optionalInterval,
  JOB_CHANGE_POLL_INTERVAL_MS: optionalInterval,
  JOB_CHANGE_BATCH_SIZE: z.coerce.number().int().positive().default(50),
  JOB_CHANGE_REQUEST_DELAY_MS: z.coerce.number().int().nonnegative().default(2000),
  CONTACT_INACTIVITY_DAYS: z.coerce.number().int().positive().default(90),
  INACTIVITY_SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(24 * 60 * 60 * 1000),

  // Playlists
  PLAYLIST_REFRESH_INTERVAL_MS: optionalInterval,
});

export type ApiEnv = z.infer<typeof ApiEnvSchema>;

export interface ApiConfig {
  port: number;
  logLevel?: ApiEnv['LOG_LEVEL'];
  redis: { url: string; token: string } | null;
  weights: {
    company_size?: number;
    digital_maturity?: number;
    cloud_usage?: number;
    sector_fit?: number;
  };
  jobChanges: {
    lookupUrl: string | null;
    lookupTimeoutMs?: number;
    pollIntervalMs?: number;
    batchSize: number;
    requestDelayMs: number;
    inactivityDays: number;
    sweepIntervalMs: number;
  };
  playlistRefreshIntervalMs?: number;
}

/**
 * Blank variables count as unset, so `PORT=` behaves like no PORT at all
 */
function dropBlank(env: Record<string, string | undefined>): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value;
    }
  }
  return cleaned;
}

/**
 * Parse the environment into the API configuration
 * @throws ZodError if a variable is malformed
 */
export function loadApiConfig(env: Record<string, string | undefined> = process.env): ApiConfig {
  const parsed = ApiEnvSchema.parse(dropBlank(env));

  return {
    port: parsed.PORT,
    logLevel: parsed.LOG_LEVEL,
    redis:
      parsed.UPSTASH_REDIS_REST_URL && parsed.UPSTASH_REDIS_REST_TOKEN
        ? { url: parsed.UPSTASH_REDIS_REST_URL, token: parsed.UPSTASH_REDIS_REST_TOKEN }
        : null,
    weights: {
      company_size: parsed.WEIGHT_COMPANY_SIZE,
      digital_maturity: parsed.WEIGHT_DIGITAL_MATURITY,
      cloud_usage: parsed.WEIGHT_CLOUD_USAGE,
      sector_fit: parsed.WEIGHT_SECTOR_FIT,
    },
    jobChanges: {
      lookupUrl: parsed.PROFILE_LOOKUP_URL ?? null,
      lookupTimeoutMs: parsed.PROFILE_LOOKUP_TIMEOUT_MS,
      pollIntervalMs: parsed.JOB_CHANGE_POLL_INTERVAL_MS,
      batchSize: parsed.JOB_CHANGE_BATCH_SIZE,
      requestDelayMs: parsed.JOB_CHANGE_REQUEST_DELAY_MS,
      inactivityDays: parsed.CONTACT_INACTIVITY_DAYS,
      sweepIntervalMs: parsed.INACTIVITY_SWEEP_INTERVAL_MS,
    },
    playlistRefreshIntervalMs: parsed.PLAYLIST_REFRESH_INTERVAL_MS,
  };
}
