/**
 * Profile Lookup
 *
 * Collaborator that reports a contact's current company and role. The
 * HTTP implementation calls a lookup service with the profile URL and
 * degrades to null on timeout, network error, non-2xx or a body that
 * does not match the snapshot shape.
 *
 * @module job-change-monitor/profile-lookup
 */

import { ProfileSnapshotSchema, errorMessage, type ProfileSnapshot } from '@cloud-prospector/lib';
import { logger as defaultLogger, type JobChangeLogger } from './logger';

export interface ProfileLookup {
  lookup(linkedinUrl: string): Promise<ProfileSnapshot | null>;
}

export type ProfileFetch = (
  url: string,
  init: { signal: AbortSignal; headers: Record<string, string> }
) => Promise<Response>;

export interface HttpProfileLookupConfig {
  /** Lookup endpoint; the profile URL is passed as the `url` query parameter */
  baseUrl: string;

  /** Per-request timeout (default: 10000ms) */
  timeoutMs: number;
}

export const DEFAULT_PROFILE_LOOKUP_TIMEOUT_MS = 10_000;

export class HttpProfileLookup implements ProfileLookup {
  private config: HttpProfileLookupConfig;
  private fetchImpl: ProfileFetch;
  private logger: JobChangeLogger;

  constructor(
    config: Pick<HttpProfileLookupConfig, 'baseUrl'> & Partial<HttpProfileLookupConfig>,
    fetchImpl: ProfileFetch = fetch
  ) {
    this.config = {
      baseUrl: config.baseUrl,
      timeoutMs: config.timeoutMs ?? DEFAULT_PROFILE_LOOKUP_TIMEOUT_MS,
    };
    this.fetchImpl = fetchImpl;
    this.logger = defaultLogger;
  }

  setLogger(customLogger: JobChangeLogger): void {
    this.logger = customLogger;
  }

  buildUrl(linkedinUrl: string): string {
    const url = new URL(this.config.baseUrl);
    url.searchParams.set('url', linkedinUrl);
    return url.toString();
  }

  async lookup(linkedinUrl: string): Promise<ProfileSnapshot | null> {
    let response: Response;
    try {
      response = await this.fetchImpl(this.buildUrl(linkedinUrl), {
        signal: AbortSignal.timeout(this.config.timeoutMs),
        headers: { Accept: 'application/json' },
      });
    } catch (error) {
      const timedOut = error instanceof Error && error.name === 'TimeoutError';
      this.logger.profileLookupFailed({
        contact_id: linkedinUrl,
        reason: timedOut ? 'timeout' : 'network_error',
        error_message: errorMessage(error),
      });
      return null;
    }

    if (!response.ok) {
      this.logger.profileLookupFailed({
        contact_id: linkedinUrl,
        reason: 'http_status',
        status: response.status,
      });
      return null;
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      this.logger.profileLookupFailed({
        contact_id: linkedinUrl,
        reason: 'invalid_response',
        error_message: errorMessage(error),
      });
      return null;
    }

    const parsed = ProfileSnapshotSchema.safeParse(body);
    if (!parsed.success) {
      this.logger.profileLookupFailed({
        contact_id: linkedinUrl,
        reason: 'invalid_response',
        error_message: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '),
      });
      return null;
    }

    return parsed.data;
  }
}
