/**
 * Structured JSON Logger for Technographics
 *
 * Events:
 * - website_inspected: Page fetched and signatures matched
 * - website_fetch_failed: Timeout, network error or non-2xx response
 * - technographics_classified: Signal bag turned into a profile
 *
 * @module technographics/logger
 */

import { StructuredLogger, type LoggerConfig, type CloudMaturity } from '@cloud-prospector/lib';
import type { Urgency } from './contracts/tech-signals';

export type TechnographicsEvent =
  | 'website_inspected'
  | 'website_fetch_failed'
  | 'technographics_classified';

export class TechnographicsLogger extends StructuredLogger<TechnographicsEvent> {
  websiteInspected(data: {
    url: string;
    status: number;
    tech_count: number;
    duration_ms: number;
  }): void {
    this.log('info', 'website_inspected', data);
  }

  websiteFetchFailed(data: {
    url: string;
    reason: 'timeout' | 'network_error' | 'http_status';
    error_message: string;
    status?: number;
  }): void {
    this.log('warn', 'website_fetch_failed', data);
  }

  technographicsClassified(data: {
    company_name?: string;
    cloud_maturity: CloudMaturity;
    intent_score: number;
    urgency: Urgency;
    opportunities: number;
  }): void {
    this.log('debug', 'technographics_classified', data);
  }
}

export const logger = new TechnographicsLogger();

export function createLogger(config: Partial<LoggerConfig> = {}): TechnographicsLogger {
  return new TechnographicsLogger(config);
}
