/**
 * Structured JSON logger for the HTTP front end and its schedulers
 */
import { StructuredLogger, type LoggerConfig } from '@cloud-prospector/lib';

export type ApiLogEvent =
  | 'request_start'
  | 'request_complete'
  | 'request_error'
  | 'server_started'
  | 'server_stopping'
  | 'job_completed'
  | 'job_failed'
  | 'job_skipped';

export class ApiLogger extends StructuredLogger<ApiLogEvent> {
  requestStart(data: { request_id: string; method: string; path: string }): void {
    this.log('debug', 'request_start', data);
  }

  requestComplete(data: {
    request_id: string;
    method: string;
    path: string;
    status: number;
    duration_ms: number;
  }): void {
    this.log('info', 'request_complete', data);
  }

  requestError(data: {
    request_id?: string;
    method: string;
    path: string;
    status: number;
    code: string;
    error_message: string;
  }): void {
    this.log(data.status >= 500 ? 'error' : 'warn', 'request_error', data);
  }

  serverStarted(data: { port: number; storage: 'redis' | 'memory'; schedulers: string[] }): void {
    this.log('info', 'server_started', data);
  }

  serverStopping(data: { signal: string }): void {
    this.log('info', 'server_stopping', data);
  }

  jobCompleted(data: { job: string; duration_ms: number; result?: Record<string, unknown> }): void {
    this.log('debug', 'job_completed', data);
  }

  jobFailed(data: { job: string; error_message: string }): void {
    this.log('error', 'job_failed', data);
  }

  jobSkipped(data: { job: string; reason: 'still_running' }): void {
    this.log('warn', 'job_skipped', data);
  }
}

export const logger = new ApiLogger();

export function createLogger(config: Partial<LoggerConfig> = {}): ApiLogger {
  return new ApiLogger(config);
}
