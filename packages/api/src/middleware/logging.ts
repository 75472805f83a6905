/**
 * Structured logging middleware for the API
 * Assigns a request ID and logs request start and completion as JSON lines
 */
import { createMiddleware } from 'hono/factory';
import { generateId } from '@cloud-prospector/lib';
import type { AppEnv } from '../types';
import type { ApiLogger } from '../logger';

/**
 * Structured logging middleware factory. An incoming x-request-id header
 * is reused so callers can correlate their own logs.
 */
export function loggingMiddleware(log: ApiLogger) {
  return createMiddleware<AppEnv>(async (c, next) => {
    const requestId = c.req.header('x-request-id') ?? generateId('req');
    const startTime = Date.now();

    // Attach request ID to context for use in handlers and the error handler
    c.set('requestId', requestId);
    c.header('x-request-id', requestId);

    log.requestStart({ request_id: requestId, method: c.req.method, path: c.req.path });

    await next();

    log.requestComplete({
      request_id: requestId,
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      duration_ms: Date.now() - startTime,
    });
  });
}
