/**
 * API entry point
 * Hono app exposing lead scoring, technographics, playlists,
 * recommendations and job-change monitoring
 */
import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger as requestLogger } from 'hono/logger';
import type { AppDeps, AppEnv } from './types';
import { loggingMiddleware } from './middleware/logging';
import { errorHandler, notFoundHandler } from './middleware/error-handler';
import { createLeadRoutes } from './routes/leads';
import { createTechnographicsRoutes } from './routes/technographics';
import { createPlaylistRoutes } from './routes/playlists';
import { createRecommendationRoutes } from './routes/recommendations';
import { createJobChangeRoutes } from './routes/job-changes';

export const API_VERSION = '0.1.0';

export interface CreateAppOptions {
  /** Plain-text access log from hono/logger (off in tests) */
  accessLog?: boolean;
  /** Reported by /health */
  storage?: 'redis' | 'memory';
}

export function createApp(deps: AppDeps, options: CreateAppOptions = {}) {
  const app = new Hono<AppEnv>();

  // ============================================================================
  // Global Middleware
  // ============================================================================

  app.use(
    '*',
    cors({
      origin: '*',
      allowMethods: ['GET', 'POST', 'PUT', 'PATCH', 'OPTIONS'],
      allowHeaders: ['Content-Type', 'X-Request-Id'],
    })
  );

  // Request logging (dev)
  if (options.accessLog) {
    app.use('*', requestLogger());
  }

  // Structured logging
  app.use('*', loggingMiddleware(deps.logger));

  // ============================================================================
  // Routes
  // ============================================================================

  app.get('/health', (c) =>
    c.json({
      status: 'healthy',
      version: API_VERSION,
      timestamp: new Date().toISOString(),
      services: {
        storage: options.storage ?? 'memory',
        job_change_polling: deps.pollingEnabled ? 'enabled' : 'disabled',
      },
    })
  );

  app.route('/api/leads', createLeadRoutes(deps));
  app.route('/api/technographics', createTechnographicsRoutes(deps));
  app.route('/api/playlists', createPlaylistRoutes(deps));
  app.route('/api/recommendations', createRecommendationRoutes(deps));
  app.route('/api/job-changes', createJobChangeRoutes(deps));

  // ============================================================================
  // Error Handling
  // ============================================================================

  app.onError(errorHandler(deps.logger));
  app.notFound(notFoundHandler());

  return app;
}

export type App = ReturnType<typeof createApp>;

export { createServices, type Services } from './services/container';
export { loadApiConfig, type ApiConfig } from './config';
export { Scheduler } from './services/scheduler';
export { LeadRepository } from './services/leads';
export type { AppDeps, AppEnv } from './types';
