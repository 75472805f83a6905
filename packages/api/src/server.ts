/**
 * Server start
 * Serves the app on Node and runs the background schedulers until SIGINT
 * or SIGTERM
 */
import { serve } from '@hono/node-server';
import { createApp } from './index';
import { loadApiConfig } from './config';
import { createServices } from './services/container';
import { Scheduler } from './services/scheduler';

const config = loadApiConfig();
const services = createServices(config);
const app = createApp(services, { accessLog: true, storage: services.storage });
const scheduler = new Scheduler(services.logger);

// ============================================================================
// Schedulers
// ============================================================================

if (config.playlistRefreshIntervalMs) {
  scheduler.every('playlist_auto_refresh', config.playlistRefreshIntervalMs, async () => {
    const summary = await services.playlists.autoRefresh(await services.leads.list());
    return { checked: summary.checked, refreshed: summary.refreshed.length, failed: summary.failed.length };
  });
}

if (services.pollingEnabled && config.jobChanges.pollIntervalMs) {
  scheduler.every('job_change_poll', config.jobChanges.pollIntervalMs, async () => {
    const summary = await services.monitor.pollOnce();
    return { checked: summary.checked, skipped: summary.skipped, changes: summary.changes };
  });
}

if (services.pollingEnabled) {
  scheduler.every('contact_inactivity_sweep', config.jobChanges.sweepIntervalMs, async () => ({
    deactivated: await services.monitor.deactivateStaleContacts(),
  }));
}

// ============================================================================
// Server Start
// ============================================================================

const server = serve({ fetch: app.fetch, port: config.port }, () => {
  services.logger.serverStarted({
    port: config.port,
    storage: services.storage,
    schedulers: scheduler.names(),
  });
});

function shutdown(signal: string): void {
  services.logger.serverStopping({ signal });
  scheduler.stop();
  server.close();
}

process.once('SIGINT', () => shutdown('SIGINT'));
process.once('SIGTERM', () => shutdown('SIGTERM'));
