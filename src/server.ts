import 'dotenv/config';
import { createApp } from './app';
import { loadAppConfig } from './config/appConfig';
import { resolveSchedulerStartupMode } from './config/schedulerStartup';
import { createLedgerStore } from './domains/ledger';
import { ANALYTICS_REFRESH_JOB, createAnalyticsRefreshJob } from './jobs/analyticsRefresh.job';
import { registerJob, startScheduler, stopScheduler } from './jobs/scheduler';
import { AnalyticsService } from './services/analytics.service';
import { LedgerService } from './services/ledger.service';
import { gracefulShutdown } from './shutdown';
import { startTelemetry } from './telemetry';

async function main() {
  const config = loadAppConfig();
  const telemetry = await startTelemetry(config.telemetry);

  const { store, pool } = createLedgerStore(config);
  const ledger = new LedgerService(store);
  const analytics = pool ? new AnalyticsService(pool) : null;
  const app = createApp({ store, ledger, analytics });

  const schedulerMode = resolveSchedulerStartupMode(config);
  if (pool) {
    // Registered even when unscheduled so POST /analytics/refresh can run it.
    registerJob(
      ANALYTICS_REFRESH_JOB,
      config.analytics.refreshCron,
      createAnalyticsRefreshJob({ pool, sourceCsvPath: config.analytics.sourceCsvPath }),
      schedulerMode.analyticsRefreshEnabled
    );
  }
  if (!schedulerMode.analyticsRefreshEnabled) {
    console.log(`📅 Analytics refresh not scheduled: ${schedulerMode.reason}`);
  }
  if (schedulerMode.schedulerEnabled) {
    startScheduler();
  }

  const server = app.listen(config.port, () => {
    console.log(`Stock ledger API listening on port ${config.port} (${store.kind} store)`);
  });

  const shutdown = (signal: string) => {
    console.log(`\n🛑 ${signal} received, shutting down...`);
    gracefulShutdown({ server, store, telemetry, stopScheduler })
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('Graceful shutdown failed', error);
        process.exit(1);
      });
  };
  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.once('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  console.error('Failed to start stock ledger API', error);
  process.exit(1);
});
