import type { AppConfig } from './appConfig';

export type SchedulerStartupMode = {
  schedulerEnabled: boolean;
  analyticsRefreshEnabled: boolean;
  reason: string;
};

/**
 * In development the scheduler needs both RUN_INPROCESS_JOBS and
 * ENABLE_SCHEDULER; elsewhere RUN_INPROCESS_JOBS is enough. The analytics
 * refresh writes to Postgres, so it is never registered on the memory store.
 */
export function resolveSchedulerStartupMode(
  config: Pick<AppConfig, 'nodeEnv' | 'runInProcessJobs' | 'enableScheduler' | 'ledgerStore'>
): SchedulerStartupMode {
  if (!config.runInProcessJobs) {
    return { schedulerEnabled: false, analyticsRefreshEnabled: false, reason: 'RUN_INPROCESS_JOBS is off' };
  }

  const schedulerEnabled = config.nodeEnv === 'development' ? config.enableScheduler : true;
  if (!schedulerEnabled) {
    return { schedulerEnabled, analyticsRefreshEnabled: false, reason: 'ENABLE_SCHEDULER is off in development' };
  }

  if (config.ledgerStore !== 'postgres') {
    return { schedulerEnabled, analyticsRefreshEnabled: false, reason: 'analytics refresh requires the postgres store' };
  }

  return { schedulerEnabled, analyticsRefreshEnabled: true, reason: 'enabled' };
}
