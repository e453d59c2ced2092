import { schedule, validate, type ScheduledTask } from 'node-cron';

/**
 * In-process job scheduler on node-cron. Jobs run in UTC.
 * Tasks are created stopped and only start with `startScheduler`.
 */

export type JobTask = () => Promise<unknown>;

export type JobDefinition = {
  name: string;
  schedule: string;
  task: JobTask;
  enabled: boolean;
};

const jobs = new Map<string, ScheduledTask>();
const jobDefinitions = new Map<string, JobDefinition>();

async function runJob(name: string, task: JobTask, label = 'Job'): Promise<unknown> {
  console.log(`🚀 Starting ${label.toLowerCase()}: ${name}`);
  const startTime = Date.now();
  const result = await task();
  console.log(`✅ ${label} "${name}" completed in ${Date.now() - startTime}ms`);
  return result;
}

/**
 * Register a scheduled job.
 *
 * @param cronExpression - cron expression, evaluated in UTC
 * @param enabled - disabled jobs can still be triggered manually
 */
export function registerJob(name: string, cronExpression: string, task: JobTask, enabled = true): void {
  if (jobDefinitions.has(name)) {
    console.warn(`⚠️  Job "${name}" already registered, skipping`);
    return;
  }
  if (!validate(cronExpression)) {
    throw new Error(`Invalid cron expression for job "${name}": ${cronExpression}`);
  }

  jobDefinitions.set(name, { name, schedule: cronExpression, enabled, task });

  if (!enabled) {
    console.log(`📅 Job "${name}" registered but disabled`);
    return;
  }

  const scheduledTask = schedule(
    cronExpression,
    async () => {
      try {
        await runJob(name, task);
      } catch (error) {
        console.error(`❌ Job "${name}" failed:`, error);
      }
    },
    { scheduled: false, timezone: 'UTC' }
  );

  jobs.set(name, scheduledTask);
  console.log(`📅 Job "${name}" scheduled: ${cronExpression} (UTC)`);
}

export function startScheduler(): void {
  console.log(`\n🕐 Starting job scheduler (${jobs.size} jobs)`);
  for (const task of jobs.values()) {
    task.start();
  }
  if (jobs.size === 0) {
    console.log('   No jobs registered');
  }
}

export function stopScheduler(): void {
  console.log('\n🛑 Stopping job scheduler');
  for (const [name, task] of jobs.entries()) {
    task.stop();
    console.log(`   Stopped: ${name}`);
  }
  jobs.clear();
  jobDefinitions.clear();
}

export function getJobDefinitions(): JobDefinition[] {
  return [...jobDefinitions.values()];
}

export function hasJob(name: string): boolean {
  return jobDefinitions.has(name);
}

/**
 * Runs a registered job now, outside its schedule, and resolves with whatever
 * the task returned. Errors propagate to the caller.
 */
export async function triggerJob(name: string): Promise<unknown> {
  const def = jobDefinitions.get(name);
  if (!def) {
    throw new Error(`Job "${name}" not found`);
  }
  try {
    return await runJob(name, def.task, 'Manual job');
  } catch (error) {
    console.error(`❌ Manual job "${name}" failed:`, error);
    throw error;
  }
}
