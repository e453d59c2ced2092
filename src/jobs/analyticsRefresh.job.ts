import { readFile } from 'node:fs/promises';
import type { Pool } from 'pg';
import { withTransaction } from '../db';
import { parseCsv, toRecords } from '../lib/csv';
import { loadStarSchema, type LoadSummary } from '../services/analyticsLoader.service';
import { buildStarSchema } from '../services/analyticsModel.service';

export const ANALYTICS_REFRESH_JOB = 'analytics-refresh';

export type AnalyticsRefreshDeps = {
  pool: Pool;
  sourceCsvPath: string;
  clock?: () => Date;
  random?: () => number;
  readSource?: (path: string) => Promise<string>;
};

export type AnalyticsRefreshSummary = {
  sourceRows: number;
  skippedRows: number;
  loaded: LoadSummary;
  durationMs: number;
};

/**
 * Full refresh of the analytic star schema from the supplier CSV.
 *
 * Extract and transform happen outside the database; the load replaces every
 * analytic table in one transaction. Calls made while a refresh is running
 * return null instead of starting a second one.
 */
export function createAnalyticsRefreshJob(deps: AnalyticsRefreshDeps) {
  const clock = deps.clock ?? (() => new Date());
  const random = deps.random ?? Math.random;
  const readSource = deps.readSource ?? ((path: string) => readFile(path, 'utf8'));
  let isRunning = false;

  return async function refreshAnalytics(): Promise<AnalyticsRefreshSummary | null> {
    if (isRunning) {
      console.warn('⚠️  Analytics refresh already running, skipping');
      return null;
    }

    isRunning = true;
    const startTime = Date.now();
    try {
      console.log(`📦 Extracting supplier dataset from ${deps.sourceCsvPath}`);
      const records = toRecords(parseCsv(await readSource(deps.sourceCsvPath)));

      const model = buildStarSchema(records, { today: clock(), random });
      console.log(
        `🔄 Transformed ${model.sourceRows} rows (${model.skippedRows} skipped): ` +
          `${model.products.length} products, ${model.suppliers.length} suppliers, ${model.carriers.length} carriers`
      );

      const loaded = await withTransaction(deps.pool, (client) => loadStarSchema(client, model));
      const durationMs = Date.now() - startTime;
      console.log(`✅ Analytics snapshot loaded in ${durationMs}ms`);

      return { sourceRows: model.sourceRows, skippedRows: model.skippedRows, loaded, durationMs };
    } finally {
      isRunning = false;
    }
  };
}
