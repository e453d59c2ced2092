import { Router, type Request, type Response } from 'express';
import { ANALYTICS_REFRESH_JOB } from '../jobs/analyticsRefresh.job';
import { hasJob, triggerJob } from '../jobs/scheduler';
import type { AnalyticsService } from '../services/analytics.service';

const UNAVAILABLE = 'Analytics is not available on this instance.';

export function createAnalyticsRouter(analytics: AnalyticsService | null): Router {
  const router = Router();

  async function report(res: Response, label: string, load: (service: AnalyticsService) => Promise<unknown>) {
    if (!analytics) {
      return res.status(404).json({ error: UNAVAILABLE });
    }
    try {
      return res.json(await load(analytics));
    } catch (error) {
      console.error(`Failed to build ${label} report`, error);
      return res.status(500).json({ error: `Failed to build ${label} report.` });
    }
  }

  router.get('/analytics/stock', (_req: Request, res: Response) =>
    report(res, 'stock', async (service) => {
      const { items, ...averages } = await service.stockReport();
      return { ...averages, data: items };
    })
  );

  router.get('/analytics/revenue', (_req: Request, res: Response) =>
    report(res, 'revenue', async (service) => ({ data: await service.revenueLeaders() }))
  );

  router.get('/analytics/carriers', (_req: Request, res: Response) =>
    report(res, 'carrier', async (service) => ({ data: await service.carrierDecisions() }))
  );

  router.get('/analytics/suppliers', (_req: Request, res: Response) =>
    report(res, 'supplier', async (service) => ({ data: await service.supplierRanking() }))
  );

  router.post('/analytics/refresh', async (_req: Request, res: Response) => {
    if (!hasJob(ANALYTICS_REFRESH_JOB)) {
      return res.status(404).json({ error: 'Analytics refresh is not enabled on this instance.' });
    }
    try {
      const result = await triggerJob(ANALYTICS_REFRESH_JOB);
      // The job answers null when a refresh is already in flight.
      if (result === null) {
        return res.status(409).json({
          job: ANALYTICS_REFRESH_JOB,
          status: 'skipped',
          error: 'Analytics refresh already running.'
        });
      }
      return res.status(202).json({ job: ANALYTICS_REFRESH_JOB, status: 'completed', summary: result });
    } catch (error) {
      console.error(error);
      return res.status(500).json({ error: 'Analytics refresh failed.' });
    }
  });

  return router;
}
