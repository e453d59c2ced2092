import express, { type Express } from 'express';
import type { LedgerStore } from './domains/ledger';
import { requestContextMiddleware } from './middleware/requestContext.middleware';
import { requestLoggerMiddleware } from './middleware/requestLogger.middleware';
import { createAnalyticsRouter } from './routes/analytics.routes';
import { createHealthRouter } from './routes/health.routes';
import { createLedgerRouter } from './routes/ledger.routes';
import type { AnalyticsService } from './services/analytics.service';
import type { LedgerService } from './services/ledger.service';

export type AppDependencies = {
  store: LedgerStore;
  ledger: LedgerService;
  /** Absent on the memory store, which has no analytic schema. */
  analytics?: AnalyticsService | null;
};

export function createApp({ store, ledger, analytics = null }: AppDependencies): Express {
  const app = express();
  app.use(express.json());
  app.use(requestContextMiddleware);
  app.use(requestLoggerMiddleware);

  app.use(createHealthRouter(store));
  app.use(createLedgerRouter(ledger));
  app.use(createAnalyticsRouter(analytics));

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}
