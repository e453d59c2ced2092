import { Router, type Request, type Response } from 'express';
import type { LedgerStore } from '../domains/ledger';
import { withTimeout } from '../lib/timeouts';

const STORE_TIMEOUT_MS = Number(process.env.HEALTH_DB_TIMEOUT_MS || 1500);

export function createHealthRouter(store: LedgerStore): Router {
  const router = Router();

  router.get('/health/live', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  router.get('/health/ready', async (_req: Request, res: Response) => {
    const start = Date.now();
    let ready = true;
    let storeDetails: Record<string, unknown>;

    try {
      await withTimeout(store.ping(), STORE_TIMEOUT_MS, store.kind);
      storeDetails = { ok: true, kind: store.kind };
    } catch (error) {
      ready = false;
      storeDetails = { ok: false, kind: store.kind, error: error instanceof Error ? error.message : String(error) };
    }

    res.status(ready ? 200 : 503).json({
      status: ready ? 'ok' : 'unavailable',
      durationMs: Date.now() - start,
      details: { store: storeDetails }
    });
  });

  return router;
}
