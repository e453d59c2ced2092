import { Router, type Request, type Response } from 'express';
import { DIRECTION_CODES, directionFromCode } from '../domains/ledger';
import { updateRequestContext } from '../lib/requestContext';
import { asyncErrorHandler } from '../middleware/validation/errors';
import {
  movementListQuerySchema,
  postMovementSchema,
  registerProductSchema,
  skuParamSchema
} from '../schemas/ledger.schema';
import type { LedgerService } from '../services/ledger.service';

export function createLedgerRouter(ledger: LedgerService): Router {
  const router = Router();

  router.post(
    '/products',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = registerProductSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.flatten() });
      }
      updateRequestContext({ sku: parsed.data.sku });
      const product = await ledger.registerProduct(parsed.data);
      return res.status(201).json({ sku: product.sku });
    })
  );

  router.post(
    '/movements',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = postMovementSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.flatten() });
      }
      updateRequestContext({ sku: parsed.data.sku });
      const result = await ledger.postMovement({
        sku: parsed.data.sku,
        direction: directionFromCode(parsed.data.direction),
        quantity: parsed.data.quantity
      });
      return res.status(201).json(result);
    })
  );

  router.get(
    '/balance/:sku',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const sku = skuParamSchema.safeParse(req.params.sku);
      if (!sku.success) {
        return res.status(400).json({ error: 'Invalid SKU.' });
      }
      updateRequestContext({ sku: sku.data });
      const balance = await ledger.getBalance(sku.data);
      return res.json({
        sku: balance.sku,
        quantity: balance.quantity,
        lastUpdated: balance.lastUpdated.toISOString()
      });
    })
  );

  router.get(
    '/products',
    asyncErrorHandler(async (_req: Request, res: Response) => {
      const products = await ledger.listProducts();
      return res.json(
        products.map((product) => ({
          sku: product.sku,
          name: product.name,
          balance: product.balance,
          minLevel: product.minLevel,
          cost: product.cost,
          lastUpdated: product.lastUpdated.toISOString()
        }))
      );
    })
  );

  router.get(
    '/products/:sku/movements',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const sku = skuParamSchema.safeParse(req.params.sku);
      if (!sku.success) {
        return res.status(400).json({ error: 'Invalid SKU.' });
      }
      const parsed = movementListQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.flatten() });
      }
      const limit = parsed.data.limit ?? 50;
      const offset = parsed.data.offset ?? 0;
      updateRequestContext({ sku: sku.data });
      const movements = await ledger.listMovements(sku.data, { limit, offset });
      return res.json({
        data: movements.map((movement) => ({
          id: movement.id,
          sku: movement.sku,
          direction: DIRECTION_CODES[movement.direction],
          quantity: movement.quantity,
          occurredAt: movement.occurredAt.toISOString()
        })),
        paging: { limit, offset }
      });
    })
  );

  router.get(
    '/ledger/reconcile',
    asyncErrorHandler(async (_req: Request, res: Response) => {
      const report = await ledger.reconcile();
      return res.json({ ...report, checkedAt: report.checkedAt.toISOString() });
    })
  );

  return router;
}
