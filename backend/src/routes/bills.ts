import { Router, Request, Response } from 'express';
import { authMiddleware, AuthRequest, requireCaller } from '../middleware/auth';
import { sendError } from '../lib/errors';
import { createBillSchema, idSchema, listBillsQuerySchema } from '../lib/validate';
import type { MarketService } from '../services/market';

export function createBillsRouter(market: MarketService): Router {
  const router = Router();

  // ============================================================
  // GET /bills — Browse open listings (public)
  // ============================================================
  router.get('/', (req: Request, res: Response): void => {
    try {
      const parsed = listBillsQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        res.status(400).json({ error: 'Invalid query', details: parsed.error.issues });
        return;
      }

      const result = market.listBills(parsed.data);
      res.json({
        bills: result.items,
        total: result.total,
        page: result.page,
        totalPages: result.totalPages,
      });
    } catch (err) {
      sendError(res, err, '[Bills] Browse');
    }
  });

  // ============================================================
  // GET /bills/:id — Single listing (public)
  // ============================================================
  router.get('/:id', (req: Request, res: Response): void => {
    try {
      const id = idSchema.safeParse(req.params.id);
      if (!id.success) {
        res.status(400).json({ error: 'Invalid bill id' });
        return;
      }

      const bill = market.getBill(id.data);
      if (!bill) {
        res.status(404).json({ error: 'Bill not found', kind: 'NotFound' });
        return;
      }
      res.json(bill);
    } catch (err) {
      sendError(res, err, '[Bills] Get');
    }
  });

  // ============================================================
  // POST /bills — List capacity and lock the provider deposit
  // ============================================================
  router.post('/', authMiddleware, (req: AuthRequest, res: Response): void => {
    try {
      const parsed = createBillSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: 'Invalid request format', details: parsed.error.issues });
        return;
      }

      const bill = market.createBill(requireCaller(req), parsed.data);
      res.status(201).json({ bill });
    } catch (err) {
      sendError(res, err, '[Bills] Create');
    }
  });

  // ============================================================
  // DELETE /bills/:id — Cancel listing, refund remaining deposit (owner only)
  // ============================================================
  router.delete('/:id', authMiddleware, (req: AuthRequest, res: Response): void => {
    try {
      const id = idSchema.safeParse(req.params.id);
      if (!id.success) {
        res.status(400).json({ error: 'Invalid bill id' });
        return;
      }

      const bill = market.cancelBill(requireCaller(req), id.data);
      res.json({ success: true, billId: bill.id, refunded: bill.depositAmount });
    } catch (err) {
      sendError(res, err, '[Bills] Cancel');
    }
  });

  return router;
}
