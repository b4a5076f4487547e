import { Router, Request, Response } from 'express';
import { authMiddleware, AuthRequest, requireCaller } from '../middleware/auth';
import { sendError } from '../lib/errors';
import { toOrderView } from '../lib/serialize';
import {
  createOrderSchema,
  idSchema,
  listOrdersQuerySchema,
  prepareOrderSchema,
} from '../lib/validate';
import type { MarketService } from '../services/market';

export function createOrdersRouter(market: MarketService): Router {
  const router = Router();

  // ============================================================
  // GET /orders — Filter by user, storager or status (public)
  // ============================================================
  router.get('/', (req: Request, res: Response): void => {
    try {
      const parsed = listOrdersQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        res.status(400).json({ error: 'Invalid query', details: parsed.error.issues });
        return;
      }

      const result = market.listOrders(parsed.data);
      res.json({
        orders: result.items.map(toOrderView),
        total: result.total,
        page: result.page,
        totalPages: result.totalPages,
      });
    } catch (err) {
      sendError(res, err, '[Orders] Browse');
    }
  });

  router.get('/:id', (req: Request, res: Response): void => {
    try {
      const id = idSchema.safeParse(req.params.id);
      if (!id.success) {
        res.status(400).json({ error: 'Invalid order id' });
        return;
      }

      const order = market.getOrder(id.data);
      if (!order) {
        res.status(404).json({ error: 'Order not found', kind: 'NotFound' });
        return;
      }
      res.json(toOrderView(order));
    } catch (err) {
      sendError(res, err, '[Orders] Get');
    }
  });

  // ============================================================
  // POST /orders — Buy a slice of a listing, escrowing the prepayment
  // ============================================================
  router.post('/', authMiddleware, (req: AuthRequest, res: Response): void => {
    try {
      const parsed = createOrderSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: 'Invalid request format', details: parsed.error.issues });
        return;
      }

      const order = market.createOrder(requireCaller(req), parsed.data);
      res.status(201).json({ order: toOrderView(order) });
    } catch (err) {
      sendError(res, err, '[Orders] Create');
    }
  });

  // ============================================================
  // POST /orders/:id/cancel — Consumer backs out before activation
  // ============================================================
  router.post('/:id/cancel', authMiddleware, (req: AuthRequest, res: Response): void => {
    try {
      const id = idSchema.safeParse(req.params.id);
      if (!id.success) {
        res.status(400).json({ error: 'Invalid order id' });
        return;
      }

      const order = market.cancelOrder(requireCaller(req), id.data);
      res.json({
        success: true,
        orderId: order.id,
        userRefund: order.userDepositAmount,
        storagerRefund: order.storageDepositAmount,
      });
    } catch (err) {
      sendError(res, err, '[Orders] Cancel');
    }
  });

  // ============================================================
  // POST /orders/:id/prepare — Submit the data commitment
  // (second matching submission activates the order)
  // ============================================================
  router.post('/:id/prepare', authMiddleware, (req: AuthRequest, res: Response): void => {
    try {
      const id = idSchema.safeParse(req.params.id);
      if (!id.success) {
        res.status(400).json({ error: 'Invalid order id' });
        return;
      }
      const parsed = prepareOrderSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: 'Invalid request format', details: parsed.error.issues });
        return;
      }

      const order = market.prepareOrder(requireCaller(req), id.data, parsed.data);
      res.json({ order: toOrderView(order) });
    } catch (err) {
      sendError(res, err, '[Orders] Prepare');
    }
  });

  // ============================================================
  // POST /orders/:id/withdraw — Provider collects accrued weeks
  // ============================================================
  router.post('/:id/withdraw', authMiddleware, (req: AuthRequest, res: Response): void => {
    try {
      const id = idSchema.safeParse(req.params.id);
      if (!id.success) {
        res.status(400).json({ error: 'Invalid order id' });
        return;
      }

      const result = market.withdrawOrder(requireCaller(req), id.data);
      res.json({ result });
    } catch (err) {
      sendError(res, err, '[Orders] Withdraw');
    }
  });

  return router;
}
