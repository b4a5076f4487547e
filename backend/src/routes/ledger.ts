import { Router, Request, Response } from 'express';
import { authMiddleware, AuthRequest, requireCaller } from '../middleware/auth';
import { sendError } from '../lib/errors';
import { accountSchema, eventsQuerySchema, transferSchema } from '../lib/validate';
import type { MarketService } from '../services/market';

export function createLedgerRouter(market: MarketService): Router {
  const router = Router();

  router.get('/:account', (req: Request, res: Response): void => {
    try {
      const parsed = accountSchema.safeParse(req.params.account);
      if (!parsed.success) {
        res.status(400).json({ error: 'Invalid account' });
        return;
      }
      res.json({ account: parsed.data, balance: market.balanceOf(parsed.data) });
    } catch (err) {
      sendError(res, err, '[Ledger] Balance');
    }
  });

  router.post('/transfer', authMiddleware, (req: AuthRequest, res: Response): void => {
    try {
      const parsed = transferSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: 'Invalid request format', details: parsed.error.issues });
        return;
      }

      const from = requireCaller(req);
      const { to, amount } = parsed.data;
      if (to === market.escrowAccount) {
        res.status(400).json({ error: 'Funds reach escrow only through market operations', kind: 'InvalidRequest' });
        return;
      }

      market.transfer(from, to, amount);
      res.json({ success: true, from, to, amount, balance: market.balanceOf(from) });
    } catch (err) {
      sendError(res, err, '[Ledger] Transfer');
    }
  });

  return router;
}

export function createEventsRouter(market: MarketService): Router {
  const router = Router();

  router.get('/', (req: Request, res: Response): void => {
    try {
      const parsed = eventsQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        res.status(400).json({ error: 'Invalid query', details: parsed.error.issues });
        return;
      }
      const events = market.getEvents(parsed.data.limit);
      res.json({ events, count: events.length });
    } catch (err) {
      sendError(res, err, '[Events] List');
    }
  });

  return router;
}
