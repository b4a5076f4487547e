import express from 'express';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { config } from './config';
import { jsonReplacer } from './lib/serialize';
import type { MarketService } from './services/market';

import { createAuthRouter } from './routes/auth';
import { createBillsRouter } from './routes/bills';
import { createOrdersRouter } from './routes/orders';
import { createChallengesRouter } from './routes/challenges';
import { createEventsRouter, createLedgerRouter } from './routes/ledger';

export function createApp(market: MarketService): express.Express {
  const app = express();

  // Trust proxy for hosted deployments (required for rate limiting)
  app.set('trust proxy', 1);
  app.set('json replacer', jsonReplacer);

  app.use(cors({
    origin: config.corsOrigin,
    credentials: true
  }));

  app.use(express.json({ limit: '2mb' }));

  const authLimiter = rateLimit({
    windowMs: 15 * 60 * 1000,
    limit: 100,
    message: { error: 'Too many requests, please try again later' },
    standardHeaders: true,
    legacyHeaders: false,
  });

  app.use('/auth', authLimiter, createAuthRouter());
  app.use('/bills', createBillsRouter(market));
  app.use('/orders', createOrdersRouter(market));
  app.use('/challenges', createChallengesRouter(market));
  app.use('/ledger', createLedgerRouter(market));
  app.use('/events', createEventsRouter(market));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use((_req: express.Request, res: express.Response) => {
    res.status(404).json({ error: 'Route not found', kind: 'NotFound' });
  });

  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    // Body parser rejections carry a 4xx status
    const status = 'status' in err && typeof err.status === 'number' ? err.status : 500;
    if (status >= 500) {
      console.error('[Server] Unhandled error:', err);
      res.status(500).json({ error: 'Internal server error' });
      return;
    }
    res.status(status).json({ error: err.message, kind: 'InvalidRequest' });
  });

  return app;
}
