import { Router, Request, Response } from 'express';
import { authMiddleware, AuthRequest, requireCaller } from '../middleware/auth';
import { sendError } from '../lib/errors';
import {
  idSchema,
  listChallengesQuerySchema,
  proofChallengeSchema,
  startChallengeSchema,
} from '../lib/validate';
import type { MarketService } from '../services/market';

export function createChallengesRouter(market: MarketService): Router {
  const router = Router();

  router.get('/', (req: Request, res: Response): void => {
    try {
      const parsed = listChallengesQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        res.status(400).json({ error: 'Invalid query', details: parsed.error.issues });
        return;
      }

      const result = market.listChallenges(parsed.data);
      res.json({
        challenges: result.items,
        total: result.total,
        page: result.page,
        totalPages: result.totalPages,
      });
    } catch (err) {
      sendError(res, err, '[Challenges] Browse');
    }
  });

  router.get('/:id', (req: Request, res: Response): void => {
    try {
      const id = idSchema.safeParse(req.params.id);
      if (!id.success) {
        res.status(400).json({ error: 'Invalid challenge id' });
        return;
      }

      const challenge = market.getChallenge(id.data);
      if (!challenge) {
        res.status(404).json({ error: 'Challenge not found', kind: 'NotFound' });
        return;
      }
      res.json(challenge);
    } catch (err) {
      sendError(res, err, '[Challenges] Get');
    }
  });

  // ============================================================
  // POST /challenges — Consumer demands proof for one piece
  // ============================================================
  router.post('/', authMiddleware, (req: AuthRequest, res: Response): void => {
    try {
      const parsed = startChallengeSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: 'Invalid request format', details: parsed.error.issues });
        return;
      }

      const challenge = market.startChallenge(requireCaller(req), parsed.data);
      res.status(201).json({ challenge });
    } catch (err) {
      sendError(res, err, '[Challenges] Start');
    }
  });

  // ============================================================
  // POST /challenges/:id/proof — Provider opens a chunk under the piece root
  // ============================================================
  router.post('/:id/proof', authMiddleware, (req: AuthRequest, res: Response): void => {
    try {
      const id = idSchema.safeParse(req.params.id);
      if (!id.success) {
        res.status(400).json({ error: 'Invalid challenge id' });
        return;
      }
      const parsed = proofChallengeSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: 'Invalid request format', details: parsed.error.issues });
        return;
      }

      const outcome = market.proofChallenge(requireCaller(req), {
        challengeId: id.data,
        chunkData: parsed.data.chunkData,
        subpath: parsed.data.subpath,
      });
      res.json({ result: outcome });
    } catch (err) {
      sendError(res, err, '[Challenges] Proof');
    }
  });

  // ============================================================
  // POST /challenges/:id/end — Consumer closes an unanswered challenge
  // ============================================================
  router.post('/:id/end', authMiddleware, (req: AuthRequest, res: Response): void => {
    try {
      const id = idSchema.safeParse(req.params.id);
      if (!id.success) {
        res.status(400).json({ error: 'Invalid challenge id' });
        return;
      }

      const settlement = market.endChallenge(requireCaller(req), id.data);
      res.json({ settlement });
    } catch (err) {
      sendError(res, err, '[Challenges] End');
    }
  });

  return router;
}
