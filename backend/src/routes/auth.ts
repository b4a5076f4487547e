import { Router, Request, Response } from 'express';
import crypto from 'crypto';
import { verifyMessage } from 'ethers';
import { generateToken } from '../middleware/auth';
import { nonceRequestSchema, verifyRequestSchema } from '../lib/validate';

const NONCE_TTL_MS = 5 * 60 * 1000;

export interface PendingNonce {
  nonce: string;
  message: string;
  issuedAt: number;
}

export function authMessage(nonce: string, timestamp: number): string {
  return `Sign this message to authenticate with the storage market.\n\nNonce: ${nonce}\nTimestamp: ${timestamp}`;
}

/**
 * Outstanding login nonces, one per address. Expired entries are dropped
 * whenever a new nonce is issued.
 */
export class NonceStore {
  private readonly pending = new Map<string, PendingNonce>();

  constructor(
    private readonly ttlMs = NONCE_TTL_MS,
    private readonly now: () => number = () => Date.now()
  ) {}

  get size(): number {
    return this.pending.size;
  }

  issue(address: string): PendingNonce {
    const issuedAt = this.now();
    for (const [key, entry] of this.pending) {
      if (issuedAt - entry.issuedAt > this.ttlMs) this.pending.delete(key);
    }

    const nonce = crypto.randomBytes(32).toString('hex');
    const entry = { nonce, message: authMessage(nonce, issuedAt), issuedAt };
    this.pending.set(address, entry);
    return entry;
  }

  /** The live entry for `address` if it carries `nonce`, otherwise null. */
  find(address: string, nonce: string): PendingNonce | null {
    const entry = this.pending.get(address);
    if (!entry || entry.nonce !== nonce) return null;
    if (this.now() - entry.issuedAt > this.ttlMs) {
      this.pending.delete(address);
      return null;
    }
    return entry;
  }

  consume(address: string): void {
    this.pending.delete(address);
  }
}

export function createAuthRouter(nonces = new NonceStore()): Router {
  const router = Router();

  router.post('/nonce', (req: Request, res: Response): void => {
    try {
      const parsed = nonceRequestSchema.safeParse(req.body);

      if (!parsed.success) {
        res.status(400).json({ error: 'Invalid address format' });
        return;
      }

      const { nonce, message, issuedAt } = nonces.issue(parsed.data.address);

      res.json({ nonce, message, timestamp: issuedAt });
    } catch (err) {
      console.error('[Auth] Nonce error:', err);
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  router.post('/verify', (req: Request, res: Response): void => {
    try {
      const parsed = verifyRequestSchema.safeParse(req.body);

      if (!parsed.success) {
        res.status(400).json({ error: 'Invalid request format' });
        return;
      }

      const { address, signature, nonce } = parsed.data;

      const pending = nonces.find(address, nonce);
      if (!pending) {
        res.status(401).json({ error: 'Invalid or expired nonce' });
        return;
      }

      let signer: string;
      try {
        signer = verifyMessage(pending.message, signature);
      } catch {
        res.status(401).json({ error: 'Invalid signature format' });
        return;
      }

      if (signer !== address) {
        res.status(401).json({ error: 'Signature does not match address' });
        return;
      }

      nonces.consume(address);

      res.json({
        success: true,
        token: generateToken(address),
        address,
      });
    } catch (err) {
      console.error('[Auth] Verify error:', err);
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  return router;
}
