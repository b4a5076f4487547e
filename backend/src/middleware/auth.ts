import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { config } from '../config';
import { MarketError } from '../lib/errors';

export interface AuthRequest extends Request {
  userAddress?: string;
}

export function authMiddleware(
  req: AuthRequest,
  res: Response,
  next: NextFunction
): void {
  const authHeader = req.headers.authorization;

  if (!authHeader || !authHeader.startsWith('Bearer ')) {
    res.status(401).json({ error: 'Missing or invalid authorization header' });
    return;
  }

  const token = authHeader.substring(7);

  try {
    const decoded = jwt.verify(token, config.jwtSecret);
    if (typeof decoded !== 'object' || typeof decoded.address !== 'string') {
      res.status(401).json({ error: 'Invalid token payload' });
      return;
    }
    req.userAddress = decoded.address;
    next();
  } catch (err) {
    res.status(401).json({ error: 'Invalid or expired token' });
  }
}

/** The authenticated account; only valid behind `authMiddleware`. */
export function requireCaller(req: AuthRequest): string {
  if (!req.userAddress) {
    throw new MarketError('PermissionDenied', 'Request is not authenticated');
  }
  return req.userAddress;
}

export function generateToken(address: string): string {
  return jwt.sign({ address }, config.jwtSecret, { expiresIn: '7d' });
}
