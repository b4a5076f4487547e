import type { Response } from 'express';

export type MarketErrorKind =
  | 'PermissionDenied'
  | 'NotFound'
  | 'InsufficientBalance'
  | 'InsufficientFunds'
  | 'InvalidRange'
  | 'InvalidState'
  | 'CommitmentMismatch'
  | 'ChallengeVerificationFailed'
  | 'TimeoutNotElapsed'
  | 'InvalidRequest';

/**
 * Rejection raised by a market operation. Throwing one inside a transaction
 * discards every change the operation made.
 */
export class MarketError extends Error {
  readonly kind: MarketErrorKind;

  constructor(kind: MarketErrorKind, message: string) {
    super(message);
    this.name = 'MarketError';
    this.kind = kind;
  }
}

const HTTP_STATUS: Record<MarketErrorKind, number> = {
  InvalidRequest: 400,
  InsufficientBalance: 400,
  InsufficientFunds: 400,
  PermissionDenied: 403,
  NotFound: 404,
  InvalidState: 409,
  CommitmentMismatch: 409,
  TimeoutNotElapsed: 409,
  InvalidRange: 422,
  ChallengeVerificationFailed: 422,
};

export function httpStatusFor(kind: MarketErrorKind): number {
  return HTTP_STATUS[kind];
}

/**
 * Answers a failed request. Domain rejections carry their kind; anything else
 * is logged under `context` and answered with a bare 500.
 */
export function sendError(res: Response, err: unknown, context: string): void {
  if (err instanceof MarketError) {
    res.status(httpStatusFor(err.kind)).json({ error: err.message, kind: err.kind });
    return;
  }
  console.error(`${context} error:`, err);
  res.status(500).json({ error: 'Internal server error' });
}
