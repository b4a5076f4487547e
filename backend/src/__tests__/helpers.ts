import { MarketError } from '../lib/errors';
import type { Clock } from '../services/clock';
import { DatabaseService } from '../services/db';
import { MarketService, type MarketOptions } from '../services/market';

export const T0 = 1_700_000_000;
export const DAY = 24 * 60 * 60;
export const WEEK = 7 * DAY;

export class ManualClock implements Clock {
  constructor(public time: number) {}

  now(): number {
    return this.time;
  }

  advance(seconds: number): void {
    this.time += seconds;
  }
}

export function createTestMarket(
  balances: Record<string, bigint> = {},
  accounts: Partial<Pick<MarketOptions, 'escrowAccount' | 'treasuryAccount'>> = {}
) {
  const db = DatabaseService.inMemory();
  db.transact((draft) => {
    Object.assign(draft.balances, balances);
  });
  const clock = new ManualClock(T0);
  const market = new MarketService(db, {
    clock,
    escrowAccount: accounts.escrowAccount ?? 'escrow',
    treasuryAccount: accounts.treasuryAccount ?? 'treasury',
  });
  return { db, clock, market };
}

export function catchMarketError(operation: () => unknown): MarketError {
  try {
    operation();
  } catch (err) {
    if (err instanceof MarketError) return err;
    throw err;
  }
  throw new Error('Expected the operation to be rejected');
}
