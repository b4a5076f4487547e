import { MarketError } from '../lib/errors';
import type {
  Account,
  Bill,
  Challenge,
  EventData,
  MarketCounters,
  MarketEventType,
  MarketState,
  Order,
} from '../types';
import type { Ledger } from './ledger';

/**
 * Everything one market operation sees. `now` is read once per operation;
 * `state` is the transaction's draft.
 */
export interface MarketTx {
  state: MarketState;
  ledger: Ledger;
  now: number;
  escrow: Account;
  treasury: Account;
  emit(type: MarketEventType, data: EventData): void;
}

export function allocateId(tx: MarketTx, kind: keyof MarketCounters): number {
  tx.state.counters[kind] += 1;
  return tx.state.counters[kind];
}

export function requireBill(tx: MarketTx, billId: number): Bill {
  const bill = tx.state.bills[billId];
  if (!bill) throw new MarketError('NotFound', `Bill ${billId} not found`);
  return bill;
}

export function requireOrder(tx: MarketTx, orderId: number): Order {
  const order = tx.state.orders[orderId];
  if (!order) throw new MarketError('NotFound', `Order ${orderId} not found`);
  return order;
}

export function requireChallenge(tx: MarketTx, challengeId: number): Challenge {
  const challenge = tx.state.challenges[challengeId];
  if (!challenge) throw new MarketError('NotFound', `Challenge ${challengeId} not found`);
  return challenge;
}

export function openChallengeFor(state: MarketState, orderId: number): Challenge | null {
  return Object.values(state.challenges).find((c) => c.orderId === orderId) ?? null;
}
