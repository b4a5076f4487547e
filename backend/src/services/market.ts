import { MAX_EVENTS } from '../config';
import { normalizeAccount } from '../lib/validate';
import type {
  Account,
  Bill,
  Challenge,
  Commitment,
  CreateBillParams,
  CreateOrderParams,
  MarketEvent,
  Order,
  OrderPhase,
  Page,
  ProofChallengeParams,
  ProofOutcome,
  Settlement,
  StartChallengeParams,
  WithdrawResult,
} from '../types';
import { endChallenge, proofChallenge, startChallenge } from './challengeEngine';
import type { Clock } from './clock';
import type { MarketTx } from './context';
import type { DatabaseService } from './db';
import { cancelOrder, createOrder, prepareOrder, withdrawOrder } from './dealBook';
import { BalanceLedger } from './ledger';
import { cancelBill, createBill } from './listingBook';

export interface MarketOptions {
  clock: Clock;
  escrowAccount: Account;
  treasuryAccount: Account;
}

export interface PageFilter {
  page?: number;
  limit?: number;
}

const DEFAULT_LIMIT = 20;
const MAX_LIMIT = 50;

function paginate<T>(items: T[], filter: PageFilter): Page<T> {
  const total = items.length;
  const limit = Math.min(filter.limit || DEFAULT_LIMIT, MAX_LIMIT);
  const page = filter.page || 1;
  const totalPages = Math.max(1, Math.ceil(total / limit));
  const offset = (page - 1) * limit;
  return {
    items: items.slice(offset, offset + limit).map((item) => structuredClone(item)),
    total,
    page,
    totalPages,
  };
}

/**
 * Entry point for every market operation. Each call runs to completion in
 * one store transaction: it either commits all of its effects, ledger
 * moves included, or throws and commits none.
 */
export class MarketService {
  private readonly options: MarketOptions;

  constructor(
    private readonly db: DatabaseService,
    options: MarketOptions
  ) {
    // Same spelling as every account that arrives through the API
    this.options = {
      ...options,
      escrowAccount: normalizeAccount(options.escrowAccount),
      treasuryAccount: normalizeAccount(options.treasuryAccount),
    };
  }

  get escrowAccount(): Account {
    return this.options.escrowAccount;
  }

  get treasuryAccount(): Account {
    return this.options.treasuryAccount;
  }

  private run<T>(operation: (tx: MarketTx) => T): T {
    const result = this.db.transact((state) => {
      const now = this.options.clock.now();
      const at = new Date(now * 1000).toISOString();
      const tx: MarketTx = {
        state,
        ledger: new BalanceLedger(state.balances),
        now,
        escrow: this.options.escrowAccount,
        treasury: this.options.treasuryAccount,
        emit: (type, data) => {
          state.events.push({ type, at, data });
          if (state.events.length > MAX_EVENTS) {
            state.events.splice(0, state.events.length - MAX_EVENTS);
          }
        },
      };
      return operation(tx);
    });
    return structuredClone(result);
  }

  // ========== Listings ==========

  createBill(owner: Account, params: CreateBillParams): Bill {
    const bill = this.run((tx) => createBill(tx, owner, params));
    console.log('[Market] Bill created:', bill.id, 'owner:', owner, 'deposit:', bill.depositAmount.toString());
    return bill;
  }

  cancelBill(caller: Account, billId: number): Bill {
    const bill = this.run((tx) => cancelBill(tx, caller, billId));
    console.log('[Market] Bill cancelled:', billId, 'refunded:', bill.depositAmount.toString());
    return bill;
  }

  // ========== Orders ==========

  createOrder(user: Account, params: CreateOrderParams): Order {
    const order = this.run((tx) => createOrder(tx, user, params));
    console.log('[Market] Order created:', order.id, 'bill:', order.billId, 'asset:', order.asset.toString());
    return order;
  }

  cancelOrder(caller: Account, orderId: number): Order {
    const order = this.run((tx) => cancelOrder(tx, caller, orderId));
    console.log('[Market] Order cancelled:', orderId);
    return order;
  }

  prepareOrder(caller: Account, orderId: number, commitment: Commitment): Order {
    const order = this.run((tx) => prepareOrder(tx, caller, orderId, commitment));
    console.log('[Market] Order prepared:', orderId, 'phase:', order.state.phase);
    return order;
  }

  withdrawOrder(caller: Account, orderId: number): WithdrawResult {
    const result = this.run((tx) => withdrawOrder(tx, caller, orderId));
    console.log(
      '[Market] Order withdrawal:', orderId,
      'weeks:', result.passedWeeks,
      'paid:', result.paid.toString(),
      result.finished ? '(finished)' : ''
    );
    return result;
  }

  // ========== Challenges ==========

  startChallenge(caller: Account, params: StartChallengeParams): Challenge {
    const challenge = this.run((tx) => startChallenge(tx, caller, params));
    console.log('[Market] Challenge started:', challenge.id, 'order:', challenge.orderId, 'piece:', challenge.index);
    return challenge;
  }

  proofChallenge(caller: Account, params: ProofChallengeParams): ProofOutcome {
    const outcome = this.run((tx) => proofChallenge(tx, caller, params));
    if (outcome.passed) {
      console.log('[Market] Challenge passed:', outcome.challengeId);
    } else {
      console.warn('[Market] Challenge failed, order slashed:', outcome.settlement.orderId);
    }
    return outcome;
  }

  endChallenge(caller: Account, challengeId: number): Settlement {
    const settlement = this.run((tx) => endChallenge(tx, caller, challengeId));
    console.warn('[Market] Challenge timed out, order slashed:', settlement.orderId);
    return settlement;
  }

  // ========== Ledger ==========

  balanceOf(account: Account): bigint {
    return this.db.read().balances[account] ?? 0n;
  }

  transfer(from: Account, to: Account, amount: bigint): void {
    this.run((tx) => {
      tx.ledger.transfer(from, to, amount);
      tx.emit('ledger_transfer', { from, to, amount: amount.toString() });
    });
    console.log('[Ledger] Transfer:', from, '->', to, amount.toString());
  }

  // ========== Reads ==========

  getBill(billId: number): Bill | null {
    const bill = this.db.read().bills[billId];
    return bill ? structuredClone(bill) : null;
  }

  getOrder(orderId: number): Order | null {
    const order = this.db.read().orders[orderId];
    return order ? structuredClone(order) : null;
  }

  getChallenge(challengeId: number): Challenge | null {
    const challenge = this.db.read().challenges[challengeId];
    return challenge ? structuredClone(challenge) : null;
  }

  listBills(filter: PageFilter & { owner?: Account } = {}): Page<Bill> {
    let bills = Object.values(this.db.read().bills);
    if (filter.owner) bills = bills.filter((b) => b.owner === filter.owner);
    bills.sort((a, b) => a.id - b.id);
    return paginate(bills, filter);
  }

  listOrders(filter: PageFilter & { user?: Account; storager?: Account; status?: OrderPhase } = {}): Page<Order> {
    let orders = Object.values(this.db.read().orders);
    if (filter.user) orders = orders.filter((o) => o.user === filter.user);
    if (filter.storager) orders = orders.filter((o) => o.storager === filter.storager);
    if (filter.status) orders = orders.filter((o) => o.state.phase === filter.status);
    orders.sort((a, b) => a.id - b.id);
    return paginate(orders, filter);
  }

  listChallenges(filter: PageFilter & { orderId?: number } = {}): Page<Challenge> {
    let challenges = Object.values(this.db.read().challenges);
    if (filter.orderId !== undefined) challenges = challenges.filter((c) => c.orderId === filter.orderId);
    challenges.sort((a, b) => a.id - b.id);
    return paginate(challenges, filter);
  }

  getEvents(limit = 100): MarketEvent[] {
    return structuredClone(this.db.read().events.slice(-limit));
  }
}
