import { describe, it, expect, beforeEach } from 'vitest';
import { buildCommitment, proveChunk } from '../lib/merkle';
import type { MarketService } from '../services/market';
import type { CreateBillParams } from '../types';
import { ManualClock, T0, DAY, WEEK, catchMarketError, createTestMarket } from './helpers';

const PROVIDER = 'provider';
const CONSUMER = 'consumer';
const ROOT = `0x${'ab'.repeat(32)}`;

const scenarioBill: CreateBillParams = {
  asset: 100n,
  price: 1n,
  capacity: 10n,
  minServiceWeek: 1,
  maxServiceWeek: 10,
  depositMultiplier: 2n,
};

let market: MarketService;
let clock: ManualClock;

beforeEach(() => {
  ({ market, clock } = createTestMarket({ [PROVIDER]: 1000n, [CONSUMER]: 1000n }));
});

function activeOrder(commitment = { merkleRoot: ROOT, pieceSize: 8, leafCount: 4 }) {
  const bill = market.createBill(PROVIDER, scenarioBill);
  const order = market.createOrder(CONSUMER, { billId: bill.id, asset: 20n, serviceWeek: 4 });
  market.prepareOrder(CONSUMER, order.id, commitment);
  market.prepareOrder(PROVIDER, order.id, commitment);
  return order.id;
}

describe('ListingBook', () => {
  it('should lock asset * price * multiplier as the listing deposit', () => {
    const bill = market.createBill(PROVIDER, scenarioBill);

    expect(bill).toEqual({
      id: 1,
      owner: PROVIDER,
      asset: 100n,
      price: 1n,
      capacity: 10n,
      minServiceWeek: 1,
      maxServiceWeek: 10,
      depositAmount: 200n,
      startTime: T0,
    });
    expect(market.balanceOf(PROVIDER)).toBe(800n);
    expect(market.balanceOf('escrow')).toBe(200n);
  });

  it('should reject a listing the owner cannot collateralise and leave no trace', () => {
    const err = catchMarketError(() =>
      market.createBill(PROVIDER, { ...scenarioBill, asset: 1000n })
    );

    expect(err.kind).toBe('InsufficientBalance');
    expect(market.balanceOf(PROVIDER)).toBe(1000n);
    expect(market.listBills().total).toBe(0);
    // The failed call did not consume an id
    expect(market.createBill(PROVIDER, scenarioBill).id).toBe(1);
  });

  it('should reject malformed listing terms', () => {
    expect(catchMarketError(() => market.createBill(PROVIDER, { ...scenarioBill, minServiceWeek: 0 })).kind)
      .toBe('InvalidRange');
    expect(catchMarketError(() => market.createBill(PROVIDER, { ...scenarioBill, maxServiceWeek: 0 })).kind)
      .toBe('InvalidRange');
    expect(catchMarketError(() => market.createBill(PROVIDER, { ...scenarioBill, asset: 15n })).kind)
      .toBe('InvalidRange');
    expect(catchMarketError(() => market.createBill(PROVIDER, { ...scenarioBill, capacity: 0n })).kind)
      .toBe('InvalidRange');
  });

  it('should let only the owner cancel, refunding the remaining deposit', () => {
    const bill = market.createBill(PROVIDER, scenarioBill);
    market.createOrder(CONSUMER, { billId: bill.id, asset: 20n, serviceWeek: 4 });

    expect(catchMarketError(() => market.cancelBill(CONSUMER, bill.id)).kind).toBe('PermissionDenied');

    const cancelled = market.cancelBill(PROVIDER, bill.id);
    expect(cancelled.depositAmount).toBe(160n);
    expect(market.getBill(bill.id)).toBeNull();
    // 1000 - 200 locked + 160 refunded; the order keeps its 40 slice
    expect(market.balanceOf(PROVIDER)).toBe(960n);
    expect(catchMarketError(() => market.cancelBill(PROVIDER, bill.id)).kind).toBe('NotFound');
  });
});

describe('DealBook: orders', () => {
  it('should split the listing deposit in proportion to the units bought', () => {
    const bill = market.createBill(PROVIDER, scenarioBill);
    const order = market.createOrder(CONSUMER, { billId: bill.id, asset: 20n, serviceWeek: 4 });

    expect(order.userDepositAmount).toBe(80n);
    expect(order.storageDepositAmount).toBe(40n);
    expect(order.state).toEqual({ phase: 'pending' });
    expect(order.storager).toBe(PROVIDER);
    expect(market.getBill(bill.id)).toMatchObject({ asset: 80n, depositAmount: 160n });
    expect(market.balanceOf(CONSUMER)).toBe(920n);
    expect(market.balanceOf('escrow')).toBe(280n);
  });

  it('should keep collateral per unit constant across partial sales', () => {
    const bill = market.createBill(PROVIDER, { ...scenarioBill, price: 3n, depositMultiplier: 1n });

    for (const asset of [10n, 30n, 20n]) {
      market.createOrder(CONSUMER, { billId: bill.id, asset, serviceWeek: 1 });
      const current = market.getBill(bill.id);
      expect(current).not.toBeNull();
      if (current) expect(current.depositAmount / current.asset).toBe(3n);
    }
    expect(market.getBill(bill.id)).toMatchObject({ asset: 40n, depositAmount: 120n });
  });

  it('should hand the whole remaining deposit to the order that sells a bill out', () => {
    const bill = market.createBill(PROVIDER, { ...scenarioBill, asset: 20n });
    const order = market.createOrder(CONSUMER, { billId: bill.id, asset: 20n, serviceWeek: 1 });

    expect(order.storageDepositAmount).toBe(40n);
    expect(market.getBill(bill.id)).toBeNull();
    expect(market.getEvents().map((e) => e.type)).toEqual(['bill_created', 'bill_sold_out', 'order_created']);
  });

  it('should enforce listing bounds', () => {
    const bill = market.createBill(PROVIDER, scenarioBill);
    const order = (asset: bigint, serviceWeek: number) =>
      catchMarketError(() => market.createOrder(CONSUMER, { billId: bill.id, asset, serviceWeek })).kind;

    expect(order(0n, 4)).toBe('InvalidRange');
    expect(order(110n, 4)).toBe('InvalidRange');
    expect(order(15n, 4)).toBe('InvalidRange');
    expect(order(20n, 0)).toBe('InvalidRange');
    expect(order(20n, 11)).toBe('InvalidRange');
    expect(catchMarketError(() => market.createOrder(CONSUMER, { billId: 99, asset: 20n, serviceWeek: 4 })).kind)
      .toBe('NotFound');
    expect(catchMarketError(() => market.createOrder(PROVIDER, { billId: bill.id, asset: 20n, serviceWeek: 4 })).kind)
      .toBe('PermissionDenied');
  });

  it('should reject an order the consumer cannot prepay', () => {
    const bill = market.createBill(PROVIDER, { ...scenarioBill, price: 100n, depositMultiplier: 0n });
    const err = catchMarketError(() => market.createOrder(CONSUMER, { billId: bill.id, asset: 10n, serviceWeek: 2 }));

    expect(err.kind).toBe('InsufficientBalance');
    expect(market.getBill(bill.id)).toMatchObject({ asset: 100n });
    expect(market.balanceOf(CONSUMER)).toBe(1000n);
  });

  it('should refund both deposits when the consumer cancels before activation', () => {
    const bill = market.createBill(PROVIDER, scenarioBill);
    const order = market.createOrder(CONSUMER, { billId: bill.id, asset: 20n, serviceWeek: 4 });

    expect(catchMarketError(() => market.cancelOrder(PROVIDER, order.id)).kind).toBe('PermissionDenied');

    const cancelled = market.cancelOrder(CONSUMER, order.id);
    expect(cancelled.userDepositAmount).toBe(80n);
    expect(market.getOrder(order.id)).toBeNull();
    expect(market.balanceOf(CONSUMER)).toBe(1000n);
    // Collateral slice goes back to the provider, not to the bill
    expect(market.balanceOf(PROVIDER)).toBe(840n);
    expect(market.getBill(bill.id)).toMatchObject({ asset: 80n, depositAmount: 160n });
  });
});

describe('DealBook: commitment handshake', () => {
  const commitment = { merkleRoot: ROOT, pieceSize: 8, leafCount: 4 };

  it('should activate once both parties submit the same commitment', () => {
    const bill = market.createBill(PROVIDER, scenarioBill);
    const { id } = market.createOrder(CONSUMER, { billId: bill.id, asset: 20n, serviceWeek: 4 });

    const first = market.prepareOrder(CONSUMER, id, commitment);
    expect(first.state).toEqual({ phase: 'committed', commitment, by: CONSUMER });

    clock.advance(100);
    const second = market.prepareOrder(PROVIDER, id, commitment);
    expect(second.state).toEqual({ phase: 'active', commitment, firstPrepare: CONSUMER, activeTime: T0 + 100 });
    expect(second.lastWithdrawTime).toBe(T0 + 100);
  });

  it('should accept the confirming submission from the same party', () => {
    const bill = market.createBill(PROVIDER, scenarioBill);
    const { id } = market.createOrder(CONSUMER, { billId: bill.id, asset: 20n, serviceWeek: 4 });

    market.prepareOrder(PROVIDER, id, commitment);
    expect(market.prepareOrder(PROVIDER, id, commitment).state.phase).toBe('active');
  });

  it('should leave the first commitment untouched on a mismatch', () => {
    const bill = market.createBill(PROVIDER, scenarioBill);
    const { id } = market.createOrder(CONSUMER, { billId: bill.id, asset: 20n, serviceWeek: 4 });
    market.prepareOrder(CONSUMER, id, commitment);

    for (const other of [
      { ...commitment, leafCount: 5 },
      { ...commitment, pieceSize: 16 },
      { ...commitment, merkleRoot: `0x${'cd'.repeat(32)}` },
    ]) {
      expect(catchMarketError(() => market.prepareOrder(PROVIDER, id, other)).kind).toBe('CommitmentMismatch');
    }

    const order = market.getOrder(id);
    expect(order?.state).toEqual({ phase: 'committed', commitment, by: CONSUMER });
    expect(order?.lastWithdrawTime).toBe(0);
  });

  it('should reject a zero root, outsiders and already active orders', () => {
    const id = activeOrder(commitment);
    expect(catchMarketError(() => market.prepareOrder(CONSUMER, id, commitment)).kind).toBe('InvalidState');
    expect(catchMarketError(() => market.cancelOrder(CONSUMER, id)).kind).toBe('InvalidState');

    const bill = market.createBill(PROVIDER, scenarioBill);
    const pending = market.createOrder(CONSUMER, { billId: bill.id, asset: 10n, serviceWeek: 1 });
    expect(catchMarketError(() =>
      market.prepareOrder(CONSUMER, pending.id, { ...commitment, merkleRoot: `0x${'00'.repeat(32)}` })
    ).kind).toBe('InvalidRange');
    expect(catchMarketError(() => market.prepareOrder('stranger', pending.id, commitment)).kind)
      .toBe('PermissionDenied');
  });
});

describe('DealBook: metered withdrawal', () => {
  it('should pay whole elapsed weeks and keep the sub-week remainder', () => {
    const id = activeOrder();
    clock.advance(3 * WEEK + 2 * DAY);

    const result = market.withdrawOrder(PROVIDER, id);
    expect(result).toEqual({ orderId: id, passedWeeks: 3, paid: 60n, finished: false, collateralReturned: 0n });
    expect(market.getOrder(id)).toMatchObject({ userDepositAmount: 20n, lastWithdrawTime: T0 + 3 * WEEK });
    expect(market.balanceOf(PROVIDER)).toBe(860n);
  });

  it('should finish the order once the deposit cannot cover the accrued weeks', () => {
    const id = activeOrder();
    clock.advance(3 * WEEK);
    market.withdrawOrder(PROVIDER, id);

    clock.time = T0 + 5 * WEEK;
    const result = market.withdrawOrder(PROVIDER, id);

    expect(result).toEqual({ orderId: id, passedWeeks: 2, paid: 20n, finished: true, collateralReturned: 40n });
    expect(market.getOrder(id)).toBeNull();
    // 1000 - 200 + 60 + 20 + 40 collateral
    expect(market.balanceOf(PROVIDER)).toBe(920n);
    expect(market.getEvents(1)[0]).toMatchObject({ type: 'order_finished', data: { orderId: id, paid: '20' } });
  });

  it('should pay nothing before a full week has passed', () => {
    const id = activeOrder();
    clock.advance(WEEK - 1);

    expect(market.withdrawOrder(PROVIDER, id)).toMatchObject({ passedWeeks: 0, paid: 0n, finished: false });
    expect(market.getOrder(id)).toMatchObject({ userDepositAmount: 80n, lastWithdrawTime: T0 });
  });

  it('should only let the provider withdraw from an active order', () => {
    const id = activeOrder();
    expect(catchMarketError(() => market.withdrawOrder(CONSUMER, id)).kind).toBe('PermissionDenied');

    const bill = market.createBill(PROVIDER, scenarioBill);
    const pending = market.createOrder(CONSUMER, { billId: bill.id, asset: 10n, serviceWeek: 1 });
    expect(catchMarketError(() => market.withdrawOrder(PROVIDER, pending.id)).kind).toBe('InvalidState');
  });
});

describe('ChallengeEngine', () => {
  const data = Buffer.from('0123456789abcdefghijklmnopqrstuv');
  const commitment = buildCommitment(data, 8, 4);
  const proof = proveChunk(commitment, 2, 1);

  // Odd collateral slice: 100 * 7 / 100 = 7
  function challengedOrder() {
    const bill = market.createBill(PROVIDER, { ...scenarioBill, capacity: 1n, depositMultiplier: 1n });
    const order = market.createOrder(CONSUMER, { billId: bill.id, asset: 7n, serviceWeek: 2 });
    const terms = { merkleRoot: commitment.merkleRoot, pieceSize: 8, leafCount: commitment.leafCount };
    market.prepareOrder(CONSUMER, order.id, terms);
    market.prepareOrder(PROVIDER, order.id, terms);
    const challenge = market.startChallenge(CONSUMER, {
      orderId: order.id,
      pieceIndex: 2,
      mhash: proof.mhash,
      proofs: proof.proofs,
    });
    return { orderId: order.id, challengeId: challenge.id };
  }

  it('should open a challenge for a piece that belongs to the root', () => {
    const { orderId, challengeId } = challengedOrder();

    expect(market.getChallenge(challengeId)).toEqual({
      id: challengeId,
      orderId,
      index: 2,
      mhash: proof.mhash,
      startTime: T0,
    });
  });

  it('should refuse a piece hash the proof does not open', () => {
    const bill = market.createBill(PROVIDER, scenarioBill);
    const order = market.createOrder(CONSUMER, { billId: bill.id, asset: 10n, serviceWeek: 1 });
    const terms = { merkleRoot: commitment.merkleRoot, pieceSize: 8, leafCount: 4 };
    market.prepareOrder(CONSUMER, order.id, terms);
    market.prepareOrder(PROVIDER, order.id, terms);

    const wrong = proveChunk(commitment, 1, 0);
    const err = catchMarketError(() =>
      market.startChallenge(CONSUMER, { orderId: order.id, pieceIndex: 2, mhash: proof.mhash, proofs: wrong.proofs })
    );

    expect(err.kind).toBe('ChallengeVerificationFailed');
    expect(market.listChallenges().total).toBe(0);
  });

  it('should guard who may challenge and what', () => {
    const { orderId } = challengedOrder();
    const start = (caller: string, pieceIndex: number) => catchMarketError(() =>
      market.startChallenge(caller, { orderId, pieceIndex, mhash: proof.mhash, proofs: proof.proofs })
    ).kind;

    expect(start(PROVIDER, 2)).toBe('PermissionDenied');
    expect(start(CONSUMER, 4)).toBe('InvalidRange');
    expect(start(CONSUMER, 2)).toBe('InvalidState');
    expect(catchMarketError(() => market.withdrawOrder(PROVIDER, orderId)).kind).toBe('InvalidState');
  });

  it('should close the challenge and keep the order on a valid answer', () => {
    const { orderId, challengeId } = challengedOrder();
    const before = market.getOrder(orderId);

    expect(catchMarketError(() => market.proofChallenge(CONSUMER, {
      challengeId,
      chunkData: proof.chunkData,
      subpath: proof.subpath,
    })).kind).toBe('PermissionDenied');

    const outcome = market.proofChallenge(PROVIDER, {
      challengeId,
      chunkData: proof.chunkData,
      subpath: proof.subpath,
    });

    expect(outcome).toEqual({ challengeId, passed: true });
    expect(market.getChallenge(challengeId)).toBeNull();
    expect(market.getOrder(orderId)).toEqual(before);
  });

  it('should slash the provider on a wrong answer', () => {
    const { orderId, challengeId } = challengedOrder();

    const outcome = market.proofChallenge(PROVIDER, {
      challengeId,
      chunkData: Buffer.from('XXXX'),
      subpath: proof.subpath,
    });

    expect(outcome).toEqual({
      challengeId,
      passed: false,
      settlement: {
        orderId,
        challengeId,
        reason: 'proof_failed',
        user: CONSUMER,
        refunded: 17n,
        userCompensation: 3n,
        forfeited: 4n,
      },
    });
    expect(market.getOrder(orderId)).toBeNull();
    expect(market.getChallenge(challengeId)).toBeNull();
    // 1000 - 14 prepaid + 14 + 3
    expect(market.balanceOf(CONSUMER)).toBe(1003n);
    expect(market.balanceOf('treasury')).toBe(4n);
    // Only the bill's remaining collateral is still locked
    expect(market.balanceOf('escrow')).toBe(93n);
  });

  it('should slash a provider that answers with the piece hashes instead of a chunk', () => {
    const { orderId, challengeId } = challengedOrder();
    const chunkHashes = [...commitment.pieces[2].levels[0]].sort();
    const forged = Buffer.concat(chunkHashes.map((hash) => Buffer.from(hash.slice(2), 'hex')));

    const outcome = market.proofChallenge(PROVIDER, { challengeId, chunkData: forged, subpath: [] });

    expect(outcome.passed).toBe(false);
    expect(market.getOrder(orderId)).toBeNull();
    expect(market.balanceOf('treasury')).toBe(4n);
  });

  it('should settle an unanswered challenge only after the response window', () => {
    const { orderId, challengeId } = challengedOrder();

    clock.time = T0 + 7 * DAY - 1;
    expect(catchMarketError(() => market.endChallenge(CONSUMER, challengeId)).kind).toBe('TimeoutNotElapsed');
    clock.time = T0 + 7 * DAY;
    expect(catchMarketError(() => market.endChallenge(CONSUMER, challengeId)).kind).toBe('TimeoutNotElapsed');
    clock.time = T0 + 7 * DAY + 1;
    expect(catchMarketError(() => market.endChallenge(PROVIDER, challengeId)).kind).toBe('PermissionDenied');

    const settlement = market.endChallenge(CONSUMER, challengeId);
    expect(settlement).toEqual({
      orderId,
      challengeId,
      reason: 'timeout',
      user: CONSUMER,
      refunded: 17n,
      userCompensation: 3n,
      forfeited: 4n,
    });
    expect(market.getOrder(orderId)).toBeNull();
    expect(market.balanceOf('treasury')).toBe(4n);
  });

  it('should still accept a late answer while the challenge is open', () => {
    const { orderId, challengeId } = challengedOrder();
    clock.advance(10 * DAY);

    const outcome = market.proofChallenge(PROVIDER, {
      challengeId,
      chunkData: proof.chunkData,
      subpath: proof.subpath,
    });
    expect(outcome.passed).toBe(true);
    expect(market.getOrder(orderId)).not.toBeNull();
  });
});
