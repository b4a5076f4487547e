import { WEEK_SECONDS } from '../config';
import { MarketError } from '../lib/errors';
import { isZeroHash } from '../lib/merkle';
import type {
  Account,
  Commitment,
  CreateOrderParams,
  Order,
  WithdrawResult,
} from '../types';
import {
  allocateId,
  openChallengeFor,
  requireBill,
  requireOrder,
  type MarketTx,
} from './context';

function sameCommitment(a: Commitment, b: Commitment): boolean {
  return a.merkleRoot.toLowerCase() === b.merkleRoot.toLowerCase()
    && a.pieceSize === b.pieceSize
    && a.leafCount === b.leafCount;
}

/**
 * Buys `asset` units of a listing for `serviceWeek` weeks. The consumer
 * prepays the whole term; the provider's collateral slice is carved out of
 * the bill in proportion to the units taken, rounding down in favour of
 * the bill.
 */
export function createOrder(tx: MarketTx, user: Account, params: CreateOrderParams): Order {
  const bill = requireBill(tx, params.billId);
  const { asset, serviceWeek } = params;

  if (bill.owner === user) {
    throw new MarketError('PermissionDenied', 'A provider cannot buy from its own listing');
  }
  if (asset <= 0n || asset > bill.asset) {
    throw new MarketError('InvalidRange', `asset must be between 1 and ${bill.asset}`);
  }
  if (!Number.isInteger(serviceWeek) || serviceWeek < bill.minServiceWeek || serviceWeek > bill.maxServiceWeek) {
    throw new MarketError(
      'InvalidRange',
      `serviceWeek must be between ${bill.minServiceWeek} and ${bill.maxServiceWeek}`
    );
  }
  if (asset % bill.capacity !== 0n) {
    throw new MarketError('InvalidRange', `asset must be a multiple of ${bill.capacity}`);
  }

  const userDepositAmount = bill.price * asset * BigInt(serviceWeek);
  const available = tx.ledger.balanceOf(user);
  if (available < userDepositAmount) {
    throw new MarketError('InsufficientBalance', `Order needs ${userDepositAmount}, balance is ${available}`);
  }
  tx.ledger.transfer(user, tx.escrow, userDepositAmount);

  const storageDepositAmount = (bill.depositAmount * asset) / bill.asset;
  bill.asset -= asset;
  bill.depositAmount -= storageDepositAmount;

  if (bill.asset === 0n) {
    delete tx.state.bills[bill.id];
    tx.emit('bill_sold_out', { billId: bill.id });
  }

  const order: Order = {
    id: allocateId(tx, 'order'),
    billId: bill.id,
    user,
    storager: bill.owner,
    asset,
    price: bill.price,
    serviceWeek,
    userDepositAmount,
    storageDepositAmount,
    state: { phase: 'pending' },
    startTime: tx.now,
    lastWithdrawTime: 0,
  };
  tx.state.orders[order.id] = order;

  tx.emit('order_created', {
    orderId: order.id,
    billId: bill.id,
    user,
    storager: order.storager,
    asset: asset.toString(),
    serviceWeek,
    userDepositAmount: userDepositAmount.toString(),
    storageDepositAmount: storageDepositAmount.toString(),
  });
  return order;
}

export function cancelOrder(tx: MarketTx, caller: Account, orderId: number): Order {
  const order = requireOrder(tx, orderId);
  if (order.user !== caller) {
    throw new MarketError('PermissionDenied', 'Only the consumer can cancel this order');
  }
  if (order.state.phase === 'active') {
    throw new MarketError('InvalidState', 'An active order cannot be cancelled');
  }

  tx.ledger.transfer(tx.escrow, order.user, order.userDepositAmount);
  tx.ledger.transfer(tx.escrow, order.storager, order.storageDepositAmount);
  delete tx.state.orders[orderId];

  tx.emit('order_cancelled', {
    orderId,
    userRefund: order.userDepositAmount.toString(),
    storagerRefund: order.storageDepositAmount.toString(),
  });
  return order;
}

/**
 * Commitment handshake. The first submission is recorded; a later one that
 * repeats it exactly activates the order. A differing one is rejected and
 * the recorded commitment stays as it was.
 */
export function prepareOrder(tx: MarketTx, caller: Account, orderId: number, commitment: Commitment): Order {
  const order = requireOrder(tx, orderId);
  if (caller !== order.user && caller !== order.storager) {
    throw new MarketError('PermissionDenied', 'Only the parties to the order can prepare it');
  }
  if (order.state.phase === 'active') {
    throw new MarketError('InvalidState', 'Order is already active');
  }
  if (isZeroHash(commitment.merkleRoot)) {
    throw new MarketError('InvalidRange', 'merkleRoot must not be zero');
  }
  if (!Number.isInteger(commitment.pieceSize) || commitment.pieceSize <= 0
    || !Number.isInteger(commitment.leafCount) || commitment.leafCount <= 0) {
    throw new MarketError('InvalidRange', 'pieceSize and leafCount must be positive integers');
  }

  if (order.state.phase === 'pending') {
    order.state = {
      phase: 'committed',
      commitment: { ...commitment, merkleRoot: commitment.merkleRoot.toLowerCase() },
      by: caller,
    };
    tx.emit('order_prepared', { orderId, by: caller, merkleRoot: order.state.commitment.merkleRoot });
    return order;
  }

  if (!sameCommitment(order.state.commitment, commitment)) {
    throw new MarketError('CommitmentMismatch', 'Commitment differs from the one already submitted');
  }

  order.state = {
    phase: 'active',
    commitment: order.state.commitment,
    firstPrepare: order.state.by,
    activeTime: tx.now,
  };
  order.lastWithdrawTime = tx.now;

  tx.emit('order_activated', { orderId, by: caller, activeTime: tx.now });
  return order;
}

/**
 * Pays the provider for every whole week since the last withdrawal. When
 * the remaining prepayment cannot cover the accrued weeks the provider takes
 * what is left, gets its collateral back and the order ends.
 */
export function withdrawOrder(tx: MarketTx, caller: Account, orderId: number): WithdrawResult {
  const order = requireOrder(tx, orderId);
  if (order.storager !== caller) {
    throw new MarketError('PermissionDenied', 'Only the provider can withdraw from this order');
  }
  if (order.state.phase !== 'active') {
    throw new MarketError('InvalidState', 'Order is not active');
  }
  if (openChallengeFor(tx.state, orderId)) {
    throw new MarketError('InvalidState', 'Order has an open challenge');
  }

  const passedWeeks = Math.max(0, Math.floor((tx.now - order.lastWithdrawTime) / WEEK_SECONDS));
  const amount = order.asset * order.price * BigInt(passedWeeks);

  if (amount > order.userDepositAmount) {
    const paid = order.userDepositAmount;
    const collateralReturned = order.storageDepositAmount;
    tx.ledger.transfer(tx.escrow, order.storager, paid);
    tx.ledger.transfer(tx.escrow, order.storager, collateralReturned);
    delete tx.state.orders[orderId];

    tx.emit('order_finished', {
      orderId,
      paid: paid.toString(),
      collateralReturned: collateralReturned.toString(),
    });
    return { orderId, passedWeeks, paid, finished: true, collateralReturned };
  }

  order.userDepositAmount -= amount;
  order.lastWithdrawTime += passedWeeks * WEEK_SECONDS;
  tx.ledger.transfer(tx.escrow, order.storager, amount);

  tx.emit('order_withdrawn', {
    orderId,
    passedWeeks,
    paid: amount.toString(),
    remaining: order.userDepositAmount.toString(),
  });
  return { orderId, passedWeeks, paid: amount, finished: false, collateralReturned: 0n };
}
