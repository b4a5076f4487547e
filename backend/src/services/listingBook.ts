import { MarketError } from '../lib/errors';
import type { Account, Bill, CreateBillParams } from '../types';
import { allocateId, requireBill, type MarketTx } from './context';

function assertBillTerms(params: CreateBillParams): void {
  const { asset, price, capacity, minServiceWeek, maxServiceWeek, depositMultiplier } = params;

  if (asset <= 0n) throw new MarketError('InvalidRange', 'asset must be positive');
  if (capacity <= 0n) throw new MarketError('InvalidRange', 'capacity must be positive');
  if (asset % capacity !== 0n) {
    throw new MarketError('InvalidRange', `asset ${asset} is not a multiple of capacity ${capacity}`);
  }
  if (price < 0n) throw new MarketError('InvalidRange', 'price must not be negative');
  if (depositMultiplier < 0n) throw new MarketError('InvalidRange', 'depositMultiplier must not be negative');
  if (!Number.isInteger(minServiceWeek) || minServiceWeek < 1) {
    throw new MarketError('InvalidRange', 'minServiceWeek must be at least 1');
  }
  if (!Number.isInteger(maxServiceWeek) || maxServiceWeek < minServiceWeek) {
    throw new MarketError('InvalidRange', 'maxServiceWeek must not be below minServiceWeek');
  }
}

/**
 * Lists capacity and locks `asset * price * depositMultiplier` of the
 * owner's balance as collateral against it.
 */
export function createBill(tx: MarketTx, owner: Account, params: CreateBillParams): Bill {
  assertBillTerms(params);

  const depositAmount = params.asset * params.price * params.depositMultiplier;
  const available = tx.ledger.balanceOf(owner);
  if (available < depositAmount) {
    throw new MarketError('InsufficientBalance', `Listing needs a deposit of ${depositAmount}, balance is ${available}`);
  }
  tx.ledger.transfer(owner, tx.escrow, depositAmount);

  const bill: Bill = {
    id: allocateId(tx, 'bill'),
    owner,
    asset: params.asset,
    price: params.price,
    capacity: params.capacity,
    minServiceWeek: params.minServiceWeek,
    maxServiceWeek: params.maxServiceWeek,
    depositAmount,
    startTime: tx.now,
  };
  tx.state.bills[bill.id] = bill;

  tx.emit('bill_created', {
    billId: bill.id,
    owner,
    asset: bill.asset.toString(),
    price: bill.price.toString(),
    depositAmount: depositAmount.toString(),
  });
  return bill;
}

export function cancelBill(tx: MarketTx, caller: Account, billId: number): Bill {
  const bill = requireBill(tx, billId);
  if (bill.owner !== caller) {
    throw new MarketError('PermissionDenied', 'Only the listing owner can cancel this bill');
  }

  tx.ledger.transfer(tx.escrow, bill.owner, bill.depositAmount);
  delete tx.state.bills[billId];

  tx.emit('bill_cancelled', {
    billId,
    owner: bill.owner,
    refunded: bill.depositAmount.toString(),
  });
  return bill;
}
