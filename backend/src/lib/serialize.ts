import type { Account, Order, OrderPhase } from '../types';
import { ZERO_HASH } from './merkle';

/** Wire shape of an order: the commitment handshake flattened to plain fields. */
export interface OrderView {
  id: number;
  billId: number;
  user: Account;
  storager: Account;
  asset: bigint;
  price: bigint;
  serviceWeek: number;
  userDepositAmount: bigint;
  storageDepositAmount: bigint;
  status: OrderPhase;
  merkleRoot: string;
  pieceSize: number;
  leafCount: number;
  firstPrepare: Account | null;
  activeTime: number;
  startTime: number;
  lastWithdrawTime: number;
}

export function toOrderView(order: Order): OrderView {
  const { state, ...fields } = order;
  const base = { ...fields, status: state.phase };

  switch (state.phase) {
    case 'pending':
      return { ...base, merkleRoot: ZERO_HASH, pieceSize: 0, leafCount: 0, firstPrepare: null, activeTime: 0 };
    case 'committed':
      return { ...base, ...state.commitment, firstPrepare: state.by, activeTime: 0 };
    case 'active':
      return { ...base, ...state.commitment, firstPrepare: state.firstPrepare, activeTime: state.activeTime };
  }
}

// Express `json replacer`: amounts leave the service as decimal strings
export function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}
