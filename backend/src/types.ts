export type Account = string;

export interface Bill {
  id: number;
  owner: Account;
  asset: bigint;                 // Remaining listable capacity units
  price: bigint;                 // Per unit, per service week
  capacity: bigint;              // Minimum tradeable unit
  minServiceWeek: number;
  maxServiceWeek: number;
  depositAmount: bigint;         // Provider collateral still locked against unsold asset
  startTime: number;             // Unix seconds
}

export interface Commitment {
  merkleRoot: string;            // 0x-prefixed root over per-piece mhash values
  pieceSize: number;
  leafCount: number;
}

// Two-party commitment handshake. An order accrues nothing until it is active.
export type CommitmentState =
  | { phase: 'pending' }
  | { phase: 'committed'; commitment: Commitment; by: Account }
  | { phase: 'active'; commitment: Commitment; firstPrepare: Account; activeTime: number };

export type OrderPhase = CommitmentState['phase'];

export interface Order {
  id: number;
  billId: number;                // Originating listing, may no longer exist
  user: Account;                 // Consumer
  storager: Account;             // Provider
  asset: bigint;
  price: bigint;
  serviceWeek: number;
  userDepositAmount: bigint;
  storageDepositAmount: bigint;
  state: CommitmentState;
  startTime: number;
  lastWithdrawTime: number;
}

export interface Challenge {
  id: number;
  orderId: number;
  index: number;                 // Challenged piece position, bookkeeping only
  mhash: string;                 // Piece root the provider must open a chunk under
  startTime: number;
}

export const MARKET_EVENT_TYPES = [
  'bill_created',
  'bill_cancelled',
  'bill_sold_out',
  'order_created',
  'order_cancelled',
  'order_prepared',
  'order_activated',
  'order_withdrawn',
  'order_finished',
  'challenge_started',
  'challenge_passed',
  'order_slashed',
  'ledger_transfer',
] as const;

export type MarketEventType = (typeof MARKET_EVENT_TYPES)[number];

export type EventData = Record<string, string | number | boolean | null>;

export interface MarketEvent {
  type: MarketEventType;
  at: string;                    // ISO timestamp
  data: EventData;
}

export interface MarketCounters {
  bill: number;
  order: number;
  challenge: number;
}

export interface MarketState {
  counters: MarketCounters;
  bills: Record<string, Bill>;
  orders: Record<string, Order>;
  challenges: Record<string, Challenge>;
  balances: Record<string, bigint>;
  events: MarketEvent[];
}

// ========== Operation inputs and outcomes ==========

export interface CreateBillParams {
  asset: bigint;
  price: bigint;
  capacity: bigint;
  minServiceWeek: number;
  maxServiceWeek: number;
  depositMultiplier: bigint;
}

export interface CreateOrderParams {
  billId: number;
  asset: bigint;
  serviceWeek: number;
}

export interface StartChallengeParams {
  orderId: number;
  pieceIndex: number;
  mhash: string;
  proofs: string[];
}

export interface ProofChallengeParams {
  challengeId: number;
  chunkData: Buffer;
  subpath: string[];
}

export interface WithdrawResult {
  orderId: number;
  passedWeeks: number;
  paid: bigint;
  finished: boolean;
  collateralReturned: bigint;
}

export interface Settlement {
  orderId: number;
  challengeId: number;
  reason: 'proof_failed' | 'timeout';
  user: Account;
  refunded: bigint;              // userDepositAmount + userCompensation
  userCompensation: bigint;
  forfeited: bigint;             // Paid to the treasury
}

export type ProofOutcome =
  | { challengeId: number; passed: true }
  | { challengeId: number; passed: false; settlement: Settlement };

export interface Page<T> {
  items: T[];
  total: number;
  page: number;
  totalPages: number;
}
