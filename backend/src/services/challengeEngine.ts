import { CHALLENGE_WINDOW_SECONDS } from '../config';
import { MarketError } from '../lib/errors';
import { hashLeaf, verifyProof } from '../lib/merkle';
import type {
  Account,
  Challenge,
  Order,
  ProofChallengeParams,
  ProofOutcome,
  Settlement,
  StartChallengeParams,
} from '../types';
import {
  allocateId,
  openChallengeFor,
  requireChallenge,
  requireOrder,
  type MarketTx,
} from './context';

/**
 * Terminates the order against the provider: the consumer gets its
 * prepayment back plus half the provider's collateral (rounded down), the
 * treasury takes the rest of the collateral.
 */
function slash(tx: MarketTx, order: Order, challenge: Challenge, reason: Settlement['reason']): Settlement {
  const userCompensation = order.storageDepositAmount / 2n;
  const forfeited = order.storageDepositAmount - userCompensation;
  const refunded = order.userDepositAmount + userCompensation;

  tx.ledger.transfer(tx.escrow, order.user, refunded);
  tx.ledger.transfer(tx.escrow, tx.treasury, forfeited);
  delete tx.state.orders[order.id];
  delete tx.state.challenges[challenge.id];

  tx.emit('order_slashed', {
    orderId: order.id,
    challengeId: challenge.id,
    reason,
    refunded: refunded.toString(),
    forfeited: forfeited.toString(),
  });

  return {
    orderId: order.id,
    challengeId: challenge.id,
    reason,
    user: order.user,
    refunded,
    userCompensation,
    forfeited,
  };
}

export function startChallenge(tx: MarketTx, caller: Account, params: StartChallengeParams): Challenge {
  const order = requireOrder(tx, params.orderId);
  if (order.user !== caller) {
    throw new MarketError('PermissionDenied', 'Only the consumer can challenge this order');
  }
  if (order.state.phase !== 'active') {
    throw new MarketError('InvalidState', 'Only an active order can be challenged');
  }
  const { commitment } = order.state;
  if (!Number.isInteger(params.pieceIndex) || params.pieceIndex < 0 || params.pieceIndex >= commitment.leafCount) {
    throw new MarketError('InvalidRange', `pieceIndex must be between 0 and ${commitment.leafCount - 1}`);
  }
  if (openChallengeFor(tx.state, order.id)) {
    throw new MarketError('InvalidState', 'Order already has an open challenge');
  }
  // The proof shows mhash is some leaf of the root; it does not pin it to pieceIndex.
  if (!verifyProof(params.proofs, commitment.merkleRoot, params.mhash)) {
    throw new MarketError('ChallengeVerificationFailed', 'mhash does not open to the order merkleRoot');
  }

  const challenge: Challenge = {
    id: allocateId(tx, 'challenge'),
    orderId: order.id,
    index: params.pieceIndex,
    mhash: params.mhash.toLowerCase(),
    startTime: tx.now,
  };
  tx.state.challenges[challenge.id] = challenge;

  tx.emit('challenge_started', {
    challengeId: challenge.id,
    orderId: order.id,
    index: challenge.index,
    mhash: challenge.mhash,
  });
  return challenge;
}

/**
 * Provider's answer. A chunk that opens under the challenged mhash closes
 * the challenge and leaves the order untouched; anything else slashes.
 */
export function proofChallenge(tx: MarketTx, caller: Account, params: ProofChallengeParams): ProofOutcome {
  const challenge = requireChallenge(tx, params.challengeId);
  const order = requireOrder(tx, challenge.orderId);
  if (order.storager !== caller) {
    throw new MarketError('PermissionDenied', 'Only the provider can answer this challenge');
  }

  if (verifyProof(params.subpath, challenge.mhash, hashLeaf(params.chunkData))) {
    delete tx.state.challenges[challenge.id];
    tx.emit('challenge_passed', { challengeId: challenge.id, orderId: order.id });
    return { challengeId: challenge.id, passed: true };
  }

  return { challengeId: challenge.id, passed: false, settlement: slash(tx, order, challenge, 'proof_failed') };
}

export function endChallenge(tx: MarketTx, caller: Account, challengeId: number): Settlement {
  const challenge = requireChallenge(tx, challengeId);
  const order = requireOrder(tx, challenge.orderId);
  if (order.user !== caller) {
    throw new MarketError('PermissionDenied', 'Only the consumer can end this challenge');
  }

  const deadline = challenge.startTime + CHALLENGE_WINDOW_SECONDS;
  if (tx.now <= deadline) {
    throw new MarketError('TimeoutNotElapsed', `Challenge can be ended after ${new Date(deadline * 1000).toISOString()}`);
  }

  return slash(tx, order, challenge, 'timeout');
}
