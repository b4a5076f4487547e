import fs from 'fs';
import { z } from 'zod';
import { MarketError } from '../lib/errors';
import { accountSchema, amountSchema } from '../lib/validate';
import type { Account } from '../types';
import type { DatabaseService } from './db';

/**
 * Fungible balance ledger the market settles through. The market never
 * mints or burns; it only moves value between accounts.
 */
export interface Ledger {
  balanceOf(account: Account): bigint;
  /** Throws `InsufficientFunds` when `from` cannot cover `amount`. */
  transfer(from: Account, to: Account, amount: bigint): void;
}

/**
 * Ledger over the store's balance table. Used inside a transaction, it
 * writes to the draft state and rolls back with the rest of the operation.
 */
export class BalanceLedger implements Ledger {
  constructor(private readonly balances: Record<string, bigint>) {}

  balanceOf(account: Account): bigint {
    return this.balances[account] ?? 0n;
  }

  transfer(from: Account, to: Account, amount: bigint): void {
    if (amount < 0n) {
      throw new MarketError('InvalidRequest', 'Transfer amount must not be negative');
    }
    if (amount === 0n) return;

    const available = this.balanceOf(from);
    if (available < amount) {
      throw new MarketError('InsufficientFunds', `Account ${from} holds ${available}, needs ${amount}`);
    }

    this.balances[from] = available - amount;
    this.balances[to] = this.balanceOf(to) + amount;
  }
}

const genesisSchema = z.record(amountSchema);

/**
 * Seeds opening balances into an empty store from a `{ account: amount }`
 * JSON file. Returns the number of funded accounts.
 */
export function seedGenesis(db: DatabaseService, filePath: string): number {
  if (!db.isEmpty()) {
    console.log('[Ledger] Store already initialised, genesis skipped');
    return 0;
  }

  const allocations = genesisSchema.parse(JSON.parse(fs.readFileSync(filePath, 'utf-8')));

  return db.transact((draft) => {
    let funded = 0;
    for (const [rawAccount, amount] of Object.entries(allocations)) {
      const account = accountSchema.parse(rawAccount);
      draft.balances[account] = (draft.balances[account] ?? 0n) + amount;
      funded++;
    }
    console.log(`[Ledger] Genesis funded ${funded} account(s) from ${filePath}`);
    return funded;
  });
}
