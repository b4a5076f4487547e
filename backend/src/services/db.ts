import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { config } from '../config';
import { amountSchema } from '../lib/validate';
import { MARKET_EVENT_TYPES, type MarketState } from '../types';

export function emptyState(): MarketState {
  return {
    counters: { bill: 0, order: 0, challenge: 0 },
    bills: {},
    orders: {},
    challenges: {},
    balances: {},
    events: [],
  };
}

// ========== On-disk format ==========
// bigint fields are written as decimal strings and parsed back here.

const storedAmount = z.string().pipe(amountSchema);
const storedId = z.number().int().positive();
const storedTime = z.number().int().nonnegative();

const commitmentSchema = z.object({
  merkleRoot: z.string(),
  pieceSize: z.number().int().positive(),
  leafCount: z.number().int().positive(),
});

const storedStateSchema = z.object({
  counters: z.object({
    bill: z.number().int().nonnegative(),
    order: z.number().int().nonnegative(),
    challenge: z.number().int().nonnegative(),
  }),
  bills: z.record(z.object({
    id: storedId,
    owner: z.string(),
    asset: storedAmount,
    price: storedAmount,
    capacity: storedAmount,
    minServiceWeek: z.number().int(),
    maxServiceWeek: z.number().int(),
    depositAmount: storedAmount,
    startTime: storedTime,
  })),
  orders: z.record(z.object({
    id: storedId,
    billId: storedId,
    user: z.string(),
    storager: z.string(),
    asset: storedAmount,
    price: storedAmount,
    serviceWeek: z.number().int(),
    userDepositAmount: storedAmount,
    storageDepositAmount: storedAmount,
    state: z.discriminatedUnion('phase', [
      z.object({ phase: z.literal('pending') }),
      z.object({ phase: z.literal('committed'), commitment: commitmentSchema, by: z.string() }),
      z.object({
        phase: z.literal('active'),
        commitment: commitmentSchema,
        firstPrepare: z.string(),
        activeTime: storedTime,
      }),
    ]),
    startTime: storedTime,
    lastWithdrawTime: storedTime,
  })),
  challenges: z.record(z.object({
    id: storedId,
    orderId: storedId,
    index: z.number().int().nonnegative(),
    mhash: z.string(),
    startTime: storedTime,
  })),
  balances: z.record(storedAmount),
  events: z.array(z.object({
    type: z.enum(MARKET_EVENT_TYPES),
    at: z.string(),
    data: z.record(z.union([z.string(), z.number(), z.boolean(), z.null()])),
  })),
});

export function parseStoredState(raw: string): MarketState {
  return storedStateSchema.parse(JSON.parse(raw));
}

export function serializeState(state: MarketState): string {
  return JSON.stringify(
    state,
    (_key, value: unknown) => (typeof value === 'bigint' ? value.toString() : value),
    2
  );
}

class WriteQueue {
  private queue: (() => Promise<void>)[] = [];
  private processing = false;

  async add(operation: () => Promise<void>): Promise<void> {
    return new Promise((resolve, reject) => {
      this.queue.push(async () => {
        try {
          await operation();
          resolve();
        } catch (err) {
          reject(err);
        }
      });
      void this.process();
    });
  }

  private async process(): Promise<void> {
    if (this.processing) return;
    this.processing = true;

    while (this.queue.length > 0) {
      const op = this.queue.shift();
      if (op) await op();
    }

    this.processing = false;
  }
}

/**
 * Single-writer store for the whole market. Every change goes through
 * `transact`, which works on a copy and only swaps it in when the
 * operation returns, so a rejected operation leaves nothing behind.
 */
export class DatabaseService {
  private static instance: DatabaseService | undefined;
  private state: MarketState;
  private readonly writeQueue = new WriteQueue();

  /** `dbPath` null keeps the state in memory only. */
  constructor(private readonly dbPath: string | null) {
    this.state = this.load();
  }

  static getInstance(): DatabaseService {
    if (!DatabaseService.instance) {
      DatabaseService.instance = new DatabaseService(config.dbPath);
    }
    return DatabaseService.instance;
  }

  static inMemory(): DatabaseService {
    return new DatabaseService(null);
  }

  private load(): MarketState {
    if (!this.dbPath) return emptyState();

    try {
      const dir = path.dirname(this.dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }

      if (fs.existsSync(this.dbPath)) {
        return parseStoredState(fs.readFileSync(this.dbPath, 'utf-8'));
      }

      const initial = emptyState();
      this.saveSync(initial);
      return initial;
    } catch (err) {
      // Refuse to start on an unreadable store rather than silently resetting balances
      console.error('[DB] Failed to load database:', err);
      throw err;
    }
  }

  private saveSync(state: MarketState): void {
    if (!this.dbPath) return;

    const dir = path.dirname(this.dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    const tempPath = `${this.dbPath}.tmp`;
    fs.writeFileSync(tempPath, serializeState(state));
    fs.renameSync(tempPath, this.dbPath);
  }

  private persist(): void {
    if (!this.dbPath) return;
    const snapshot = this.state;
    this.writeQueue
      .add(async () => {
        this.saveSync(snapshot);
      })
      .catch((err: unknown) => {
        console.error('[DB] Failed to save database:', err);
      });
  }

  /** Waits for every queued write to reach disk. */
  async flush(): Promise<void> {
    await this.writeQueue.add(async () => undefined);
  }

  /** Live state for reads. Callers copy what they hand out. */
  read(): Readonly<MarketState> {
    return this.state;
  }

  isEmpty(): boolean {
    const { counters, balances } = this.state;
    return counters.bill === 0
      && counters.order === 0
      && counters.challenge === 0
      && Object.keys(balances).length === 0;
  }

  transact<T>(operation: (draft: MarketState) => T): T {
    const draft = structuredClone(this.state);
    const result = operation(draft);
    this.state = draft;
    this.persist();
    return result;
  }
}
