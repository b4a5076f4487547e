import { z } from 'zod';
import { getAddress, isAddress } from 'ethers';

export function normalizeAccount(value: string): string {
  return isAddress(value) ? getAddress(value) : value;
}

export const addressSchema = z
  .string()
  .refine((value) => isAddress(value), 'Invalid address format')
  .transform((value) => getAddress(value));

// Ledger accounts: wallet addresses, or named system accounts such as the treasury
export const accountSchema = z.string().trim().min(1).max(128).transform(normalizeAccount);

export const amountSchema = z
  .union([
    z.string().regex(/^[0-9]+$/, 'Must be a non-negative integer string'),
    z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
  ])
  .transform((value) => BigInt(value));

export const hashSchema = z
  .string()
  .regex(/^0x[0-9a-fA-F]{64}$/, 'Must be a 0x-prefixed 32-byte hex string')
  .transform((value) => value.toLowerCase());

export const hexDataSchema = z
  .string()
  .regex(/^0x(?:[0-9a-fA-F]{2})*$/, 'Must be 0x-prefixed hex bytes')
  .transform((value) => Buffer.from(value.slice(2), 'hex'));

export const idSchema = z.coerce.number().int().positive();

const weekSchema = z.number().int();

// ========== Auth ==========

export const nonceRequestSchema = z.object({
  address: addressSchema,
});

export const verifyRequestSchema = z.object({
  address: addressSchema,
  signature: z.string().regex(/^0x[0-9a-fA-F]+$/, 'Signature must be hex'),
  nonce: z.string().min(1),
});

// ========== Ledger ==========

export const transferSchema = z.object({
  to: accountSchema,
  amount: amountSchema,
});

// ========== Bills ==========

export const createBillSchema = z.object({
  asset: amountSchema,
  price: amountSchema,
  capacity: amountSchema,
  minServiceWeek: weekSchema,
  maxServiceWeek: weekSchema,
  depositMultiplier: amountSchema,
});

// ========== Orders ==========

export const createOrderSchema = z.object({
  billId: idSchema,
  asset: amountSchema,
  serviceWeek: weekSchema,
});

export const prepareOrderSchema = z.object({
  merkleRoot: hashSchema,
  pieceSize: z.number().int().positive(),
  leafCount: z.number().int().positive(),
});

// ========== Challenges ==========

export const startChallengeSchema = z.object({
  orderId: idSchema,
  pieceIndex: z.number().int().nonnegative(),
  mhash: hashSchema,
  proofs: z.array(hashSchema).max(64),
});

export const proofChallengeSchema = z.object({
  chunkData: hexDataSchema,
  subpath: z.array(hashSchema).max(64),
});

// ========== Queries ==========

const pageQuery = {
  page: z.coerce.number().int().positive().optional(),
  limit: z.coerce.number().int().positive().optional(),
};

export const listBillsQuerySchema = z.object({
  owner: accountSchema.optional(),
  ...pageQuery,
});

export const listOrdersQuerySchema = z.object({
  user: accountSchema.optional(),
  storager: accountSchema.optional(),
  status: z.enum(['pending', 'committed', 'active']).optional(),
  ...pageQuery,
});

export const listChallengesQuerySchema = z.object({
  orderId: idSchema.optional(),
  ...pageQuery,
});

export const eventsQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(1000).optional(),
});
