import dotenv from 'dotenv';

dotenv.config();

export const config = {
  port: parseInt(process.env.PORT || '3001', 10),
  corsOrigin: process.env.CORS_ORIGIN || 'http://localhost:5173',
  jwtSecret: process.env.JWT_SECRET || 'dev-secret',
  dbPath: process.env.DB_PATH || './data/market.json',

  // Ledger accounts the market moves locked value through
  escrowAccount: process.env.ESCROW_ACCOUNT || 'escrow',
  treasuryAccount: process.env.TREASURY_ACCOUNT || 'treasury',
  ledgerGenesisPath: process.env.LEDGER_GENESIS_PATH || null,
};

export const WEEK_SECONDS = 7 * 24 * 60 * 60;

// How long a provider has to answer a challenge before the consumer may end it
export const CHALLENGE_WINDOW_SECONDS = 7 * 24 * 60 * 60;

export const MAX_EVENTS = 1000;
