import { config } from './config';
import { createApp } from './app';
import { SystemClock } from './services/clock';
import { DatabaseService } from './services/db';
import { seedGenesis } from './services/ledger';
import { MarketService } from './services/market';

const db = DatabaseService.getInstance();

if (config.ledgerGenesisPath) {
  seedGenesis(db, config.ledgerGenesisPath);
}

const market = new MarketService(db, {
  clock: new SystemClock(),
  escrowAccount: config.escrowAccount,
  treasuryAccount: config.treasuryAccount,
});

const app = createApp(market);

const server = app.listen(config.port, () => {
  console.log(`[Server] Running on port ${config.port}`);
  console.log(`[Server] CORS origin: ${config.corsOrigin}`);
  console.log(`[Server] Store: ${config.dbPath}`);
});

function shutdown(signal: string): void {
  console.log(`[Server] ${signal} received, flushing store`);
  server.close();
  db.flush()
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      console.error('[Server] Flush on shutdown failed:', err);
      process.exit(1);
    });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
