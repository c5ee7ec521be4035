/**
 * Team Split Ledger - Main Entry Point
 * Proportional payouts for a fixed team, one counter set per asset
 */

import * as dotenv from 'dotenv';

// Load environment variables
dotenv.config();

import { loadConfig } from './config';
import { SplitLedger } from './core/ledger';
import { InMemoryCustody } from './modules/custody';
import { createApp } from './api';

async function bootstrap(): Promise<void> {
  console.log('='.repeat(60));
  console.log('  TEAM SPLIT LEDGER');
  console.log('='.repeat(60));

  const config = loadConfig();

  // Only the in-memory custody ships; deposits arrive through the API
  console.log('[Boot] Initializing custody...');
  const custody = new InMemoryCustody();

  console.log('[Boot] Initializing ledger...');
  const ledger = SplitLedger.create({
    members: config.members,
    creator: config.owner,
    custody,
    accounting: config.accounting,
  });

  const app = createApp({
    ledger,
    custody,
    adminApiKey: config.adminApiKey,
    rateLimitPerMinute: config.rateLimitPerMinute,
  });

  const server = app.listen(config.port, () => {
    console.log(`\n[Boot] Server listening on port ${config.port}`);
    console.log(`  - Health: http://localhost:${config.port}/health`);
    console.log(`  - Ledger: http://localhost:${config.port}/v1/ledger`);
  });

  const shutdown = (signal: string): void => {
    console.log(`\n[Shutdown] Received ${signal}, shutting down gracefully...`);
    server.close(() => {
      console.log('[Shutdown] HTTP server closed');
      process.exit(0);
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

bootstrap().catch((error) => {
  console.error('[Boot] Fatal error during startup:', error);
  process.exit(1);
});
