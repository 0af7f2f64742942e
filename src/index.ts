/**
 * Credit Decision Engine - Main Entry Point
 *
 * Loan eligibility checks and credit decisions over HTTP.
 */

import * as dotenv from 'dotenv';

// Load environment variables
dotenv.config();

// Database
import { getPool, testConnection, closePool, isMockMode } from './database';

// Modules
import {
  CreditRepository,
  InMemoryCreditRepository,
  loadSeedFile,
  OriginationService,
  PgCreditRepository,
  pgConnectionSource,
} from './modules/loans';

import { createApp, rateLimitFromEnv } from './app';

async function bootstrap(): Promise<void> {
  console.log('='.repeat(60));
  console.log('  CREDIT DECISION ENGINE');
  console.log('='.repeat(60));

  console.log('\n[Boot] Testing database connection...');
  const dbConnected = await testConnection();
  if (!dbConnected) {
    console.error('[Boot] FATAL: Database connection failed');
    process.exit(1);
  }

  const pool = getPool();

  console.log('[Boot] Initializing repository...');
  let repository: CreditRepository;
  if (pool) {
    repository = new PgCreditRepository(pgConnectionSource(pool));
  } else {
    console.warn('[Boot] Using in-memory repository; data is lost on restart');
    const memory = new InMemoryCreditRepository();
    if (process.env.SEED_FILE) {
      const loaded = loadSeedFile(memory, process.env.SEED_FILE);
      console.log(`[Boot] Seeded ${loaded.customers} customers and ${loaded.loans} loans from ${process.env.SEED_FILE}`);
    } else {
      console.warn('[Boot] No SEED_FILE set: the repository starts empty and every lookup returns 404');
    }
    repository = memory;
  }

  const originationService = new OriginationService(repository);

  console.log('[Boot] Configuring Express server...');
  const app = createApp({
    originationService,
    mode: isMockMode() ? 'mock' : 'postgres',
    rateLimitPerMinute: rateLimitFromEnv(process.env.RATE_LIMIT_PER_MINUTE),
  });

  const port = parseInt(process.env.PORT || '3001', 10);
  const server = app.listen(port, () => {
    console.log(`\n[Boot] Server listening on port ${port}`);
    console.log('[Boot] Endpoints:');
    console.log(`  - Health: http://localhost:${port}/health`);
    console.log(`  - API:    http://localhost:${port}/api/v1/*`);
  });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    console.log(`\n[Shutdown] Received ${signal}, shutting down gracefully...`);

    server.close(() => {
      console.log('[Shutdown] HTTP server closed');
    });

    await closePool();

    console.log('[Shutdown] Complete');
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((error) => {
      console.error('[Shutdown] Failed:', error);
      process.exit(1);
    });
  };

  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));

  console.log('\n[Boot] Ready to decide loans');
}

// Run
bootstrap().catch((error) => {
  console.error('[Boot] Fatal error during startup:', error);
  process.exit(1);
});
