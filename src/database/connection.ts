/**
 * Credit Decision Engine - Database Connection
 * PostgreSQL connection pool management
 *
 * MOCK MODE: If DATABASE_URL is not set, the service runs on the in-memory
 * repository and no pool is created.
 */

import { Pool } from 'pg';

const DEFAULT_POOL_MAX = 20;

let pool: Pool | null = null;
let mockMode = false;

export function isMockMode(): boolean {
  return mockMode;
}

export function poolSizeFromEnv(value: string | undefined): number {
  const parsed = parseInt(value || '', 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : DEFAULT_POOL_MAX;
}

export function getPool(): Pool | null {
  if (mockMode) {
    return null;
  }

  if (!pool) {
    if (!process.env.DATABASE_URL) {
      console.warn('[Database] DATABASE_URL not set - running in MOCK MODE');
      mockMode = true;
      return null;
    }

    pool = new Pool({
      connectionString: process.env.DATABASE_URL,
      max: poolSizeFromEnv(process.env.DB_POOL_MAX),
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    });

    pool.on('error', (err) => {
      console.error('[Database] Unexpected error on idle client:', err);
    });
  }

  return pool;
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    console.log('[Database] Connection pool closed');
  }
}

export async function testConnection(): Promise<boolean> {
  const p = getPool();
  if (!p) {
    return true; // Mock mode
  }

  try {
    const result = await p.query<{ now: Date }>('SELECT NOW() AS now');
    console.log('[Database] Connection test successful:', result.rows[0].now);
    return true;
  } catch (error) {
    console.error('[Database] Connection test failed:', error);
    return false;
  }
}
