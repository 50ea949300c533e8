/**
 * UAE Mortgage Advisor - Database Connection
 *
 * One shared pg Pool for lead storage. Without DATABASE_URL there is no pool
 * and leads stay in memory.
 */

import { Pool } from 'pg';

let pool: Pool | null = null;

export function getPool(databaseUrl: string | undefined = process.env.DATABASE_URL): Pool | null {
  if (pool) {
    return pool;
  }
  if (!databaseUrl) {
    return null;
  }

  pool = new Pool({ connectionString: databaseUrl, max: 10, connectionTimeoutMillis: 2000 });
  pool.on('error', (err) => {
    console.error('[Database] Idle client error:', err);
  });
  return pool;
}

export async function closePool(): Promise<void> {
  if (pool) {
    const closing = pool;
    pool = null;
    await closing.end();
    console.log('[Database] Connection pool closed');
  }
}

/**
 * Boot check: true when there is no database to reach, or it answers.
 */
export async function testConnection(databaseUrl: string | undefined = process.env.DATABASE_URL): Promise<boolean> {
  const p = getPool(databaseUrl);
  if (!p) {
    console.warn('[Database] DATABASE_URL not set - leads will be kept in memory');
    return true;
  }

  try {
    await p.query('SELECT 1');
    console.log('[Database] Connection OK');
    return true;
  } catch (error) {
    console.error('[Database] Connection test failed:', error);
    return false;
  }
}
