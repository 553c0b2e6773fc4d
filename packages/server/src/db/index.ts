import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import pg from 'pg';
import type { Logger } from '@flowrelay/runtime';
import * as schema from './schema.js';

export type Database = NodePgDatabase<typeof schema>;

// Connection pool sized for a single service instance shared by every tenant
export function createPool(connectionString: string, logger: Logger): pg.Pool {
  const pool = new pg.Pool({
    connectionString,
    max: 20, // Maximum number of clients in the pool
    idleTimeoutMillis: 30000, // Close idle clients after 30 seconds
    connectionTimeoutMillis: 5000, // Return error after 5 seconds if connection cannot be established
  });

  // Idle clients can error when the server goes away; the pool replaces them
  pool.on('error', (err) => {
    logger.error({ err }, 'Unexpected error on idle database client');
  });

  return pool;
}

export function createDatabase(pool: pg.Pool): Database {
  return drizzle(pool, { schema });
}

// Health check function
export async function checkDatabaseConnection(pool: pg.Pool, logger?: Logger): Promise<boolean> {
  try {
    const client = await pool.connect();
    try {
      await client.query('SELECT 1');
    } finally {
      client.release();
    }
    return true;
  } catch (error) {
    logger?.debug({ err: error }, 'Database connection check failed');
    return false;
  }
}

// Graceful shutdown
export async function closeDatabaseConnection(pool: pg.Pool): Promise<void> {
  await pool.end();
}

export * from './schema.js';
