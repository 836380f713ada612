/**
 * PostgreSQL access through Drizzle over a pg Pool
 * Master data: users and contacts
 */

import { readFile } from 'fs/promises';
import pg from 'pg';
import type { Pool } from 'pg';
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import type { Config } from '../../config/index.js';
import { createLogger } from '../logging/logger.js';
import * as schema from './schema.js';

const logger = createLogger('postgres-client');

const SCHEMA_FILE = new URL('../../../sql/schema.sql', import.meta.url);

export type Database = NodePgDatabase<typeof schema>;

export interface PostgresConnection {
  readonly pool: Pool;
  readonly db: Database;
}

export function createPostgresConnection(config: Config): PostgresConnection {
  const pool = new pg.Pool({
    connectionString: config.postgres.url,
    max: config.postgres.poolSize,
    connectionTimeoutMillis: config.postgres.connectionTimeoutMs,
    statement_timeout: config.postgres.statementTimeoutMs,
    query_timeout: config.postgres.statementTimeoutMs + 1000,
    idleTimeoutMillis: 30000,
  });

  pool.on('error', (error: Error) => {
    logger.error({ error: error.message }, 'Idle PostgreSQL client error');
  });

  return { pool, db: drizzle(pool, { schema }) };
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Connect to PostgreSQL with retries
 */
export async function connectPostgresWithRetry(connection: PostgresConnection, maxRetries = 10): Promise<void> {
  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      await connection.pool.query('SELECT 1');
      logger.info('PostgreSQL connected');
      return;
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      logger.warn({ attempt, maxRetries, error: errorMessage }, 'PostgreSQL connection attempt failed');

      if (attempt === maxRetries) {
        throw new Error(`PostgreSQL connection failed after ${maxRetries} attempts: ${errorMessage}`);
      }

      await sleep(2000);
    }
  }
}

/**
 * Create tables and indexes if they do not exist yet
 */
export async function ensureSchema(connection: PostgresConnection): Promise<void> {
  const ddl = await readFile(SCHEMA_FILE, 'utf-8');
  await connection.pool.query(ddl);
  logger.info('Database schema ensured');
}

export async function pingPostgres(connection: PostgresConnection): Promise<void> {
  await connection.pool.query('SELECT 1');
}

export async function closePostgresConnection(connection: PostgresConnection): Promise<void> {
  await connection.pool.end();
  logger.info('PostgreSQL pool closed');
}

/**
 * Unique constraint violation (SQLSTATE 23505), possibly wrapped by the ORM
 */
export function isUniqueViolation(error: unknown): boolean {
  let current: unknown = error;
  for (let depth = 0; depth < 3 && typeof current === 'object' && current !== null; depth++) {
    if ('code' in current && current.code === '23505') {
      return true;
    }
    current = 'cause' in current ? current.cause : undefined;
  }
  return false;
}
