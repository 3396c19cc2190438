// Neon serverless Postgres access for the ledger and audit tables

import { neon, type NeonQueryFunction } from '@neondatabase/serverless';
import { errorMessage, logger } from './logger';
import type { DatabaseStatus } from '../types';

const NOT_CONFIGURED = 'Database not configured - missing DATABASE_URL environment variable';

let sqlInstance: NeonQueryFunction<false, false> | null = null;

function getDatabaseUrl(): string | undefined {
  return (
    process.env.DATABASE_URL?.trim() ||
    process.env.POSTGRES_URL?.trim() ||
    process.env.POSTGRES_URL_NON_POOLING?.trim()
  );
}

/**
 * Lazily create the query function so importing this module never needs a
 * connection string.
 */
function getSql(): NeonQueryFunction<false, false> {
  if (sqlInstance) {
    return sqlInstance;
  }

  const connectionString = getDatabaseUrl();
  if (!connectionString) {
    throw new Error(NOT_CONFIGURED);
  }

  sqlInstance = neon(connectionString);
  return sqlInstance;
}

export function isDatabaseConfigured(): boolean {
  return !!getDatabaseUrl();
}

export async function checkDatabaseConnection(): Promise<DatabaseStatus> {
  if (!isDatabaseConfigured()) {
    return { connected: false, error: NOT_CONFIGURED };
  }

  const started = Date.now();
  try {
    const result = await getSql()`SELECT 1 as health_check`;
    if (result[0]?.health_check === 1) {
      const latencyMs = Date.now() - started;
      logger.debug('Database connection successful', { latencyMs });
      return { connected: true, latencyMs };
    }
    return { connected: false, error: 'Unexpected health check response' };
  } catch (error) {
    const message = errorMessage(error, 'Unknown database error');
    logger.error('Database connection failed', { error: message });
    return { connected: false, error: message };
  }
}

/**
 * Parameterized query through a tagged template.
 *
 * @example
 * const rows = await query`SELECT net_lots FROM position_ledger WHERE instrument_key = ${key}`;
 */
export function query<T = Record<string, unknown>>(
  strings: TemplateStringsArray,
  ...values: unknown[]
): Promise<T[]> {
  const sql = getSql();
  return sql(strings, ...values) as Promise<T[]>;
}

/**
 * Run a statement held in a string, e.g. one read from a migration file.
 * Placeholders are `$1`, `$2`, ...
 */
export async function execute(text: string, values: unknown[] = []): Promise<number> {
  const sql = getSql();
  const rows = await sql(text, values);
  return rows.length;
}

/** Drop the cached query function so the next call re-reads the environment */
export function resetConnection(): void {
  sqlInstance = null;
}
