// Ordered SQL migrations for the ledger and audit tables

import { readFileSync, readdirSync } from 'fs';
import { join } from 'path';
import { execute, query, isDatabaseConfigured } from './db';
import { errorMessage, logger } from './logger';

export interface MigrationResult {
  applied: string[];
  skipped: string[];
  error?: string;
}

export interface MigrationPlan {
  pending: { name: string; file: string }[];
  done: string[];
}

/** `.sql` files in the directory, in name order. A missing directory yields none. */
export function getMigrationFiles(migrationsDir: string): string[] {
  try {
    return readdirSync(migrationsDir)
      .filter((f) => f.endsWith('.sql'))
      .sort();
  } catch {
    return [];
  }
}

/** Split a migration file into statements, dropping comment-only fragments */
export function splitStatements(sql: string): string[] {
  return sql
    .split(';')
    .map((chunk) =>
      chunk
        .split('\n')
        .filter((line) => !line.trim().startsWith('--'))
        .join('\n')
        .trim()
    )
    .filter((statement) => statement.length > 0);
}

export function planMigrations(files: string[], alreadyApplied: Iterable<string>): MigrationPlan {
  const applied = new Set(alreadyApplied);
  const plan: MigrationPlan = { pending: [], done: [] };
  for (const file of files) {
    const name = file.replace(/\.sql$/, '');
    if (applied.has(name)) {
      plan.done.push(name);
    } else {
      plan.pending.push({ name, file });
    }
  }
  return plan;
}

async function appliedNames(): Promise<string[]> {
  await query`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      name TEXT PRIMARY KEY,
      statements INTEGER NOT NULL,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `;
  const rows = await query<{ name: string }>`SELECT name FROM schema_migrations`;
  return rows.map((row) => row.name);
}

export async function runMigrations(migrationsDir: string): Promise<MigrationResult> {
  const result: MigrationResult = { applied: [], skipped: [] };

  if (!isDatabaseConfigured()) {
    result.error = 'Database not configured - missing DATABASE_URL environment variable';
    return result;
  }

  try {
    const plan = planMigrations(getMigrationFiles(migrationsDir), await appliedNames());
    result.skipped = plan.done;

    for (const { name, file } of plan.pending) {
      const statements = splitStatements(readFileSync(join(migrationsDir, file), 'utf-8'));
      for (const statement of statements) {
        await execute(statement);
      }
      await query`INSERT INTO schema_migrations (name, statements) VALUES (${name}, ${statements.length})`;

      result.applied.push(name);
      logger.info('Migration applied', { name, statements: statements.length });
    }

    return result;
  } catch (error) {
    result.error = errorMessage(error, 'Unknown migration error');
    logger.error('Migration failed', { error: result.error, applied: result.applied });
    return result;
  }
}
