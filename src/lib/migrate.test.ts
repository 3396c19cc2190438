import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { fileURLToPath } from 'url';
import { getMigrationFiles, planMigrations, runMigrations, splitStatements } from './migrate';

const mockSqlFn = vi.fn();
vi.mock('@neondatabase/serverless', () => ({
  neon: vi.fn(() => mockSqlFn),
  neonConfig: {},
}));

const migrationsDir = fileURLToPath(new URL('../../migrations', import.meta.url));

describe('migrate', () => {
  beforeEach(() => {
    delete process.env.DATABASE_URL;
    mockSqlFn.mockReset();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    delete process.env.DATABASE_URL;
  });

  describe('getMigrationFiles', () => {
    it('lists the ledger and audit migrations in order', () => {
      expect(getMigrationFiles(migrationsDir)).toEqual([
        '001_create_position_ledger.sql',
        '002_create_signal_audit.sql',
        '003_create_instrument_locks.sql',
      ]);
    });

    it('returns empty array for non-existent directory', () => {
      expect(getMigrationFiles('/nonexistent/path')).toEqual([]);
    });
  });

  describe('splitStatements', () => {
    it('drops comment lines and empty fragments', () => {
      const sql = '-- header\nCREATE TABLE a (id INT);\n\n-- second\nCREATE INDEX i ON a (id);\n';
      expect(splitStatements(sql)).toEqual(['CREATE TABLE a (id INT)', 'CREATE INDEX i ON a (id)']);
    });
  });

  describe('planMigrations', () => {
    it('separates applied names from pending files', () => {
      const plan = planMigrations(['001_a.sql', '002_b.sql', '003_c.sql'], ['002_b']);

      expect(plan.done).toEqual(['002_b']);
      expect(plan.pending).toEqual([
        { name: '001_a', file: '001_a.sql' },
        { name: '003_c', file: '003_c.sql' },
      ]);
    });
  });

  describe('runMigrations', () => {
    it('returns error when database is not configured', async () => {
      const result = await runMigrations('/some/path');

      expect(result.error).toBe('Database not configured - missing DATABASE_URL environment variable');
      expect(result.applied).toEqual([]);
      expect(result.skipped).toEqual([]);
    });

    it('applies pending migrations when database is configured', async () => {
      process.env.DATABASE_URL = 'postgres://localhost:5432/test';
      mockSqlFn.mockResolvedValue([]);

      const result = await runMigrations(migrationsDir);

      expect(result.error).toBeUndefined();
      expect(result.applied).toEqual([
        '001_create_position_ledger',
        '002_create_signal_audit',
        '003_create_instrument_locks',
      ]);
      expect(result.skipped).toEqual([]);
      // tracking table, applied list, 1 + insert, 3 + insert, 1 + insert
      expect(mockSqlFn).toHaveBeenCalledTimes(10);
    });

    it('skips already-applied migrations', async () => {
      process.env.DATABASE_URL = 'postgres://localhost:5432/test';
      mockSqlFn
        .mockResolvedValueOnce([])
        .mockResolvedValueOnce([{ name: '001_create_position_ledger' }])
        .mockResolvedValue([]);

      const result = await runMigrations(migrationsDir);

      expect(result.error).toBeUndefined();
      expect(result.applied).toEqual(['002_create_signal_audit', '003_create_instrument_locks']);
      expect(result.skipped).toEqual(['001_create_position_ledger']);
    });

    it('reports database errors in the result', async () => {
      process.env.DATABASE_URL = 'postgres://localhost:5432/test';
      mockSqlFn.mockRejectedValueOnce(new Error('Connection refused'));

      const result = await runMigrations(migrationsDir);

      expect(result.error).toBe('Connection refused');
      expect(result.applied).toEqual([]);
    });
  });
});
