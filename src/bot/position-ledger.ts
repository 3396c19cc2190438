// Position ledger - durable net lots per broker instrument

import { randomUUID } from 'crypto';
import { setTimeout as sleep } from 'timers/promises';
import { query } from '../lib/db';
import { errorMessage, logger } from '../lib/logger';
import type { LedgerRow } from '../types/database';
import { KeyedMutex } from './keyed-mutex';
import type { BrokerName } from './types';

export interface PositionLedger {
  /**
   * Run `fn` as the only reader-writer of the key among everyone sharing
   * this ledger. Different keys never wait on each other.
   */
  withLock<T>(key: string, fn: () => Promise<T>): Promise<T>;
  /** Net lots for the key, 0 when nothing is recorded */
  get(key: string): Promise<number>;
  set(key: string, lots: number): Promise<void>;
  clear(key: string): Promise<void>;
  listAll(): Promise<Record<string, number>>;
  clearAll(): Promise<void>;
}

/** `fyers/NSE:NIFTY24NOVFUT`; each broker account keeps its own book */
export function ledgerKey(broker: BrokerName, tradableSymbol: string): string {
  return `${broker}/${tradableSymbol}`;
}

export interface LeaseOptions {
  /** Lease lifetime; must outlast a decide-and-execute run */
  ttlMs: number;
  /** Pause between attempts while another instance holds the key */
  retryMs: number;
  /** Give up after waiting this long */
  waitMs: number;
}

const DEFAULT_LEASE: LeaseOptions = { ttlMs: 120_000, retryMs: 250, waitMs: 60_000 };

/**
 * Ledger stored in `position_ledger`. Zero is stored as a deleted row so
 * `listAll` only returns open positions.
 *
 * Keys are locked with a lease row in `instrument_locks`, so router
 * instances sharing the database serialize on the same instrument.
 */
export class PostgresPositionLedger implements PositionLedger {
  private readonly local = new KeyedMutex();
  private readonly lease: LeaseOptions;

  constructor(lease: Partial<LeaseOptions> = {}) {
    this.lease = { ...DEFAULT_LEASE, ...lease };
  }

  async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    // queue locally first so one process never polls against itself
    return this.local.run(key, async () => {
      const holder = await this.acquire(key);
      try {
        return await fn();
      } finally {
        await this.release(key, holder);
      }
    });
  }

  private async acquire(key: string): Promise<string> {
    const holder = randomUUID();
    const deadline = Date.now() + this.lease.waitMs;

    for (;;) {
      const rows = await query<{ holder: string }>`
        INSERT INTO instrument_locks (instrument_key, holder, expires_at)
        VALUES (${key}, ${holder}, NOW() + make_interval(secs => ${this.lease.ttlMs / 1000}))
        ON CONFLICT (instrument_key)
        DO UPDATE SET holder = EXCLUDED.holder, expires_at = EXCLUDED.expires_at
        WHERE instrument_locks.expires_at < NOW()
        RETURNING holder
      `;
      if (rows[0]?.holder === holder) {
        return holder;
      }
      if (Date.now() >= deadline) {
        throw new Error(`Instrument ${key} is locked by another router instance`);
      }
      logger.debug('Instrument locked elsewhere, waiting', { key });
      await sleep(this.lease.retryMs);
    }
  }

  private async release(key: string, holder: string): Promise<void> {
    try {
      await query`DELETE FROM instrument_locks WHERE instrument_key = ${key} AND holder = ${holder}`;
    } catch (error) {
      // the lease expires on its own
      logger.error('Instrument lock not released', { key, error: errorMessage(error) });
    }
  }
  async get(key: string): Promise<number> {
    const rows = await query<Pick<LedgerRow, 'net_lots'>>`
      SELECT net_lots FROM position_ledger WHERE instrument_key = ${key}
    `;
    return rows[0]?.net_lots ?? 0;
  }

  async set(key: string, lots: number): Promise<void> {
    if (lots === 0) {
      await this.clear(key);
      return;
    }
    await query`
      INSERT INTO position_ledger (instrument_key, net_lots, updated_at)
      VALUES (${key}, ${lots}, NOW())
      ON CONFLICT (instrument_key)
      DO UPDATE SET net_lots = EXCLUDED.net_lots, updated_at = NOW()
    `;
    logger.debug('Ledger updated', { key, lots });
  }

  async clear(key: string): Promise<void> {
    await query`DELETE FROM position_ledger WHERE instrument_key = ${key}`;
    logger.debug('Ledger cleared', { key });
  }

  async listAll(): Promise<Record<string, number>> {
    const rows = await query<Pick<LedgerRow, 'instrument_key' | 'net_lots'>>`
      SELECT instrument_key, net_lots FROM position_ledger ORDER BY instrument_key
    `;
    const result: Record<string, number> = {};
    for (const row of rows) {
      result[row.instrument_key] = row.net_lots;
    }
    return result;
  }

  async clearAll(): Promise<void> {
    await query`DELETE FROM position_ledger`;
    logger.info('Ledger cleared for all instruments');
  }
}

/** Process-local ledger for dry runs and tests */
export class MemoryPositionLedger implements PositionLedger {
  private readonly positions = new Map<string, number>();
  private readonly locks = new KeyedMutex();

  constructor(initial: Record<string, number> = {}) {
    for (const [key, lots] of Object.entries(initial)) {
      if (lots !== 0) this.positions.set(key, lots);
    }
  }

  withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    return this.locks.run(key, fn);
  }

  async get(key: string): Promise<number> {
    return this.positions.get(key) ?? 0;
  }

  async set(key: string, lots: number): Promise<void> {
    if (lots === 0) {
      this.positions.delete(key);
    } else {
      this.positions.set(key, lots);
    }
  }

  async clear(key: string): Promise<void> {
    this.positions.delete(key);
  }

  async listAll(): Promise<Record<string, number>> {
    return Object.fromEntries([...this.positions.entries()].sort(([a], [b]) => a.localeCompare(b)));
  }

  async clearAll(): Promise<void> {
    this.positions.clear();
  }
}
