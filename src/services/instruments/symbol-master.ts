// Broker symbol-master CSV loading with file-version caching

import { readFileSync, statSync } from 'fs';
import { join } from 'path';
import { SYMBOL_MASTER_FILES } from '../../lib/config';
import { errorMessage, logger } from '../../lib/logger';
import { toIsoDate } from './option-symbol';
import type { Exchange } from '../../types';
import type { SymbolMasterRow } from './types';

// Column positions in the headerless broker CSV
const COL = {
  description: 1,
  segmentCode: 2,
  lotSize: 3,
  tradableSymbol: 9,
  exchangeToken: 12,
  underlying: 13,
  strike: 15,
  optionType: 16,
} as const;

const MIN_COLUMNS = COL.optionType + 1;

const MONTHS: Record<string, number> = {
  JAN: 1, FEB: 2, MAR: 3, APR: 4, MAY: 5, JUN: 6,
  JUL: 7, AUG: 8, SEP: 9, OCT: 10, NOV: 11, DEC: 12,
};

/** "BANKNIFTY 24 Nov 13 52500 CE" → "2024-11-13" */
export function parseDescriptionExpiry(description: string): string | null {
  const match = /(\d{2}) ([A-Za-z]{3}) (\d{2})/.exec(description);
  if (!match) return null;
  const month = MONTHS[match[2].toUpperCase()];
  if (!month) return null;
  return toIsoDate(Number(match[1]), month, Number(match[3]));
}

/** Parse one CSV line; rows with missing or non-numeric key columns are dropped */
export function parseSymbolMasterLine(line: string): SymbolMasterRow | null {
  const cols = line.split(',').map((c) => c.trim());
  if (cols.length < MIN_COLUMNS) return null;

  const segmentCode = Number(cols[COL.segmentCode]);
  const lotSize = Number(cols[COL.lotSize]);
  const exchangeToken = Number(cols[COL.exchangeToken]);
  const strike = Number(cols[COL.strike]);
  const tradableSymbol = cols[COL.tradableSymbol];

  if (!Number.isFinite(segmentCode) || !Number.isInteger(lotSize) || lotSize <= 0) return null;
  if (!Number.isFinite(exchangeToken) || !Number.isFinite(strike) || !tradableSymbol) return null;

  const description = cols[COL.description];
  return {
    description,
    segmentCode,
    lotSize,
    tradableSymbol,
    exchangeToken,
    underlying: cols[COL.underlying].toUpperCase(),
    strike,
    optionType: cols[COL.optionType].toUpperCase(),
    expiryDate: parseDescriptionExpiry(description),
  };
}

export function parseSymbolMaster(content: string): SymbolMasterRow[] {
  const rows: SymbolMasterRow[] = [];
  for (const line of content.split('\n')) {
    if (!line.trim()) continue;
    const row = parseSymbolMasterLine(line);
    if (row) rows.push(row);
  }
  return rows;
}

interface CachedTable {
  mtimeMs: number;
  size: number;
  rows: SymbolMasterRow[];
}

export type TableLoadResult =
  | { ok: true; rows: SymbolMasterRow[]; reloaded: boolean }
  | { ok: false; error: string };

/**
 * Per-exchange symbol-master tables read from `dir`. A table is re-read
 * whenever the file's mtime or size changes.
 */
export class SymbolMaster {
  private readonly tables = new Map<Exchange, CachedTable>();

  constructor(readonly dir: string) {}

  pathFor(exchange: Exchange): string {
    return join(this.dir, SYMBOL_MASTER_FILES[exchange].filename);
  }

  load(exchange: Exchange): TableLoadResult {
    const path = this.pathFor(exchange);

    let mtimeMs: number;
    let size: number;
    try {
      ({ mtimeMs, size } = statSync(path));
    } catch (error) {
      this.tables.delete(exchange);
      return { ok: false, error: `Symbol master not available at ${path}: ${errorMessage(error)}` };
    }

    const cached = this.tables.get(exchange);
    if (cached && cached.mtimeMs === mtimeMs && cached.size === size) {
      return { ok: true, rows: cached.rows, reloaded: false };
    }

    let content: string;
    try {
      content = readFileSync(path, 'utf-8');
    } catch (error) {
      this.tables.delete(exchange);
      return { ok: false, error: `Symbol master unreadable at ${path}: ${errorMessage(error)}` };
    }

    const rows = parseSymbolMaster(content);
    this.tables.set(exchange, { mtimeMs, size, rows });
    logger.info('Symbol master loaded', { exchange, path, rows: rows.length });
    return { ok: true, rows, reloaded: true };
  }
}
