// Instrument resolution against the broker symbol master

import { SYMBOL_MASTER_FILES } from '../../lib/config';
import { logger } from '../../lib/logger';
import { localDate } from '../../lib/market-time';
import { decomposeOptionSymbol } from './option-symbol';
import { SymbolMaster } from './symbol-master';
import {
  BROKER_SEGMENTS,
  BSE_UNDERLYING_ALIASES,
  type BrokerIdsResult,
  type ResolveFailureReason,
  type ResolveRequest,
  type ResolveResult,
  type SymbolMasterRow,
} from './types';
import type { Exchange } from '../../types';

export const DEFAULT_MEMO_SIZE = 100;

export function isExchange(value: string): value is Exchange {
  return Object.hasOwn(SYMBOL_MASTER_FILES, value);
}

export interface InstrumentResolverOptions {
  memoSize?: number;
  /** Local trading date (YYYY-MM-DD); defaults to the UTC+05:30 calendar date */
  today?: () => string;
}

function fail(reason: ResolveFailureReason, error: string): ResolveResult {
  return { ok: false, reason, error };
}

export class InstrumentResolver {
  private readonly memo = new Map<string, ResolveResult>();
  private readonly memoSize: number;
  private readonly today: () => string;

  constructor(
    private readonly symbols: SymbolMaster,
    options: InstrumentResolverOptions = {}
  ) {
    this.memoSize = options.memoSize ?? DEFAULT_MEMO_SIZE;
    this.today = options.today ?? (() => localDate());
  }

  /** Number of memoized results, for diagnostics */
  get memoEntries(): number {
    return this.memo.size;
  }

  /**
   * Map a normalized ticker to a concrete contract. Never throws; every
   * failure comes back as `{ ok: false, reason }`.
   */
  resolve(request: ResolveRequest): ResolveResult {
    const exchange = request.exchange.toUpperCase();
    if (!isExchange(exchange)) {
      return fail('reference_data_unavailable', `No symbol master configured for exchange ${request.exchange}`);
    }

    const table = this.symbols.load(exchange);
    if (!table.ok) {
      this.dropExchange(exchange);
      logger.warn('Symbol master unavailable', { exchange, error: table.error });
      return fail('reference_data_unavailable', table.error);
    }
    if (table.reloaded) {
      this.dropExchange(exchange);
    }

    const today = this.today();
    const key = [exchange, request.rawSymbol, request.isFuture ? 'FUT' : 'OPT', today].join('|');
    const memoized = this.memo.get(key);
    if (memoized) {
      // refresh recency
      this.memo.delete(key);
      this.memo.set(key, memoized);
      return memoized;
    }

    const result = request.isFuture
      ? this.resolveFuture(exchange, request.rawSymbol, table.rows, today)
      : this.resolveOption(exchange, request.rawSymbol, table.rows);

    this.remember(key, result);
    return result;
  }

  /**
   * Second lookup for brokers that address instruments by segment and numeric id.
   * Fails independently of {@link resolve}.
   */
  lookupBrokerIds(exchange: Exchange, tradableSymbol: string): BrokerIdsResult {
    const table = this.symbols.load(exchange);
    if (!table.ok) {
      return { ok: false, reason: 'reference_data_unavailable', error: table.error };
    }
    const row = table.rows.find((r) => r.tradableSymbol === tradableSymbol);
    if (!row) {
      return { ok: false, reason: 'not_found', error: `No instrument id for ${tradableSymbol}` };
    }
    return { ok: true, brokerSegment: BROKER_SEGMENTS[exchange], brokerInstrumentId: row.exchangeToken };
  }

  private resolveFuture(exchange: Exchange, underlying: string, rows: SymbolMasterRow[], today: string): ResolveResult {
    const segmentCode = SYMBOL_MASTER_FILES[exchange].segmentCode;
    const wanted = underlying.toUpperCase();

    const candidates = rows
      .filter(
        (r) =>
          r.segmentCode === segmentCode &&
          r.underlying === wanted &&
          r.optionType !== 'CE' &&
          r.optionType !== 'PE' &&
          r.expiryDate !== null &&
          r.expiryDate >= today
      )
      .sort((a, b) => (a.expiryDate ?? '').localeCompare(b.expiryDate ?? ''));

    const row = candidates[0];
    if (!row || row.expiryDate === null) {
      return fail('not_found', `No live future for ${wanted} on ${exchange}`);
    }
    return {
      ok: true,
      instrument: {
        tradableSymbol: row.tradableSymbol,
        underlying: row.underlying,
        lotSize: row.lotSize,
        expiryDate: row.expiryDate,
        exchange,
      },
    };
  }

  private resolveOption(exchange: Exchange, rawSymbol: string, rows: SymbolMasterRow[]): ResolveResult {
    const option = decomposeOptionSymbol(rawSymbol);
    if (!option) {
      return fail('bad_symbol_format', `Cannot decompose option symbol ${rawSymbol}`);
    }

    let underlying = option.underlying;
    if (exchange === 'BSE') {
      const alias = BSE_UNDERLYING_ALIASES[underlying];
      if (!alias) {
        return fail('unsupported_underlying', `BSE underlying ${underlying} is not supported`);
      }
      underlying = alias;
    }

    const strike = Number(option.strike);
    const row = rows.find(
      (r) =>
        r.underlying === underlying &&
        r.strike === strike &&
        r.optionType === option.optionType &&
        r.expiryDate === option.expiryDate
    );
    if (!row) {
      return fail(
        'not_found',
        `No ${underlying} ${option.expiryDate} ${option.strike} ${option.optionType} on ${exchange}`
      );
    }
    return {
      ok: true,
      instrument: {
        tradableSymbol: row.tradableSymbol,
        underlying: row.underlying,
        lotSize: row.lotSize,
        expiryDate: option.expiryDate,
        exchange,
      },
    };
  }

  private remember(key: string, result: ResolveResult): void {
    this.memo.set(key, result);
    while (this.memo.size > this.memoSize) {
      const oldest = this.memo.keys().next();
      if (oldest.done) break;
      this.memo.delete(oldest.value);
    }
  }

  private dropExchange(exchange: Exchange): void {
    const prefix = `${exchange}|`;
    for (const key of [...this.memo.keys()]) {
      if (key.startsWith(prefix)) {
        this.memo.delete(key);
      }
    }
  }
}
