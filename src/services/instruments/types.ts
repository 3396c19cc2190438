// Instrument resolution types

import type { Exchange } from '../../types';

export type OptionType = 'CE' | 'PE';

/** Broker exchange segment names used by the XTS interactive API */
export type BrokerSegment = 'NSEFO' | 'BSEFO' | 'MCXFO';

export const BROKER_SEGMENTS: Record<Exchange, BrokerSegment> = {
  NSE: 'NSEFO',
  BSE: 'BSEFO',
  MCX: 'MCXFO',
};

/** BSE index tickers used on charts mapped to the underlying in the symbol master */
export const BSE_UNDERLYING_ALIASES: Record<string, string> = {
  BSX: 'SENSEX',
  BKX: 'BANKEX',
};

/**
 * One row of a broker symbol-master CSV, restricted to the columns the router reads
 */
export interface SymbolMasterRow {
  /** e.g. "BANKNIFTY 24 Nov 13 52500 CE" */
  description: string;
  segmentCode: number;
  lotSize: number;
  /** e.g. "NSE:BANKNIFTY24N1352500CE" */
  tradableSymbol: string;
  exchangeToken: number;
  underlying: string;
  strike: number;
  /** `CE`, `PE`, or `XX` for futures */
  optionType: string;
  /** YYYY-MM-DD parsed from the description, null when it carries no date */
  expiryDate: string | null;
}

export interface OptionDescriptor {
  underlying: string;
  /** YYYY-MM-DD */
  expiryDate: string;
  optionType: OptionType;
  /** Integer strike without leading zeros */
  strike: string;
}

export interface ResolveRequest {
  exchange: string;
  rawSymbol: string;
  isFuture: boolean;
}

export interface ResolvedInstrument {
  /** Broker-tradable symbol, also the ledger and position key */
  tradableSymbol: string;
  underlying: string;
  lotSize: number;
  expiryDate: string;
  exchange: Exchange;
  brokerSegment?: BrokerSegment;
  brokerInstrumentId?: number;
}

export type ResolveFailureReason =
  | 'reference_data_unavailable'
  | 'not_found'
  | 'bad_symbol_format'
  | 'unsupported_underlying';

export type ResolveResult =
  | { ok: true; instrument: ResolvedInstrument }
  | { ok: false; reason: ResolveFailureReason; error: string };

export type BrokerIdsResult =
  | { ok: true; brokerSegment: BrokerSegment; brokerInstrumentId: number }
  | { ok: false; reason: ResolveFailureReason; error: string };
