// Option ticker decomposition

import type { OptionDescriptor, OptionType } from './types';

// NIFTY241128C24000: underlying, YY, MM, DD, C|P, strike
const DATED_FORM = /^([A-Z]+)(\d{2})(\d{2})(\d{2})([CP])(\d+)$/;

// BANKNIFTY24N1352500CE: underlying, YY, month code, DD, strike, CE|PE
const WEEKLY_FORM = /^([A-Z]+)(\d{2})([1-9OND])(\d{2})(\d+)(CE|PE)$/;

const MONTH_CODES: Record<string, number> = {
  O: 10,
  N: 11,
  D: 12,
};

function monthFromCode(code: string): number {
  return MONTH_CODES[code] ?? Number(code);
}

/** YYYY-MM-DD for a two-digit year, or null when the date does not exist */
export function toIsoDate(yy: number, month: number, day: number): string | null {
  const year = 2000 + yy;
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date.toISOString().slice(0, 10);
}

function normalizeStrike(strike: string): string {
  return String(parseInt(strike, 10));
}

/**
 * Split an option ticker into underlying, expiry, type and strike.
 * Accepts the chart form `NIFTY241128C24000` and the broker weekly form
 * `BANKNIFTY24N1352500CE`. Returns null for anything else.
 */
export function decomposeOptionSymbol(symbol: string): OptionDescriptor | null {
  const value = symbol.trim().toUpperCase();

  const dated = DATED_FORM.exec(value);
  if (dated) {
    const [, underlying, yy, mm, dd, cp, strike] = dated;
    const expiryDate = toIsoDate(Number(yy), Number(mm), Number(dd));
    if (!expiryDate) return null;
    const optionType: OptionType = cp === 'C' ? 'CE' : 'PE';
    return { underlying, expiryDate, optionType, strike: normalizeStrike(strike) };
  }

  const weekly = WEEKLY_FORM.exec(value);
  if (weekly) {
    const [, underlying, yy, code, dd, strike, type] = weekly;
    const expiryDate = toIsoDate(Number(yy), monthFromCode(code), Number(dd));
    if (!expiryDate) return null;
    const optionType: OptionType = type === 'CE' ? 'CE' : 'PE';
    return { underlying, expiryDate, optionType, strike: normalizeStrike(strike) };
  }

  return null;
}
